import { logger } from '../observability/logger';

/**
 * Detached post-response work. Tasks run after the caller has its answer;
 * their failures go to the log and never reach the submitter.
 */
export class BackgroundTaskRunner {
  private readonly pending = new Set<Promise<void>>();
  private readonly log = logger.child({ component: 'background-tasks' });
  private closed = false;
  private failureCount = 0;

  submit(name: string, task: () => Promise<unknown>, context: Record<string, unknown> = {}): void {
    if (this.closed) {
      this.log.warn({ task: name, ...context }, 'Runner closed; background task dropped');
      return;
    }

    const run: Promise<void> = Promise.resolve()
      .then(task)
      .then(
        () => {
          this.log.debug({ task: name, ...context }, 'Background task completed');
        },
        (err) => {
          this.failureCount++;
          this.log.warn({ err, task: name, ...context }, 'Background task failed (non-blocking)');
        },
      )
      .then(() => {
        this.pending.delete(run);
      });
    this.pending.add(run);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get failures(): number {
    return this.failureCount;
  }

  /** Wait until every submitted task, including ones submitted meanwhile, has settled */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(Array.from(this.pending));
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.drain();
  }
}
