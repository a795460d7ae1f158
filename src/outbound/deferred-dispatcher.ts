import { DeferredChannel, EngagementPayload, ImmediateChannel } from './types';
import { logger } from '../observability/logger';

export interface DispatcherOptions {
  intervalMs: number;
  batchSize?: number;
  now?: () => Date;
}

/**
 * Moves due deferred engagements onto the immediate channel on a fixed
 * interval.
 *
 * A task whose publish fails is put back on the deferred channel for the
 * next pass.
 */
export class DeferredEngagementDispatcher {
  private intervalHandle?: NodeJS.Timeout;
  private running = false;
  private readonly log = logger.child({ component: 'deferred-dispatcher' });
  private readonly batchSize: number;
  private readonly now: () => Date;

  constructor(
    private readonly deferred: DeferredChannel,
    private readonly immediate: ImmediateChannel,
    private readonly options: DispatcherOptions,
  ) {
    this.batchSize = options.batchSize ?? 50;
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.intervalHandle) return;
    this.intervalHandle = setInterval(() => {
      this.tick().catch((err) => this.log.error({ err }, 'Deferred dispatch pass failed'));
    }, this.options.intervalMs);
    this.intervalHandle.unref();
    this.log.info({ intervalMs: this.options.intervalMs }, 'Deferred dispatcher started');
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = undefined;
      this.log.info('Deferred dispatcher stopped');
    }
  }

  /** One dispatch pass. Returns the number of engagements delivered. */
  async tick(): Promise<number> {
    if (this.running) {
      this.log.warn('Dispatch pass already running, skipping');
      return 0;
    }
    this.running = true;
    try {
      const now = this.now();
      const due = await this.deferred.claimDue(now, this.batchSize);
      let delivered = 0;

      for (const task of due) {
        const { taskId, triggerTime, ...payload } = task;
        try {
          const messageId = await this.immediate.publish({
            ...payload,
            metadata: { ...payload.metadata, deferredTaskId: taskId, scheduledFor: new Date(triggerTime).toISOString() },
          });
          delivered++;
          this.log.debug({ taskId, messageId }, 'Deferred engagement delivered');
        } catch (err) {
          this.log.error({ err, taskId }, 'Deferred engagement publish failed; requeueing');
          await this.requeue(taskId, payload, new Date(now.getTime() + this.options.intervalMs));
        }
      }

      if (due.length > 0) {
        this.log.info({ claimed: due.length, delivered }, 'Deferred dispatch pass complete');
      }
      return delivered;
    } finally {
      this.running = false;
    }
  }

  // A claimed task exists nowhere else, so a failed requeue is logged with its body
  private async requeue(taskId: string, payload: EngagementPayload, retryAt: Date): Promise<void> {
    try {
      await this.deferred.enqueue(payload, retryAt);
    } catch (err) {
      this.log.error({ err, taskId, task: payload }, 'Deferred engagement requeue failed; task dropped');
    }
  }
}
