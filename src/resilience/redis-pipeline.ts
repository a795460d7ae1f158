import type { ChainableCommander } from 'ioredis';

/**
 * Runs a queued pipeline and fails on the first command error. ioredis resolves
 * `exec()` even when individual commands fail, reporting each as an
 * `[error, result]` pair.
 */
export async function execPipeline(pipeline: Pick<ChainableCommander, 'exec'>): Promise<unknown[]> {
  const replies = await pipeline.exec();
  if (!replies) throw new Error('Redis pipeline was aborted');

  return replies.map(([err, result]) => {
    if (err) throw err;
    return result;
  });
}
