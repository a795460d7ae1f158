import { BackgroundTaskRunner } from '../../src/orchestrator/background-tasks';

describe('BackgroundTaskRunner', () => {
  it('should run submitted tasks without the caller awaiting them', async () => {
    const runner = new BackgroundTaskRunner();
    const task = jest.fn().mockResolvedValue('done');

    runner.submit('work', task);
    expect(runner.pendingCount).toBe(1);

    await runner.drain();
    expect(task).toHaveBeenCalledTimes(1);
    expect(runner.pendingCount).toBe(0);
  });

  it('should count failures instead of surfacing them', async () => {
    const runner = new BackgroundTaskRunner();

    runner.submit('fails', () => Promise.reject(new Error('boom')));
    runner.submit('throws', () => {
      throw new Error('sync boom');
    });
    runner.submit('works', () => Promise.resolve());

    await expect(runner.drain()).resolves.toBeUndefined();
    expect(runner.failures).toBe(2);
  });

  it('should wait for tasks submitted while draining', async () => {
    const runner = new BackgroundTaskRunner();
    const order: string[] = [];

    runner.submit('outer', async () => {
      order.push('outer');
      runner.submit('inner', async () => {
        order.push('inner');
      });
    });

    await runner.drain();
    expect(order).toEqual(['outer', 'inner']);
    expect(runner.pendingCount).toBe(0);
  });

  it('should drop tasks submitted after close', async () => {
    const runner = new BackgroundTaskRunner();
    await runner.close();

    const task = jest.fn().mockResolvedValue(undefined);
    runner.submit('late', task);
    await runner.drain();

    expect(task).not.toHaveBeenCalled();
    expect(runner.pendingCount).toBe(0);
  });
});
