import { SessionLock } from '../../src/memory/session-lock';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('SessionLock', () => {
  it('should run same-key tasks one after another in submission order', async () => {
    const lock = new SessionLock();
    const events: string[] = [];

    await Promise.all([
      lock.runExclusive('s1', async () => {
        events.push('a:start');
        await delay(30);
        events.push('a:end');
      }),
      lock.runExclusive('s1', async () => {
        events.push('b:start');
        events.push('b:end');
      }),
    ]);

    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('should not make different keys wait on each other', async () => {
    const lock = new SessionLock();
    const events: string[] = [];

    await Promise.all([
      lock.runExclusive('slow', async () => {
        events.push('slow:start');
        await delay(30);
        events.push('slow:end');
      }),
      lock.runExclusive('fast', async () => {
        events.push('fast:done');
      }),
    ]);

    expect(events.indexOf('fast:done')).toBeLessThan(events.indexOf('slow:end'));
  });

  it('should keep serving a key after a task fails', async () => {
    const lock = new SessionLock();
    await expect(
      lock.runExclusive('s1', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(lock.runExclusive('s1', async () => 'ok')).resolves.toBe('ok');
  });

  it('should release the key once its queue drains', async () => {
    const lock = new SessionLock();
    const pending = lock.runExclusive('s1', async () => 1);
    expect(lock.isLocked('s1')).toBe(true);
    await pending;
    await delay(0);
    expect(lock.isLocked('s1')).toBe(false);
    expect(lock.activeKeys).toBe(0);
  });
});
