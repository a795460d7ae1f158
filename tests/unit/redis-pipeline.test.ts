import { execPipeline } from '../../src/resilience/redis-pipeline';

type Replies = [Error | null, unknown][] | null;

const queued = (replies: Replies) => ({ exec: jest.fn(async () => replies) });

describe('execPipeline', () => {
  it('should return each command result in order', async () => {
    await expect(execPipeline(queued([[null, 'OK'], [null, 1]]))).resolves.toEqual(['OK', 1]);
  });

  it('should reject with the first failed command', async () => {
    const wrongType = new Error('WRONGTYPE Operation against a key holding the wrong kind of value');
    const pipeline = queued([
      [null, 'OK'],
      [wrongType, null],
      [new Error('second failure'), null],
    ]);
    await expect(execPipeline(pipeline)).rejects.toBe(wrongType);
  });

  it('should reject when the pipeline was aborted', async () => {
    await expect(execPipeline(queued(null))).rejects.toThrow('Redis pipeline was aborted');
  });
});
