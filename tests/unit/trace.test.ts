import { createTurnTrace, summarizeTurn, traceStage } from '../../src/observability/trace';

describe('turn trace', () => {
  const steppingClock = (step: number) => {
    let now = 1000;
    return () => {
      now += step;
      return now;
    };
  };

  it('should time each stage and summarize the turn', async () => {
    const trace = createTurnTrace('user-1', 'session-1', steppingClock(5));

    expect(await traceStage(trace, 'escalation', () => 'no escalation')).toBe('no escalation');
    await traceStage(trace, 'intent', async () => 'billing');

    expect(summarizeTurn(trace)).toEqual({
      totalMs: 25,
      stages: { escalation: 5, intent: 5 },
      notOk: [],
    });
  });

  it('should mark degraded results', async () => {
    const trace = createTurnTrace('user-1', 'session-1', steppingClock(1));

    await traceStage(trace, 'knowledge', async () => ({ fromFallback: true }), (r) => r.fromFallback);
    expect(trace.stages[0].status).toBe('degraded');
    expect(summarizeTurn(trace).notOk).toEqual(['knowledge']);
  });

  it('should mark failed stages and rethrow', async () => {
    const trace = createTurnTrace('user-1', 'session-1', steppingClock(1));

    await expect(
      traceStage(trace, 'personalization', () => {
        throw new Error('store offline');
      }),
    ).rejects.toThrow('store offline');
    expect(trace.stages[0]).toMatchObject({ stage: 'personalization', status: 'error', durationMs: 1 });
  });
});
