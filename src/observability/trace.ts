import { v4 as uuidv4 } from 'uuid';

/** Pipeline stages timed within a turn */
export type TurnStage = 'escalation' | 'intent' | 'knowledge' | 'personalization';

export type StageStatus = 'ok' | 'degraded' | 'error';

export interface StageTiming {
  stage: TurnStage;
  startedAt: number;
  durationMs?: number;
  status: StageStatus;
}

export interface TurnTrace {
  turnId: string;
  userId: string;
  sessionId: string;
  startedAt: number;
  stages: StageTiming[];
  clock: () => number;
}

export interface TurnSummary {
  totalMs: number;
  /** Duration per completed stage */
  stages: Partial<Record<TurnStage, number>>;
  /** Stages that did not finish `ok`, in the order they ran */
  notOk: TurnStage[];
}

export function createTurnTrace(userId: string, sessionId: string, clock: () => number = Date.now): TurnTrace {
  return { turnId: uuidv4(), userId, sessionId, startedAt: clock(), stages: [], clock };
}

/**
 * Time one stage. A throw marks the stage `error` and is rethrown;
 * `isDegraded` lets a stage that recovered internally report `degraded`.
 */
export async function traceStage<T>(
  trace: TurnTrace,
  stage: TurnStage,
  run: () => T | Promise<T>,
  isDegraded?: (result: T) => boolean,
): Promise<T> {
  const timing: StageTiming = { stage, startedAt: trace.clock(), status: 'ok' };
  trace.stages.push(timing);
  try {
    const result = await run();
    if (isDegraded?.(result)) timing.status = 'degraded';
    return result;
  } catch (err) {
    timing.status = 'error';
    throw err;
  } finally {
    timing.durationMs = trace.clock() - timing.startedAt;
  }
}

export function summarizeTurn(trace: TurnTrace): TurnSummary {
  const stages: Partial<Record<TurnStage, number>> = {};
  const notOk: TurnStage[] = [];
  for (const timing of trace.stages) {
    if (timing.durationMs !== undefined) stages[timing.stage] = timing.durationMs;
    if (timing.status !== 'ok') notOk.push(timing.stage);
  }
  return { totalMs: trace.clock() - trace.startedAt, stages, notOk };
}
