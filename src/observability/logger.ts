import pino from 'pino';
import { env } from '../config/env';
import type { TurnTrace } from './trace';

export const logger = pino({
  level: env.logLevel,
  base: { service: 'support-router' },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  ...(env.isDev ? { transport: { target: 'pino/file', options: { destination: 1 } } } : {}),
});

/** Child logger carrying the ids of one conversation turn */
export function turnLogger(trace: Pick<TurnTrace, 'turnId' | 'userId' | 'sessionId'>): pino.Logger {
  return logger.child({ turnId: trace.turnId, userId: trace.userId, sessionId: trace.sessionId });
}
