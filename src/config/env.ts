import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

const nodeEnv = optional('NODE_ENV', 'development');

export const env = {
  nodeEnv,
  // Tests stay quiet unless a level is asked for explicitly
  logLevel: optional('LOG_LEVEL', nodeEnv === 'test' ? 'silent' : 'info'),

  // ───── Conversation history ─────
  history: {
    maxSize: optionalInt('MAX_HISTORY_SIZE', 20),
    windowSize: optionalInt('HISTORY_WINDOW_SIZE', 5),
    // 0 disables idle expiry
    idleTtlMinutes: optionalInt('SESSION_IDLE_TTL_MINUTES', 120),
    sweepIntervalSeconds: optionalInt('SESSION_SWEEP_INTERVAL_SECONDS', 60),
  },

  escalation: {
    maxUnsuccessfulAttempts: optionalInt('MAX_UNSUCCESSFUL_ATTEMPTS', 3),
  },

  // Empty URL keeps every store in memory
  redis: {
    url: optional('REDIS_URL', ''),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'support-router:'),
  },

  // ───── Collaborators ─────
  classifier: {
    url: optional('CLASSIFIER_URL', ''),
    timeoutMs: optionalInt('CLASSIFIER_TIMEOUT_MS', 5000),
  },

  knowledge: {
    enabled: optionalBool('KNOWLEDGE_ENABLED', true),
    dir: optional('KNOWLEDGE_DIR', 'knowledge'),
    maxResults: optionalInt('KNOWLEDGE_MAX_RESULTS', 3),
  },

  engagement: {
    enabled: optionalBool('ENGAGEMENT_ENABLED', true),
    channel: optional('ENGAGEMENT_CHANNEL', 'proactive-engagements'),
    pollIntervalSeconds: optionalInt('ENGAGEMENT_POLL_INTERVAL_SECONDS', 30),
    followUpDelayHours: optionalInt('ENGAGEMENT_FOLLOW_UP_DELAY_HOURS', 24),
  },

  personalization: {
    lookbackDays: optionalInt('INTERACTION_LOOKBACK_DAYS', 30),
    interactionLimit: optionalInt('INTERACTION_LIMIT', 5),
  },

  get isDev() {
    return this.nodeEnv === 'development';
  },
} as const;
