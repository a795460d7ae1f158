export type TurnRole = 'user' | 'assistant' | 'system';

export type TurnMetadata = Readonly<Record<string, unknown>>;

/** One immutable entry in a session's history. Timestamps are epoch millis. */
export interface ConversationTurn {
  readonly id: string;
  readonly role: TurnRole;
  readonly content: string;
  readonly timestamp: number;
  readonly metadata: TurnMetadata;
}

export interface NewTurn {
  role: TurnRole;
  content: string;
  metadata?: Record<string, unknown>;
  /** Defaults to the store clock; never allowed to go backwards within a session */
  timestamp?: number;
}

export interface HistoryStoreOptions {
  maxHistorySize: number;
  /** Sessions idle longer than this are evicted by the sweeper. 0 disables expiry. */
  idleTtlMs?: number;
  sweepIntervalMs?: number;
  now?: () => number;
}
