import { v4 as uuidv4 } from 'uuid';
import { ConversationTurn, HistoryStoreOptions, NewTurn } from './types';
import { SessionLock } from './session-lock';
import { ConfigurationError } from '../config/errors';
import { logger } from '../observability/logger';

interface SessionEntry {
  turns: ConversationTurn[];
  lastActivity: number;
}

/**
 * Process-local, bounded, per-session conversation log.
 *
 * Each session keeps at most `maxHistorySize` turns; the oldest are dropped
 * first. Sessions are created on their first append. Callers that need an
 * append followed by a window read to be atomic go through `runExclusive`.
 */
export class ConversationHistoryStore {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly lock = new SessionLock();
  private readonly log = logger.child({ component: 'conversation-history' });
  private readonly maxHistorySize: number;
  private readonly idleTtlMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private sweepHandle?: NodeJS.Timeout;

  constructor(options: HistoryStoreOptions) {
    if (!Number.isInteger(options.maxHistorySize) || options.maxHistorySize < 1) {
      throw new ConfigurationError('maxHistorySize must be a positive integer', {
        maxHistorySize: options.maxHistorySize,
      });
    }
    this.maxHistorySize = options.maxHistorySize;
    this.idleTtlMs = Math.max(0, options.idleTtlMs ?? 0);
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  append(sessionId: string, turn: NewTurn): ConversationTurn {
    let entry = this.sessions.get(sessionId);
    if (!entry) {
      entry = { turns: [], lastActivity: this.now() };
      this.sessions.set(sessionId, entry);
      this.log.debug({ sessionId }, 'Session history created');
    }

    const last = entry.turns[entry.turns.length - 1];
    const requested = turn.timestamp ?? this.now();
    // Insertion order is temporal order: a backdated turn is pinned to its predecessor
    const timestamp = last && requested < last.timestamp ? last.timestamp : requested;

    const created: ConversationTurn = Object.freeze({
      id: uuidv4(),
      role: turn.role,
      content: turn.content,
      timestamp,
      metadata: Object.freeze({ ...(turn.metadata ?? {}) }),
    });

    entry.turns.push(created);
    if (entry.turns.length > this.maxHistorySize) {
      entry.turns.splice(0, entry.turns.length - this.maxHistorySize);
    }
    entry.lastActivity = this.now();
    return created;
  }

  /** Last `size` turns of the session in insertion order */
  window(sessionId: string, size: number): ConversationTurn[] {
    const entry = this.sessions.get(sessionId);
    if (!entry || size <= 0) return [];
    return entry.turns.slice(-size);
  }

  get(sessionId: string): ConversationTurn[] {
    return [...(this.sessions.get(sessionId)?.turns ?? [])];
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  get capacity(): number {
    return this.maxHistorySize;
  }

  runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    return this.lock.runExclusive(sessionId, task);
  }

  /**
   * Drop sessions idle for longer than the configured TTL. Sessions with work
   * in flight are skipped. Returns the number of sessions evicted.
   */
  evictIdle(now: number = this.now()): number {
    if (this.idleTtlMs <= 0) return 0;
    let evicted = 0;
    for (const [sessionId, entry] of this.sessions) {
      if (now - entry.lastActivity <= this.idleTtlMs) continue;
      if (this.lock.isLocked(sessionId)) continue;
      this.sessions.delete(sessionId);
      evicted++;
    }
    if (evicted > 0) {
      this.log.info({ evicted, remaining: this.sessions.size }, 'Idle sessions evicted');
    }
    return evicted;
  }

  /** Start the idle sweeper. No-op when expiry is disabled or already running. */
  start(): void {
    if (this.idleTtlMs <= 0 || this.sweepHandle) return;
    this.sweepHandle = setInterval(() => this.evictIdle(), this.sweepIntervalMs);
    this.sweepHandle.unref();
  }

  stop(): void {
    if (this.sweepHandle) {
      clearInterval(this.sweepHandle);
      this.sweepHandle = undefined;
    }
  }
}
