import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import {
  EscalationPriority,
  EscalationRecord,
  EscalationRecordStore,
  EscalationStatus,
  NewEscalationRecord,
} from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { execPipeline } from '../resilience/redis-pipeline';

const DEFAULT_LIST_LIMIT = 50;

function buildRecord(input: NewEscalationRecord, now: number): EscalationRecord {
  return {
    id: uuidv4(),
    userId: input.userId,
    sessionId: input.sessionId,
    status: 'pending',
    reason: input.reason,
    priority: input.priority,
    suggestedAgent: input.suggestedAgent,
    createdAt: now,
    updatedAt: now,
    conversationSnapshot: input.conversationSnapshot,
  };
}

function applyStatus(
  record: EscalationRecord,
  status: EscalationStatus,
  assignedAgent: string | undefined,
  notes: string | undefined,
  now: number,
): EscalationRecord {
  const updated: EscalationRecord = { ...record, status, updatedAt: now };
  if (assignedAgent) updated.assignedAgent = assignedAgent;
  if (status === 'resolved') {
    updated.resolvedAt = now;
    if (notes) updated.resolutionNotes = notes;
  }
  return updated;
}

/**
 * In-memory escalation store (dev/test fallback).
 */
export class InMemoryEscalationStore implements EscalationRecordStore {
  private readonly records = new Map<string, EscalationRecord>();

  async create(input: NewEscalationRecord): Promise<EscalationRecord> {
    const record = buildRecord(input, Date.now());
    this.records.set(record.id, record);
    return record;
  }

  async list(
    status: EscalationStatus,
    priority?: EscalationPriority,
    limit: number = DEFAULT_LIST_LIMIT,
  ): Promise<EscalationRecord[]> {
    return Array.from(this.records.values())
      .filter((r) => r.status === status && (!priority || r.priority === priority))
      .sort((a, b) => a.createdAt - b.createdAt)
      .slice(0, limit);
  }

  async updateStatus(
    id: string,
    status: EscalationStatus,
    assignedAgent?: string,
    notes?: string,
  ): Promise<boolean> {
    const record = this.records.get(id);
    if (!record) return false;
    this.records.set(id, applyStatus(record, status, assignedAgent, notes, Date.now()));
    return true;
  }

  /** For testing: get all records */
  getAll(): EscalationRecord[] {
    return Array.from(this.records.values());
  }
}

/**
 * Redis-backed escalation store. Records are JSON strings keyed by id, with
 * a sorted set per status scored by creation time for ordered listing.
 */
export class RedisEscalationStore implements EscalationRecordStore {
  private readonly prefix: string;
  private readonly log = logger.child({ component: 'escalation-store' });

  constructor(private readonly redis: Redis) {
    this.prefix = `${env.redis.keyPrefix}escalation:`;
  }

  private recordKey(id: string): string {
    return `${this.prefix}${id}`;
  }

  private statusKey(status: EscalationStatus): string {
    return `${this.prefix}status:${status}`;
  }

  async create(input: NewEscalationRecord): Promise<EscalationRecord> {
    const record = buildRecord(input, Date.now());
    await execPipeline(
      this.redis
        .pipeline()
        .set(this.recordKey(record.id), JSON.stringify(record))
        .zadd(this.statusKey(record.status), record.createdAt, record.id),
    );
    return record;
  }

  async list(
    status: EscalationStatus,
    priority?: EscalationPriority,
    limit: number = DEFAULT_LIST_LIMIT,
  ): Promise<EscalationRecord[]> {
    const ids = await this.redis.zrange(this.statusKey(status), 0, -1);
    if (ids.length === 0) return [];

    const raws = await this.redis.mget(ids.map((id) => this.recordKey(id)));
    const records: EscalationRecord[] = [];
    for (const raw of raws) {
      const record = this.parse(raw);
      if (!record) continue;
      if (priority && record.priority !== priority) continue;
      records.push(record);
      if (records.length >= limit) break;
    }
    return records;
  }

  async updateStatus(
    id: string,
    status: EscalationStatus,
    assignedAgent?: string,
    notes?: string,
  ): Promise<boolean> {
    const record = this.parse(await this.redis.get(this.recordKey(id)));
    if (!record) return false;

    const updated = applyStatus(record, status, assignedAgent, notes, Date.now());
    await execPipeline(
      this.redis
        .pipeline()
        .set(this.recordKey(id), JSON.stringify(updated))
        .zrem(this.statusKey(record.status), id)
        .zadd(this.statusKey(status), updated.createdAt, id),
    );
    return true;
  }

  private parse(raw: string | null): EscalationRecord | null {
    if (!raw) return null;
    try {
      const parsed: EscalationRecord = JSON.parse(raw);
      return parsed;
    } catch (err) {
      this.log.error({ err }, 'Corrupt escalation record in Redis');
      return null;
    }
  }
}

/**
 * Create the appropriate store based on environment.
 */
export function createEscalationStore(redis?: Redis): EscalationRecordStore {
  if (redis) {
    return new RedisEscalationStore(redis);
  }
  logger.warn('Using in-memory escalation store (no Redis)');
  return new InMemoryEscalationStore();
}
