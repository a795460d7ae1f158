import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { InteractionLogStore, InteractionQuery, InteractionRecord, NewInteraction } from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { execPipeline } from '../resilience/redis-pipeline';

// Per-user cap on retained interactions
const MAX_PER_USER = 200;

function buildInteraction(input: NewInteraction): InteractionRecord {
  return { ...input, id: uuidv4(), timestamp: input.timestamp ?? Date.now() };
}

function matches(record: InteractionRecord, query: InteractionQuery): boolean {
  if (query.sessionId && record.sessionId !== query.sessionId) return false;
  if (query.since !== undefined && record.timestamp < query.since) return false;
  return true;
}

/**
 * In-memory interaction log (dev/test fallback).
 */
export class InMemoryInteractionLog implements InteractionLogStore {
  private readonly byUser = new Map<string, InteractionRecord[]>();

  async queryRecent(userId: string, query: InteractionQuery): Promise<InteractionRecord[]> {
    const records = this.byUser.get(userId) ?? [];
    // Reverse first so equal timestamps still come back newest first
    return [...records]
      .reverse()
      .filter((r) => matches(r, query))
      .sort((a, b) => b.timestamp - a.timestamp)
      .slice(0, query.limit);
  }

  async append(input: NewInteraction): Promise<InteractionRecord> {
    const record = buildInteraction(input);
    const records = this.byUser.get(record.userId) ?? [];
    records.push(record);
    if (records.length > MAX_PER_USER) records.splice(0, records.length - MAX_PER_USER);
    this.byUser.set(record.userId, records);
    return record;
  }
}

/**
 * Redis-backed interaction log: one list per user, newest at the head.
 */
export class RedisInteractionLog implements InteractionLogStore {
  private readonly prefix: string;
  private readonly log = logger.child({ component: 'interaction-log' });

  constructor(private readonly redis: Redis) {
    this.prefix = `${env.redis.keyPrefix}interactions:`;
  }

  private key(userId: string): string {
    return `${this.prefix}${userId}`;
  }

  async queryRecent(userId: string, query: InteractionQuery): Promise<InteractionRecord[]> {
    const raws = await this.redis.lrange(this.key(userId), 0, MAX_PER_USER - 1);
    const results: InteractionRecord[] = [];
    for (const raw of raws) {
      const record = this.parse(raw);
      if (!record || !matches(record, query)) continue;
      results.push(record);
      if (results.length >= query.limit) break;
    }
    return results;
  }

  async append(input: NewInteraction): Promise<InteractionRecord> {
    const record = buildInteraction(input);
    await execPipeline(
      this.redis
        .pipeline()
        .lpush(this.key(record.userId), JSON.stringify(record))
        .ltrim(this.key(record.userId), 0, MAX_PER_USER - 1),
    );
    return record;
  }

  private parse(raw: string): InteractionRecord | null {
    try {
      const record: InteractionRecord = JSON.parse(raw);
      return record;
    } catch (err) {
      this.log.warn({ err }, 'Skipping corrupt interaction entry');
      return null;
    }
  }
}

/**
 * Create the appropriate store based on environment.
 */
export function createInteractionLog(redis?: Redis): InteractionLogStore {
  if (redis) {
    return new RedisInteractionLog(redis);
  }
  logger.warn('Using in-memory interaction log (no Redis)');
  return new InMemoryInteractionLog();
}
