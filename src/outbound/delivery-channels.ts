import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { DeferredChannel, DeferredTask, EngagementPayload, ImmediateChannel } from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { execPipeline } from '../resilience/redis-pipeline';

// ───── In-memory (dev/test fallback) ─────

export interface PublishedEngagement extends EngagementPayload {
  messageId: string;
  publishedAt: number;
}

export class InMemoryImmediateChannel implements ImmediateChannel {
  private readonly published: PublishedEngagement[] = [];

  async publish(payload: EngagementPayload): Promise<string> {
    const messageId = uuidv4();
    this.published.push({ ...payload, messageId, publishedAt: Date.now() });
    return messageId;
  }

  /** For testing: everything published so far */
  getPublished(): PublishedEngagement[] {
    return [...this.published];
  }
}

export class InMemoryDeferredChannel implements DeferredChannel {
  private tasks: DeferredTask[] = [];

  async enqueue(payload: EngagementPayload, triggerTime: Date): Promise<string> {
    const taskId = uuidv4();
    this.tasks.push({ ...payload, taskId, triggerTime: triggerTime.getTime() });
    return taskId;
  }

  async claimDue(now: Date, limit: number): Promise<DeferredTask[]> {
    const due = this.tasks
      .filter((t) => t.triggerTime <= now.getTime())
      .sort((a, b) => a.triggerTime - b.triggerTime)
      .slice(0, limit);
    const claimed = new Set(due.map((t) => t.taskId));
    this.tasks = this.tasks.filter((t) => !claimed.has(t.taskId));
    return due;
  }

  /** For testing: tasks not yet claimed */
  getPending(): DeferredTask[] {
    return [...this.tasks];
  }
}

// ───── Redis ─────

/**
 * Publishes engagements on a Redis pub/sub channel for delivery workers.
 */
export class RedisImmediateChannel implements ImmediateChannel {
  private readonly channel: string;

  constructor(private readonly redis: Redis, channel: string = env.engagement.channel) {
    this.channel = `${env.redis.keyPrefix}${channel}`;
  }

  async publish(payload: EngagementPayload): Promise<string> {
    const messageId = uuidv4();
    await this.redis.publish(
      this.channel,
      JSON.stringify({ ...payload, messageId, publishedAt: new Date().toISOString() }),
    );
    return messageId;
  }
}

/**
 * Durable deferred queue: a sorted set of task ids scored by trigger time
 * plus a hash holding each task body.
 */
export class RedisDeferredChannel implements DeferredChannel {
  private readonly scheduleKey: string;
  private readonly tasksKey: string;
  private readonly log = logger.child({ component: 'deferred-channel' });

  constructor(private readonly redis: Redis, channel: string = env.engagement.channel) {
    this.scheduleKey = `${env.redis.keyPrefix}${channel}:schedule`;
    this.tasksKey = `${env.redis.keyPrefix}${channel}:tasks`;
  }

  async enqueue(payload: EngagementPayload, triggerTime: Date): Promise<string> {
    const task: DeferredTask = { ...payload, taskId: uuidv4(), triggerTime: triggerTime.getTime() };
    await execPipeline(
      this.redis
        .pipeline()
        .hset(this.tasksKey, task.taskId, JSON.stringify(task))
        .zadd(this.scheduleKey, task.triggerTime, task.taskId),
    );
    return task.taskId;
  }

  async claimDue(now: Date, limit: number): Promise<DeferredTask[]> {
    const ids = await this.redis.zrangebyscore(this.scheduleKey, '-inf', now.getTime(), 'LIMIT', 0, limit);
    const claimed: DeferredTask[] = [];

    for (const id of ids) {
      // ZREM succeeds for exactly one worker, which then owns the task
      const removed = await this.redis.zrem(this.scheduleKey, id);
      if (removed === 0) continue;

      const raw = await this.redis.hget(this.tasksKey, id);
      await this.redis.hdel(this.tasksKey, id);
      if (!raw) continue;

      try {
        const task: DeferredTask = JSON.parse(raw);
        claimed.push(task);
      } catch (err) {
        this.log.error({ err, taskId: id }, 'Dropping corrupt deferred task');
      }
    }
    return claimed;
  }
}

export function createDeliveryChannels(redis?: Redis): { immediate: ImmediateChannel; deferred: DeferredChannel } {
  if (redis) {
    return { immediate: new RedisImmediateChannel(redis), deferred: new RedisDeferredChannel(redis) };
  }
  logger.warn('Using in-memory delivery channels (no Redis)');
  return { immediate: new InMemoryImmediateChannel(), deferred: new InMemoryDeferredChannel() };
}
