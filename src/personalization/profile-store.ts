import Redis from 'ioredis';
import { ProfileStore, UserProfile } from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';

export function defaultProfile(userId: string, now: number = Date.now()): UserProfile {
  return { userId, preferences: {}, metadata: {}, createdAt: now, updatedAt: now };
}

/**
 * In-memory profile store (dev/test fallback).
 */
export class InMemoryProfileStore implements ProfileStore {
  private readonly profiles = new Map<string, UserProfile>();

  async getProfile(userId: string): Promise<UserProfile | null> {
    return this.profiles.get(userId) ?? null;
  }

  async saveProfile(profile: UserProfile): Promise<void> {
    this.profiles.set(profile.userId, { ...profile, updatedAt: Date.now() });
  }

  async updatePreferences(userId: string, preferences: Record<string, unknown>): Promise<boolean> {
    const existing = this.profiles.get(userId) ?? defaultProfile(userId);
    this.profiles.set(userId, {
      ...existing,
      preferences: { ...existing.preferences, ...preferences },
      updatedAt: Date.now(),
    });
    return true;
  }
}

/**
 * Redis-backed profile store. One JSON document per user.
 */
export class RedisProfileStore implements ProfileStore {
  private readonly prefix: string;
  private readonly log = logger.child({ component: 'profile-store' });

  constructor(private readonly redis: Redis) {
    this.prefix = `${env.redis.keyPrefix}profile:`;
  }

  private key(userId: string): string {
    return `${this.prefix}${userId}`;
  }

  async getProfile(userId: string): Promise<UserProfile | null> {
    const raw = await this.redis.get(this.key(userId));
    if (!raw) return null;
    const profile: UserProfile = JSON.parse(raw);
    return profile;
  }

  async saveProfile(profile: UserProfile): Promise<void> {
    await this.redis.set(this.key(profile.userId), JSON.stringify({ ...profile, updatedAt: Date.now() }));
  }

  async updatePreferences(userId: string, preferences: Record<string, unknown>): Promise<boolean> {
    try {
      const existing = (await this.getProfile(userId)) ?? defaultProfile(userId);
      await this.saveProfile({ ...existing, preferences: { ...existing.preferences, ...preferences } });
      return true;
    } catch (err) {
      this.log.error({ err, userId }, 'Failed to update user preferences');
      return false;
    }
  }
}

/**
 * Create the appropriate store based on environment.
 */
export function createProfileStore(redis?: Redis): ProfileStore {
  if (redis) {
    return new RedisProfileStore(redis);
  }
  logger.warn('Using in-memory profile store (no Redis)');
  return new InMemoryProfileStore();
}
