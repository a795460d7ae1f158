import { InteractionLogStore, InteractionRecord, PersonalizationRequest, PersonalizationResult, ProfileStore, UserProfile } from './types';
import { ResponsePersonalizer } from './response-personalizer';
import { defaultProfile } from './profile-store';
import { logger } from '../observability/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PersonalizationOptions {
  lookbackDays: number;
  interactionLimit: number;
  now?: () => Date;
}

/**
 * Loads profile and interaction context for a user, adapts the outgoing
 * text, and records the interaction. Never throws: any store failure
 * degrades to the unmodified message.
 */
export class PersonalizationService {
  private readonly log = logger.child({ component: 'personalization' });
  private readonly now: () => Date;

  constructor(
    private readonly profiles: ProfileStore,
    private readonly interactions: InteractionLogStore,
    private readonly options: PersonalizationOptions,
    private readonly personalizer: ResponsePersonalizer = new ResponsePersonalizer(),
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async personalizeForUser(req: PersonalizationRequest): Promise<PersonalizationResult> {
    const now = this.now();
    try {
      const profile = await this.loadOrCreateProfile(req.userId, now.getTime());
      const recent = await this.recentInteractions(req.userId, now.getTime());

      await this.interactions
        .append({
          userId: req.userId,
          sessionId: req.sessionId,
          message: req.userMessage,
          intent: req.intent,
          context: req.context ?? {},
          timestamp: now.getTime(),
        })
        .catch((err) => this.log.warn({ err, userId: req.userId }, 'Interaction log write failed (non-blocking)'));

      return {
        text: this.personalizer.personalize(req.message, profile, recent, req.intent, now),
        degraded: false,
        preferences: profile.preferences,
      };
    } catch (err) {
      this.log.warn({ err, userId: req.userId }, 'Personalization failed; returning message unchanged');
      return { text: req.message, degraded: true, preferences: {} };
    }
  }

  async updatePreferences(userId: string, preferences: Record<string, unknown>): Promise<boolean> {
    try {
      return await this.profiles.updatePreferences(userId, preferences);
    } catch (err) {
      this.log.error({ err, userId }, 'Failed to update user preferences');
      return false;
    }
  }

  private async loadOrCreateProfile(userId: string, now: number): Promise<UserProfile> {
    const existing = await this.profiles.getProfile(userId);
    if (existing) return existing;

    const created = defaultProfile(userId, now);
    await this.profiles.saveProfile(created);
    this.log.debug({ userId }, 'Default profile created');
    return created;
  }

  /** Chronological, oldest first */
  private async recentInteractions(userId: string, now: number): Promise<InteractionRecord[]> {
    const newestFirst = await this.interactions.queryRecent(userId, {
      since: now - this.options.lookbackDays * DAY_MS,
      limit: this.options.interactionLimit,
    });
    return [...newestFirst].reverse();
  }
}
