import {
  DeferredChannel,
  EngagementPayload,
  EngagementRequest,
  ImmediateChannel,
  SchedulingResult,
  TemplatePicker,
  TriggerTimeInput,
} from './types';
import { pickRandom, renderTemplate, templatesFor } from './templates';
import { logger } from '../observability/logger';

const IMMEDIATE_WINDOW_MS = 60_000;
const DEFAULT_DELAY_MS = 60 * 60 * 1000;
const UNIX_SECONDS = /^\d+$/;
// Date-only or date-time with optional fraction and zone
const ISO_8601 = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?)?$/i;

/** Zoneless ISO-8601 date-times are read as UTC, never as host-local time */
function parseIso(text: string): Date | undefined {
  const match = ISO_8601.exec(text);
  if (!match) return undefined;
  const [, date, time, zone] = match;
  if (!time) return new Date(`${date}T00:00:00Z`);
  const offset = zone ? zone.toUpperCase().replace(/^([+-]\d{2})(\d{2})$/, '$1:$2') : 'Z';
  return new Date(`${date}T${time}${offset}`);
}

export interface SchedulerOptions {
  /** Defaults to a uniform random pick among a type's templates */
  pickTemplate?: TemplatePicker;
  now?: () => Date;
}

/**
 * Decides immediate versus deferred delivery for proactive messages and
 * hands them to the matching channel. Failures come back as
 * `status: 'error'`; nothing is thrown.
 */
export class EngagementScheduler {
  private readonly log = logger.child({ component: 'engagement-scheduler' });
  private readonly pickTemplate: TemplatePicker;
  private readonly now: () => Date;

  constructor(
    private readonly immediate: ImmediateChannel,
    private readonly deferred: DeferredChannel,
    options: SchedulerOptions = {},
  ) {
    this.pickTemplate = options.pickTemplate ?? pickRandom;
    this.now = options.now ?? (() => new Date());
  }

  async schedule(request: EngagementRequest): Promise<SchedulingResult> {
    if (!request.userId || !request.engagementType) {
      return {
        status: 'error',
        message: 'Missing required fields: userId and engagementType are required',
      };
    }

    try {
      const now = this.now();
      const triggerTime = this.parseTriggerTime(request.triggerTime, now);
      const metadata = request.metadata ?? {};
      const payload: EngagementPayload = {
        userId: request.userId,
        engagementType: request.engagementType,
        message: request.message || this.generateMessage(request.engagementType, metadata),
        metadata,
      };

      if (triggerTime.getTime() <= now.getTime() + IMMEDIATE_WINDOW_MS) {
        const messageId = await this.immediate.publish(payload);
        this.log.info({ userId: request.userId, messageId, type: request.engagementType }, 'Engagement published');
        return {
          status: 'success',
          messageId,
          scheduledTime: now.toISOString(),
          deliveryMethod: 'immediate',
          message: 'Engagement scheduled successfully',
        };
      }

      const taskId = await this.deferred.enqueue(payload, triggerTime);
      this.log.info(
        { userId: request.userId, taskId, type: request.engagementType, triggerTime: triggerTime.toISOString() },
        'Engagement deferred',
      );
      return {
        status: 'success',
        messageId: taskId,
        scheduledTime: triggerTime.toISOString(),
        deliveryMethod: 'deferred',
        message: 'Engagement scheduled successfully',
      };
    } catch (err) {
      this.log.error({ err, userId: request.userId }, 'Failed to schedule engagement');
      const reason = err instanceof Error ? err.message : String(err);
      return { status: 'error', message: `Failed to schedule engagement: ${reason}` };
    }
  }

  /**
   * Absolute instants pass through; ISO-8601 strings and Unix-second
   * timestamps are parsed. Anything else becomes now + 1 hour.
   */
  parseTriggerTime(input: TriggerTimeInput, now: Date = this.now()): Date {
    const fallback = new Date(now.getTime() + DEFAULT_DELAY_MS);
    if (input === undefined || input === null) return fallback;

    let parsed: Date | undefined;
    if (input instanceof Date) {
      parsed = input;
    } else if (typeof input === 'number') {
      parsed = new Date(input * 1000);
    } else {
      const text = input.trim();
      if (UNIX_SECONDS.test(text)) {
        parsed = new Date(parseInt(text, 10) * 1000);
      } else {
        parsed = parseIso(text);
      }
    }

    if (!parsed || Number.isNaN(parsed.getTime())) {
      this.log.warn({ triggerTime: String(input) }, 'Could not parse trigger time; defaulting to 1 hour from now');
      return fallback;
    }
    return parsed;
  }

  generateMessage(engagementType: string, metadata: Record<string, unknown>): string {
    const template = this.pickTemplate(templatesFor(engagementType));
    return renderTemplate(template, {
      userName: metadata.userName ?? metadata.user_name ?? 'there',
      tip: metadata.tip,
      promoDetails: metadata.promoDetails ?? metadata.promo_details,
    });
  }
}
