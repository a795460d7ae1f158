import { EngagementRequest } from './types';

const HOUR_MS = 60 * 60 * 1000;

export const PRODUCT_INTEREST_MESSAGE =
  'Hi! I noticed you were interested in our products. Do you have any questions I can help with?';

export interface OpportunityContext {
  userId: string;
  sessionId: string;
  intent: string;
  now: Date;
  followUpDelayHours: number;
}

/**
 * Decide whether this turn warrants a proactive follow-up. Only product
 * questions qualify today.
 */
export function identifyEngagementOpportunity(ctx: OpportunityContext): EngagementRequest | null {
  if (ctx.intent !== 'product_information') return null;
  return {
    userId: ctx.userId,
    engagementType: 'follow_up',
    message: PRODUCT_INTEREST_MESSAGE,
    triggerTime: new Date(ctx.now.getTime() + ctx.followUpDelayHours * HOUR_MS),
    metadata: { follow_up_type: 'product_interest', sessionId: ctx.sessionId },
  };
}
