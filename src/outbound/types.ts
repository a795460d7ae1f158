/**
 * Proactive Engagement Types
 */

/** Accepted trigger-time inputs; numbers and digit strings are Unix seconds */
export type TriggerTimeInput = Date | string | number | null | undefined;

export interface EngagementRequest {
  userId: string;
  /** Unrecognized types use the generic template set */
  engagementType: string;
  /** Generated from the type's templates when absent */
  message?: string;
  triggerTime?: TriggerTimeInput;
  metadata?: Record<string, unknown>;
}

export type DeliveryMethod = 'immediate' | 'deferred';

export type SchedulingResult =
  | {
      status: 'success';
      messageId: string;
      scheduledTime: string;
      deliveryMethod: DeliveryMethod;
      message: string;
    }
  | { status: 'error'; message: string };

export interface EngagementPayload {
  userId: string;
  message: string;
  engagementType: string;
  metadata: Record<string, unknown>;
}

export interface DeferredTask extends EngagementPayload {
  taskId: string;
  /** Epoch millis */
  triggerTime: number;
}

/** "Send now" channel */
export interface ImmediateChannel {
  publish(payload: EngagementPayload): Promise<string>;
}

/** "Send later" channel; tasks persist until claimed */
export interface DeferredChannel {
  enqueue(payload: EngagementPayload, triggerTime: Date): Promise<string>;
  /** Remove and return up to `limit` tasks due at or before `now`, earliest first */
  claimDue(now: Date, limit: number): Promise<DeferredTask[]>;
}

export type TemplatePicker = (candidates: readonly string[]) => string;
