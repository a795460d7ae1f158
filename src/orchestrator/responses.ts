import { EscalationPriority } from '../escalation/types';
import { EscalationPayload, OrchestratorResponse, TurnErrorType } from './types';

export const ACKNOWLEDGMENT_TEXT = "I'll help you with that. Let me check the best way to assist you.";
export const SYSTEM_ERROR_TEXT = 'System initialization failed. Please try again later.';
export const PROCESSING_ERROR_TEXT =
  "I'm sorry, I encountered an error processing your request. Our team has been notified.";

const PRIORITY_WORDING: Record<EscalationPriority, string> = {
  critical: 'top priority',
  high: 'high priority',
  medium: 'priority',
  low: 'standard priority',
};

export function escalationText(priority: EscalationPriority): string {
  return (
    `I've escalated your request to our support team with ${PRIORITY_WORDING[priority]}. ` +
    'Someone will get back to you as soon as possible. ' +
    'In the meantime, is there anything else I can help you with?'
  );
}

/** Content of the system turn recorded when a conversation is escalated */
export function escalationNote(reason: string, priority: EscalationPriority): string {
  return `[ESCALATION] ${reason} (Priority: ${priority})`;
}

export function escalationResponse(escalation: EscalationPayload, ruleName: string): OrchestratorResponse {
  return {
    responseText: escalationText(escalation.priority),
    intent: 'escalation',
    confidence: 1.0,
    source: 'escalation',
    metadata: { rule: ruleName },
    requiresFollowUp: true,
    suggestedResponses: [],
    sources: [],
    personalizationApplied: false,
    escalation,
  };
}

export function errorResponse(type: TurnErrorType): OrchestratorResponse {
  const text = type === 'system_error' ? SYSTEM_ERROR_TEXT : PROCESSING_ERROR_TEXT;
  return {
    responseText: text,
    intent: 'error',
    confidence: 1.0,
    source: 'system',
    metadata: {},
    requiresFollowUp: false,
    suggestedResponses: [],
    sources: [],
    personalizationApplied: false,
    error: { type, message: text },
  };
}
