import { EscalationPriority } from '../escalation/types';
import { KnowledgeSource } from '../knowledge/types';

export type ResponseSource = 'escalation' | 'knowledge_base' | 'knowledge_fallback' | 'orchestrator' | 'system';

export type TurnErrorType = 'system_error' | 'processing_error';

export interface EscalationPayload {
  escalated: true;
  reason: string;
  priority: EscalationPriority;
  suggestedAgent?: string;
  /** ISO-8601 */
  timestamp: string;
  recordId?: string;
}

/** The one shape callers ever get back from a turn */
export interface OrchestratorResponse {
  responseText: string;
  intent: string;
  confidence: number;
  source: ResponseSource;
  metadata: Record<string, unknown>;
  requiresFollowUp: boolean;
  suggestedResponses: string[];
  sources: KnowledgeSource[];
  personalizationApplied: boolean;
  escalation?: EscalationPayload;
  error?: { type: TurnErrorType; message: string };
}
