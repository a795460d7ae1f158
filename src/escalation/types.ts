import { ConversationTurn } from '../memory/types';

export type EscalationPriority = 'low' | 'medium' | 'high' | 'critical';

export type EscalationRuleName =
  | 'multiple_unsuccessful_attempts'
  | 'high_priority_keywords'
  | 'sentiment_escalation'
  | 'explicit_escalation_request';

/** Configured rule entry; `name` is resolved through the rule dispatch table. */
export interface EscalationRuleDescriptor {
  name: string;
  defaultPriority: EscalationPriority;
}

export interface EscalationInput {
  message: string;
  userId?: string;
  sessionId?: string;
}

export interface RuleOutcome {
  needsEscalation: boolean;
  reason?: string;
  priority?: EscalationPriority;
  suggestedAgent?: string;
}

export type EscalationDecision =
  | { needsEscalation: false; priority: 'none' }
  | {
      needsEscalation: true;
      priority: EscalationPriority;
      reason: string;
      suggestedAgent?: string;
      ruleName: string;
    };

export interface RuleSettings {
  maxUnsuccessfulAttempts: number;
  highPriorityPhrases: string[];
  explicitRequestPhrases: string[];
  negativeWords: string[];
}

export type RuleEvaluator = (
  input: EscalationInput,
  window: readonly ConversationTurn[],
  settings: RuleSettings,
) => RuleOutcome;

export type RuleTable = Readonly<Record<string, RuleEvaluator>>;

// ───── Escalation records ─────

export type EscalationStatus = 'pending' | 'in_progress' | 'resolved' | 'cancelled';

export interface SnapshotTurn {
  role: string;
  content: string;
  timestamp: number;
}

export interface EscalationRecord {
  id: string;
  userId: string;
  sessionId: string;
  status: EscalationStatus;
  reason: string;
  priority: EscalationPriority;
  suggestedAgent?: string;
  assignedAgent?: string;
  resolutionNotes?: string;
  createdAt: number;
  updatedAt: number;
  resolvedAt?: number;
  conversationSnapshot: SnapshotTurn[];
}

export interface NewEscalationRecord {
  userId: string;
  sessionId: string;
  reason: string;
  priority: EscalationPriority;
  suggestedAgent?: string;
  conversationSnapshot: SnapshotTurn[];
}

export interface EscalationRecordStore {
  create(record: NewEscalationRecord): Promise<EscalationRecord>;
  list(status: EscalationStatus, priority?: EscalationPriority, limit?: number): Promise<EscalationRecord[]>;
  updateStatus(id: string, status: EscalationStatus, assignedAgent?: string, notes?: string): Promise<boolean>;
}
