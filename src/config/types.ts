import { EscalationRuleDescriptor } from '../escalation/types';
import { IntentKeywordEntry } from '../intent/types';

/** Numeric limits; set through the environment */
export interface RouterLimits {
  maxHistorySize: number;
  windowSize: number;
  maxUnsuccessfulAttempts: number;
}

/** Behaviour tables for the routing core. Tables come from config/router.json, limits from `RouterLimits`. */
export interface RouterConfig {
  history: {
    maxSize: number;
    windowSize: number;
  };
  escalation: {
    /** Evaluation order; the first matching rule wins */
    rules: EscalationRuleDescriptor[];
    maxUnsuccessfulAttempts: number;
    highPriorityPhrases: string[];
    explicitRequestPhrases: string[];
    negativeWords: string[];
  };
  intents: {
    keywordTable: IntentKeywordEntry[];
    knowledgeEligible: string[];
  };
}

/** The part of `RouterConfig` that config/router.json carries */
export interface RouterTables {
  escalation: Omit<RouterConfig['escalation'], 'maxUnsuccessfulAttempts'>;
  intents: RouterConfig['intents'];
}
