import { EscalationRuleDescriptor, EscalationRuleName, RuleEvaluator, RuleOutcome, RuleSettings } from './types';

export const DEFAULT_HIGH_PRIORITY_PHRASES = [
  'speak to a human',
  'talk to a person',
  'let me talk to a manager',
  'this is urgent',
  'i need help now',
  'emergency',
  'critical issue',
  'not working at all',
  'cancel my account',
  'i want to cancel',
];

export const DEFAULT_EXPLICIT_REQUEST_PHRASES = [
  'speak to a human',
  'talk to a real person',
  'connect me with an agent',
  'let me talk to someone',
  'transfer me to a person',
];

export const DEFAULT_NEGATIVE_WORDS = [
  'angry', 'frustrated', 'disappointed', 'terrible', 'awful',
  'horrible', 'worst', 'hate', 'useless', 'waste',
];

/** Evaluation order is priority: the first rule that fires wins. */
export const DEFAULT_RULES: EscalationRuleDescriptor[] = [
  { name: 'multiple_unsuccessful_attempts', defaultPriority: 'medium' },
  { name: 'high_priority_keywords', defaultPriority: 'high' },
  { name: 'sentiment_escalation', defaultPriority: 'medium' },
  { name: 'explicit_escalation_request', defaultPriority: 'high' },
];

const NO_ESCALATION: RuleOutcome = { needsEscalation: false };

function firstPhraseIn(message: string, phrases: string[]): string | undefined {
  const text = message.toLowerCase();
  return phrases.find((phrase) => text.includes(phrase.toLowerCase()));
}

/**
 * Assistant turns flagged `unsuccessful` among the last `maxUnsuccessfulAttempts`
 * turns before the current message. A trailing user turn in the window is the
 * message being evaluated and is left out of the count.
 */
const multipleUnsuccessfulAttempts: RuleEvaluator = (_input, window, settings) => {
  const max = settings.maxUnsuccessfulAttempts;
  const last = window[window.length - 1];
  const prior = last?.role === 'user' ? window.slice(0, -1) : window;
  const failures = prior
    .slice(-max)
    .filter((turn) => turn.role === 'assistant' && turn.metadata.unsuccessful === true).length;

  if (failures < max - 1) return NO_ESCALATION;
  return {
    needsEscalation: true,
    reason: `User has had ${failures + 1} unsuccessful attempts`,
    priority: 'medium',
    suggestedAgent: 'customer_service',
  };
};

const highPriorityKeywords: RuleEvaluator = (input, _window, settings) => {
  const phrase = firstPhraseIn(input.message, settings.highPriorityPhrases);
  if (!phrase) return NO_ESCALATION;
  return {
    needsEscalation: true,
    reason: `High-priority phrase detected: ${phrase}`,
    priority: 'high',
    suggestedAgent: 'senior_support',
  };
};

/** Each listed word counts once, however often it appears. */
export function countNegativeWords(message: string, words: string[]): number {
  const text = message.toLowerCase();
  return words.filter((word) => text.includes(word.toLowerCase())).length;
}

const sentimentEscalation: RuleEvaluator = (input, _window, settings) => {
  const negatives = countNegativeWords(input.message, settings.negativeWords);
  const exclamations = (input.message.match(/!/g) ?? []).length;

  if (negatives > 1 || (negatives > 0 && exclamations > 1)) {
    return {
      needsEscalation: true,
      reason: 'Negative sentiment detected',
      priority: 'high',
      suggestedAgent: 'customer_relations',
    };
  }
  return NO_ESCALATION;
};

const explicitEscalationRequest: RuleEvaluator = (input, _window, settings) => {
  if (!firstPhraseIn(input.message, settings.explicitRequestPhrases)) return NO_ESCALATION;
  return {
    needsEscalation: true,
    reason: 'User explicitly requested human assistance',
    priority: 'high',
    suggestedAgent: 'customer_service',
  };
};

export const BUILTIN_RULES: Readonly<Record<EscalationRuleName, RuleEvaluator>> = {
  multiple_unsuccessful_attempts: multipleUnsuccessfulAttempts,
  high_priority_keywords: highPriorityKeywords,
  sentiment_escalation: sentimentEscalation,
  explicit_escalation_request: explicitEscalationRequest,
};

export const DEFAULT_RULE_SETTINGS: RuleSettings = {
  maxUnsuccessfulAttempts: 3,
  highPriorityPhrases: DEFAULT_HIGH_PRIORITY_PHRASES,
  explicitRequestPhrases: DEFAULT_EXPLICIT_REQUEST_PHRASES,
  negativeWords: DEFAULT_NEGATIVE_WORDS,
};
