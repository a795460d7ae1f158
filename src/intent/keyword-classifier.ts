import { IntentKeywordEntry, IntentResult } from './types';

/** Declaration order breaks ties: the first matching intent wins. */
export const DEFAULT_INTENT_KEYWORDS: IntentKeywordEntry[] = [
  { intent: 'billing', keywords: ['bill', 'invoice', 'payment', 'charge', 'refund', 'pricing'] },
  { intent: 'technical_support', keywords: ['help', 'support', 'issue', 'problem', 'not working', 'error'] },
  { intent: 'product_information', keywords: ['feature', 'how to', 'what is', 'can i', 'does it', 'product'] },
  { intent: 'account_management', keywords: ['account', 'login', 'sign up', 'password', 'profile'] },
  { intent: 'order_status', keywords: ['order', 'track', 'delivery', 'shipping', 'when will'] },
  { intent: 'refund_request', keywords: ['refund', 'return', 'cancel', 'money back'] },
  { intent: 'general_inquiry', keywords: ['hello', 'hi', 'hey', 'thank', 'thanks', 'bye'] },
];

export const KEYWORD_FALLBACK_INTENT = 'general_inquiry';
export const KEYWORD_FALLBACK_CONFIDENCE = 0.3;

const BASE_CONFIDENCE = 0.3;
const PER_EXTRA_MATCH = 0.1;
const MAX_CONFIDENCE = 0.9;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

interface CompiledEntry {
  intent: string;
  patterns: RegExp[];
}

/**
 * Deterministic classifier over an ordered keyword table. A keyword matches
 * at the start of a word, case-insensitively, so inflected forms ("orders",
 * "charged") count while "this" does not count as "hi".
 */
export class KeywordIntentClassifier {
  private readonly entries: CompiledEntry[];

  constructor(table: IntentKeywordEntry[] = DEFAULT_INTENT_KEYWORDS) {
    this.entries = table.map((entry) => ({
      intent: entry.intent,
      patterns: entry.keywords.map((kw) => new RegExp(`\\b${escapeRegExp(kw.toLowerCase())}`, 'i')),
    }));
  }

  get intents(): string[] {
    return this.entries.map((e) => e.intent);
  }

  classify(message: string): IntentResult {
    const matched = this.entries
      .filter((entry) => entry.patterns.some((p) => p.test(message)))
      .map((entry) => entry.intent);

    if (matched.length === 0) {
      return {
        intent: KEYWORD_FALLBACK_INTENT,
        confidence: KEYWORD_FALLBACK_CONFIDENCE,
        entities: {},
        source: 'keyword',
      };
    }

    // One matched intent scores the base confidence; each further one adds a step
    const confidence = Math.min(MAX_CONFIDENCE, BASE_CONFIDENCE + PER_EXTRA_MATCH * (matched.length - 1));
    return {
      intent: matched[0],
      confidence: Math.round(confidence * 100) / 100,
      entities: { matchedIntents: matched },
      source: 'keyword',
    };
  }
}
