/**
 * Static Fallback Responses
 *
 * Canned knowledge answers used when the knowledge provider is down or
 * finds nothing, keyed by the kind of question asked.
 */

export type FallbackCategory = 'how_to' | 'contact' | 'pricing' | 'refund' | 'generic';

export interface KnowledgeFallback {
  category: FallbackCategory;
  answer: string;
  confidence: number;
}

// Checked in order; the first category with a trigger in the query wins
const KNOWLEDGE_FALLBACKS: Array<{ category: FallbackCategory; triggers: string[]; answer: string }> = [
  {
    category: 'how_to',
    triggers: ['how to', 'how do i'],
    answer: 'Please check our help center at https://support.example.com for detailed instructions.',
  },
  {
    category: 'contact',
    triggers: ['contact', 'support', 'help'],
    answer: 'You can reach our support team at support@example.com or call us at 1-800-EXAMPLE.',
  },
  {
    category: 'pricing',
    triggers: ['pricing', 'cost', 'how much'],
    answer: 'For the most up-to-date pricing information, please visit our pricing page at https://example.com/pricing.',
  },
  {
    category: 'refund',
    triggers: ['refund', 'return', 'cancel'],
    answer: 'For refund and return requests, please contact our support team with your order number.',
  },
];

const MATCHED_CONFIDENCE = 0.6;
const GENERIC_CONFIDENCE = 0.3;

export const EMPTY_QUERY_RESPONSE = "I didn't receive a question to look up. How can I help you?";

export function getKnowledgeFallback(query: string): KnowledgeFallback {
  const text = query.toLowerCase();
  const match = KNOWLEDGE_FALLBACKS.find((f) => f.triggers.some((t) => text.includes(t)));
  if (match) {
    return { category: match.category, answer: match.answer, confidence: MATCHED_CONFIDENCE };
  }
  return { category: 'generic', answer: getDefaultFallback(), confidence: GENERIC_CONFIDENCE };
}

export function getDefaultFallback(): string {
  return "I'm having trouble accessing the knowledge base. Please try again later or contact support for assistance.";
}
