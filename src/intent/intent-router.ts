import { Capability } from '../resilience/capability';
import { KeywordIntentClassifier } from './keyword-classifier';
import { HandlingStrategy, IntentClassifier, IntentResult, UNKNOWN_INTENT } from './types';
import { logger } from '../observability/logger';

export const DEFAULT_KNOWLEDGE_INTENTS = ['billing', 'product_information', 'general_inquiry'];

function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Classifies a message and picks its handling strategy.
 *
 * The pluggable classifier is consulted first when it is available. When it
 * is unavailable, errors, declines, or answers outside the taxonomy, the
 * keyword table decides.
 */
export class IntentRouter {
  private readonly log = logger.child({ component: 'intent-router' });
  private readonly taxonomy: Set<string>;
  private readonly knowledgeIntents: Set<string>;

  constructor(
    private readonly classifier: Capability<IntentClassifier>,
    private readonly fallback: KeywordIntentClassifier = new KeywordIntentClassifier(),
    knowledgeIntents: string[] = DEFAULT_KNOWLEDGE_INTENTS,
  ) {
    this.taxonomy = new Set(fallback.intents);
    this.knowledgeIntents = new Set(knowledgeIntents);
  }

  async classify(message: string): Promise<IntentResult> {
    if (!message.trim()) {
      return { intent: UNKNOWN_INTENT, confidence: 0, entities: {}, source: 'empty' };
    }

    if (this.classifier.available) {
      try {
        const prediction = await this.classifier.client.classify(message);
        if (prediction && this.taxonomy.has(prediction.intent)) {
          return {
            intent: prediction.intent,
            confidence: clampConfidence(prediction.confidence),
            entities: prediction.entities ?? {},
            source: 'classifier',
          };
        }
        if (prediction) {
          this.log.warn({ intent: prediction.intent }, 'Classifier intent outside taxonomy; using keyword fallback');
        }
      } catch (err) {
        this.log.warn({ err }, 'Classifier failed; using keyword fallback');
      }
    }

    const result = this.fallback.classify(message);
    return { ...result, confidence: clampConfidence(result.confidence) };
  }

  route(intent: string): HandlingStrategy {
    return this.knowledgeIntents.has(intent) ? 'knowledge' : 'acknowledge';
  }
}
