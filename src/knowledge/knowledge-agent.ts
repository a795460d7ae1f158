import { Capability } from '../resilience/capability';
import { getKnowledgeFallback, EMPTY_QUERY_RESPONSE } from '../resilience/static-fallbacks';
import { KnowledgeFilters, KnowledgeProvider, KnowledgeResult } from './types';
import { logger } from '../observability/logger';

/**
 * Answers a query from the knowledge provider, substituting a canned
 * response whenever the provider is unavailable, fails, or finds nothing.
 */
export class KnowledgeAgent {
  private readonly log = logger.child({ component: 'knowledge-agent' });

  constructor(private readonly provider: Capability<KnowledgeProvider>) {}

  async answer(query: string, filters?: KnowledgeFilters): Promise<KnowledgeResult> {
    if (!query.trim()) {
      return { answerText: EMPTY_QUERY_RESPONSE, confidence: 0, sources: [], fromFallback: true };
    }

    if (this.provider.available) {
      try {
        const result = await this.provider.client.answer(query, filters);
        if (result.answerText.trim()) {
          return { ...result, sources: result.sources.slice(0, 3), fromFallback: false };
        }
        this.log.info('Knowledge provider returned no answer; using fallback');
      } catch (err) {
        this.log.warn({ err }, 'Knowledge provider failed; using fallback');
      }
    }

    const fallback = getKnowledgeFallback(query);
    return {
      answerText: fallback.answer,
      confidence: fallback.confidence,
      sources: [],
      fromFallback: true,
      fallbackCategory: fallback.category,
    };
  }
}
