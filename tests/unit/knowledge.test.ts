import * as path from 'path';
import { KnowledgeService } from '../../src/knowledge/knowledge-service';
import { KnowledgeAgent } from '../../src/knowledge/knowledge-agent';
import { FAQEntry, KnowledgeProvider } from '../../src/knowledge/types';
import { available, unavailable } from '../../src/resilience/capability';
import { getKnowledgeFallback } from '../../src/resilience/static-fallbacks';

const entries: FAQEntry[] = [
  {
    question: 'How do I update my billing address?',
    answer: 'Open Settings, choose Billing and edit the address on file.',
    category: 'billing',
    tags: ['billing', 'address'],
    link: 'https://support.example.com/billing/address',
  },
  {
    question: 'What plans do you offer?',
    answer: 'We offer Starter, Team and Enterprise plans.',
    category: 'product',
    tags: ['plans', 'pricing'],
  },
];

describe('KnowledgeService', () => {
  const service = new KnowledgeService({ entries });

  it('should answer from the best matching entry', async () => {
    const answer = await service.answer('update billing address');
    expect(answer.answerText).toBe('Open Settings, choose Billing and edit the address on file.');
    expect(answer.confidence).toBe(0.9);
    expect(answer.sources).toEqual([
      {
        title: 'How do I update my billing address?',
        link: 'https://support.example.com/billing/address',
        snippet: 'Open Settings, choose Billing and edit the address on file.',
      },
    ]);
  });

  it('should use a lower confidence for partial matches and derive a link from the category', async () => {
    // "plans" hits, "yearly" does not: score 1.5 / 2 = 0.75
    const answer = await service.answer('yearly plans');
    expect(answer.answerText).toBe('We offer Starter, Team and Enterprise plans.');
    expect(answer.confidence).toBe(0.7);
    expect(answer.sources[0].link).toBe('faq/product');
  });

  it('should return an empty answer when nothing scores', async () => {
    expect(await service.answer('quantum teleportation')).toEqual({ answerText: '', confidence: 0, sources: [] });
  });

  it('should apply category filters', async () => {
    const filtered = await service.answer('update billing address', { category: 'product' });
    expect(filtered.answerText).toBe('');
  });

  it('should load the bundled FAQ files from disk', () => {
    const fromDisk = new KnowledgeService({ knowledgeDir: path.resolve(__dirname, '..', '..', 'knowledge') });
    expect(fromDisk.size).toBeGreaterThan(0);
  });

  it('should start empty when the directory is missing', () => {
    const missing = new KnowledgeService({ knowledgeDir: 'does-not-exist' });
    expect(missing.size).toBe(0);
  });
});

describe('getKnowledgeFallback', () => {
  it('should pick the first category whose trigger appears in the query', () => {
    expect(getKnowledgeFallback('How do I export data?')).toEqual({
      category: 'how_to',
      answer: 'Please check our help center at https://support.example.com for detailed instructions.',
      confidence: 0.6,
    });
    expect(getKnowledgeFallback('who do I contact').category).toBe('contact');
    expect(getKnowledgeFallback('what does it cost').category).toBe('pricing');
    expect(getKnowledgeFallback('I want to return this').category).toBe('refund');
  });

  it('should fall back to the generic message', () => {
    expect(getKnowledgeFallback('purple elephants')).toEqual({
      category: 'generic',
      answer:
        "I'm having trouble accessing the knowledge base. Please try again later or contact support for assistance.",
      confidence: 0.3,
    });
  });
});

describe('KnowledgeAgent', () => {
  it('should return provider answers as-is, capped to three sources', async () => {
    const provider: KnowledgeProvider = {
      answer: jest.fn().mockResolvedValue({
        answerText: 'Invoices are emailed monthly.',
        confidence: 0.9,
        sources: [1, 2, 3, 4].map((n) => ({ title: `t${n}`, link: `l${n}`, snippet: `s${n}` })),
      }),
    };
    const result = await new KnowledgeAgent(available(provider)).answer('when do invoices arrive', { category: 'billing' });

    expect(result.fromFallback).toBe(false);
    expect(result.answerText).toBe('Invoices are emailed monthly.');
    expect(result.sources.map((s) => s.title)).toEqual(['t1', 't2', 't3']);
    expect(provider.answer).toHaveBeenCalledWith('when do invoices arrive', { category: 'billing' });
  });

  it('should use the canned fallback when the provider fails', async () => {
    const provider: KnowledgeProvider = { answer: jest.fn().mockRejectedValue(new Error('search down')) };
    const result = await new KnowledgeAgent(available(provider)).answer('how much is the team plan');

    expect(result).toEqual({
      answerText:
        'For the most up-to-date pricing information, please visit our pricing page at https://example.com/pricing.',
      confidence: 0.6,
      sources: [],
      fromFallback: true,
      fallbackCategory: 'pricing',
    });
  });

  it('should use the fallback when the provider finds nothing', async () => {
    const provider: KnowledgeProvider = {
      answer: jest.fn().mockResolvedValue({ answerText: '', confidence: 0, sources: [] }),
    };
    const result = await new KnowledgeAgent(available(provider)).answer('refund please');
    expect(result.fallbackCategory).toBe('refund');
  });

  it('should use the fallback when the provider is unavailable', async () => {
    const result = await new KnowledgeAgent(unavailable('disabled')).answer('unrelated words');
    expect(result.fallbackCategory).toBe('generic');
    expect(result.confidence).toBe(0.3);
  });

  it('should ask for a question when the query is blank', async () => {
    const result = await new KnowledgeAgent(unavailable('disabled')).answer('  ');
    expect(result.answerText).toBe("I didn't receive a question to look up. How can I help you?");
    expect(result.confidence).toBe(0);
  });
});
