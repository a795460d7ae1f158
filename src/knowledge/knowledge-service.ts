import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import Ajv from 'ajv';
import {
  FAQEntry,
  KnowledgeAnswer,
  KnowledgeFilters,
  KnowledgeProvider,
  KnowledgeSearchResult,
  KnowledgeSource,
} from './types';
import { logger } from '../observability/logger';

// Resolve from project root (2 levels up from dist/knowledge/ or src/knowledge/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');

const SNIPPET_LENGTH = 160;
const MIN_SCORE = 0.3;

const ajv = new Ajv({ allErrors: true });
const validateEntries = ajv.compile<FAQEntry[]>({
  type: 'array',
  items: {
    type: 'object',
    properties: {
      question: { type: 'string' },
      answer: { type: 'string' },
      tags: { type: 'array', items: { type: 'string' } },
      category: { type: 'string' },
      link: { type: 'string' },
    },
    required: ['question', 'answer', 'tags', 'category'],
  },
});

export interface KnowledgeServiceOptions {
  /** Directory of *.yaml FAQ files, relative to the project root unless absolute */
  knowledgeDir?: string;
  /** Preloaded entries; skips reading from disk */
  entries?: FAQEntry[];
  maxResults?: number;
}

/**
 * Local knowledge provider over YAML FAQ files, scored by keyword overlap.
 */
export class KnowledgeService implements KnowledgeProvider {
  private readonly log = logger.child({ component: 'knowledge-service' });
  private readonly dir: string;
  private readonly maxResults: number;
  private entries: FAQEntry[] = [];

  constructor(options: KnowledgeServiceOptions = {}) {
    this.dir = path.resolve(PROJECT_ROOT, options.knowledgeDir ?? 'knowledge');
    this.maxResults = options.maxResults ?? 3;
    if (options.entries) {
      this.entries = options.entries;
    } else {
      this.loadAll();
    }
  }

  get size(): number {
    return this.entries.length;
  }

  loadAll(): void {
    if (!fs.existsSync(this.dir)) {
      this.log.warn({ dir: this.dir }, 'Knowledge directory not found');
      this.entries = [];
      return;
    }
    const files = fs.readdirSync(this.dir).filter((f) => f.endsWith('.yaml') || f.endsWith('.yml'));
    const loaded: FAQEntry[] = [];
    for (const file of files) {
      loaded.push(...this.loadYAML(path.join(this.dir, file)));
    }
    this.entries = loaded;
    this.log.info({ faqCount: loaded.length, files: files.length }, 'Knowledge base loaded');
  }

  private loadYAML(filepath: string): FAQEntry[] {
    try {
      const content: unknown = yaml.load(fs.readFileSync(filepath, 'utf-8'));
      if (!validateEntries(content)) {
        this.log.error({ filepath, errors: validateEntries.errors }, 'Knowledge file has invalid shape');
        return [];
      }
      return content;
    } catch (err) {
      this.log.error({ err, filepath }, 'Failed to load knowledge file');
      return [];
    }
  }

  /**
   * Stop words that dilute search relevance.
   * These common words match almost every knowledge entry and
   * should be filtered out before scoring.
   */
  private static STOP_WORDS = new Set([
    'i', 'me', 'my', 'we', 'our', 'you', 'your', 'he', 'she', 'it', 'they', 'them',
    'a', 'an', 'the', 'is', 'am', 'are', 'was', 'were', 'be', 'been', 'being',
    'have', 'has', 'had', 'do', 'does', 'did', 'will', 'would', 'shall', 'should',
    'can', 'could', 'may', 'might', 'must',
    'to', 'of', 'in', 'for', 'on', 'with', 'at', 'by', 'from', 'as', 'into',
    'about', 'and', 'but', 'or', 'not', 'so', 'if', 'then', 'than',
    'what', 'which', 'who', 'this', 'that', 'these', 'those',
    'how', 'when', 'where', 'why',
    'all', 'any', 'some', 'no', 'up', 'out', 'just', 'also', 'very', 'only',
    'want', 'need', 'know', 'tell', 'please', 'help', 'get',
  ]);

  /**
   * Filter stop words from query terms while preserving meaningful words.
   * If ALL terms are stop words (e.g. "what is it"), fall back to original terms.
   */
  private filterStopWords(terms: string[]): string[] {
    const meaningful = terms.filter((t) => !KnowledgeService.STOP_WORDS.has(t) && t.length > 1);
    return meaningful.length > 0 ? meaningful : terms;
  }

  /**
   * Score a text against meaningful terms.
   * Tag matches get a bonus on top of the plain hit.
   */
  private scoreText(text: string, terms: string[], tagText: string): number {
    if (terms.length === 0) return 0;
    let score = 0;
    for (const term of terms) {
      if (text.includes(term)) {
        score += 1;
        if (tagText.includes(term)) score += 0.5;
      }
    }
    return score / terms.length;
  }

  private matchesFilters(entry: FAQEntry, filters?: KnowledgeFilters): boolean {
    if (!filters) return true;
    if (filters.category && entry.category !== filters.category) return false;
    if (filters.tags && filters.tags.length > 0) {
      const tags = new Set(entry.tags.map((t) => t.toLowerCase()));
      if (!filters.tags.some((t) => tags.has(t.toLowerCase()))) return false;
    }
    return true;
  }

  search(query: string, filters?: KnowledgeFilters, topK: number = this.maxResults): KnowledgeSearchResult[] {
    const rawTerms = query.toLowerCase().split(/[^a-z0-9']+/).filter(Boolean);
    const terms = this.filterStopWords(rawTerms);
    const results: KnowledgeSearchResult[] = [];

    for (const entry of this.entries) {
      if (!this.matchesFilters(entry, filters)) continue;
      const tagText = entry.tags.join(' ').toLowerCase();
      const text = `${entry.question} ${entry.answer} ${tagText}`.toLowerCase();
      const score = this.scoreText(text, terms, tagText);
      if (score > MIN_SCORE) {
        results.push({ entry, score });
      }
    }

    return results.sort((a, b) => b.score - a.score).slice(0, topK);
  }

  async answer(query: string, filters?: KnowledgeFilters): Promise<KnowledgeAnswer> {
    const results = this.search(query, filters);
    if (results.length === 0) {
      return { answerText: '', confidence: 0, sources: [] };
    }

    const best = results[0];
    return {
      answerText: best.entry.answer,
      // Every query term hit the best entry → treat it as a direct answer
      confidence: best.score >= 1 ? 0.9 : 0.7,
      sources: results.map((r) => this.toSource(r.entry)),
    };
  }

  private toSource(entry: FAQEntry): KnowledgeSource {
    const snippet =
      entry.answer.length > SNIPPET_LENGTH ? `${entry.answer.slice(0, SNIPPET_LENGTH - 3)}...` : entry.answer;
    return {
      title: entry.question,
      link: entry.link ?? `faq/${entry.category}`,
      snippet,
    };
  }
}
