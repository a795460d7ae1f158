export interface FAQEntry {
  question: string;
  answer: string;
  tags: string[];
  category: string;
  link?: string;
}

export interface KnowledgeSource {
  title: string;
  link: string;
  snippet: string;
}

export interface KnowledgeFilters {
  category?: string;
  tags?: string[];
}

export interface KnowledgeAnswer {
  answerText: string;
  confidence: number;
  sources: KnowledgeSource[];
}

/** Pluggable search/answer provider. An empty `answerText` means nothing was found. */
export interface KnowledgeProvider {
  answer(query: string, filters?: KnowledgeFilters): Promise<KnowledgeAnswer>;
}

export interface KnowledgeResult extends KnowledgeAnswer {
  /** True when the text is a canned response rather than a provider answer */
  fromFallback: boolean;
  fallbackCategory?: string;
}

export interface KnowledgeSearchResult {
  entry: FAQEntry;
  score: number;
}
