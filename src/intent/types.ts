export const UNKNOWN_INTENT = 'unknown';

export type IntentSource = 'empty' | 'classifier' | 'keyword';

export interface IntentResult {
  intent: string;
  /** Always within [0, 1] */
  confidence: number;
  entities: Record<string, unknown>;
  source: IntentSource;
}

/** Raw classifier answer, before clamping and taxonomy checks */
export interface ClassifierPrediction {
  intent: string;
  confidence: number;
  entities?: Record<string, unknown>;
}

/** Pluggable classification service. `null` means "no opinion". */
export interface IntentClassifier {
  classify(text: string): Promise<ClassifierPrediction | null>;
}

export interface IntentKeywordEntry {
  intent: string;
  keywords: string[];
}

export type HandlingStrategy = 'knowledge' | 'acknowledge';
