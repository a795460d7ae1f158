import Ajv from 'ajv';
import { ClassifierPrediction, IntentClassifier } from './types';
import { logger } from '../observability/logger';

const ajv = new Ajv({ allErrors: true });

const predictionSchema = {
  type: 'object',
  properties: {
    intent: { type: 'string', minLength: 1 },
    confidence: { type: 'number' },
    entities: { type: 'object' },
  },
  required: ['intent', 'confidence'],
  additionalProperties: true,
};

const validatePrediction = ajv.compile<ClassifierPrediction>(predictionSchema);

export interface HttpClassifierOptions {
  url: string;
  timeoutMs: number;
}

/**
 * Client for a JSON classification endpoint.
 * POST { text } → { intent, confidence, entities? }
 *
 * Transport failures and malformed payloads throw; the intent router turns
 * them into the keyword fallback.
 */
export class HttpClassifierClient implements IntentClassifier {
  private readonly log = logger.child({ component: 'http-classifier' });

  constructor(private readonly options: HttpClassifierOptions) {}

  async classify(text: string): Promise<ClassifierPrediction | null> {
    const response = await fetch(this.options.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text }),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (response.status === 204) return null;
    if (!response.ok) {
      throw new Error(`Classifier responded with status ${response.status}`);
    }

    const data: unknown = await response.json();
    if (!validatePrediction(data)) {
      const errors = validatePrediction.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
      this.log.warn({ errors }, 'Classifier payload failed validation');
      throw new Error(`Invalid classifier payload: ${errors}`);
    }
    return data;
  }
}
