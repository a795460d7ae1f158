import * as fs from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import { RouterConfig, RouterLimits, RouterTables } from './types';
import { env } from './env';
import { logger } from '../observability/logger';
import {
  DEFAULT_EXPLICIT_REQUEST_PHRASES,
  DEFAULT_HIGH_PRIORITY_PHRASES,
  DEFAULT_NEGATIVE_WORDS,
  DEFAULT_RULES,
} from '../escalation/rules';
import { DEFAULT_INTENT_KEYWORDS } from '../intent/keyword-classifier';
import { DEFAULT_KNOWLEDGE_INTENTS } from '../intent/intent-router';

// Resolve from project root (2 levels up from dist/config/ or src/config/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const DEFAULT_CONFIG_PATH = path.resolve(PROJECT_ROOT, 'config', 'router.json');

const ajv = new Ajv({ allErrors: true });

const stringList = { type: 'array', items: { type: 'string', minLength: 1 } };

const routerTablesSchema = {
  type: 'object',
  properties: {
    escalation: {
      type: 'object',
      properties: {
        rules: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              name: {
                type: 'string',
                enum: [
                  'multiple_unsuccessful_attempts',
                  'high_priority_keywords',
                  'sentiment_escalation',
                  'explicit_escalation_request',
                ],
              },
              defaultPriority: { type: 'string', enum: ['low', 'medium', 'high', 'critical'] },
            },
            required: ['name', 'defaultPriority'],
          },
        },
        highPriorityPhrases: stringList,
        explicitRequestPhrases: stringList,
        negativeWords: stringList,
      },
      required: ['rules', 'highPriorityPhrases', 'explicitRequestPhrases', 'negativeWords'],
    },
    intents: {
      type: 'object',
      properties: {
        keywordTable: {
          type: 'array',
          minItems: 1,
          items: {
            type: 'object',
            properties: {
              intent: { type: 'string', minLength: 1 },
              keywords: stringList,
            },
            required: ['intent', 'keywords'],
          },
        },
        knowledgeEligible: stringList,
      },
      required: ['keywordTable', 'knowledgeEligible'],
    },
  },
  required: ['escalation', 'intents'],
};

const validateRouterTables = ajv.compile<RouterTables>(routerTablesSchema);

export function limitsFromEnv(): RouterLimits {
  return {
    maxHistorySize: env.history.maxSize,
    windowSize: env.history.windowSize,
    maxUnsuccessfulAttempts: env.escalation.maxUnsuccessfulAttempts,
  };
}

function defaultTables(): RouterTables {
  return {
    escalation: {
      rules: DEFAULT_RULES.map((r) => ({ ...r })),
      highPriorityPhrases: [...DEFAULT_HIGH_PRIORITY_PHRASES],
      explicitRequestPhrases: [...DEFAULT_EXPLICIT_REQUEST_PHRASES],
      negativeWords: [...DEFAULT_NEGATIVE_WORDS],
    },
    intents: {
      keywordTable: DEFAULT_INTENT_KEYWORDS.map((e) => ({ intent: e.intent, keywords: [...e.keywords] })),
      knowledgeEligible: [...DEFAULT_KNOWLEDGE_INTENTS],
    },
  };
}

function combine(tables: RouterTables, limits: RouterLimits): RouterConfig {
  return {
    history: { maxSize: limits.maxHistorySize, windowSize: limits.windowSize },
    escalation: {
      rules: tables.escalation.rules,
      maxUnsuccessfulAttempts: limits.maxUnsuccessfulAttempts,
      highPriorityPhrases: tables.escalation.highPriorityPhrases,
      explicitRequestPhrases: tables.escalation.explicitRequestPhrases,
      negativeWords: tables.escalation.negativeWords,
    },
    intents: {
      keywordTable: tables.intents.keywordTable,
      knowledgeEligible: tables.intents.knowledgeEligible,
    },
  };
}

export class ConfigService {
  private config: RouterConfig;

  constructor(
    private readonly configPath: string = DEFAULT_CONFIG_PATH,
    private readonly limits: RouterLimits = limitsFromEnv(),
  ) {
    this.config = ConfigService.builtInDefault(limits);
    this.load();
  }

  load(): void {
    if (!fs.existsSync(this.configPath)) {
      logger.warn({ path: this.configPath }, 'Router config not found; using built-in default');
      this.config = ConfigService.builtInDefault(this.limits);
      return;
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
      if (!validateRouterTables(raw)) {
        logger.error(
          { path: this.configPath, errors: validateRouterTables.errors },
          'Router config failed validation; using built-in default',
        );
        this.config = ConfigService.builtInDefault(this.limits);
        return;
      }
      this.config = combine(raw, this.limits);
      logger.info(
        { path: this.configPath, rules: raw.escalation.rules.map((r) => r.name), limits: this.limits },
        'Loaded router config',
      );
    } catch (err) {
      logger.error({ path: this.configPath, err }, 'Failed to load router config; using built-in default');
      this.config = ConfigService.builtInDefault(this.limits);
    }
  }

  get(): RouterConfig {
    return this.config;
  }

  static builtInDefault(limits: RouterLimits = limitsFromEnv()): RouterConfig {
    return combine(defaultTables(), limits);
  }
}

/** Singleton */
export const configService = new ConfigService();
