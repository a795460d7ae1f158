import Redis from 'ioredis';
import { env } from './config/env';
import { configService } from './config/config-service';
import { ConfigurationError } from './config/errors';
import { logger } from './observability/logger';
import { ConversationHistoryStore } from './memory/conversation-history';
import { createEscalationStore } from './escalation/escalation-store';
import { createProfileStore } from './personalization/profile-store';
import { createInteractionLog } from './personalization/interaction-log';
import { HttpClassifierClient } from './intent/http-classifier';
import { IntentClassifier } from './intent/types';
import { KnowledgeService } from './knowledge/knowledge-service';
import { KnowledgeProvider } from './knowledge/types';
import { createDeliveryChannels } from './outbound/delivery-channels';
import { EngagementScheduler } from './outbound/engagement-scheduler';
import { DeferredEngagementDispatcher } from './outbound/deferred-dispatcher';
import { Capability, available, unavailable } from './resilience/capability';
import { Orchestrator } from './orchestrator/orchestrator';

export interface AppContext {
  orchestrator: Orchestrator;
  history: ConversationHistoryStore;
  dispatcher?: DeferredEngagementDispatcher;
  redis?: Redis;
  close(): Promise<void>;
}

async function connectRedis(): Promise<Redis | undefined> {
  if (!env.redis.url) {
    logger.info('REDIS_URL not set; using in-memory stores');
    return undefined;
  }

  const redisInstance = new Redis(env.redis.url, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      if (times > 5) return null; // stop retrying
      return Math.min(times * 200, 2000);
    },
    lazyConnect: true,
  });
  // Attach error handler BEFORE connect to prevent unhandled error events
  redisInstance.on('error', (err) => {
    logger.debug({ err: err.message }, 'Redis connection error (handled)');
  });

  try {
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    redisInstance.disconnect();
    return undefined;
  }
}

function resolveClassifier(): Capability<IntentClassifier> {
  if (!env.classifier.url) return unavailable('CLASSIFIER_URL not configured');
  try {
    new URL(env.classifier.url);
  } catch (err) {
    const error = new ConfigurationError('CLASSIFIER_URL is not a valid URL', { url: env.classifier.url });
    logger.error({ err: error, cause: err }, 'Classifier disabled');
    return unavailable(error.message);
  }
  return available(new HttpClassifierClient({ url: env.classifier.url, timeoutMs: env.classifier.timeoutMs }));
}

function resolveKnowledge(): Capability<KnowledgeProvider> {
  if (!env.knowledge.enabled) return unavailable('KNOWLEDGE_ENABLED=false');
  const service = new KnowledgeService({ knowledgeDir: env.knowledge.dir, maxResults: env.knowledge.maxResults });
  if (service.size === 0) return unavailable(`no knowledge entries under ${env.knowledge.dir}`);
  return available(service);
}

export async function buildApp(): Promise<AppContext> {
  const config = configService.get();
  const redis = await connectRedis();

  const history = new ConversationHistoryStore({
    maxHistorySize: config.history.maxSize,
    idleTtlMs: env.history.idleTtlMinutes * 60_000,
    sweepIntervalMs: env.history.sweepIntervalSeconds * 1000,
  });
  history.start();

  // ───── Proactive engagement ─────
  let engagement: Capability<EngagementScheduler> = unavailable('ENGAGEMENT_ENABLED=false');
  let dispatcher: DeferredEngagementDispatcher | undefined;
  if (env.engagement.enabled) {
    const channels = createDeliveryChannels(redis);
    engagement = available(new EngagementScheduler(channels.immediate, channels.deferred));
    dispatcher = new DeferredEngagementDispatcher(channels.deferred, channels.immediate, {
      intervalMs: env.engagement.pollIntervalSeconds * 1000,
    });
    dispatcher.start();
  }

  const orchestrator = new Orchestrator({
    config,
    history,
    classifier: resolveClassifier(),
    knowledge: resolveKnowledge(),
    engagement,
    profiles: createProfileStore(redis),
    interactions: createInteractionLog(redis),
    escalations: createEscalationStore(redis),
    followUpDelayHours: env.engagement.followUpDelayHours,
    lookbackDays: env.personalization.lookbackDays,
    interactionLimit: env.personalization.interactionLimit,
  });

  if (!(await orchestrator.initialize())) {
    logger.warn('Orchestrator failed to initialize; turns will retry on demand');
  }

  return {
    orchestrator,
    history,
    dispatcher,
    redis,
    async close() {
      dispatcher?.stop();
      await orchestrator.shutdown();
      if (redis) {
        redis.disconnect();
      }
    },
  };
}
