import { RouterConfig } from '../config/types';
import { ConversationHistoryStore } from '../memory/conversation-history';
import { ConversationTurn } from '../memory/types';
import { EscalationEvaluator } from '../escalation/escalation-evaluator';
import { EscalationDecision, EscalationRecordStore, RuleTable } from '../escalation/types';
import { BUILTIN_RULES } from '../escalation/rules';
import { IntentRouter } from '../intent/intent-router';
import { KeywordIntentClassifier } from '../intent/keyword-classifier';
import { IntentClassifier, IntentResult } from '../intent/types';
import { KnowledgeAgent } from '../knowledge/knowledge-agent';
import { KnowledgeProvider } from '../knowledge/types';
import { PersonalizationService } from '../personalization/personalization-service';
import { InteractionLogStore, ProfileStore } from '../personalization/types';
import { EngagementScheduler } from '../outbound/engagement-scheduler';
import { identifyEngagementOpportunity } from '../outbound/engagement-opportunity';
import { Capability, describeCapability } from '../resilience/capability';
import { BackgroundTaskRunner } from './background-tasks';
import { ACKNOWLEDGMENT_TEXT, errorResponse, escalationNote, escalationResponse } from './responses';
import { EscalationPayload, OrchestratorResponse } from './types';
import { logger, turnLogger } from '../observability/logger';
import { TurnTrace, createTurnTrace, summarizeTurn, traceStage } from '../observability/trace';
import type { Logger } from 'pino';

export interface OrchestratorDeps {
  config: RouterConfig;
  history: ConversationHistoryStore;
  classifier: Capability<IntentClassifier>;
  knowledge: Capability<KnowledgeProvider>;
  engagement: Capability<EngagementScheduler>;
  profiles: ProfileStore;
  interactions: InteractionLogStore;
  escalations: EscalationRecordStore;
  background?: BackgroundTaskRunner;
  /** Escalation rule dispatch table; defaults to the built-in rules */
  ruleTable?: RuleTable;
  followUpDelayHours?: number;
  lookbackDays?: number;
  interactionLimit?: number;
  now?: () => Date;
}

/** Components built once by `initialize()` */
interface Core {
  evaluator: EscalationEvaluator;
  router: IntentRouter;
  knowledge: KnowledgeAgent;
  personalization: PersonalizationService;
}

interface TurnOutcome {
  response: OrchestratorResponse;
  /** Set when the turn went through intent classification */
  intent?: IntentResult;
}

interface TurnInput {
  userId: string;
  sessionId: string;
  message: string;
  metadata: Record<string, unknown>;
}

/**
 * Per-turn pipeline: history → escalation → intent → knowledge or
 * acknowledgment → personalization → history, with proactive engagement
 * checked after the response is built.
 *
 * Turns for the same session run one at a time; different sessions run
 * independently. `processMessage` never throws.
 */
export class Orchestrator {
  private readonly log = logger.child({ component: 'orchestrator' });
  private readonly background: BackgroundTaskRunner;
  private readonly now: () => Date;
  private core?: Core;
  private initPromise?: Promise<boolean>;

  constructor(private readonly deps: OrchestratorDeps) {
    this.background = deps.background ?? new BackgroundTaskRunner();
    this.now = deps.now ?? (() => new Date());
  }

  get isInitialized(): boolean {
    return this.core !== undefined;
  }

  /**
   * Build the pipeline components. Safe to call repeatedly or concurrently:
   * callers share a single attempt, and once it succeeds later calls are
   * no-ops. A failed attempt is logged and may be retried.
   */
  initialize(): Promise<boolean> {
    if (this.core) return Promise.resolve(true);
    if (!this.initPromise) {
      this.initPromise = this.buildCore().then(
        (core) => {
          this.core = core;
          return true;
        },
        (err) => {
          this.log.error({ err }, 'Orchestrator initialization failed');
          this.initPromise = undefined;
          return false;
        },
      );
    }
    return this.initPromise;
  }

  private async buildCore(): Promise<Core> {
    const { config } = this.deps;

    const evaluator = new EscalationEvaluator(
      config.escalation.rules,
      {
        maxUnsuccessfulAttempts: config.escalation.maxUnsuccessfulAttempts,
        highPriorityPhrases: config.escalation.highPriorityPhrases,
        explicitRequestPhrases: config.escalation.explicitRequestPhrases,
        negativeWords: config.escalation.negativeWords,
      },
      this.deps.ruleTable ?? BUILTIN_RULES,
    );

    const router = new IntentRouter(
      this.deps.classifier,
      new KeywordIntentClassifier(config.intents.keywordTable),
      config.intents.knowledgeEligible,
    );

    const personalization = new PersonalizationService(this.deps.profiles, this.deps.interactions, {
      lookbackDays: this.deps.lookbackDays ?? 30,
      interactionLimit: this.deps.interactionLimit ?? 5,
      now: this.now,
    });

    this.log.info(
      {
        rules: evaluator.ruleNames,
        classifier: describeCapability(this.deps.classifier),
        knowledge: describeCapability(this.deps.knowledge),
        engagement: describeCapability(this.deps.engagement),
        maxHistorySize: this.deps.history.capacity,
      },
      'Orchestrator initialized',
    );

    return { evaluator, router, knowledge: new KnowledgeAgent(this.deps.knowledge), personalization };
  }

  async processMessage(
    userId: string,
    sessionId: string,
    message: string,
    metadata: Record<string, unknown> = {},
  ): Promise<OrchestratorResponse> {
    const trace = createTurnTrace(userId, sessionId);
    const log = turnLogger(trace);

    if (!(await this.initialize()) || !this.core) {
      log.error('Turn rejected: orchestrator not initialized');
      return errorResponse('system_error');
    }
    const core = this.core;

    try {
      const input: TurnInput = { userId, sessionId, message, metadata };
      const outcome = await this.deps.history.runExclusive(sessionId, () => this.runTurn(core, input, trace, log));

      if (outcome.intent) {
        this.submitEngagementCheck(input, outcome.intent.intent);
      }

      log.info(
        {
          intent: outcome.response.intent,
          source: outcome.response.source,
          escalated: Boolean(outcome.response.escalation),
          timing: summarizeTurn(trace),
        },
        'Turn processed',
      );
      return outcome.response;
    } catch (err) {
      log.error({ err, timing: summarizeTurn(trace) }, 'Error processing message');
      return errorResponse('processing_error');
    }
  }

  getHistory(sessionId: string, limit?: number): ConversationTurn[] {
    return limit === undefined ? this.deps.history.get(sessionId) : this.deps.history.window(sessionId, limit);
  }

  async updateUserPreferences(userId: string, preferences: Record<string, unknown>): Promise<boolean> {
    if (!(await this.initialize()) || !this.core) return false;
    return this.core.personalization.updatePreferences(userId, preferences);
  }

  /** Wait for detached engagement work. Mostly for shutdown and tests. */
  drainBackgroundTasks(): Promise<void> {
    return this.background.drain();
  }

  async shutdown(): Promise<void> {
    await this.background.close();
    this.deps.history.stop();
    this.log.info('Orchestrator stopped');
  }

  // ───── Pipeline ─────

  private async runTurn(core: Core, input: TurnInput, trace: TurnTrace, log: Logger): Promise<TurnOutcome> {
    const { userId, sessionId, message, metadata } = input;
    const { history, config } = this.deps;

    history.append(sessionId, { role: 'user', content: message, metadata });

    const decision = await traceStage(trace, 'escalation', () =>
      core.evaluator.evaluate({ message, userId, sessionId }, history.window(sessionId, config.history.windowSize)),
    );

    if (decision.needsEscalation) {
      return { response: await this.escalate(input, decision, log) };
    }

    const intent = await traceStage(
      trace,
      'intent',
      () => core.router.classify(message),
      (result) => result.source === 'keyword' && this.deps.classifier.available,
    );

    let responseText = ACKNOWLEDGMENT_TEXT;
    let source: OrchestratorResponse['source'] = 'orchestrator';
    let unsuccessful = false;
    const response: OrchestratorResponse = {
      responseText,
      intent: intent.intent,
      confidence: intent.confidence,
      source,
      metadata: { intentSource: intent.source, entities: intent.entities },
      requiresFollowUp: false,
      suggestedResponses: [],
      sources: [],
      personalizationApplied: false,
    };

    if (core.router.route(intent.intent) === 'knowledge') {
      const answer = await traceStage(
        trace,
        'knowledge',
        () => core.knowledge.answer(message),
        (result) => result.fromFallback,
      );

      responseText = answer.answerText;
      source = answer.fromFallback ? 'knowledge_fallback' : 'knowledge_base';
      unsuccessful = answer.fromFallback;
      response.sources = answer.sources;
      response.requiresFollowUp = answer.fromFallback;
      response.metadata.knowledgeConfidence = answer.confidence;
      if (answer.fallbackCategory) response.metadata.fallbackCategory = answer.fallbackCategory;
    }

    const personalized = await traceStage(
      trace,
      'personalization',
      () =>
        core.personalization.personalizeForUser({
          userId,
          sessionId,
          message: responseText,
          userMessage: message,
          intent: intent.intent,
          context: metadata,
        }),
      (result) => result.degraded,
    );

    response.responseText = personalized.text;
    response.source = source;
    response.personalizationApplied = true;

    history.append(sessionId, {
      role: 'assistant',
      content: response.responseText,
      metadata: { intent: intent.intent, confidence: intent.confidence, source, unsuccessful },
    });

    return { response, intent };
  }

  private async escalate(
    input: TurnInput,
    decision: Extract<EscalationDecision, { needsEscalation: true }>,
    log: Logger,
  ): Promise<OrchestratorResponse> {
    const { history } = this.deps;
    log.info(
      { reason: decision.reason, priority: decision.priority, rule: decision.ruleName },
      'Escalating conversation',
    );

    history.append(input.sessionId, {
      role: 'system',
      content: escalationNote(decision.reason, decision.priority),
      metadata: { type: 'escalation', priority: decision.priority, rule: decision.ruleName },
    });

    const payload: EscalationPayload = {
      escalated: true,
      reason: decision.reason,
      priority: decision.priority,
      suggestedAgent: decision.suggestedAgent,
      timestamp: this.now().toISOString(),
    };

    try {
      const record = await this.deps.escalations.create({
        userId: input.userId,
        sessionId: input.sessionId,
        reason: decision.reason,
        priority: decision.priority,
        suggestedAgent: decision.suggestedAgent,
        conversationSnapshot: history
          .get(input.sessionId)
          .map((t) => ({ role: t.role, content: t.content, timestamp: t.timestamp })),
      });
      payload.recordId = record.id;
    } catch (err) {
      log.warn({ err }, 'Escalation record create failed (non-blocking)');
    }

    return escalationResponse(payload, decision.ruleName);
  }

  private submitEngagementCheck(input: TurnInput, intent: string): void {
    const engagement = this.deps.engagement;
    if (!engagement.available) return;

    const request = identifyEngagementOpportunity({
      userId: input.userId,
      sessionId: input.sessionId,
      intent,
      now: this.now(),
      followUpDelayHours: this.deps.followUpDelayHours ?? 24,
    });
    if (!request) return;

    this.background.submit(
      'engagement.schedule',
      async () => {
        const result = await engagement.client.schedule(request);
        if (result.status === 'error') {
          throw new Error(result.message);
        }
        return result;
      },
      { userId: input.userId, sessionId: input.sessionId },
    );
  }
}
