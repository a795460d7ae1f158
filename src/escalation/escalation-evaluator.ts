import {
  EscalationDecision,
  EscalationInput,
  EscalationRuleDescriptor,
  RuleEvaluator,
  RuleOutcome,
  RuleSettings,
  RuleTable,
} from './types';
import { ConversationTurn } from '../memory/types';
import { BUILTIN_RULES } from './rules';
import { ConfigurationError } from '../config/errors';
import { logger } from '../observability/logger';

interface ResolvedRule {
  descriptor: EscalationRuleDescriptor;
  evaluate: RuleEvaluator;
}

const NOT_ESCALATED: EscalationDecision = Object.freeze({ needsEscalation: false, priority: 'none' });

/**
 * Ordered, first-match escalation rule engine.
 *
 * Rule descriptors are resolved against the dispatch table once, at
 * construction; an unknown rule name is a configuration error. During
 * evaluation a rule that throws is logged and treated as "no match".
 */
export class EscalationEvaluator {
  private readonly log = logger.child({ component: 'escalation-evaluator' });
  private readonly rules: ResolvedRule[];

  constructor(
    descriptors: EscalationRuleDescriptor[],
    private readonly settings: RuleSettings,
    table: RuleTable = BUILTIN_RULES,
  ) {
    const seen = new Set<string>();
    this.rules = descriptors.map((descriptor) => {
      if (seen.has(descriptor.name)) {
        throw new ConfigurationError(`Duplicate escalation rule: ${descriptor.name}`);
      }
      seen.add(descriptor.name);
      const evaluate = Object.prototype.hasOwnProperty.call(table, descriptor.name)
        ? table[descriptor.name]
        : undefined;
      if (!evaluate) {
        throw new ConfigurationError(`Unknown escalation rule: ${descriptor.name}`, {
          known: Object.keys(table),
        });
      }
      return { descriptor, evaluate };
    });
  }

  get ruleNames(): string[] {
    return this.rules.map((r) => r.descriptor.name);
  }

  evaluate(input: EscalationInput, window: readonly ConversationTurn[]): EscalationDecision {
    for (const { descriptor, evaluate } of this.rules) {
      let outcome: RuleOutcome;
      try {
        outcome = evaluate(input, window, this.settings);
      } catch (err) {
        this.log.error(
          { err, rule: descriptor.name, sessionId: input.sessionId },
          'Escalation rule failed; skipping',
        );
        continue;
      }

      if (!outcome.needsEscalation) continue;

      const decision: EscalationDecision = {
        needsEscalation: true,
        priority: outcome.priority ?? descriptor.defaultPriority,
        reason: outcome.reason || `Triggered by rule: ${descriptor.name}`,
        suggestedAgent: outcome.suggestedAgent,
        ruleName: descriptor.name,
      };
      this.log.info(
        { rule: descriptor.name, priority: decision.priority, sessionId: input.sessionId },
        'Escalation rule matched',
      );
      return decision;
    }
    return NOT_ESCALATED;
  }
}
