import { copySpec, normalizeRuleMap, normalizeRules } from './normalizer';
import type { Condition, ConditionalRule, RuleExpression, RuleMap, RuleSet } from './types';

export function copyRuleSet(ruleSet: RuleSet): RuleSet {
  const copy: RuleSet = {};
  Object.entries(ruleSet).forEach(([field, rules]) => {
    copy[field] = rules.map(copySpec);
  });
  return copy;
}

/**
 * Accumulates field rules for one validator. Rules are only ever appended;
 * registering the same rule twice keeps both copies.
 */
export class RuleStore {
  private readonly rules: RuleSet = {};
  private readonly conditionals: ConditionalRule[] = [];

  addRule(field: string, expr: RuleExpression): this {
    const existing = this.rules[field] ?? [];
    this.rules[field] = [...existing, ...normalizeRules(expr)];
    return this;
  }

  addRules(map: RuleMap): this {
    Object.entries(map).forEach(([field, expr]) => this.addRule(field, expr));
    return this;
  }

  addConditional(condition: Condition, thenMap: RuleMap, elseMap: RuleMap = {}): this {
    this.conditionals.push({
      condition: { ...condition },
      then: normalizeRuleMap(thenMap),
      else: normalizeRuleMap(elseMap),
    });
    return this;
  }

  getRules(): RuleSet {
    return copyRuleSet(this.rules);
  }

  /** Copies of the conditionals; stored ones never change after registration. */
  getConditionals(): ConditionalRule[] {
    return this.conditionals.map((conditional) => ({
      condition: { ...conditional.condition },
      then: copyRuleSet(conditional.then),
      else: copyRuleSet(conditional.else),
    }));
  }
}
