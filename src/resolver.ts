import { explainCondition } from './conditions';
import { copySpec } from './normalizer';
import type { RuleStore } from './store';
import type { BranchTrace, DuplicateRule, Resolution, RuleSet, RuleSpec, ValidationContext } from './types';

/**
 * Merge `addition` into `base` field by field. Rule lists are concatenated,
 * never replaced or deduplicated. Neither input is mutated.
 */
export function mergeRuleSets(base: RuleSet, addition: RuleSet): RuleSet {
  const merged: RuleSet = {};
  Object.entries(base).forEach(([field, rules]) => {
    merged[field] = rules.map(copySpec);
  });
  Object.entries(addition).forEach(([field, rules]) => {
    merged[field] = [...(merged[field] ?? []), ...rules.map(copySpec)];
  });
  return merged;
}

/**
 * Walk the conditional rules in registration order and fold the matching
 * branch of each into the unconditional rules, recording why each branch
 * was taken.
 */
export function explainRuleSet(store: RuleStore, context: ValidationContext): Resolution {
  let ruleSet = store.getRules();
  const branches: BranchTrace[] = [];

  store.getConditionals().forEach((conditional, index) => {
    const why = explainCondition(conditional.condition, context);
    const branch = why.result ? 'then' : 'else';
    const applied = why.result ? conditional.then : conditional.else;
    ruleSet = mergeRuleSets(ruleSet, applied);
    branches.push({ index, why, branch, applied });
  });

  return { ruleSet, branches };
}

export function resolveRuleSet(store: RuleStore, context: ValidationContext): RuleSet {
  return explainRuleSet(store, context).ruleSet;
}

function ruleKey(spec: RuleSpec): string {
  return JSON.stringify([spec.name, spec.params]);
}

/**
 * Rules that appear more than once (same name and parameters) on a field.
 * Merging keeps every copy, so these run, and may fail, more than once.
 */
export function findDuplicateRules(ruleSet: RuleSet): DuplicateRule[] {
  const duplicates: DuplicateRule[] = [];
  Object.entries(ruleSet).forEach(([field, rules]) => {
    const counts = new Map<string, { rule: RuleSpec; count: number }>();
    rules.forEach((spec) => {
      const key = ruleKey(spec);
      const entry = counts.get(key);
      if (entry) entry.count += 1;
      else counts.set(key, { rule: spec, count: 1 });
    });
    counts.forEach(({ rule, count }) => {
      if (count > 1) duplicates.push({ field, rule, count });
    });
  });
  return duplicates;
}
