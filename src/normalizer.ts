import { RuleDefinitionError } from './errors';
import type {
  FieldRules,
  MessageOption,
  RuleExpression,
  RuleMap,
  RuleParam,
  RuleSet,
  RuleSpec,
  Scalar,
} from './types';

function isScalar(value: unknown): value is Scalar {
  return value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isRuleParam(value: unknown): value is RuleParam {
  return isScalar(value) || (Array.isArray(value) && value.every(isScalar));
}

function isMessageOption(value: unknown): value is MessageOption {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !('name' in value) &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

export function isRuleSpec(value: unknown): value is RuleSpec {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'name' in value &&
    typeof value.name === 'string' &&
    'params' in value &&
    Array.isArray(value.params)
  );
}

function copyParam(param: RuleParam): RuleParam {
  return Array.isArray(param) ? [...param] : param;
}

export function copySpec(spec: RuleSpec): RuleSpec {
  const copy: RuleSpec = { name: spec.name, params: spec.params.map(copyParam) };
  if (spec.message !== undefined) copy.message = spec.message;
  return copy;
}

function tupleToSpec(items: readonly unknown[]): RuleSpec {
  const [name, ...rest] = items;
  if (typeof name !== 'string') {
    throw new RuleDefinitionError(`Rule tuple must start with a rule name, got ${JSON.stringify(name)}`);
  }
  const spec: RuleSpec = { name, params: [] };
  rest.forEach((item) => {
    if (isMessageOption(item)) {
      spec.message = item.message;
    } else if (isRuleParam(item)) {
      spec.params.push(copyParam(item));
    } else {
      throw new RuleDefinitionError(`Unsupported parameter for rule "${name}": ${JSON.stringify(item)}`);
    }
  });
  return spec;
}

function isRuleEntryItem(item: unknown): boolean {
  return Array.isArray(item) || isRuleSpec(item);
}

function normalizeEntry(entry: unknown): RuleSpec {
  if (typeof entry === 'string') return { name: entry, params: [] };
  if (isRuleSpec(entry)) return copySpec(entry);
  if (Array.isArray(entry)) return tupleToSpec(entry);
  throw new RuleDefinitionError(`Cannot read rule from ${JSON.stringify(entry)}`);
}

/**
 * Canonicalize a rule expression into an ordered list of RuleSpecs.
 *
 * Arrays are read as follows: all strings means several bare rule names;
 * an array holding any nested array or RuleSpec, or not starting with a
 * string, is a list of rules in any mixture of names, tuples and specs;
 * anything else is a single `[name, ...params, { message }?]` tuple. An array
 * parameter therefore needs its own tuple: `[['in', ['a', 'b']]]`, or
 * `rule('in', ['a', 'b'])`.
 */
export function normalizeRules(expr: RuleExpression): FieldRules {
  if (typeof expr === 'string' || isRuleSpec(expr)) return [normalizeEntry(expr)];

  const items: readonly unknown[] = expr;
  if (items.every((item) => typeof item === 'string')) {
    return items.map(normalizeEntry);
  }
  if (typeof items[0] !== 'string' || items.some(isRuleEntryItem)) {
    return items.map(normalizeEntry);
  }
  return [tupleToSpec(items)];
}

export function normalizeRuleMap(map: RuleMap): RuleSet {
  const ruleSet: RuleSet = {};
  Object.entries(map).forEach(([field, expr]) => {
    ruleSet[field] = normalizeRules(expr);
  });
  return ruleSet;
}

/** Build a RuleSpec: `rule('lengthBetween', 4, 10, { message: 'too short' })`. */
export function rule(name: string, ...args: (RuleParam | MessageOption)[]): RuleSpec {
  return tupleToSpec([name, ...args]);
}
