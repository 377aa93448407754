import Ajv from 'ajv';
import type { ErrorObject } from 'ajv';
import { DeclarationError, FieldRulesError } from './errors';
import { normalizeRuleMap } from './normalizer';
import { findDuplicateRules } from './resolver';
import { declarationSchema, declarationSchemaId } from './schema';
import type { Condition, RuleMap, RuleSet } from './types';
import type { Validator } from './validator';

export interface ConditionalDeclaration {
  when: Condition;
  then: RuleMap;
  else?: RuleMap;
}

/** Rules for one kind of record, as kept in a JSON file. */
export interface RuleDeclaration {
  description?: string;
  locale?: string;
  rules?: RuleMap;
  conditionals?: ConditionalDeclaration[];
}

export interface DeclarationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  declaration?: RuleDeclaration;
}

const ajv = new Ajv({ allErrors: true, strict: true, allowUnionTypes: true });
ajv.addSchema(declarationSchema);

function describeAjvError(error: ErrorObject): string {
  const instancePath = error.instancePath ? ` at ${error.instancePath}` : '';
  return `${error.message ?? 'Invalid value'}${instancePath}`;
}

function normalizeSection(map: RuleMap, label: string, errors: string[]): RuleSet {
  try {
    return normalizeRuleMap(map);
  } catch (err) {
    if (!(err instanceof FieldRulesError)) throw err;
    errors.push(`${label}: ${err.message}`);
    return {};
  }
}

function unknownRuleWarnings(ruleSet: RuleSet, label: string, knownRules: ReadonlySet<string>): string[] {
  return Object.entries(ruleSet).flatMap(([field, rules]) =>
    rules
      .filter((spec) => !knownRules.has(spec.name))
      .map((spec) => `${label}: rule "${spec.name}" on field "${field}" is not registered.`)
  );
}

/**
 * Check a parsed declaration against the JSON schema and that every rule
 * expression normalizes. Warnings flag rule names outside `knownRules`,
 * conditionals that always apply, and rules listed twice on one field.
 */
export function checkDeclaration(input: unknown, knownRules?: Iterable<string>): DeclarationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!ajv.validate<RuleDeclaration>(declarationSchemaId, input)) {
    errors.push(...(ajv.errors ?? []).map(describeAjvError));
    return { valid: false, errors, warnings };
  }

  const known = knownRules ? new Set(knownRules) : undefined;
  const base = normalizeSection(input.rules ?? {}, 'rules', errors);
  if (known) warnings.push(...unknownRuleWarnings(base, 'rules', known));
  findDuplicateRules(base).forEach((duplicate) =>
    warnings.push(`rules: "${duplicate.rule.name}" is listed ${duplicate.count} times on field "${duplicate.field}".`)
  );

  (input.conditionals ?? []).forEach((conditional, index) => {
    const label = `conditionals[${index}]`;
    if (Object.keys(conditional.when).length === 0) {
      warnings.push(`${label}: empty condition, the "then" rules always apply.`);
    }
    const thenRules = normalizeSection(conditional.then, `${label}.then`, errors);
    const elseRules = normalizeSection(conditional.else ?? {}, `${label}.else`, errors);
    if (known) {
      warnings.push(...unknownRuleWarnings(thenRules, `${label}.then`, known));
      warnings.push(...unknownRuleWarnings(elseRules, `${label}.else`, known));
    }
  });

  return { valid: errors.length === 0, errors, warnings, declaration: input };
}

export function parseDeclaration(source: string, knownRules?: Iterable<string>): DeclarationResult {
  let input: unknown;
  try {
    input = JSON.parse(source);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { valid: false, errors: [`Invalid JSON: ${message}`], warnings: [] };
  }
  return checkDeclaration(input, knownRules);
}

/** Register every rule of a declaration on a validator; throws DeclarationError when it is invalid. */
export function applyDeclaration(validator: Validator, input: unknown): RuleDeclaration {
  const result = checkDeclaration(input);
  if (!result.valid || !result.declaration) throw new DeclarationError(result.errors);

  const { declaration } = result;
  validator.addRules(declaration.rules ?? {});
  (declaration.conditionals ?? []).forEach((conditional) =>
    validator.addConditional(conditional.when, conditional.then, conditional.else ?? {})
  );
  return declaration;
}
