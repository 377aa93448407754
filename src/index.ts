export { Validator } from './validator';
export type { ValidatorOptions } from './validator';
export { RuleStore } from './store';
export { normalizeRules, normalizeRuleMap, rule, isRuleSpec } from './normalizer';
export { evaluateCondition, explainCondition, looseEquals } from './conditions';
export { explainRuleSet, findDuplicateRules, mergeRuleSets, resolveRuleSet } from './resolver';
export { createContext, ValidationRunner } from './runner';
export type { RunnerOptions } from './runner';
export { RuleEngine, sharedEngine, formatMessage } from './engine';
export type {
  EngineHost,
  MessageTable,
  RuleCheck,
  RuleType,
  RuleTypeOptions,
  RuleTypeRegistry,
  ValidationEngine,
} from './engine';
export { RuleTypeLoader, sharedLoader } from './loader';
export { builtinRules, defineRule } from './rules';
export type { DefineRuleOptions, RuleDefinition } from './rules';
export {
  DeclarationError,
  FieldRulesError,
  InputError,
  normalizeErrors,
  RuleDefinitionError,
  UnknownRuleError,
  ValidationError,
} from './errors';
export type { ErrorCode } from './errors';
export { DataRecord } from './record';
export { parseJson, readJsonFile, readRecordFile, toFieldValues } from './input';
export { applyDeclaration, checkDeclaration, parseDeclaration } from './declaration';
export type { ConditionalDeclaration, DeclarationResult, RuleDeclaration } from './declaration';
export type * from './types';
