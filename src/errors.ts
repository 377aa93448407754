import type { ErrorMap, RunOutcome } from './types';

export type ErrorCode =
  | 'RULE_DEFINITION'
  | 'UNKNOWN_RULE'
  | 'INVALID_DECLARATION'
  | 'INVALID_INPUT'
  | 'VALIDATION_FAILED';

export class FieldRulesError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Setup defect: bad rule definition, unknown locale, malformed rule expression. */
export class RuleDefinitionError extends FieldRulesError {
  constructor(message: string) {
    super('RULE_DEFINITION', message);
  }
}

export class UnknownRuleError extends FieldRulesError {
  readonly rule: string;
  readonly field: string;

  constructor(rule: string, field: string) {
    super('UNKNOWN_RULE', `Rule "${rule}" on field "${field}" has not been registered`);
    this.rule = rule;
    this.field = field;
  }
}

export class DeclarationError extends FieldRulesError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('INVALID_DECLARATION', `Invalid rule declaration: ${problems.join('; ')}`);
    this.problems = problems;
  }
}

/** A file or value handed in from outside that can not be read as expected. */
export class InputError extends FieldRulesError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}

export class ValidationError extends FieldRulesError {
  readonly errors: ErrorMap;

  constructor(errors: ErrorMap) {
    super('VALIDATION_FAILED', `Validation failed for ${Object.keys(errors).join(', ')}`);
    this.errors = errors;
  }
}

/**
 * Reduce raw engine output to one message per field. When several rules of a
 * field fail, the last message wins. A passing run yields `null`.
 */
export function normalizeErrors(outcome: RunOutcome): ErrorMap | null {
  if (outcome.passed) return null;

  const errors: ErrorMap = {};
  Object.entries(outcome.errors).forEach(([field, messages]) => {
    if (messages.length === 0) return;
    errors[field] = messages[messages.length - 1];
  });
  return Object.keys(errors).length > 0 ? errors : null;
}
