export type Scalar = string | number | boolean | null;

export type RuleParam = Scalar | Scalar[];

export interface MessageOption {
  message: string;
}

/** Canonical form of one atomic check. */
export interface RuleSpec {
  name: string;
  params: RuleParam[];
  message?: string;
}

/** `[name, ...params]`, optionally ending with `{ message }`. */
export type RuleTuple = readonly [string, ...(RuleParam | MessageOption)[]];

export type RuleEntry = string | RuleTuple | RuleSpec;

export type RuleExpression = RuleEntry | readonly RuleEntry[];

export type FieldRules = RuleSpec[];

export type RuleSet = Record<string, FieldRules>;

export type RuleMap = Record<string, RuleExpression>;

/** Field name to expected value; every pair must loosely match. */
export type Condition = Record<string, Scalar>;

export interface ConditionalRule {
  condition: Condition;
  then: RuleSet;
  else: RuleSet;
}

export type FieldValues = Readonly<Record<string, unknown>>;

export interface ValidationContext {
  fields: FieldValues;
  locale: string;
}

/** Engine output: every failing rule's message, per field, in rule order. */
export type RawErrors = Record<string, string[]>;

export type RunOutcome = { passed: true } | { passed: false; errors: RawErrors };

export type ErrorMap = Record<string, string>;

export type ValidateHook = (record: FieldSource, intent?: string) => ErrorMap | null;

/** Read side of a record: the current value of every field. */
export interface FieldSource {
  get(): FieldValues;
}

/** What a validator needs from the record it is attached to. */
export interface HookHost extends FieldSource {
  addHook(spot: 'validate', hook: ValidateHook): void;
}

export interface FieldMatchTrace {
  field: string;
  expected: Scalar;
  actual: unknown;
  matched: boolean;
}

export interface ConditionTrace {
  condition: Condition;
  result: boolean;
  fields: FieldMatchTrace[];
}

export interface BranchTrace {
  index: number;
  why: ConditionTrace;
  branch: 'then' | 'else';
  applied: RuleSet;
}

export interface Resolution {
  ruleSet: RuleSet;
  branches: BranchTrace[];
}

export interface DuplicateRule {
  field: string;
  rule: RuleSpec;
  count: number;
}
