import { normalizeErrors } from './errors';
import { explainRuleSet } from './resolver';
import { RuleStore } from './store';
import { createContext, ValidationRunner } from './runner';
import type { RunnerOptions } from './runner';
import type {
  Condition,
  ErrorMap,
  FieldSource,
  HookHost,
  Resolution,
  RuleExpression,
  RuleMap,
  RuleSet,
} from './types';

export type ValidatorOptions = RunnerOptions;

/**
 * Field validation for one record. Rules accumulate through `addRule`,
 * `addRules` and `addConditional`; the record's `validate` hook runs them
 * against its current values.
 *
 *   const validator = new Validator(record)
 *     .addRule('email', ['required', 'email'])
 *     .addConditional({ country: 'US' }, { zip: 'required' });
 */
export class Validator {
  readonly store = new RuleStore();
  private readonly runner: ValidationRunner;

  constructor(record: HookHost, options: ValidatorOptions = {}) {
    this.runner = new ValidationRunner(options);
    record.addHook('validate', (source, intent) => this.validate(source, intent));
  }

  addRule(field: string, expr: RuleExpression): this {
    this.store.addRule(field, expr);
    return this;
  }

  addRules(map: RuleMap): this {
    this.store.addRules(map);
    return this;
  }

  addConditional(condition: Condition, thenMap: RuleMap, elseMap: RuleMap = {}): this {
    this.store.addConditional(condition, thenMap, elseMap);
    return this;
  }

  /** Effective rules for the record's current values, with the branch taken by each conditional. */
  explain(record: FieldSource): Resolution {
    return explainRuleSet(this.store, createContext(record, this.runner.engine));
  }

  resolve(record: FieldSource): RuleSet {
    return this.explain(record).ruleSet;
  }

  /**
   * Run every applicable rule. Returns one message per failing field, or
   * `null` when all rules pass. `intent` is accepted for hook compatibility
   * and not interpreted here.
   */
  validate(record: FieldSource, intent?: string): ErrorMap | null {
    const context = createContext(record, this.runner.engine);
    const { ruleSet } = explainRuleSet(this.store, context);
    return normalizeErrors(this.runner.run(ruleSet, context));
  }
}
