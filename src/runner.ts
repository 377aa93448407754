import { sharedEngine } from './engine';
import type { EngineHost } from './engine';
import { sharedLoader } from './loader';
import type { RuleTypeLoader } from './loader';
import type { FieldSource, RuleSet, RunOutcome, ValidationContext } from './types';

export interface RunnerOptions {
  engine?: EngineHost;
  loader?: RuleTypeLoader;
}

/** Snapshot the record and the engine locale for one validation run. */
export function createContext(record: FieldSource, engine: EngineHost): ValidationContext {
  return { fields: { ...record.get() }, locale: engine.lang() };
}

/**
 * Hands a resolved rule set and a record snapshot to the engine. Rule types
 * are (re-)registered first whenever the engine locale changed since the
 * last run.
 */
export class ValidationRunner {
  readonly engine: EngineHost;
  readonly loader: RuleTypeLoader;

  constructor(options: RunnerOptions = {}) {
    this.engine = options.engine ?? sharedEngine;
    this.loader = options.loader ?? sharedLoader;
  }

  prepare(): boolean {
    return this.loader.ensureRegistered(this.engine);
  }

  run(ruleSet: RuleSet, context: ValidationContext): RunOutcome {
    this.prepare();

    const validation = this.engine.create(context.fields);
    validation.mapFieldsRules(ruleSet);
    if (validation.evaluate()) return { passed: true };
    return { passed: false, errors: validation.errors() };
  }
}
