import { builtinRules } from './rules';
import type { RuleDefinition } from './rules';
import type { RuleTypeRegistry } from './engine';

/**
 * Registers rule definitions with an engine once per locale. The locale last
 * registered is remembered per engine; a run that sees a different locale
 * registers every definition again so their messages follow the new locale.
 *
 * Validation runs synchronously, so check-then-register can not interleave.
 */
export class RuleTypeLoader {
  private readonly registered = new WeakMap<RuleTypeRegistry, string>();

  constructor(private readonly definitions: readonly RuleDefinition[] = builtinRules) {}

  registeredLocale(engine: RuleTypeRegistry): string | undefined {
    return this.registered.get(engine);
  }

  needsRegistration(engine: RuleTypeRegistry): boolean {
    return this.registered.get(engine) !== engine.lang();
  }

  /** Returns true when registration ran. Setup errors propagate and leave the marker unchanged. */
  ensureRegistered(engine: RuleTypeRegistry): boolean {
    if (!this.needsRegistration(engine)) return false;

    const locale = engine.lang();
    this.definitions.forEach((definition) => definition.setup(engine));
    this.registered.set(engine, locale);
    return true;
  }

  ruleNames(): string[] {
    return this.definitions.map((definition) => definition.name);
  }
}

export const sharedLoader = new RuleTypeLoader();
