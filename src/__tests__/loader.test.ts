import { describe, expect, it } from 'vitest';
import { RuleEngine } from '../engine';
import { RuleDefinitionError } from '../errors';
import { RuleTypeLoader } from '../loader';
import { defineRule } from '../rules';
import type { RuleDefinition } from '../rules';

function countingDefinition(): { definition: RuleDefinition; calls: () => number } {
  let calls = 0;
  return {
    definition: {
      name: 'counted',
      setup(registry) {
        calls += 1;
        registry.addRuleType('counted', () => true, `counted in ${registry.lang()}`);
      },
    },
    calls: () => calls,
  };
}

describe('RuleTypeLoader', () => {
  it('registers once per locale', () => {
    const { definition, calls } = countingDefinition();
    const loader = new RuleTypeLoader([definition]);
    const engine = new RuleEngine();

    expect(loader.ensureRegistered(engine)).toBe(true);
    expect(loader.ensureRegistered(engine)).toBe(false);
    expect(calls()).toBe(1);
    expect(loader.registeredLocale(engine)).toBe('en');
  });

  it('registers again after every locale change', () => {
    const { definition, calls } = countingDefinition();
    const loader = new RuleTypeLoader([definition]);
    const engine = new RuleEngine();

    loader.ensureRegistered(engine);
    engine.lang('de');
    expect(loader.needsRegistration(engine)).toBe(true);
    expect(loader.ensureRegistered(engine)).toBe(true);
    expect(loader.ensureRegistered(engine)).toBe(false);
    engine.lang('en');
    expect(loader.ensureRegistered(engine)).toBe(true);
    expect(calls()).toBe(3);
    expect(engine.ruleTypes().find((type) => type.name === 'counted')?.message).toBe('counted in en');
  });

  it('tracks each engine separately', () => {
    const { definition, calls } = countingDefinition();
    const loader = new RuleTypeLoader([definition]);
    loader.ensureRegistered(new RuleEngine());
    loader.ensureRegistered(new RuleEngine());
    expect(calls()).toBe(2);
  });

  it('leaves the marker unset when a setup fails', () => {
    const broken: RuleDefinition = {
      name: 'broken',
      setup() {
        throw new RuleDefinitionError('broken rule');
      },
    };
    const loader = new RuleTypeLoader([broken]);
    const engine = new RuleEngine();

    expect(() => loader.ensureRegistered(engine)).toThrow('broken rule');
    expect(loader.registeredLocale(engine)).toBeUndefined();
    expect(loader.needsRegistration(engine)).toBe(true);
  });

  it('registers built-in messages in the active locale', () => {
    const engine = new RuleEngine();
    engine.lang('fr');
    new RuleTypeLoader().ensureRegistered(engine);
    expect(engine.ruleTypes().find((type) => type.name === 'required')?.message).toBe('{field} est obligatoire');
  });
});

describe('defineRule', () => {
  it('falls back to its own message when the locale has none', () => {
    const engine = new RuleEngine();
    new RuleTypeLoader([defineRule('even', (value) => Number(value) % 2 === 0, { message: '{field} must be even' })]).ensureRegistered(engine);
    expect(engine.ruleTypes()).toEqual([
      expect.objectContaining({ name: 'even', message: '{field} must be even', implicit: false }),
    ]);
  });

  it('fails without any message', () => {
    const loader = new RuleTypeLoader([defineRule('odd', () => true)]);
    expect(() => loader.ensureRegistered(new RuleEngine())).toThrow('No "en" message for rule "odd"');
  });
});
