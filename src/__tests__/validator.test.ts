import { describe, expect, it } from 'vitest';
import { RuleEngine } from '../engine';
import { UnknownRuleError } from '../errors';
import { RuleTypeLoader } from '../loader';
import { DataRecord } from '../record';
import { builtinRules } from '../rules';
import type { RuleDefinition } from '../rules';
import { Validator } from '../validator';

function isolated(values: Record<string, unknown>) {
  const engine = new RuleEngine();
  const loader = new RuleTypeLoader();
  const record = new DataRecord(values);
  const validator = new Validator(record, { engine, loader });
  return { engine, record, validator };
}

describe('Validator', () => {
  it('reports the last failing message of a field', () => {
    const { record, validator } = isolated({ email: '' });
    validator.addRule('email', 'required').addRule('email', ['email']);
    expect(validator.validate(record)).toEqual({ email: 'email is required' });
  });

  it('keeps only the last of several failures', () => {
    const { record, validator } = isolated({ code: '1' });
    validator.addRule('code', [
      ['alpha', { message: 'required' }],
      ['lengthMin', 3, { message: 'too short' }],
    ]);
    expect(validator.validate(record)).toEqual({ code: 'too short' });
  });

  it('runs every rule of a list that mixes names and tuples', () => {
    const { record, validator } = isolated({ zip: 'abc' });
    validator.addRule('zip', ['required', ['regex', '^\\d{5}$']]);
    expect(validator.validate(record)).toEqual({ zip: 'zip contains invalid characters' });

    record.set('zip', '02139');
    expect(validator.validate(record)).toBeNull();
  });

  it('passes fields registered with an empty rule list', () => {
    const { record, validator } = isolated({ a: 'x', b: '' });
    validator.addRule('a', []).addConditional({ a: 'x' }, { b: [] }, { b: 'required' });
    expect(validator.validate(record)).toBeNull();
  });

  it('does not let explain results change the stored rules', () => {
    const { record, validator } = isolated({ kind: 'x', n: '' });
    validator.addConditional({ kind: 'x' }, { n: 'required' });

    const [trace] = validator.explain(record).branches;
    trace.applied.n.length = 0;
    trace.why.condition.kind = 'y';

    expect(validator.validate(record)).toEqual({ n: 'n is required' });
  });

  it('returns null when every rule passes', () => {
    const { record, validator } = isolated({ email: 'ada@example.com', age: 36 });
    validator.addRules({ email: ['required', 'email'], age: [['integer'], ['min', 13]] });
    expect(validator.validate(record)).toBeNull();
  });

  it('applies the branch that matches the current values', () => {
    const { record, validator } = isolated({ country: 'US', zip: null });
    validator.addConditional({ country: 'US' }, { zip: ['required'] }, {});
    expect(validator.validate(record)).toEqual({ zip: 'zip is required' });

    record.set('country', 'FR');
    expect(validator.validate(record)).toBeNull();
  });

  it('matches conditions loosely', () => {
    const { record, validator } = isolated({ age: '5', nick: '' });
    validator.addConditional({ age: 5 }, { nick: 'required' });
    expect(validator.validate(record)).toEqual({ nick: 'nick is required' });
  });

  it('runs through the record hook', () => {
    const { record, validator } = isolated({ terms: 'no' });
    validator.addRule('terms', 'accepted');
    expect(record.validate('save')).toEqual({ terms: 'terms must be accepted' });
  });

  it('explains which branch each conditional took', () => {
    const { record, validator } = isolated({ status: 'inactive' });
    validator.addRule('note', 'required').addConditional({ status: 'active' }, { note: 'email' }, { note: ['lengthMax', 5] });

    const { ruleSet, branches } = validator.explain(record);
    expect(ruleSet).toEqual({ note: [{ name: 'required', params: [] }, { name: 'lengthMax', params: [5] }] });
    expect(branches).toEqual([
      {
        index: 0,
        branch: 'else',
        applied: { note: [{ name: 'lengthMax', params: [5] }] },
        why: {
          condition: { status: 'active' },
          result: false,
          fields: [{ field: 'status', expected: 'active', actual: 'inactive', matched: false }],
        },
      },
    ]);
    expect(validator.resolve(record)).toEqual(ruleSet);
  });

  it('uses messages of the active locale', () => {
    const { engine, record, validator } = isolated({ email: '' });
    validator.addRule('email', 'required');
    expect(validator.validate(record)).toEqual({ email: 'email is required' });
    engine.lang('de');
    expect(validator.validate(record)).toEqual({ email: 'email ist erforderlich' });
  });

  it('registers rule types once per locale', () => {
    let setups = 0;
    const counted: RuleDefinition = {
      name: 'counted',
      setup() {
        setups += 1;
      },
    };
    const engine = new RuleEngine();
    const record = new DataRecord({ email: 'ada@example.com' });
    const validator = new Validator(record, { engine, loader: new RuleTypeLoader([...builtinRules, counted]) });
    validator.addRule('email', 'email');

    validator.validate(record);
    validator.validate(record);
    expect(setups).toBe(1);

    engine.lang('fr');
    validator.validate(record);
    expect(setups).toBe(2);
  });

  it('propagates rules the engine does not know', () => {
    const { record, validator } = isolated({ a: 1 });
    validator.addRule('a', 'nope');
    expect(() => validator.validate(record)).toThrow(UnknownRuleError);
  });
});
