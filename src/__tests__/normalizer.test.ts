import { describe, expect, it } from 'vitest';
import { RuleDefinitionError } from '../errors';
import { isRuleSpec, normalizeRuleMap, normalizeRules, rule } from '../normalizer';
import type { RuleExpression } from '../types';

describe('normalizeRules', () => {
  it('turns a bare rule name into a single spec', () => {
    expect(normalizeRules('required')).toEqual([{ name: 'required', params: [] }]);
  });

  it('reads a list of strings as several bare rules', () => {
    expect(normalizeRules(['required', 'email'])).toEqual([
      { name: 'required', params: [] },
      { name: 'email', params: [] },
    ]);
  });

  it('reads a tuple as one rule with positional params and a message', () => {
    expect(normalizeRules(['lengthBetween', 4, 10, { message: 'test 2' }])).toEqual([
      { name: 'lengthBetween', params: [4, 10], message: 'test 2' },
    ]);
  });

  it('keeps an array parameter inside a nested tuple', () => {
    expect(normalizeRules([['in', ['free', 'pro']]])).toEqual([{ name: 'in', params: [['free', 'pro']] }]);
    expect(normalizeRules(rule('in', ['free', 'pro']))).toEqual([{ name: 'in', params: [['free', 'pro']] }]);
  });

  it('reads a mixture of names and tuples as a list of rules', () => {
    expect(normalizeRules(['required', ['regex', '^\\d{5}$']])).toEqual([
      { name: 'required', params: [] },
      { name: 'regex', params: ['^\\d{5}$'] },
    ]);
    expect(normalizeRules(['required', rule('email'), ['lengthMax', 40, { message: 'too long' }]])).toEqual([
      { name: 'required', params: [] },
      { name: 'email', params: [] },
      { name: 'lengthMax', params: [40], message: 'too long' },
    ]);
  });

  it('reads a top-level array after the name as a rule entry', () => {
    expect(normalizeRules(['in', ['free', 'pro']])).toEqual([
      { name: 'in', params: [] },
      { name: 'free', params: ['pro'] },
    ]);
  });

  it('reads a list that starts with a tuple as a list of rules, in order', () => {
    expect(normalizeRules([['min', 3], 'required', rule('max', 9)])).toEqual([
      { name: 'min', params: [3] },
      { name: 'required', params: [] },
      { name: 'max', params: [9] },
    ]);
  });

  it('accepts message options on nested tuples', () => {
    expect(normalizeRules([['required'], ['integer', { message: 'test 1' }]])).toEqual([
      { name: 'required', params: [] },
      { name: 'integer', params: [], message: 'test 1' },
    ]);
  });

  it('is idempotent on already normalized rules', () => {
    const inputs: RuleExpression[] = [
      'required',
      ['required', 'email'],
      ['lengthBetween', 4, 10, { message: 'too long' }],
      [['min', 3], ['in', ['a', 'b']]],
      ['required', ['regex', '^[a-z]+$']],
      [],
    ];
    inputs.forEach((input) => {
      const once = normalizeRules(input);
      expect(normalizeRules(once)).toEqual(once);
    });
  });

  it('copies specs and params instead of aliasing them', () => {
    const options = ['a', 'b'];
    const spec = { name: 'in', params: [options] };
    const [normalized] = normalizeRules(spec);
    expect(normalized).toEqual(spec);
    expect(normalized).not.toBe(spec);
    expect(normalized.params[0]).not.toBe(options);
  });

  it('rejects a tuple that does not start with a rule name', () => {
    const malformed: RuleExpression = JSON.parse('[[42]]');
    expect(() => normalizeRules(malformed)).toThrow(RuleDefinitionError);
    expect(() => normalizeRules(malformed)).toThrow('Rule tuple must start with a rule name, got 42');
  });
});

describe('normalizeRuleMap', () => {
  it('normalizes every field and keeps field order', () => {
    const ruleSet = normalizeRuleMap({ zip: 'required', name: [['lengthMin', 2]] });
    expect(Object.keys(ruleSet)).toEqual(['zip', 'name']);
    expect(ruleSet.name).toEqual([{ name: 'lengthMin', params: [2] }]);
  });
});

describe('rule', () => {
  it('builds a spec with a message', () => {
    expect(rule('lengthBetween', 4, 10, { message: 'bad' })).toEqual({
      name: 'lengthBetween',
      params: [4, 10],
      message: 'bad',
    });
  });

  it('is recognised as a spec', () => {
    expect(isRuleSpec(rule('email'))).toBe(true);
    expect(isRuleSpec({ message: 'x' })).toBe(false);
    expect(isRuleSpec(['email'])).toBe(false);
  });
});
