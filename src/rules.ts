import Ajv from 'ajv';
import addFormats from 'ajv-formats';
import { looseEquals } from './conditions';
import { isEmptyValue } from './engine';
import type { RuleCheck, RuleTypeOptions, RuleTypeRegistry } from './engine';
import { RuleDefinitionError } from './errors';
import type { FieldValues, RuleParam, Scalar } from './types';

/** A unit that knows how to register one rule type with an engine. */
export interface RuleDefinition {
  name: string;
  setup(registry: RuleTypeRegistry): void;
}

export interface DefineRuleOptions extends RuleTypeOptions {
  /** Used when the active locale has no template for this rule. */
  message?: string;
}

export function defineRule(name: string, check: RuleCheck, options: DefineRuleOptions = {}): RuleDefinition {
  return {
    name,
    setup(registry) {
      const message = registry.message(name) ?? options.message;
      if (message === undefined) {
        throw new RuleDefinitionError(`No "${registry.lang()}" message for rule "${name}"`);
      }
      registry.addRuleType(name, check, message, { implicit: options.implicit });
    },
  };
}

const formats = addFormats(new Ajv(), ['email', 'uri', 'date', 'date-time']);
const isEmail = formats.compile({ type: 'string', format: 'email' });
const isUri = formats.compile({ type: 'string', format: 'uri' });
const isDate = formats.compile({ type: 'string', format: 'date' });
const isDateTime = formats.compile({ type: 'string', format: 'date-time' });

const integerPattern = /^[+-]?\d+$/;
const numericPattern = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && numericPattern.test(value)) return Number(value);
  return null;
}

function paramList(param: RuleParam | undefined): Scalar[] {
  if (param === undefined) return [];
  return Array.isArray(param) ? param : [param];
}

function fieldNames(param: RuleParam | undefined): string[] {
  return paramList(param).map((name) => String(name));
}

function lengthOf(value: unknown): number | null {
  return typeof value === 'string' ? [...value].length : null;
}

function compareNumber(value: unknown, param: RuleParam | undefined, test: (n: number, limit: number) => boolean): boolean {
  const n = toNumber(value);
  const limit = toNumber(param);
  return n !== null && limit !== null && test(n, limit);
}

function compareLength(value: unknown, param: RuleParam | undefined, test: (len: number, limit: number) => boolean): boolean {
  const len = lengthOf(value);
  const limit = toNumber(param);
  return len !== null && limit !== null && test(len, limit);
}

function otherField(fields: FieldValues, param: RuleParam | undefined): unknown {
  return fields[String(param)];
}

const required = defineRule(
  'required',
  (value) => !isEmptyValue(value) && !(Array.isArray(value) && value.length === 0),
  { implicit: true }
);

const requiredWith = defineRule(
  'requiredWith',
  (value, params, fields) =>
    fieldNames(params[0]).every((name) => isEmptyValue(fields[name])) || !isEmptyValue(value),
  { implicit: true }
);

const requiredWithout = defineRule(
  'requiredWithout',
  (value, params, fields) =>
    fieldNames(params[0]).every((name) => !isEmptyValue(fields[name])) || !isEmptyValue(value),
  { implicit: true }
);

const accepted = defineRule(
  'accepted',
  (value) => value === true || value === 1 || value === '1' || value === 'yes' || value === 'on',
  { implicit: true }
);

const equals = defineRule('equals', (value, params, fields) => value === otherField(fields, params[0]));

const different = defineRule('different', (value, params, fields) => value !== otherField(fields, params[0]));

const inList = defineRule('in', (value, params) => paramList(params[0]).some((option) => looseEquals(value, option)));

const notIn = defineRule('notIn', (value, params) => !paramList(params[0]).some((option) => looseEquals(value, option)));

const integer = defineRule(
  'integer',
  (value) => Number.isInteger(value) || (typeof value === 'string' && integerPattern.test(value))
);

const numeric = defineRule('numeric', (value) => toNumber(value) !== null);

const boolean = defineRule(
  'boolean',
  (value) => typeof value === 'boolean' || value === 0 || value === 1 || value === '0' || value === '1'
);

const alpha = defineRule('alpha', (value) => typeof value === 'string' && /^[a-z]+$/i.test(value));

const alphaNum = defineRule('alphaNum', (value) => typeof value === 'string' && /^[a-z0-9]+$/i.test(value));

const slug = defineRule('slug', (value) => typeof value === 'string' && /^[-a-z0-9_]+$/i.test(value));

const email = defineRule('email', (value) => isEmail(value));

const url = defineRule('url', (value) => isUri(value));

const date = defineRule(
  'date',
  (value) => (value instanceof Date ? !Number.isNaN(value.getTime()) : isDate(value) || isDateTime(value))
);

const patterns = new Map<string, RegExp>();

function compilePattern(source: string): RegExp {
  const cached = patterns.get(source);
  if (cached) return cached;
  let pattern: RegExp;
  try {
    pattern = new RegExp(source);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RuleDefinitionError(`Invalid pattern for rule "regex": ${reason}`);
  }
  patterns.set(source, pattern);
  return pattern;
}

const regex = defineRule(
  'regex',
  (value, params) => typeof value === 'string' && compilePattern(String(params[0])).test(value)
);

const min = defineRule('min', (value, params) => compareNumber(value, params[0], (n, limit) => n >= limit));

const max = defineRule('max', (value, params) => compareNumber(value, params[0], (n, limit) => n <= limit));

const between = defineRule(
  'between',
  (value, params) =>
    compareNumber(value, params[0], (n, limit) => n >= limit) &&
    compareNumber(value, params[1], (n, limit) => n <= limit)
);

const length = defineRule('length', (value, params) => compareLength(value, params[0], (len, limit) => len === limit));

const lengthBetween = defineRule(
  'lengthBetween',
  (value, params) =>
    compareLength(value, params[0], (len, limit) => len >= limit) &&
    compareLength(value, params[1], (len, limit) => len <= limit)
);

const lengthMin = defineRule('lengthMin', (value, params) => compareLength(value, params[0], (len, limit) => len >= limit));

const lengthMax = defineRule('lengthMax', (value, params) => compareLength(value, params[0], (len, limit) => len <= limit));

const contains = defineRule(
  'contains',
  (value, params) => typeof value === 'string' && value.includes(String(params[0]))
);

/** Rule types registered with an engine on first use and after every locale change. */
export const builtinRules: readonly RuleDefinition[] = [
  required,
  requiredWith,
  requiredWithout,
  accepted,
  equals,
  different,
  inList,
  notIn,
  integer,
  numeric,
  boolean,
  alpha,
  alphaNum,
  slug,
  email,
  url,
  date,
  regex,
  min,
  max,
  between,
  length,
  lengthBetween,
  lengthMin,
  lengthMax,
  contains,
];
