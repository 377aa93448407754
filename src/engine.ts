import Ajv from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import { RuleDefinitionError, UnknownRuleError } from './errors';
import de from './lang/de.json';
import en from './lang/en.json';
import fr from './lang/fr.json';
import type { FieldValues, RawErrors, RuleParam, RuleSet } from './types';

export type RuleCheck = (value: unknown, params: readonly RuleParam[], fields: FieldValues) => boolean;

export type MessageTable = Record<string, string>;

export interface RuleTypeOptions {
  /** Run the check even when the value is empty. */
  implicit?: boolean;
}

export interface RuleType {
  name: string;
  check: RuleCheck;
  message: string;
  implicit: boolean;
}

/** One evaluation of a rule set against one snapshot of field values. */
export interface ValidationEngine {
  mapFieldsRules(ruleSet: RuleSet): void;
  evaluate(): boolean;
  errors(): RawErrors;
}

/** Where rule definitions register their rule types. */
export interface RuleTypeRegistry {
  lang(): string;
  message(rule: string): string | undefined;
  addRuleType(name: string, check: RuleCheck, message: string, options?: RuleTypeOptions): void;
}

export interface EngineHost extends RuleTypeRegistry {
  create(fields: FieldValues): ValidationEngine;
}

interface DataContext {
  parentDataProperty: string | number;
  rootData: unknown;
}

interface KeywordValidate {
  (schema: unknown, data: unknown, parentSchema?: unknown, dataCxt?: DataContext): boolean;
  errors?: Partial<ErrorObject>[];
}

interface RuleSchema {
  params: RuleParam[];
  message?: string;
}

const ruleName = /^[a-z_$][a-z0-9_$-]*$/i;
const keywordPrefix = 'rule:';
const defaultLocale = 'en';

const ruleSchemaMeta: SchemaObject = {
  type: 'object',
  properties: {
    params: { type: 'array' },
    message: { type: 'string' },
  },
  required: ['params'],
  additionalProperties: false,
};

function isRuleSchema(value: unknown): value is RuleSchema {
  return (
    typeof value === 'object' &&
    value !== null &&
    'params' in value &&
    Array.isArray(value.params) &&
    (!('message' in value) || typeof value.message === 'string')
  );
}

function isFieldValues(value: unknown): value is FieldValues {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isEmptyValue(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

function formatParam(param: RuleParam | undefined): string {
  if (param === undefined) return '';
  if (Array.isArray(param)) return param.map((item) => String(item)).join(', ');
  return String(param);
}

export function formatMessage(template: string, field: string, params: readonly RuleParam[]): string {
  return template
    .replace(/\{field\}/g, field)
    .replace(/\{(\d+)\}/g, (_match, index: string) => formatParam(params[Number(index)]));
}

function ruleErrorField(error: ErrorObject): string | undefined {
  if (!error.keyword.startsWith(keywordPrefix)) return undefined;
  const field: unknown = error.params.field;
  return typeof field === 'string' ? field : undefined;
}

/**
 * Validation engine backed by ajv. Every rule type is an ajv keyword
 * (`rule:<name>`); a rule set compiles to an object schema whose fields hold
 * their rules as an ordered `allOf`, so errors come back in rule order.
 */
export class RuleEngine implements EngineHost {
  private readonly ajv = new Ajv({ allErrors: true, strict: true });
  private readonly types = new Map<string, RuleType>();
  private readonly locales = new Map<string, MessageTable>([
    ['en', en],
    ['de', de],
    ['fr', fr],
  ]);
  private readonly compiled = new Map<string, ValidateFunction>();
  private locale = defaultLocale;

  lang(locale?: string): string {
    if (locale !== undefined) {
      if (!this.locales.has(locale)) {
        throw new RuleDefinitionError(`No message table for locale "${locale}"`);
      }
      this.locale = locale;
    }
    return this.locale;
  }

  addLocale(locale: string, table: MessageTable): void {
    this.locales.set(locale, { ...this.locales.get(locale), ...table });
  }

  availableLocales(): string[] {
    return [...this.locales.keys()];
  }

  message(rule: string): string | undefined {
    return this.locales.get(this.locale)?.[rule];
  }

  addRuleType(name: string, check: RuleCheck, message: string, options: RuleTypeOptions = {}): void {
    if (!ruleName.test(name)) {
      throw new RuleDefinitionError(`Invalid rule name "${name}"`);
    }
    if (!this.types.has(name)) this.defineKeyword(name);
    this.types.set(name, { name, check, message, implicit: options.implicit ?? false });
  }

  hasRuleType(name: string): boolean {
    return this.types.has(name);
  }

  ruleTypes(): RuleType[] {
    return [...this.types.values()];
  }

  create(fields: FieldValues): ValidationEngine {
    return new EngineRun(this, fields);
  }

  compile(schema: SchemaObject): ValidateFunction {
    const key = JSON.stringify(schema);
    const cached = this.compiled.get(key);
    if (cached) return cached;
    const validate = this.ajv.compile(schema);
    this.compiled.set(key, validate);
    return validate;
  }

  private defineKeyword(name: string): void {
    const keyword = `${keywordPrefix}${name}`;
    const validate: KeywordValidate = (schema, data, _parentSchema, dataCxt) => {
      const type = this.types.get(name);
      const field = dataCxt === undefined ? '' : String(dataCxt.parentDataProperty);
      if (!type) throw new UnknownRuleError(name, field);
      if (!isRuleSchema(schema)) {
        throw new RuleDefinitionError(`Malformed schema for rule "${name}"`);
      }
      if (!type.implicit && isEmptyValue(data)) return true;

      const root = dataCxt?.rootData;
      const fields = isFieldValues(root) ? root : {};
      if (type.check(data, schema.params, fields)) return true;

      validate.errors = [
        {
          keyword,
          message: formatMessage(schema.message ?? type.message, field, schema.params),
          params: { rule: name, field },
        },
      ];
      return false;
    };
    this.ajv.addKeyword({ keyword, metaSchema: ruleSchemaMeta, errors: true, validate });
  }
}

class EngineRun implements ValidationEngine {
  private ruleSet: RuleSet = {};
  private rawErrors: RawErrors = {};

  constructor(
    private readonly host: RuleEngine,
    private readonly fields: FieldValues
  ) {}

  mapFieldsRules(ruleSet: RuleSet): void {
    Object.entries(ruleSet).forEach(([field, rules]) => {
      rules.forEach((spec) => {
        if (!this.host.hasRuleType(spec.name)) throw new UnknownRuleError(spec.name, field);
      });
    });
    this.ruleSet = { ...this.ruleSet, ...ruleSet };
  }

  evaluate(): boolean {
    const properties: Record<string, SchemaObject> = {};
    const data: Record<string, unknown> = { ...this.fields };
    Object.entries(this.ruleSet).forEach(([field, rules]) => {
      // ajv rejects an empty allOf
      if (rules.length === 0) return;
      properties[field] = {
        allOf: rules.map((spec) => {
          const ruleSchema: RuleSchema = { params: spec.params };
          if (spec.message !== undefined) ruleSchema.message = spec.message;
          return { [`${keywordPrefix}${spec.name}`]: ruleSchema };
        }),
      };
      if (data[field] === undefined) data[field] = null;
    });

    const validate = this.host.compile({ type: 'object', properties });
    this.rawErrors = {};
    if (validate(data)) return true;

    (validate.errors ?? []).forEach((error) => {
      const field = ruleErrorField(error);
      if (field === undefined) return;
      const messages = this.rawErrors[field] ?? [];
      messages.push(error.message ?? field);
      this.rawErrors[field] = messages;
    });
    return false;
  }

  errors(): RawErrors {
    return this.rawErrors;
  }
}

/** Engine shared by every validator that is not given its own. */
export const sharedEngine = new RuleEngine();
