import { ValidationError } from './errors';
import type { ErrorMap, FieldValues, HookHost, ValidateHook } from './types';

/**
 * In-memory record with a `validate` hook spot. `save` refuses to store
 * values that any attached validator rejects.
 */
export class DataRecord implements HookHost {
  private values: Record<string, unknown>;
  private saved: FieldValues | undefined;
  private readonly hooks: ValidateHook[] = [];

  constructor(values: Record<string, unknown> = {}) {
    this.values = { ...values };
  }

  get(): FieldValues;
  get(field: string): unknown;
  get(field?: string): unknown {
    if (field === undefined) return { ...this.values };
    return this.values[field];
  }

  set(field: string, value: unknown): this;
  set(values: Record<string, unknown>): this;
  set(fieldOrValues: string | Record<string, unknown>, value?: unknown): this {
    if (typeof fieldOrValues === 'string') {
      this.values[fieldOrValues] = value;
    } else {
      this.values = { ...this.values, ...fieldOrValues };
    }
    return this;
  }

  addHook(spot: 'validate', hook: ValidateHook): void {
    this.hooks.push(hook);
  }

  /** Errors from every validate hook; for a field reported twice the first hook wins. */
  validate(intent?: string): ErrorMap | null {
    const errors: ErrorMap = {};
    this.hooks.forEach((hook) => {
      const result = hook(this, intent);
      if (!result) return;
      Object.entries(result).forEach(([field, message]) => {
        if (!(field in errors)) errors[field] = message;
      });
    });
    return Object.keys(errors).length > 0 ? errors : null;
  }

  save(intent: string = 'save'): FieldValues {
    const errors = this.validate(intent);
    if (errors) throw new ValidationError(errors);
    this.saved = this.get();
    return this.saved;
  }

  lastSaved(): FieldValues | undefined {
    return this.saved;
  }
}
