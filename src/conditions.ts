import type { Condition, ConditionTrace, FieldMatchTrace, FieldValues, Scalar, ValidationContext } from './types';

const numericString = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;

function isNumericString(value: string): boolean {
  return numericString.test(value);
}

function isBlank(value: unknown): boolean {
  return (
    value === null ||
    value === undefined ||
    value === false ||
    value === 0 ||
    value === '' ||
    (Array.isArray(value) && value.length === 0)
  );
}

function truthy(value: unknown): boolean {
  if (value === '0') return false;
  return !isBlank(value);
}

/**
 * Type-juggling comparison for record values: numbers and numeric strings
 * compare by value ("5" == 5, "1e1" == "10"), booleans compare by
 * truthiness, and null matches any blank value.
 */
export function looseEquals(actual: unknown, expected: Scalar): boolean {
  if (actual === undefined || actual === null) return isBlank(expected);
  if (expected === null) return isBlank(actual);

  if (typeof actual === 'boolean' || typeof expected === 'boolean') {
    return truthy(actual) === truthy(expected);
  }

  if (typeof actual === 'number' && typeof expected === 'number') return actual === expected;

  if (typeof actual === 'number' && typeof expected === 'string') {
    return isNumericString(expected) ? actual === Number(expected) : String(actual) === expected;
  }

  if (typeof actual === 'string' && typeof expected === 'number') {
    return isNumericString(actual) ? Number(actual) === expected : actual === String(expected);
  }

  if (typeof actual === 'string' && typeof expected === 'string') {
    if (isNumericString(actual) && isNumericString(expected)) return Number(actual) === Number(expected);
    return actual === expected;
  }

  if (actual instanceof Date) return looseEquals(actual.toISOString(), expected);

  return false;
}

function readField(fields: FieldValues, field: string): unknown {
  return Object.prototype.hasOwnProperty.call(fields, field) ? fields[field] : undefined;
}

export function explainCondition(condition: Condition, context: ValidationContext): ConditionTrace {
  const fields: FieldMatchTrace[] = Object.entries(condition).map(([field, expected]) => {
    const actual = readField(context.fields, field);
    return { field, expected, actual, matched: looseEquals(actual, expected) };
  });
  return { condition: { ...condition }, result: fields.every((entry) => entry.matched), fields };
}

/** True when every field of the condition matches; an empty condition always holds. */
export function evaluateCondition(condition: Condition, context: ValidationContext): boolean {
  return Object.entries(condition).every(([field, expected]) =>
    looseEquals(readField(context.fields, field), expected)
  );
}
