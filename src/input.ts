import { readFileSync } from 'fs';
import path from 'path';
import { InputError } from './errors';

export function parseJson(source: string, label: string): unknown {
  try {
    return JSON.parse(source);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InputError(`${label} is not valid JSON: ${reason}`);
  }
}

export function toFieldValues(value: unknown, label: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new InputError(`${label} must contain a JSON object`);
  }
  return { ...value };
}

export function readJsonFile(filePath: string): unknown {
  const resolved = path.resolve(filePath);
  let source: string;
  try {
    source = readFileSync(resolved, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InputError(`Can not read ${filePath}: ${reason}`);
  }
  return parseJson(source, filePath);
}

export function readRecordFile(filePath: string): Record<string, unknown> {
  return toFieldValues(readJsonFile(filePath), filePath);
}
