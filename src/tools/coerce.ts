import { isRecord } from '../mcp/protocol.js';

// Coercions for loosely typed model arguments. Each returns `undefined` for
// a value it cannot interpret, which callers treat as "omitted".

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const TRUE_WORDS = new Set(['true', 'yes', 'y', '1', 'on']);
const FALSE_WORDS = new Set(['false', 'no', 'n', '0', 'off']);

export function coerceNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value !== 'string') return undefined;
  const text = value.trim().replace(/^\$/, '').replace(/,/g, '');
  return NUMERIC.test(text) ? Number(text) : undefined;
}

export function coerceInteger(value: unknown): number | undefined {
  const number = coerceNumber(value);
  return number !== undefined && Number.isInteger(number) ? number : undefined;
}

export function coerceBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 1 || value === 0) return value === 1;
  if (typeof value !== 'string') return undefined;
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  return undefined;
}

export function coerceText(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

export function coerceEnum<T extends string>(values: readonly T[]): (value: unknown) => T | undefined {
  return (value) => {
    if (typeof value !== 'string') return undefined;
    const word = value.trim().toLowerCase();
    return values.find((candidate) => candidate === word);
  };
}

function parseJson(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

export function coerceObject(value: unknown): Record<string, unknown> | undefined {
  const parsed = typeof value === 'string' ? parseJson(value) : value;
  return isRecord(parsed) ? parsed : undefined;
}

export function coerceArray(value: unknown): unknown[] | undefined {
  const parsed = typeof value === 'string' ? parseJson(value) : value;
  return Array.isArray(parsed) ? parsed : undefined;
}

/**
 * Argument objects arrive either as an object or as the JSON text of one.
 * Anything else becomes an empty object.
 */
export function coerceArgumentObject(raw: unknown): Record<string, unknown> {
  return coerceObject(raw) ?? {};
}
