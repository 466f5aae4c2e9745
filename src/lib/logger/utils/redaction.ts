import type { RedactFunction } from '../types';

const MASK = '********';

/**
 * Masks strings with a fixed-length mask, so the length of a secret is not
 * revealed either. Other values become a generic marker.
 */
export const defaultRedactFunction: RedactFunction = (
  _keyName: string,
  value: unknown,
): unknown => {
  if (typeof value === 'string') {
    return value.length === 0 ? '' : MASK;
  }

  return '***REDACTED***';
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns a copy of `obj` where the value at `path` is replaced by
 * `redact(value)`. Only the objects along the path are copied; when the path
 * does not exist the original object is returned as is.
 */
function redactAtPath(
  obj: Record<string, unknown>,
  path: string[],
  fullKey: string,
  redact: RedactFunction,
): Record<string, unknown> {
  const [head, ...rest] = path;

  if (head === undefined || !(head in obj)) {
    return obj;
  }

  const current = obj[head];

  if (rest.length === 0) {
    return { ...obj, [head]: redact(fullKey, current) };
  }

  if (!isRecord(current)) {
    return obj;
  }

  const updated = redactAtPath(current, rest, fullKey, redact);

  return updated === current ? obj : { ...obj, [head]: updated };
}

/**
 * Apply redaction to params based on redacted keys.
 * Supports top-level keys and nested paths using dot notation (e.g. 'env.PASSWORD').
 * The given params are never mutated.
 */
export function applyRedaction(
  params: Record<string, unknown>,
  redactedKeys?: string[],
  redactFunction: RedactFunction = defaultRedactFunction,
): Record<string, unknown> {
  if (!redactedKeys || redactedKeys.length === 0) {
    return params;
  }

  let redacted = params;

  for (const key of redactedKeys) {
    redacted = redactAtPath(redacted, key.split('.'), key, redactFunction);
  }

  return redacted;
}
