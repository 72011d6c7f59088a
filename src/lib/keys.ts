import type { Request } from 'express';
import { InvalidCacheKeyError } from './errors';

export const KEY_SEPARATOR = ':';
export const WILDCARD = '*';

const MIN_SEGMENTS = 2;
const MAX_SEGMENTS = 4;
// printable ASCII minus space, ':' and '*'
const SEGMENT_RE = /^[\x21-\x29\x2b-\x39\x3b-\x7e]+$/;

export type Invalidation =
  | { kind: 'exact'; key: string }
  | { kind: 'prefix'; prefix: string };

function checkSegments(raw: string, segments: string[], min: number): void {
  if (segments.length < min || segments.length > MAX_SEGMENTS) {
    throw new InvalidCacheKeyError(raw, `expected ${min}-${MAX_SEGMENTS} segments, got ${segments.length}`);
  }
  for (const segment of segments) {
    if (!SEGMENT_RE.test(segment)) {
      throw new InvalidCacheKeyError(raw, `bad segment "${segment}"`);
    }
  }
}

export function assertCacheKey(key: string): string {
  checkSegments(key, key.split(KEY_SEPARATOR), MIN_SEGMENTS);
  return key;
}

export function isValidCacheKey(key: string): boolean {
  try {
    assertCacheKey(key);
    return true;
  } catch {
    return false;
  }
}

// namespace:identifier[:subfield[:parameter]]
export function cacheKey(
  namespace: string,
  identifier: string | number,
  subfield?: string | number,
  parameter?: string | number,
): string {
  const parts = [namespace, identifier, subfield, parameter]
    .filter((p): p is string | number => p !== undefined)
    .map(String);
  return assertCacheKey(parts.join(KEY_SEPARATOR));
}

/**
 * `meter:42:unit` is an exact key; `meter:42:*` matches every key whose
 * leading segments are `meter` and `42` and which has at least one more.
 */
export function parseInvalidation(pattern: string): Invalidation {
  const segments = pattern.split(KEY_SEPARATOR);
  const last = segments[segments.length - 1];
  if (last !== WILDCARD) {
    if (pattern.includes(WILDCARD)) {
      throw new InvalidCacheKeyError(pattern, 'wildcard must be the final segment');
    }
    return { kind: 'exact', key: assertCacheKey(pattern) };
  }
  const head = segments.slice(0, -1);
  if (head.length === 0 || head.some((s) => s.includes(WILDCARD))) {
    throw new InvalidCacheKeyError(pattern, 'wildcard must follow at least one literal segment');
  }
  checkSegments(pattern, head, 1);
  if (head.length === MAX_SEGMENTS) {
    throw new InvalidCacheKeyError(pattern, 'pattern cannot match keys longer than the grammar allows');
  }
  return { kind: 'prefix', prefix: head.join(KEY_SEPARATOR) + KEY_SEPARATOR };
}

export function matchesInvalidation(key: string, invalidation: Invalidation): boolean {
  return invalidation.kind === 'exact'
    ? key === invalidation.key
    : key.startsWith(invalidation.prefix);
}

export function bearerToken(req: Request, headerName: string = 'authorization'): string | undefined {
  const auth = req.header(headerName.toLowerCase()) || '';
  const match = /^Bearer\s+(.+)$/i.exec(auth);
  return match?.[1]?.trim() || undefined;
}
