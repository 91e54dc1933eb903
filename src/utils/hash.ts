/**
 * Hashing utilities for run ids
 */

import { createHash } from 'crypto';

export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([k, v]) => [k, canonicalize(v)])
    );
  }
  return value;
}

/** Hash of `obj` that ignores key order at every depth. */
export function hashObject(obj: unknown): string {
  return sha256(JSON.stringify(canonicalize(obj)));
}
