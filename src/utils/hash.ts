/**
 * Hashing utilities for input fingerprints
 */

import { createHash } from 'crypto';

export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

/** JSON with object keys sorted at every depth, so key order never changes the hash. */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return '[' + value.map(stableStringify).join(',') + ']';
  }

  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return '{' + entries.map(([key, v]) => JSON.stringify(key) + ':' + stableStringify(v)).join(',') + '}';
}

export function contentHash(content: unknown): string {
  return sha256(stableStringify(content));
}

export function contentHashShort(content: unknown, length: number = 16): string {
  return contentHash(content).substring(0, length);
}
