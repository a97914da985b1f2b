/**
 * @tessera/build — Content hashing
 */

import { createHash } from 'node:crypto';

/** Hex sha256 of a unit's source text. */
export function contentHash(source: string): string {
  return createHash('sha256').update(source, 'utf8').digest('hex');
}

/**
 * Hash of a value's deterministic serialisation: object keys are sorted, so
 * two structurally equal values hash the same.
 */
export function stableHash(value: unknown): string {
  return createHash('sha256').update(stableSerialize(value)).digest('hex');
}

export function stableSerialize(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (Array.isArray(value)) return `[${value.map(stableSerialize).join(',')}]`;
  if (value instanceof Map) {
    const entries = [...value.entries()].map(([k, v]) => [String(k), v] as const);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableSerialize(v)}`).join(',')}}`;
  }
  if (value instanceof Set) return stableSerialize([...value].map(stableSerialize).sort());
  if (typeof value === 'object') {
    const keys = Object.keys(value).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${stableSerialize(Reflect.get(value, k))}`).join(',')}}`;
  }
  if (typeof value === 'number' && !Number.isFinite(value)) return `"${String(value)}"`;
  if (typeof value === 'function') return '"<fn>"';
  if (typeof value === 'bigint' || typeof value === 'symbol') return JSON.stringify(String(value));
  return JSON.stringify(value);
}
