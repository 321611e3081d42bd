/**
 * Dataset fingerprint
 */

import * as crypto from 'node:crypto';
import type { Dataset } from '@report-kit/report-contracts';

/**
 * Re-create the value as plain JSON in which distinct cells stay distinct.
 *
 * Object keys get a `k:` prefix and are sorted, so key order does not
 * change the hash. Values JSON cannot hold (`undefined`, non-finite
 * numbers, bigints, dates) become `{ "$": type, "v": text }` objects,
 * which cannot collide with a real row object since those only carry
 * prefixed keys.
 */
function canonicalize(value: unknown): unknown {
  if (value === undefined) {
    return { $: 'undefined' };
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return { $: 'number', v: String(value) };
  }
  if (typeof value === 'bigint') {
    return { $: 'bigint', v: value.toString() };
  }
  if (value instanceof Date) {
    return { $: 'date', v: Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString() };
  }
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, entry] of entries) {
      sorted[`k:${key}`] = canonicalize(entry);
    }
    return sorted;
  }
  return value;
}

/**
 * SHA-256 hex digest of the dataset's canonical JSON form
 */
export function hashDataset(dataset: Dataset): string {
  return crypto
    .createHash('sha256')
    .update(JSON.stringify(canonicalize(dataset)), 'utf-8')
    .digest('hex');
}
