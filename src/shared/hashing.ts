import { createHash } from 'node:crypto';
import { isPlainObject } from './utils.js';

// Dates and other class instances serialize through their own toJSON.
function isRecordLike(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isPlainObject(value) && isRecordLike(value)) {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      out[key] = sortKeys(value[key]);
    }
    return out;
  }
  return value;
}

/**
 * Canonical JSON: keys sorted at every depth, no whitespace.
 * JSON.stringify leaves non-ASCII characters as-is, so Unicode is preserved.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value)) ?? 'null';
}

export function sha256Hex(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * Content hash used for idempotency on both sides of the pipeline:
 * raw-row dedup and last-synced CRM payload.
 */
export function hashObject(value: unknown): string {
  return sha256Hex(canonicalJson(value));
}
