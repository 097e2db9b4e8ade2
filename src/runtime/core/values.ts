/**
 * navex Value Types and Utilities
 *
 * Values flowing through navigation and expression evaluation.
 * Data handed in by a host is `unknown` until classified here.
 */

import {
  type ExternalRecord,
  isExternalRecord,
  isPlainRecord,
  listRecordFields,
  fieldKey,
  lookupRecordField,
  recordKeys,
  type FieldLookup,
} from '../../navigator/records.js';

/** Plain string-keyed record */
export interface ValueRecord {
  [key: string]: Value;
}

/** Any value that can be navigated or evaluated */
export type Value =
  | null
  | boolean
  | number
  | string
  | Uint8Array
  | Value[]
  | ValueRecord
  | ExternalRecord;

/** Type names reported by type() and used for completion filtering */
export type ValueType =
  | 'null'
  | 'bool'
  | 'int'
  | 'uint'
  | 'double'
  | 'string'
  | 'bytes'
  | 'list'
  | 'map'
  | 'unknown';

export const VALUE_TYPES: readonly ValueType[] = [
  'null',
  'bool',
  'int',
  'uint',
  'double',
  'string',
  'bytes',
  'list',
  'map',
  'unknown',
];

export function isValueType(name: string): name is ValueType {
  return VALUE_TYPES.some((t) => t === name);
}

// ============================================================
// CLASSIFICATION
// ============================================================

/** Infer the type name of a runtime value */
export function inferType(value: unknown): ValueType {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'int' : 'double';
  }
  if (typeof value === 'bigint') return 'int';
  if (typeof value === 'string') return 'string';
  if (value instanceof Uint8Array) return 'bytes';
  if (Array.isArray(value)) return 'list';
  if (isPlainRecord(value) || isExternalRecord(value)) return 'map';
  return 'unknown';
}

/** Plain record or external record: anything navigated by key */
export function isMapLike(value: unknown): value is object {
  return isPlainRecord(value) || isExternalRecord(value);
}

export function isList(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

// ============================================================
// FIELD ACCESS
// ============================================================

/** Look up a key on a plain or external record */
export function getField(value: object, key: string): FieldLookup {
  if (isPlainRecord(value)) {
    return Object.prototype.hasOwnProperty.call(value, key)
      ? { found: true, value: value[key] }
      : { found: false };
  }
  return lookupRecordField(value, key);
}

/** Keys of a plain or external record in natural order */
export function mapKeys(value: object): string[] {
  if (isPlainRecord(value)) return Object.keys(value);
  return recordKeys(value);
}

/** Entries of a plain or external record in natural order */
export function mapEntries(value: object): [string, unknown][] {
  if (isPlainRecord(value)) return Object.entries(value);
  return listRecordFields(value).map((field) => [fieldKey(field), field.value]);
}

// ============================================================
// EQUALITY
// ============================================================

/** Structural equality over lists, records and bytes */
export function deepEquals(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined) {
    return (a ?? null) === (b ?? null);
  }
  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    return a.length === b.length && a.every((byte, i) => byte === b[i]);
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return (
      a.length === b.length && a.every((item, i) => deepEquals(item, b[i]))
    );
  }
  if (isPlainRecord(a) && isPlainRecord(b)) {
    const keysA = Object.keys(a);
    const keysB = Object.keys(b);
    if (keysA.length !== keysB.length) return false;
    return keysA.every(
      (key) =>
        Object.prototype.hasOwnProperty.call(b, key) &&
        deepEquals(a[key], b[key])
    );
  }
  return false;
}

// ============================================================
// FORMATTING
// ============================================================

/** Convert a value into something JSON.stringify renders faithfully */
export function toJsonValue(value: unknown): unknown {
  if (value === undefined) return null;
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (isMapLike(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of mapEntries(value)) {
      result[key] = toJsonValue(item);
    }
    return result;
  }
  if (typeof value === 'function' || typeof value === 'symbol') return null;
  return value;
}

/** Compact JSON rendering */
export function toJson(value: unknown): string {
  return JSON.stringify(toJsonValue(value));
}

/** Format a value for string() conversion */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString('utf8');
  return toJson(value);
}
