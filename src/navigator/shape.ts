/**
 * Shape Detection
 *
 * Structural classification used by renderers to choose between scalar,
 * key/value, list and table views.
 */

import { mapEntries, mapKeys, toJson } from '../runtime/core/values.js';
import { isExternalRecord, isPlainRecord } from './records.js';

export type ShapeKind = 'scalar' | 'map' | 'array' | 'homogeneousArray';

export interface Shape {
  readonly kind: ShapeKind;
  /** Element count for arrays, key count for maps, 0 for scalars */
  readonly length: number;
  /** Common field names, sorted; present only for homogeneousArray */
  readonly fields?: readonly string[] | undefined;
}

export type Homogeneity =
  | { readonly homogeneous: true; readonly fields: string[] }
  | { readonly homogeneous: false };

export interface ColumnarData {
  readonly columns: string[];
  readonly rows: string[][];
}

function recordKeysOf(value: unknown): string[] | null {
  if (isPlainRecord(value) || isExternalRecord(value)) return mapKeys(value);
  return null;
}

function sameKeySet(keys: readonly string[], other: readonly string[]): boolean {
  if (keys.length !== other.length) return false;
  const set = new Set(other);
  return keys.every((key) => set.has(key));
}

// ============================================================
// DETECTION
// ============================================================

/**
 * Test whether a value is a non-empty array of records sharing one key set.
 * This is the only homogeneity test; renderers call it rather than
 * repeating the check.
 */
export function isHomogeneousArray(value: unknown): Homogeneity {
  if (!Array.isArray(value) || value.length === 0) {
    return { homogeneous: false };
  }

  const baseKeys = recordKeysOf(value[0]);
  if (baseKeys === null || baseKeys.length === 0) {
    return { homogeneous: false };
  }

  for (let i = 1; i < value.length; i++) {
    const keys = recordKeysOf(value[i]);
    if (keys === null || !sameKeySet(baseKeys, keys)) {
      return { homogeneous: false };
    }
  }

  return { homogeneous: true, fields: [...baseKeys].sort() };
}

export function detectShape(value: unknown): Shape {
  if (Array.isArray(value)) {
    if (value.length === 0) return { kind: 'array', length: 0 };
    const check = isHomogeneousArray(value);
    return check.homogeneous
      ? { kind: 'homogeneousArray', length: value.length, fields: check.fields }
      : { kind: 'array', length: value.length };
  }

  const keys = recordKeysOf(value);
  if (keys !== null) return { kind: 'map', length: keys.length };

  return { kind: 'scalar', length: 0 };
}

// ============================================================
// COLUMNAR EXTRACTION
// ============================================================

/**
 * Render a value for a single table cell: null is empty, strings stay on
 * one line, containers become compact JSON.
 */
export function stringify(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') {
    return value
      .replace(/\r\n?/g, '\n')
      .replace(/\n/g, '\\n')
      .replace(/\t/g, '\\t');
  }
  if (
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    typeof value === 'bigint'
  ) {
    return String(value);
  }
  return toJson(value);
}

/**
 * Extract a homogeneous array as columns and stringified rows.
 * Columns follow preferredOrder where those fields exist, then the rest
 * in sorted order. Returns null for any other value.
 */
export function extractColumnarData(
  value: unknown,
  preferredOrder: readonly string[] = []
): ColumnarData | null {
  const check = isHomogeneousArray(value);
  if (!check.homogeneous || !Array.isArray(value)) return null;

  const fields = check.fields;
  const preferred = preferredOrder.filter((field) => fields.includes(field));
  const columns = [
    ...new Set(preferred),
    ...fields.filter((field) => !preferred.includes(field)),
  ];

  const rows = value.map((element: unknown) => {
    const entries = isPlainRecord(element) || isExternalRecord(element)
      ? new Map(mapEntries(element))
      : new Map<string, unknown>();
    return columns.map((column) => stringify(entries.get(column)));
  });

  return { columns, rows };
}
