/**
 * External Record Adapter
 *
 * Field access for objects that are neither plain records nor sequences.
 * Classes expose their fields through the RECORD_FIELDS protocol; any other
 * object falls back to its own enumerable string-keyed properties.
 */

// ============================================================
// ADAPTER PROTOCOL
// ============================================================

/** Symbol under which an object lists its navigable fields */
export const RECORD_FIELDS: unique symbol = Symbol.for('navex.recordFields');

/** One navigable field of an external record */
export interface RecordField {
  /** Native member name */
  readonly name: string;
  /**
   * Declared external name. `"-"` hides the field from navigation.
   */
  readonly declaredName?: string | undefined;
  readonly value: unknown;
}

/**
 * An object that describes its own fields.
 *
 * @example
 * ```typescript
 * class User {
 *   constructor(private readonly id: number) {}
 *   [RECORD_FIELDS](): RecordField[] {
 *     return [{ name: 'id', declaredName: 'user_id', value: this.id }];
 *   }
 * }
 * ```
 */
export interface ExternalRecord {
  [RECORD_FIELDS](): readonly RecordField[];
}

const HIDDEN = '-';

// ============================================================
// CLASSIFICATION
// ============================================================

/** Plain object literal or null-prototype dictionary */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  if (Array.isArray(value) || value instanceof Uint8Array) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function hasRecordFields(value: object): value is ExternalRecord {
  return RECORD_FIELDS in value && typeof value[RECORD_FIELDS] === 'function';
}

/** Any object navigated by field name that is not a plain record */
export function isExternalRecord(value: unknown): value is object {
  if (typeof value !== 'object' || value === null) return false;
  if (Array.isArray(value) || value instanceof Uint8Array) return false;
  return !isPlainRecord(value);
}

// ============================================================
// FIELD ACCESS
// ============================================================

/** Visible fields of an external record, hidden and private members removed */
export function listRecordFields(value: object): RecordField[] {
  const fields: RecordField[] = hasRecordFields(value)
    ? [...value[RECORD_FIELDS]()]
    : ownFields(value);
  return fields.filter(
    (field) => field.declaredName !== HIDDEN && !field.name.startsWith('#')
  );
}

function ownFields(value: object): RecordField[] {
  const entries: [string, unknown][] = Object.entries(value);
  return entries
    .filter(([, v]) => typeof v !== 'function')
    .map(([name, v]) => ({ name, value: v }));
}

/** The name a field is listed under: declared name first, then native */
export function fieldKey(field: RecordField): string {
  return field.declaredName !== undefined && field.declaredName !== ''
    ? field.declaredName
    : field.name;
}

export type FieldLookup =
  | { readonly found: true; readonly value: unknown }
  | { readonly found: false };

/** Look up a field by its declared or native name */
export function lookupRecordField(value: object, key: string): FieldLookup {
  for (const field of listRecordFields(value)) {
    if (field.declaredName === key || field.name === key) {
      return { found: true, value: field.value };
    }
  }
  return { found: false };
}

export function recordKeys(value: object): string[] {
  return listRecordFields(value).map(fieldKey);
}
