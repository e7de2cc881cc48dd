/**
 * Record values and their encoding into body cells.
 *
 * Every field occupies two cells: the single value and, for lists of two or
 * more items, the multi-value form `$a$;$b$` (each item wrapped in `$`,
 * inner `$` doubled).
 */

import { ContractViolationError } from '../errors.js';
import { encodeMetadata, encodeNumber, type Encodable } from './metadata.js';

export type FieldValue =
  | null
  | undefined
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | readonly FieldValue[]
  | ReadonlyMap<string, FieldValue>
  | FieldObject;

export interface FieldObject {
  readonly [key: string]: FieldValue;
}

/** A record is an ordered mapping; a Map keeps insertion order exactly. */
export type RecordInput = ReadonlyMap<string, FieldValue> | FieldObject;

/** [single value, multi value] */
export type EncodedField = readonly [string, string];

export const MULTI_VALUE_PREFIX = '__mv_';

const EMPTY_FIELD: EncodedField = ['', ''];

const utf8 = new TextDecoder('utf-8', { fatal: true });

const ENCODED_ITEM = /\$((?:\$\$|[^$])*)\$(?:;|$)/g;

function isFieldList(value: FieldValue): value is readonly FieldValue[] {
  return Array.isArray(value);
}

function isFieldMap(value: FieldValue | RecordInput): value is ReadonlyMap<string, FieldValue> {
  return value instanceof Map;
}

/**
 * Decode bytes that must hold UTF-8 text.
 */
export function decodeText(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch {
    throw new ContractViolationError(`Byte value of length ${bytes.length} is not valid UTF-8 text`);
  }
}

export function recordEntries(record: RecordInput): Iterable<[string, FieldValue]> {
  return isFieldMap(record) ? record.entries() : Object.entries(record);
}

/**
 * Convert a nested field value into something the metadata codec encodes.
 * Plain objects become Maps so that their key order is kept.
 */
export function toEncodable(value: FieldValue): Encodable {
  if (value instanceof Uint8Array) return decodeText(value);
  if (isFieldList(value)) return value.map(toEncodable);
  if (value === null || typeof value !== 'object') return value;

  const entries = isFieldMap(value) ? [...value.entries()] : Object.entries(value);
  return new Map(entries.map(([key, item]): [string, Encodable] => [key, toEncodable(item)]));
}

function scalarText(value: FieldValue): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'boolean') return value ? '1' : '0';
  if (typeof value === 'number') return encodeNumber(value);
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'string') return value;
  if (value instanceof Uint8Array) return decodeText(value);
  return encodeMetadata(toEncodable(value));
}

function escapeItem(text: string): string {
  return `$${text.replace(/\$/g, '$$$$')}$`;
}

export function encodeField(value: FieldValue): EncodedField {
  if (isFieldList(value)) {
    if (value.length === 0) return EMPTY_FIELD;
    if (value.length === 1) return encodeField(value[0]);

    const items = value.map((item) => scalarText(item) ?? '');
    return [items.join('\n'), items.map(escapeItem).join(';')];
  }

  const text = scalarText(value);
  return text === null ? EMPTY_FIELD : [text, ''];
}

/**
 * Split a `$a$;$b$` multi-value cell back into its items.
 */
export function decodeMultiValue(cell: string): string[] {
  return Array.from(cell.matchAll(ENCODED_ITEM), (match) => match[1].replace(/\$\$/g, '$'));
}
