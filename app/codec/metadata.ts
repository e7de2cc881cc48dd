/**
 * Metadata codec for chunk headers.
 *
 * Compact JSON (no whitespace, key order preserved) extended with the bare
 * tokens `NaN`, `Infinity` and `-Infinity`, so every IEEE-754 double
 * survives a round trip. Output containing no non-finite number is plain
 * JSON; the decoder accepts all of standard JSON.
 *
 * Keys that look like array indices ("0", "17") are ordered first by
 * JavaScript objects. Pass a Map to the encoder when that order matters.
 */

import { MetadataDecodeError } from '../errors.js';

export type MetadataValue = null | boolean | number | string | MetadataValue[] | MetadataObject;

export interface MetadataObject {
  [key: string]: MetadataValue;
}

/** Anything the encoder accepts. `undefined` members are dropped, as JSON.stringify does. */
export type Encodable =
  | null
  | undefined
  | boolean
  | number
  | bigint
  | string
  | readonly Encodable[]
  | ReadonlyMap<string, Encodable>
  | EncodableObject;

export interface EncodableObject {
  readonly [key: string]: Encodable;
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

export function encodeNumber(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'Infinity';
  if (value === -Infinity) return '-Infinity';
  if (Object.is(value, -0)) return '-0';
  return JSON.stringify(value);
}

function encodeEntries(entries: Iterable<[string, Encodable]>): string {
  const members: string[] = [];
  for (const [key, value] of entries) {
    if (value === undefined) continue;
    members.push(`${JSON.stringify(key)}:${encodeMetadata(value)}`);
  }
  return `{${members.join(',')}}`;
}

function isEncodableArray(value: Encodable): value is readonly Encodable[] {
  return Array.isArray(value);
}

function isEncodableMap(value: Encodable): value is ReadonlyMap<string, Encodable> {
  return value instanceof Map;
}

export function encodeMetadata(value: Encodable): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return encodeNumber(value);
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'string') return JSON.stringify(value);

  if (isEncodableArray(value)) {
    return `[${value.map((item) => (item === undefined ? 'null' : encodeMetadata(item))).join(',')}]`;
  }
  if (isEncodableMap(value)) {
    return encodeEntries(value.entries());
  }
  return encodeEntries(Object.entries(value));
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

const LITERALS: ReadonlyArray<readonly [string, MetadataValue]> = [
  ['true', true],
  ['false', false],
  ['null', null],
  ['NaN', NaN],
  ['Infinity', Infinity],
  ['-Infinity', -Infinity],
];

const NUMBER_PATTERN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

const WHITESPACE = new Set([' ', '\t', '\n', '\r']);

/** Arrays and objects nested deeper than this are rejected. */
export const MAX_NESTING_DEPTH = 512;

class MetadataParser {
  private pos = 0;
  private depth = 0;

  constructor(private readonly text: string) {}

  parse(): MetadataValue {
    const value = this.value();
    this.skipWhitespace();
    if (this.pos < this.text.length) {
      throw this.fail('Unexpected trailing content');
    }
    return value;
  }

  private fail(message: string): MetadataDecodeError {
    return new MetadataDecodeError(message, this.pos);
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && WHITESPACE.has(this.text[this.pos])) {
      this.pos++;
    }
  }

  private expect(ch: string): void {
    this.skipWhitespace();
    if (this.text[this.pos] !== ch) {
      throw this.fail(this.pos >= this.text.length ? 'Unexpected end of input' : `Expected '${ch}'`);
    }
    this.pos++;
  }

  private value(): MetadataValue {
    this.skipWhitespace();

    if (this.pos >= this.text.length) {
      throw this.fail('Unexpected end of input');
    }

    const ch = this.text[this.pos];
    if (ch === '{' || ch === '[') {
      if (this.depth >= MAX_NESTING_DEPTH) {
        throw this.fail('Nesting too deep');
      }
      this.depth++;
      const nested = ch === '{' ? this.object() : this.array();
      this.depth--;
      return nested;
    }
    if (ch === '"') {
      return this.string();
    }

    for (const [token, literal] of LITERALS) {
      if (this.text.startsWith(token, this.pos)) {
        this.pos += token.length;
        return literal;
      }
    }

    return this.number();
  }

  private number(): number {
    NUMBER_PATTERN.lastIndex = this.pos;
    const match = NUMBER_PATTERN.exec(this.text);
    if (!match) {
      throw this.fail('Unexpected character');
    }
    this.pos += match[0].length;
    return Number(match[0]);
  }

  private string(): string {
    const start = this.pos;
    let end = start + 1;

    while (end < this.text.length && this.text[end] !== '"') {
      end += this.text[end] === '\\' ? 2 : 1;
    }
    if (end >= this.text.length) {
      throw this.fail('Unterminated string');
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(this.text.slice(start, end + 1));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw this.fail(`Invalid string literal (${reason})`);
    }
    if (typeof decoded !== 'string') {
      throw this.fail('Invalid string literal');
    }

    this.pos = end + 1;
    return decoded;
  }

  private array(): MetadataValue[] {
    const items: MetadataValue[] = [];
    this.pos++;
    this.skipWhitespace();

    if (this.text[this.pos] === ']') {
      this.pos++;
      return items;
    }

    for (;;) {
      items.push(this.value());
      this.skipWhitespace();
      const ch = this.text[this.pos];
      if (ch === ',') {
        this.pos++;
      } else if (ch === ']') {
        this.pos++;
        return items;
      } else {
        throw this.fail(ch === undefined ? 'Unexpected end of input' : "Expected ',' or ']'");
      }
    }
  }

  private object(): MetadataObject {
    const members: MetadataObject = {};
    this.pos++;
    this.skipWhitespace();

    if (this.text[this.pos] === '}') {
      this.pos++;
      return members;
    }

    for (;;) {
      this.skipWhitespace();
      if (this.text[this.pos] !== '"') {
        throw this.fail(this.pos >= this.text.length ? 'Unexpected end of input' : 'Expected property name');
      }
      const key = this.string();
      this.expect(':');
      // defineProperty so that a "__proto__" key stays an own member
      Object.defineProperty(members, key, {
        value: this.value(),
        enumerable: true,
        writable: true,
        configurable: true,
      });

      this.skipWhitespace();
      const ch = this.text[this.pos];
      if (ch === ',') {
        this.pos++;
      } else if (ch === '}') {
        this.pos++;
        return members;
      } else {
        throw this.fail(ch === undefined ? 'Unexpected end of input' : "Expected ',' or '}'");
      }
    }
  }
}

/**
 * Decode metadata text. Throws MetadataDecodeError on malformed or truncated input.
 */
export function decodeMetadata(text: string): MetadataValue {
  return new MetadataParser(text).parse();
}
