/**
 * Host-side reader for the chunked protocol: splits a byte stream back into
 * chunks and a chunk body back into records.
 */

import { ChunkFormatError } from '../errors.js';
import { decodeMetadata } from '../codec/metadata.js';
import { parseCsv } from '../codec/csv.js';
import { decodeMultiValue, MULTI_VALUE_PREFIX } from '../codec/values.js';
import type { ByteReader } from '../streams/types.js';
import {
  METRIC_KEY_PREFIX,
  chunkMetadataSchema,
  messageEntrySchema,
  metricTupleSchema,
  searchMetric,
  type DecodedChunkMetadata,
  type MessageEntry,
  type SearchMetric,
} from './types.js';

export interface Chunk {
  metadata: DecodedChunkMetadata;
  /** The metadata block exactly as it arrived. */
  rawMetadata: Buffer;
  body: Buffer;
}

export type ParsedRecord = Record<string, string | string[]>;

export interface ParsedBody {
  fieldNames: string[];
  records: ParsedRecord[];
}

const HEADER_PATTERN = /^chunked 1\.0,(\d+),(\d+)\n$/;

export function parseChunkMetadata(bytes: Buffer): DecodedChunkMetadata {
  if (bytes.length === 0) return {};

  const result = chunkMetadataSchema.safeParse(decodeMetadata(bytes.toString('utf8')));
  if (!result.success) {
    throw new ChunkFormatError(`Unexpected metadata shape: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return result.data;
}

export class ChunkReader {
  private chunksRead = 0;

  constructor(private readonly input: ByteReader) {}

  get chunkCount(): number {
    return this.chunksRead;
  }

  /**
   * Read the next chunk, or null at a clean end of stream.
   */
  readChunk(): Chunk | null {
    const line = this.input.readline();
    if (line.length === 0) return null;

    const header = line.toString('utf8');
    const match = HEADER_PATTERN.exec(header);
    if (!match) {
      throw new ChunkFormatError(`Malformed chunk header: ${JSON.stringify(header.slice(0, 80))}`);
    }

    const rawMetadata = this.readBlock(Number(match[1]), 'metadata');
    const metadata = parseChunkMetadata(rawMetadata);
    const body = this.readBlock(Number(match[2]), 'body');

    this.chunksRead++;
    return { metadata, rawMetadata, body };
  }

  readAll(): Chunk[] {
    const chunks: Chunk[] = [];
    for (let chunk = this.readChunk(); chunk !== null; chunk = this.readChunk()) {
      chunks.push(chunk);
    }
    return chunks;
  }

  private readBlock(length: number, block: string): Buffer {
    if (length === 0) return Buffer.alloc(0);

    const bytes = this.input.read(length);
    if (bytes.length !== length) {
      throw new ChunkFormatError(`Truncated ${block} block: expected ${length} bytes, got ${bytes.length}`);
    }
    return bytes;
  }
}

/**
 * Decode a chunk body into records. Multi-value cells become string arrays;
 * every other cell stays the text that was written, '' for empty.
 */
export function parseBody(body: Buffer | string): ParsedBody {
  const rows = parseCsv(typeof body === 'string' ? body : body.toString('utf8'));
  if (rows.length === 0) {
    return { fieldNames: [], records: [] };
  }

  const [header, ...data] = rows;
  const columns = new Map(header.map((name, index): [string, number] => [name, index]));
  const fieldNames = header.filter((name) => !name.startsWith(MULTI_VALUE_PREFIX));

  const records = data.map((row) => {
    const record: ParsedRecord = {};
    for (const name of fieldNames) {
      const single = row[columns.get(name) ?? -1] ?? '';
      const mvIndex = columns.get(MULTI_VALUE_PREFIX + name);
      const multi = mvIndex === undefined ? '' : (row[mvIndex] ?? '');
      record[name] = multi.length > 0 ? decodeMultiValue(multi) : single;
    }
    return record;
  });

  return { fieldNames, records };
}

export function inspectorMessages(metadata: DecodedChunkMetadata): MessageEntry[] {
  const messages = metadata.inspector?.messages;
  if (messages === undefined) return [];

  const result = messageEntrySchema.array().safeParse(messages);
  if (!result.success) {
    throw new ChunkFormatError('Inspector messages are not [severity, text] pairs');
  }
  return result.data;
}

export function inspectorMetrics(metadata: DecodedChunkMetadata): Map<string, SearchMetric> {
  const metrics = new Map<string, SearchMetric>();

  for (const [key, value] of Object.entries(metadata.inspector ?? {})) {
    if (!key.startsWith(METRIC_KEY_PREFIX)) continue;

    const result = metricTupleSchema.safeParse(value);
    if (!result.success) {
      throw new ChunkFormatError(`Inspector metric ${key} is not a 4-tuple of numbers`);
    }
    metrics.set(key.slice(METRIC_KEY_PREFIX.length), searchMetric(...result.data));
  }

  return metrics;
}
