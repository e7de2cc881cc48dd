/**
 * Record writer for the chunked protocol.
 *
 * Buffers records and inspector output (messages, metrics) and emits them as
 * one chunk per flush:
 *
 *   chunked 1.0,<metadata bytes>,<body bytes>\n<metadata><body>
 *
 * A flush happens implicitly when `maxResultRows` records are pending, or
 * explicitly through flush(). The complete chunk is assembled in memory and
 * handed to the destination in a single write; counters and buffers are only
 * reset once that write returns.
 *
 * Field names accumulate in first-seen order and are never dropped. Rows
 * written before a field appeared are padded with empty cells. Chunks after
 * the first carry the full list in their `fieldnames` metadata.
 */

import { format } from 'util';
import { ContractViolationError } from '../errors.js';
import { encodeMetadata } from '../codec/metadata.js';
import { formatCsvRow } from '../codec/csv.js';
import {
  encodeField,
  recordEntries,
  MULTI_VALUE_PREFIX,
  type EncodedField,
  type RecordInput,
} from '../codec/values.js';
import { DEFAULT_MAX_RESULT_ROWS } from '../config/defaults.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { ByteWriter } from '../streams/types.js';
import {
  FlushMode,
  METRIC_KEY_PREFIX,
  PROTOCOL_VERSION,
  isFlushMode,
  isSeverity,
  metricTuple,
  resolveFlushMode,
  type ChunkMetadata,
  type InspectorSnapshot,
  type MessageEntry,
  type MetricTuple,
  type SearchMetric,
  type Severity,
} from './types.js';

export interface RecordWriterOptions {
  /** Pending records that trigger an implicit flush. */
  maxResultRows?: number;
  logger?: Logger;
}

type MetricKey = `${typeof METRIC_KEY_PREFIX}${string}`;

const EMPTY_CELLS: EncodedField = ['', ''];

function metricKey(name: string): MetricKey {
  return `${METRIC_KEY_PREFIX}${name}`;
}

export function chunkHeader(metadataLength: number, bodyLength: number): string {
  return `chunked ${PROTOCOL_VERSION},${metadataLength},${bodyLength}\n`;
}

export class RecordWriter {
  private readonly output: ByteWriter;
  private readonly maxResultRows: number;
  private readonly log: Logger;

  private readonly names: string[] = [];
  private readonly nameIndex = new Map<string, number>();
  private rows: EncodedField[][] = [];
  private messages: MessageEntry[] = [];
  private metrics = new Map<MetricKey, MetricTuple>();

  private pending = 0;
  private total = 0;
  private chunks = 0;
  private finished = false;

  constructor(output: ByteWriter, options: RecordWriterOptions = {}) {
    const maxResultRows = options.maxResultRows ?? DEFAULT_MAX_RESULT_ROWS;
    if (!Number.isInteger(maxResultRows) || maxResultRows < 1) {
      throw new ContractViolationError(`maxResultRows must be a positive integer, got ${maxResultRows}`);
    }

    this.output = output;
    this.maxResultRows = maxResultRows;
    this.log = options.logger ?? rootLogger.child('[record-writer]');
  }

  // -------------------------------------------------------------------
  // Observers
  // -------------------------------------------------------------------

  /** Records buffered since the last flush. */
  get pendingRecordCount(): number {
    return this.pending;
  }

  /** Records emitted in flushed chunks over the writer's lifetime. */
  get totalRecordCount(): number {
    return this.total;
  }

  get chunkCount(): number {
    return this.chunks;
  }

  get fieldNames(): string[] {
    return [...this.names];
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /** True when no record, message or metric is waiting for a flush. */
  get isFlushed(): boolean {
    return this.pending === 0 && this.messages.length === 0 && this.metrics.size === 0;
  }

  get inspector(): InspectorSnapshot {
    const snapshot: InspectorSnapshot = {};
    if (this.messages.length > 0) {
      snapshot.messages = [...this.messages];
    }
    for (const [key, tuple] of this.metrics) {
      snapshot[key] = tuple;
    }
    return snapshot;
  }

  // -------------------------------------------------------------------
  // Writing
  // -------------------------------------------------------------------

  writeRecord(record: RecordInput): void {
    this.ensureOpen('write a record');

    // Encode everything before touching writer state, so a rejected value
    // leaves no trace.
    const encoded: Array<[string, EncodedField]> = [];
    for (const [name, value] of recordEntries(record)) {
      encoded.push([name, encodeField(value)]);
    }

    const row: EncodedField[] = [];
    for (const [name, cells] of encoded) {
      row[this.fieldPosition(name)] = cells;
    }
    this.rows.push(Array.from({ length: this.names.length }, (_, i) => row[i] ?? EMPTY_CELLS));
    this.pending++;

    if (this.pending >= this.maxResultRows) {
      this.flush(FlushMode.Continue);
    }
  }

  writeRecords(records: Iterable<RecordInput>): void {
    for (const record of records) {
      this.writeRecord(record);
    }
  }

  /**
   * Queue a message for the host. `message` and `args` follow util.format.
   */
  writeMessage(severity: Severity, message: string, ...args: unknown[]): void {
    this.ensureOpen('write a message');
    if (!isSeverity(severity)) {
      throw new ContractViolationError(`Unknown message severity: ${String(severity)}`);
    }
    this.messages.push([severity, format(message, ...args)]);
  }

  /** Store or replace the metric reported under `name`. */
  writeMetric(name: string, metric: SearchMetric): void {
    this.ensureOpen('write a metric');
    this.metrics.set(metricKey(name), metricTuple(metric));
  }

  // -------------------------------------------------------------------
  // Flushing
  // -------------------------------------------------------------------

  flush(mode: FlushMode = FlushMode.Continue): void {
    if (!isFlushMode(mode)) {
      throw new ContractViolationError(`Unknown flush mode: ${String(mode)}`);
    }
    this.ensureOpen('flush');

    const chunk = this.buildChunk(mode);
    this.output.write(chunk);
    this.output.flush?.();

    const records = this.pending;
    this.total += records;
    this.chunks++;
    this.rows = [];
    this.messages = [];
    this.metrics = new Map();
    this.pending = 0;

    if (mode === FlushMode.Finished) {
      this.finished = true;
    }

    this.log.debug(`Chunk ${this.chunks} (${mode}): ${records} records, ${chunk.length} bytes`);
  }

  /** The two-flag form: `{ finished?: boolean, partial?: boolean }`. */
  flushWithFlags(flags: unknown): void {
    this.flush(resolveFlushMode(flags));
  }

  // -------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------

  private ensureOpen(operation: string): void {
    if (this.finished) {
      throw new ContractViolationError(`Cannot ${operation}: the writer has finished`);
    }
  }

  private fieldPosition(name: string): number {
    let index = this.nameIndex.get(name);
    if (index === undefined) {
      index = this.names.length;
      this.names.push(name);
      this.nameIndex.set(name, index);
    }
    return index;
  }

  private buildBody(): string {
    if (this.rows.length === 0) return '';

    const width = this.names.length;
    const lines = [formatCsvRow(this.names.flatMap((name) => [name, MULTI_VALUE_PREFIX + name]))];

    for (const row of this.rows) {
      const cells = row.flatMap((field) => [...field]);
      for (let i = row.length; i < width; i++) {
        cells.push(...EMPTY_CELLS);
      }
      lines.push(formatCsvRow(cells));
    }

    return lines.join('');
  }

  private buildChunk(mode: FlushMode): Buffer {
    const metadata: ChunkMetadata = {
      // The first chunk's header row already names the fields.
      fieldnames: this.chunks > 0 && this.names.length > 0 ? [...this.names] : undefined,
      inspector: this.inspector,
      finished: mode === FlushMode.Finished,
      partial: mode === FlushMode.Partial,
    };

    const metadataBytes = Buffer.from(encodeMetadata(metadata), 'utf8');
    const bodyBytes = Buffer.from(this.buildBody(), 'utf8');
    const header = Buffer.from(chunkHeader(metadataBytes.length, bodyBytes.length), 'utf8');

    return Buffer.concat([header, metadataBytes, bodyBytes]);
  }
}
