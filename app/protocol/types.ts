/**
 * Protocol Types
 *
 * Shapes carried in chunk metadata, and the flush modes of a record writer.
 */

import { z } from 'zod';
import { ContractViolationError } from '../errors.js';

export const PROTOCOL_VERSION = '1.0';

export const SEVERITIES = ['debug', 'info', 'warn', 'error', 'fatal'] as const;

export type Severity = (typeof SEVERITIES)[number];

/** Inspector key prefix that marks a metric entry. */
export const METRIC_KEY_PREFIX = 'metric.';

/**
 * Timing and volume counters for one named stage of a command
 */
export interface SearchMetric {
  elapsedSeconds: number;
  invocationCount: number;
  inputCount: number;
  outputCount: number;
}

/** Wire form: [duration, invocations, input records, output records] */
export type MetricTuple = readonly [number, number, number, number];

export type MessageEntry = readonly [Severity, string];

export type InspectorSnapshot = {
  messages?: MessageEntry[];
  [metricKey: `${typeof METRIC_KEY_PREFIX}${string}`]: MetricTuple;
};

/** Metadata block written ahead of every chunk body. */
export type ChunkMetadata = {
  fieldnames?: string[];
  inspector: InspectorSnapshot;
  finished: boolean;
  partial: boolean;
};

export function searchMetric(
  elapsedSeconds: number,
  invocationCount: number,
  inputCount: number,
  outputCount: number
): SearchMetric {
  return { elapsedSeconds, invocationCount, inputCount, outputCount };
}

export function metricTuple(metric: SearchMetric): MetricTuple {
  return [metric.elapsedSeconds, metric.invocationCount, metric.inputCount, metric.outputCount];
}

export function isSeverity(value: unknown): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

// ---------------------------------------------------------------------------
// Flush modes
// ---------------------------------------------------------------------------

export const FlushMode = {
  /** Emit the buffered rows; more chunks follow. */
  Continue: 'continue',
  /** Emit an intermediate result set without ending the session. */
  Partial: 'partial',
  /** Emit the last chunk; the writer refuses further records. */
  Finished: 'finished',
} as const;

export type FlushMode = (typeof FlushMode)[keyof typeof FlushMode];

const FLUSH_MODES: readonly string[] = Object.values(FlushMode);

export function isFlushMode(value: unknown): value is FlushMode {
  return typeof value === 'string' && FLUSH_MODES.includes(value);
}

/**
 * The two-flag form of a flush request, as hosts and older callers express it.
 */
export const flushFlagsSchema = z
  .object({
    finished: z.boolean().optional(),
    partial: z.boolean().optional(),
  })
  .strict()
  .refine((flags) => !(flags.finished && flags.partial), {
    message: 'finished and partial cannot both be true',
  });

export type FlushFlags = z.infer<typeof flushFlagsSchema>;

/**
 * Map `{ finished, partial }` onto a flush mode. Flags must be strict
 * booleans and at most one may be true.
 */
export function resolveFlushMode(flags: unknown): FlushMode {
  const result = flushFlagsSchema.safeParse(flags);
  if (!result.success) {
    const reasons = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new ContractViolationError(`Invalid flush flags: ${reasons.join('; ')}`);
  }

  if (result.data.finished) return FlushMode.Finished;
  if (result.data.partial) return FlushMode.Partial;
  return FlushMode.Continue;
}

// ---------------------------------------------------------------------------
// Decoded metadata (reader side)
// ---------------------------------------------------------------------------

export const messageEntrySchema = z.tuple([z.enum(SEVERITIES), z.string()]);

export const metricTupleSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

/**
 * Metadata as read off the wire. Host chunks carry their own keys
 * (action, preview, ...), which pass through untouched.
 */
export const chunkMetadataSchema = z
  .object({
    fieldnames: z.array(z.string()).optional(),
    inspector: z.record(z.string(), z.unknown()).optional(),
    finished: z.boolean().optional(),
    partial: z.boolean().optional(),
  })
  .passthrough();

export type DecodedChunkMetadata = z.infer<typeof chunkMetadataSchema>;
