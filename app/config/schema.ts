import { z } from 'zod';
import { LOG_LEVEL_NAMES } from '../utils/logger.js';

/**
 * Zod schema for engine configuration validation
 */

export const writerConfigSchema = z.object({
  /** Pending records that trigger an implicit chunk flush. */
  maxResultRows: z.number().int().min(1).default(50_000),
});

export const recordingConfigSchema = z.object({
  enabled: z.boolean().default(false),
  dir: z.string().min(1).default('recordings'),
});

export const loggingConfigSchema = z.object({
  level: z.enum(LOG_LEVEL_NAMES).default('info'),
});

export const chunkwireConfigSchema = z.object({
  writer: writerConfigSchema.default({}),
  recording: recordingConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

export type ChunkwireConfig = z.infer<typeof chunkwireConfigSchema>;
export type WriterConfig = z.infer<typeof writerConfigSchema>;
export type RecordingConfig = z.infer<typeof recordingConfigSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
