import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { chunkwireConfigSchema, type ChunkwireConfig } from './schema.js';
import { defaultConfig, getDefaultConfigPath } from './defaults.js';
import { logger } from '../utils/logger.js';

export type { ChunkwireConfig, WriterConfig, RecordingConfig, LoggingConfig } from './schema.js';
export { defaultConfig, getDefaultConfigPath, DEFAULT_MAX_RESULT_ROWS } from './defaults.js';

type RawSection = Record<string, unknown>;

function isRawSection(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  return isRawSection(value) ? value : {};
}

/**
 * Environment overrides, applied over the file contents.
 * Values stay strings here; the schema rejects anything malformed.
 */
function envOverrides(env: NodeJS.ProcessEnv): { writer: RawSection; recording: RawSection; logging: RawSection } {
  const writer: RawSection = {};
  const recording: RawSection = {};
  const logging: RawSection = {};

  if (env.CHUNKWIRE_MAX_RESULT_ROWS) {
    writer.maxResultRows = Number(env.CHUNKWIRE_MAX_RESULT_ROWS);
  }
  if (env.CHUNKWIRE_RECORDING_DIR) {
    recording.enabled = true;
    recording.dir = env.CHUNKWIRE_RECORDING_DIR;
  }
  if (env.CHUNKWIRE_LOG_LEVEL) {
    logging.level = env.CHUNKWIRE_LOG_LEVEL;
  }

  return { writer, recording, logging };
}

/**
 * Load configuration from file, then apply environment overrides
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): ChunkwireConfig {
  const path = configPath || getDefaultConfigPath();
  let raw: RawSection = {};

  if (existsSync(path)) {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (!isRawSection(parsed)) {
      throw new Error(`Config file ${path} must contain a JSON object`);
    }
    raw = parsed;
  } else if (configPath) {
    logger.warn(`Config file not found at ${path}, using defaults`);
  }

  const overrides = envOverrides(env);
  const recording = { ...defaultConfig.recording, ...section(raw, 'recording'), ...overrides.recording };

  if (typeof recording.dir === 'string') {
    recording.dir = recording.dir.replace(/^~/, homedir());
  }

  // Validate and merge with defaults
  return chunkwireConfigSchema.parse({
    writer: {
      ...defaultConfig.writer,
      ...section(raw, 'writer'),
      ...overrides.writer,
    },
    recording,
    logging: {
      ...defaultConfig.logging,
      ...section(raw, 'logging'),
      ...overrides.logging,
    },
  });
}
