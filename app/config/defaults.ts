import { homedir } from 'os';
import { join } from 'path';
import type { ChunkwireConfig } from './schema.js';

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG_DIR = join(homedir(), '.chunkwire');

export const DEFAULT_MAX_RESULT_ROWS = 50_000;

export const defaultConfig: ChunkwireConfig = {
  writer: {
    maxResultRows: DEFAULT_MAX_RESULT_ROWS,
  },
  recording: {
    enabled: false,
    dir: join(DEFAULT_CONFIG_DIR, 'recordings'),
  },
  logging: {
    level: 'info',
  },
};

/**
 * Get the default config path
 */
export function getDefaultConfigPath(): string {
  return join(DEFAULT_CONFIG_DIR, 'config.json');
}
