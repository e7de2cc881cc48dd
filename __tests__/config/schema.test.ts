import { chunkwireConfigSchema } from '../../app/config/schema.js';

describe('Config Schema', () => {
  it('fills every section with defaults', () => {
    const config = chunkwireConfigSchema.parse({});
    expect(config.writer.maxResultRows).toBe(50_000);
    expect(config.recording.enabled).toBe(false);
    expect(config.recording.dir).toBe('recordings');
    expect(config.logging.level).toBe('info');
  });

  it('accepts custom values', () => {
    const config = chunkwireConfigSchema.parse({
      writer: { maxResultRows: 10 },
      recording: { enabled: true, dir: '/tmp/recordings' },
      logging: { level: 'debug' },
    });
    expect(config.writer.maxResultRows).toBe(10);
    expect(config.recording.dir).toBe('/tmp/recordings');
    expect(config.logging.level).toBe('debug');
  });

  it('rejects a threshold below one', () => {
    expect(chunkwireConfigSchema.safeParse({ writer: { maxResultRows: 0 } }).success).toBe(false);
    expect(chunkwireConfigSchema.safeParse({ writer: { maxResultRows: 1.5 } }).success).toBe(false);
  });

  it('rejects unknown log levels', () => {
    expect(chunkwireConfigSchema.safeParse({ logging: { level: 'loud' } }).success).toBe(false);
  });
});
