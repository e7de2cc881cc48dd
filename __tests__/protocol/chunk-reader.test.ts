import {
  ChunkReader,
  inspectorMessages,
  inspectorMetrics,
  parseBody,
  parseChunkMetadata,
  type ParsedRecord,
} from '../../app/protocol/chunk-reader.js';
import { RecordWriter } from '../../app/protocol/record-writer.js';
import { FlushMode, SEVERITIES, searchMetric } from '../../app/protocol/types.js';
import { encodeMetadata, encodeNumber } from '../../app/codec/metadata.js';
import type { FieldValue } from '../../app/codec/values.js';
import { randomDouble, randomMap, randomText, seededRandom } from '../helpers/generators.js';
import { MemoryStream } from '../../app/streams/memory-stream.js';
import { ChunkFormatError, MetadataDecodeError } from '../../app/errors.js';
import { Logger } from '../../app/utils/logger.js';

const quiet = new Logger({ level: 'error', write: () => {} });

describe('ChunkReader', () => {
  it('returns null at the end of the stream', () => {
    const reader = new ChunkReader(new MemoryStream());
    expect(reader.readChunk()).toBeNull();
    expect(reader.chunkCount).toBe(0);
  });

  it('reads back what a RecordWriter wrote', () => {
    const stream = new MemoryStream();
    const writer = new RecordWriter(stream, { logger: quiet });
    writer.writeRecord({ name: 'alpha', tags: ['x', 'y'], score: 1.5 });
    writer.writeRecord({ name: 'beta', flag: true });
    writer.flush(FlushMode.Finished);

    const reader = new ChunkReader(stream);
    const chunk = reader.readChunk();
    expect(chunk).not.toBeNull();
    expect(chunk?.metadata).toEqual({
      inspector: {},
      finished: true,
      partial: false,
    });
    expect(parseBody(chunk?.body ?? '')).toEqual({
      fieldNames: ['name', 'tags', 'score', 'flag'],
      records: [
        { name: 'alpha', tags: ['x', 'y'], score: '1.5', flag: '' },
        { name: 'beta', tags: '', score: '', flag: '1' },
      ],
    });
    expect(reader.readChunk()).toBeNull();
    expect(reader.chunkCount).toBe(1);
  });

  it('round-trips generated records with every severity and two metrics', () => {
    const rand = seededRandom(42);
    const stream = new MemoryStream();
    const writer = new RecordWriter(stream, { maxResultRows: 1000, logger: quiet });
    const expected: ParsedRecord[] = [];

    for (let i = 0; i < 100; i++) {
      const number = randomDouble(rand);
      const text = randomText(rand, 20);
      const nested = randomMap(rand, 2);
      writer.writeRecord(
        new Map<string, FieldValue>([
          ['random_double', number],
          ['random_unicode', text],
          ['福 酒吧', nested],
        ])
      );
      expected.push({
        random_double: encodeNumber(number),
        random_unicode: text,
        '福 酒吧': encodeMetadata(nested),
      });
    }
    for (const severity of SEVERITIES) {
      writer.writeMessage(severity, 'message at %s', severity);
    }
    writer.writeMetric('foo.bar', searchMetric(1.5, 2, 100, 50));
    writer.writeMetric('baz', searchMetric(0.25, 1, 10, 0));
    writer.flush(FlushMode.Finished);

    const chunk = new ChunkReader(stream).readChunk();
    const metadata = chunk?.metadata ?? {};
    expect(parseBody(chunk?.body ?? '')).toEqual({
      fieldNames: ['random_double', 'random_unicode', '福 酒吧'],
      records: expected,
    });
    expect(inspectorMessages(metadata)).toEqual(SEVERITIES.map((severity) => [severity, `message at ${severity}`]));
    expect(inspectorMetrics(metadata)).toEqual(
      new Map([
        ['foo.bar', { elapsedSeconds: 1.5, invocationCount: 2, inputCount: 100, outputCount: 50 }],
        ['baz', { elapsedSeconds: 0.25, invocationCount: 1, inputCount: 10, outputCount: 0 }],
      ])
    );
  });

  it('passes through host metadata keys', () => {
    const reader = new ChunkReader(new MemoryStream('chunked 1.0,20,0\n{"action":"getinfo"}'));
    const chunk = reader.readChunk();
    expect(chunk?.metadata.action).toBe('getinfo');
    expect(chunk?.rawMetadata.toString()).toBe('{"action":"getinfo"}');
    expect(chunk?.body.length).toBe(0);
  });

  it('rejects a malformed header', () => {
    const reader = new ChunkReader(new MemoryStream('chunked 2.0,1,1\nxx'));
    expect(() => reader.readChunk()).toThrow(ChunkFormatError);
  });

  it('rejects a truncated body', () => {
    const reader = new ChunkReader(new MemoryStream('chunked 1.0,2,10\n{}abc'));
    expect(() => reader.readChunk()).toThrow('Truncated body block: expected 10 bytes, got 3');
  });

  it('rejects metadata of the wrong shape', () => {
    const reader = new ChunkReader(new MemoryStream('chunked 1.0,18,0\n{"fieldnames":"a"}'));
    expect(() => reader.readChunk()).toThrow(ChunkFormatError);
  });

  it('surfaces metadata decode errors', () => {
    const reader = new ChunkReader(new MemoryStream('chunked 1.0,5,0\n{bad}'));
    expect(() => reader.readChunk()).toThrow(MetadataDecodeError);
  });
});

describe('parseChunkMetadata', () => {
  it('treats an empty block as empty metadata', () => {
    expect(parseChunkMetadata(Buffer.alloc(0))).toEqual({});
  });
});

describe('parseBody', () => {
  it('returns nothing for an empty body', () => {
    expect(parseBody('')).toEqual({ fieldNames: [], records: [] });
  });
});

describe('inspector accessors', () => {
  it('reads messages and metrics from chunk metadata', () => {
    const stream = new MemoryStream();
    const writer = new RecordWriter(stream, { logger: quiet });
    writer.writeMessage('error', 'lookup failed: %s', 'timeout');
    writer.writeMetric('lookup', searchMetric(1.25, 2, 40, 38));
    writer.flush();

    const chunk = new ChunkReader(stream).readChunk();
    const metadata = chunk?.metadata ?? {};
    expect(inspectorMessages(metadata)).toEqual([['error', 'lookup failed: timeout']]);
    expect(inspectorMetrics(metadata)).toEqual(
      new Map([['lookup', { elapsedSeconds: 1.25, invocationCount: 2, inputCount: 40, outputCount: 38 }]])
    );
  });

  it('returns no messages when the inspector is absent', () => {
    expect(inspectorMessages({})).toEqual([]);
    expect(inspectorMetrics({}).size).toBe(0);
  });

  it('rejects malformed inspector entries', () => {
    expect(() => inspectorMessages({ inspector: { messages: [['loud', 'x']] } })).toThrow(ChunkFormatError);
    expect(() => inspectorMetrics({ inspector: { 'metric.bad': [1, 2] } })).toThrow(ChunkFormatError);
  });
});
