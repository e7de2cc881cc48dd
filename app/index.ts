/**
 * chunkwire
 *
 * Streaming record serialization for command processes that talk to a host
 * over the chunked protocol, with session capture and call record/replay.
 */

export * from './config/index.js';
export * from './errors.js';

export {
  decodeMetadata,
  encodeMetadata,
  encodeNumber,
  MAX_NESTING_DEPTH,
  type Encodable,
  type MetadataObject,
  type MetadataValue,
} from './codec/metadata.js';
export { encodeField, decodeMultiValue, type FieldValue, type RecordInput } from './codec/values.js';

export {
  FlushMode,
  SEVERITIES,
  resolveFlushMode,
  searchMetric,
  type ChunkMetadata,
  type DecodedChunkMetadata,
  type InspectorSnapshot,
  type SearchMetric,
  type Severity,
} from './protocol/types.js';
export { RecordWriter, chunkHeader, type RecordWriterOptions } from './protocol/record-writer.js';
export {
  ChunkReader,
  inspectorMessages,
  inspectorMetrics,
  parseBody,
  type Chunk,
  type ParsedBody,
  type ParsedRecord,
} from './protocol/chunk-reader.js';

export type { ByteReader, ByteWriter } from './streams/types.js';
export { MemoryStream } from './streams/memory-stream.js';
export { FdReader, FdWriter } from './streams/fd-stream.js';
export {
  TeeReader,
  TeeWriter,
  TeeRecorder,
  assertRecordingIntact,
  readRecording,
  withTeeReader,
  withTeeWriter,
} from './streams/tee-recorder.js';

export { CallRecorder, metadataValueSchema, type RecorderModeName } from './recording/call-recorder.js';
export { openCommandSession, type CommandSession, type CommandStreams } from './session.js';
export { Logger, logger, type LogLevel } from './utils/logger.js';
