/**
 * Error kinds raised by the protocol engine.
 *
 * Stream I/O failures are not wrapped: whatever the underlying
 * stream throws reaches the caller unchanged.
 */

/**
 * The caller broke the writer/recorder contract: an invalid flush mode,
 * a write after the session finished, bytes that are not UTF-8 text.
 * Never retried.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}

/**
 * Metadata text could not be decoded. Fatal for the chunk being processed.
 */
export class MetadataDecodeError extends Error {
  /** Offset into the decoded text where parsing stopped. */
  readonly position: number;

  constructor(message: string, position: number) {
    super(`${message} at position ${position}`);
    this.name = 'MetadataDecodeError';
    this.position = position;
  }
}

/**
 * A chunk header line or one of its blocks is malformed or truncated.
 */
export class ChunkFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChunkFormatError';
  }
}

/**
 * A call recorder was used before record or playback mode was selected.
 */
export class NotConfiguredError extends Error {
  constructor(operation: string) {
    super(`Call recorder is not in playback or record mode (${operation})`);
    this.name = 'NotConfiguredError';
  }
}

/**
 * Playback asked for more results than were recorded for a call site.
 */
export class ReplayExhaustedError extends Error {
  readonly callSite: string;

  constructor(callSite: string) {
    super(`No recorded results left for call site "${callSite}"`);
    this.name = 'ReplayExhaustedError';
    this.callSite = callSite;
  }
}

/**
 * Recorded bytes and observed bytes disagree.
 */
export class RecordingIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecordingIntegrityError';
  }
}
