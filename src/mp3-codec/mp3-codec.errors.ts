/**
 * Error codes specific to MP3 codec operations
 * This module is framework-agnostic and does not depend on NestJS
 */
export enum Mp3CodecErrorCode {
  SYNC_BUFFER_LIMIT = "SYNC_BUFFER_LIMIT",
  INVALID_FIELD_VALUE = "INVALID_FIELD_VALUE",
}

/**
 * Base error class for MP3 codec errors
 */
export class Mp3CodecError extends Error {
  constructor(
    public readonly code: Mp3CodecErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "Mp3CodecError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, Mp3CodecError);
    }
  }
}

/**
 * Error thrown when an item does not complete within the iterator's buffer limit
 */
export class SyncBufferLimitError extends Mp3CodecError {
  constructor(
    message: string,
    public readonly position: number,
  ) {
    super(Mp3CodecErrorCode.SYNC_BUFFER_LIMIT, message);
    this.name = "SyncBufferLimitError";
  }
}

/**
 * Error thrown when a header or side info field is given a value it cannot hold
 */
export class InvalidFieldValueError extends Mp3CodecError {
  constructor(message: string) {
    super(Mp3CodecErrorCode.INVALID_FIELD_VALUE, message);
    this.name = "InvalidFieldValueError";
  }
}
