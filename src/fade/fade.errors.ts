import { Mp3TypeInfo } from "../mp3-codec/types";

/**
 * Error codes specific to fade operations
 * This module is framework-agnostic and does not depend on NestJS
 */
export enum FadeErrorCode {
  UNSUPPORTED_FORMAT = "UNSUPPORTED_FORMAT",
  INVALID_GAIN_VALUE = "INVALID_GAIN_VALUE",
  INVALID_RAMP = "INVALID_RAMP",
  INVALID_STATE = "INVALID_STATE",
}

/**
 * Base error class for fade errors
 */
export class FadeError extends Error {
  constructor(
    public readonly code: FadeErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "FadeError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FadeError);
    }
  }
}

/**
 * Error thrown when a frame is not MPEG audio Layer III
 */
export class UnsupportedFormatError extends FadeError {
  constructor(
    public readonly typeInfo: Mp3TypeInfo,
    public readonly frameIndex: number,
  ) {
    super(
      FadeErrorCode.UNSUPPORTED_FORMAT,
      `Unsupported format at frame ${frameIndex}: ${typeInfo.description} (only Layer 3 can be faded)`,
    );
    this.name = "UnsupportedFormatError";
  }
}

/**
 * Error thrown when an explicit gain is not an integer in [0, 255]
 */
export class InvalidGainValueError extends FadeError {
  constructor(public readonly value: number) {
    super(FadeErrorCode.INVALID_GAIN_VALUE, `Invalid gain value: ${value} (expected an integer in [0, 255])`);
    this.name = "InvalidGainValueError";
  }
}

export class InvalidRampError extends FadeError {
  constructor(message: string) {
    super(FadeErrorCode.INVALID_RAMP, message);
    this.name = "InvalidRampError";
  }
}

/**
 * Error thrown when a fade strategy is used after it has been drained
 */
export class FadeStateError extends FadeError {
  constructor(message: string) {
    super(FadeErrorCode.INVALID_STATE, message);
    this.name = "FadeStateError";
  }
}
