/**
 * Errors thrown by tweens and sequences.
 *
 * Every failure is reported synchronously from the call that caused it, and
 * the failing call leaves the instance exactly as it found it.
 */

/** Machine-readable failure category. */
export type TweenErrorCode = "INVALID_CONFIG" | "EMPTY_SEQUENCE" | "UNSUPPORTED_OPERATION";

/** Base class for all errors raised by the tween engine. */
export class TweenError extends Error {
  readonly code: TweenErrorCode;

  constructor(message: string, code: TweenErrorCode) {
    super(message);
    this.name = "TweenError";
    this.code = code;
  }
}

/** A tween was constructed or started with values it cannot run with. */
export class TweenConfigError extends TweenError {
  constructor(message: string) {
    super(message, "INVALID_CONFIG");
    this.name = "TweenConfigError";
  }
}

/** `Sequence.start()` was called before anything was appended. */
export class EmptySequenceError extends TweenError {
  constructor() {
    super("Cannot start a sequence with no members", "EMPTY_SEQUENCE");
    this.name = "EmptySequenceError";
  }
}

/** The unit does not implement the requested operation at all. */
export class UnsupportedOperationError extends TweenError {
  readonly operation: string;

  constructor(operation: string, message: string) {
    super(message, "UNSUPPORTED_OPERATION");
    this.name = "UnsupportedOperationError";
    this.operation = operation;
  }
}
