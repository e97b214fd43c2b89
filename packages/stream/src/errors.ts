/**
 * Sequence Error Types
 *
 * Every error here is a local precondition violation raised synchronously to
 * the caller: either at chain time (bad arguments) or during a terminal
 * operation (nothing to aggregate).
 */

/** Reason codes for sequence failures. */
export type SequenceErrorReason = "empty_sequence" | "invalid_argument";

/**
 * Base class for all sequence errors.
 */
export class SequenceError extends Error {
  constructor(
    readonly reason: SequenceErrorReason,
    readonly operation: string,
    message: string
  ) {
    super(message);
    this.name = "SequenceError";
  }
}

/**
 * Thrown by `min`, `max` and seedless `reduce` on a sequence with no elements.
 */
export class EmptySequenceError extends SequenceError {
  constructor(operation: string) {
    super("empty_sequence", operation, `${operation}() called on an empty sequence`);
    this.name = "EmptySequenceError";
  }
}

/**
 * Thrown when a size, count or bound is outside what the operation accepts.
 */
export class InvalidArgumentError extends SequenceError {
  constructor(
    operation: string,
    readonly argument: string,
    readonly value: unknown,
    expected: string
  ) {
    super(
      "invalid_argument",
      operation,
      `${operation}(): ${argument} must be ${expected}, got ${String(value)}`
    );
    this.name = "InvalidArgumentError";
  }
}

export function requirePositiveInteger(operation: string, argument: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidArgumentError(operation, argument, value, "a positive integer");
  }
}

export function requireInteger(operation: string, argument: string, value: number): void {
  if (!Number.isSafeInteger(value)) {
    throw new InvalidArgumentError(operation, argument, value, "a safe integer");
  }
}
