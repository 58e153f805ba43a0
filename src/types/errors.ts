/**
 * Error types for media-type header handling
 */

/**
 * Error kind categories
 */
export type ErrorKind = 'format' | 'operation' | 'argument' | 'range';

/**
 * Base media-type error class
 */
export class MediaTypeError extends Error {
  /** Error code */
  code: string;
  /** Error kind category */
  kind: ErrorKind;

  constructor(message: string, code: string, kind: ErrorKind) {
    super(message);
    this.name = 'MediaTypeError';
    this.code = code;
    this.kind = kind;
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Malformed header text (bad token characters, unterminated quotes,
 * missing slash, trailing content, empty input)
 */
export class MediaTypeFormatError extends MediaTypeError {
  override kind: 'format' = 'format';
  /** Text that failed to parse */
  input: string;
  /** Offset into input where parsing stopped (if known) */
  position?: number;

  constructor(message: string, input: string, position?: number) {
    super(message, 'FORMAT_ERROR', 'format');
    this.name = 'MediaTypeFormatError';
    this.input = input;
    this.position = position;
  }
}

/**
 * Mutation attempted on a read-only value, collection or parameter
 */
export class MediaTypeOperationError extends MediaTypeError {
  override kind: 'operation' = 'operation';
  /** Operation that was rejected */
  operation: string;

  constructor(message: string, operation: string) {
    super(message, 'INVALID_OPERATION', 'operation');
    this.name = 'MediaTypeOperationError';
    this.operation = operation;
  }
}

/**
 * Required argument missing or empty
 */
export class MediaTypeArgumentError extends MediaTypeError {
  override kind: 'argument' = 'argument';
  /** Name of the offending argument */
  argument: string;

  constructor(message: string, argument: string) {
    super(message, 'INVALID_ARGUMENT', 'argument');
    this.name = 'MediaTypeArgumentError';
    this.argument = argument;
  }
}

/**
 * Numeric argument outside its permitted range
 */
export class MediaTypeRangeError extends MediaTypeError {
  override kind: 'range' = 'range';
  /** Name of the offending argument */
  argument: string;
  /** Rejected value */
  actual: number;

  constructor(message: string, argument: string, actual: number) {
    super(message, 'OUT_OF_RANGE', 'range');
    this.name = 'MediaTypeRangeError';
    this.argument = argument;
    this.actual = actual;
  }
}

/**
 * Builds the error thrown by every mutator of a frozen object
 */
export function readOnlyError(operation: string): MediaTypeOperationError {
  return new MediaTypeOperationError(
    `Cannot ${operation}: the object is read-only`,
    operation
  );
}
