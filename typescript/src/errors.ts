/**
 * Base error class for bytewire errors.
 *
 * Every malformed-input and bounds failure in the library is an instance of
 * this class, so callers can reject bad input with a single `instanceof`.
 */
export class BytewireError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BytewireError";
  }
}

/**
 * Error thrown when a value cannot be encoded.
 */
export class EncodeError extends BytewireError {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends BytewireError {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when the source is exhausted during decoding.
 */
export class BufferUnderflowError extends DecodeError {
  readonly needed: number;
  readonly available: number;

  constructor(needed: number, available: number) {
    super(`Buffer underflow: needed ${needed} bytes, only ${available} available`);
    this.name = "BufferUnderflowError";
    this.needed = needed;
    this.available = available;
  }
}

/**
 * Error thrown when a boolean byte is neither 0 nor 1.
 */
export class NonBinaryByteError extends DecodeError {
  constructor(byte: number) {
    super(`Tried composing binary from non-binary byte: ${byte}`);
    this.name = "NonBinaryByteError";
  }
}

/**
 * Error thrown when string bytes are not valid UTF-8.
 */
export class InvalidUtf8Error extends DecodeError {
  constructor(length: number) {
    super(`Invalid UTF-8 sequence in ${length} byte string`);
    this.name = "InvalidUtf8Error";
  }
}

/**
 * Error thrown when a network address carries an unknown family tag.
 */
export class UnknownAddressTagError extends DecodeError {
  constructor(tag: number) {
    super(`Unknown address tag: ${tag}`);
    this.name = "UnknownAddressTagError";
  }
}

/**
 * Error thrown when a variable-length integer runs past its byte budget.
 */
export class VarIntOverflowError extends DecodeError {
  constructor(maxBytes: number) {
    super(`Varint overflow: exceeded ${maxBytes} bytes`);
    this.name = "VarIntOverflowError";
  }
}

/**
 * Error thrown when an index, range or offset falls outside a buffer's bounds.
 */
export class OutOfBoundsError extends BytewireError {
  constructor(message: string) {
    super(message);
    this.name = "OutOfBoundsError";
  }
}

/**
 * Error thrown when a bounds change would break `lower <= offset <= upper <= length`.
 */
export class InvalidBoundsError extends BytewireError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidBoundsError";
  }
}

/**
 * Error thrown when writing to or growing a clamped view.
 */
export class ReadOnlyBufferError extends BytewireError {
  constructor(operation: string) {
    super(`Cannot ${operation}: buffer is a read-only clamped view`);
    this.name = "ReadOnlyBufferError";
  }
}

/**
 * Thrown by the forced codec variants (`fparse`, `fcompose`).
 *
 * Not a {@link BytewireError}; the original failure is kept as `cause`.
 */
export class UnrecoverableError extends Error {
  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed: ${reason}`, { cause });
    this.name = "UnrecoverableError";
  }
}
