/**
 * Kinds of failure reported by the codec.
 */
export type ErrorKind =
  | "UnexpectedEnd"
  | "TrailingCharacters"
  | "ExpectedBoolean"
  | "ExpectedUInteger"
  | "ExpectedInteger"
  | "ExpectedFloat"
  | "ExpectedString"
  | "ExpectedChar"
  | "ExpectedBytes"
  | "ExpectedNull"
  | "ExpectedArray"
  | "ExpectedMap"
  | "ExpectedExt"
  | "ExpectedEnum"
  | "Message";

/**
 * Kinds raised when the next value on the wire has the wrong shape.
 */
export type ExpectedKind = Exclude<ErrorKind, "UnexpectedEnd" | "TrailingCharacters" | "Message">;

/**
 * Base error class for tagwire errors.
 */
export class CodecError extends Error {
  readonly kind: ErrorKind;

  constructor(message: string, kind: ErrorKind = "Message") {
    super(message);
    this.name = "CodecError";
    this.kind = kind;
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends CodecError {
  constructor(message: string) {
    super(message, "Message");
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends CodecError {
  constructor(message: string, kind: ErrorKind = "Message") {
    super(message, kind);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when a number does not fit the width it is written as.
 */
export class ValueOutOfRangeError extends EncodeError {
  constructor(value: number | bigint, bits: number, signed: boolean) {
    super(`${signed ? "integer" : "unsigned integer"} overflow: value = ${value}; bits = ${bits}`);
    this.name = "ValueOutOfRangeError";
  }
}

/**
 * Error thrown when the input ends before a value is complete.
 */
export class UnexpectedEndError extends DecodeError {
  readonly needed: number;
  readonly available: number;

  constructor(needed: number, available: number) {
    super(`Unexpected end of input: needed ${needed} bytes, only ${available} available`, "UnexpectedEnd");
    this.name = "UnexpectedEndError";
    this.needed = needed;
    this.available = available;
  }
}

/**
 * Error thrown when bytes remain after the root value.
 */
export class TrailingCharactersError extends DecodeError {
  constructor(position: number, length: number) {
    super(`Trailing characters: decoded ${position} of ${length} bytes`, "TrailingCharacters");
    this.name = "TrailingCharactersError";
  }
}

/**
 * Error thrown when the next value does not have the requested shape.
 */
export class UnexpectedFormatError extends DecodeError {
  constructor(kind: ExpectedKind, message: string) {
    super(message, kind);
    this.name = "UnexpectedFormatError";
  }
}

/**
 * Error thrown when a decoded integer does not fit the requested width.
 */
export class IntegerOverflowError extends DecodeError {
  readonly value: bigint;
  readonly bits: number;

  constructor(value: bigint, bits: number, signed: boolean) {
    super(`${signed ? "integer" : "unsigned integer"} overflow: value = ${value}; bits = ${bits}`);
    this.name = "IntegerOverflowError";
    this.value = value;
    this.bits = bits;
  }
}

/**
 * Error thrown when a length prefix exceeds the configured maximum.
 */
export class LengthLimitExceededError extends DecodeError {
  constructor(length: number, limit: number) {
    super(`Length ${length} exceeds maximum allowed length ${limit}`);
    this.name = "LengthLimitExceededError";
  }
}
