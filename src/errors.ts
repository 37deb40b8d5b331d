/**
 * Base error class for valpack errors.
 */
export class ValpackError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValpackError";
  }
}

/**
 * Error thrown when a value is built outside its legal domain.
 */
export class ConstructionError extends ValpackError {
  constructor(message: string) {
    super(message);
    this.name = "ConstructionError";
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends ValpackError {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends ValpackError {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when the buffer ends before a declared payload is complete.
 */
export class TruncationError extends DecodeError {
  constructor(needed: number, available: number) {
    super(`Truncated input: needed ${needed} bytes, only ${available} available`);
    this.name = "TruncationError";
  }
}

/**
 * Error thrown when a tag byte matches no variant.
 */
export class UnknownVariantError extends DecodeError {
  readonly tag: number;

  constructor(tag: number) {
    super(`Unknown variant tag: 0x${tag.toString(16).padStart(2, "0")}`);
    this.name = "UnknownVariantError";
    this.tag = tag;
  }
}

/**
 * Error thrown when bytes remain after a complete value.
 */
export class TrailingBytesError extends DecodeError {
  constructor(remaining: number) {
    super(`Trailing bytes: ${remaining} bytes left after value`);
    this.name = "TrailingBytesError";
  }
}

/**
 * Error thrown when a length or count exceeds what the format can carry.
 */
export class LengthOverflowError extends ValpackError {
  constructor(length: number, max: number) {
    super(`Length overflow: ${length} exceeds maximum of ${max}`);
    this.name = "LengthOverflowError";
  }
}

/**
 * Error thrown when values nest deeper than the configured limit.
 */
export class NestingDepthError extends ValpackError {
  constructor(maxDepth: number) {
    super(`Nesting depth exceeded: limit is ${maxDepth}`);
    this.name = "NestingDepthError";
  }
}
