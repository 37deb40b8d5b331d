/**
 * Tag bytes used in the valpack encoding format.
 *
 * Every encoded value starts with one tag byte. Bool and SmallU8 fold their
 * payload into the tag itself; all other variants follow the tag with a
 * fixed-width or length-prefixed payload.
 */
export enum Tag {
  /** 64-bit signed integer (8 bytes, little-endian) */
  I64 = 0x00,
  /** Length-prefixed bytes, shared by Slice and SliceLike */
  Slice = 0x01,
  /** Element count followed by each element */
  Vector = 0x02,
  /** Pair count followed by key, value for each pair */
  HashMap = 0x04,
  True = 0x06,
  False = 0x07,
  /** 64-bit float (IEEE 754, little-endian) */
  F64 = 0x08,
  /** Presence byte followed by the inner value if present */
  Optional = 0x09,
  /** 32-bit signed integer (4 bytes, little-endian) */
  I32 = 0x0b,
  /** 32-bit float (IEEE 754, little-endian) */
  F32 = 0x0c,
  /** Unsigned 8-bit integer (1 byte) */
  U8 = 0x0d,
  /** Length-prefixed bytes owned by an external runtime */
  Opaque = 0x0e,
}

/**
 * SmallU8 values are stored as a single byte: SMALL_U8_BASE + value.
 * Every byte from SMALL_U8_BASE up to 0xff is a SmallU8.
 */
export const SMALL_U8_BASE = 0x14;
export const SMALL_U8_MAX = 0xff - SMALL_U8_BASE; // 235

/**
 * Presence byte values for Optional.
 */
export const PRESENT = 0x01;
export const ABSENT = 0x00;

/**
 * Width of a length or count prefix, in bytes (unsigned 32-bit, little-endian).
 */
export const LENGTH_PREFIX_SIZE = 4;

/**
 * Largest length or count a prefix can carry.
 */
export const MAX_LENGTH = 0xffffffff;

/**
 * Default limit on how deeply values may nest.
 */
export const DEFAULT_MAX_DEPTH = 512;

/**
 * Integer bounds for the fixed-width numeric variants.
 */
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1
export const MinInt32 = -0x80000000;
export const MaxInt32 = 0x7fffffff;
export const MaxUint8 = 0xff;

/**
 * Returns true if the byte is a folded SmallU8.
 */
export function isSmallU8Tag(tag: number): boolean {
  return tag >= SMALL_U8_BASE && tag <= 0xff;
}

/**
 * Options accepted by the encoder.
 */
export interface EncodeOptions {
  /** Maximum nesting depth. Default: 512 */
  maxDepth?: number;
}

/**
 * Options accepted by the decoder.
 */
export interface DecodeOptions {
  /** Maximum nesting depth. Default: 512 */
  maxDepth?: number;
  /** Largest length or count accepted from a prefix. Default: 0xffffffff */
  maxLength?: number;
  /** Accept bytes after the top-level value. Default: false */
  allowTrailingBytes?: boolean;
}
