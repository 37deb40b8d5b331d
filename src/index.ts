/**
 * valpack - compact self-describing binary serialization for TypeScript
 *
 * Encodes a small closed set of value shapes (fixed-width numbers, byte
 * slices, optionals, vectors and insertion-ordered maps) into one contiguous
 * buffer, and decodes it back without any schema.
 *
 * @example
 * ```typescript
 * import { serialize, deserialize, hashMap, slice, i64, getEntry } from 'valpack';
 *
 * // Encoding
 * const data = serialize(hashMap([[slice("count"), i64(42n)]]));
 *
 * // Decoding
 * const value = deserialize(data);
 * if (value.kind === "hashMap") {
 *   getEntry(value, slice("count")); // { kind: "i64", value: 42n }
 * }
 * ```
 */

// Wire constants and options
export {
  Tag,
  SMALL_U8_BASE,
  SMALL_U8_MAX,
  PRESENT,
  ABSENT,
  LENGTH_PREFIX_SIZE,
  MAX_LENGTH,
  DEFAULT_MAX_DEPTH,
  MinInt64,
  MaxInt64,
  MinInt32,
  MaxInt32,
  MaxUint8,
  isSmallU8Tag,
} from "./types";
export type { EncodeOptions, DecodeOptions } from "./types";

// Errors
export {
  ValpackError,
  ConstructionError,
  EncodeError,
  DecodeError,
  TruncationError,
  UnknownVariantError,
  TrailingBytesError,
  LengthOverflowError,
  NestingDepthError,
} from "./errors";

// Value model
export {
  i64,
  i32,
  u8,
  smallU8,
  f32,
  f64,
  bool,
  slice,
  sliceLike,
  optional,
  none,
  vector,
  hashMap,
  opaque,
  asI64,
  asI32,
  asF64,
  asF32,
  asBool,
  asU8,
  asBytes,
  asString,
  asOptional,
  asVector,
  asHashMap,
  asOpaque,
  validateScalar,
  valueEquals,
  getEntry,
} from "./value";
export type {
  Value,
  ValueKind,
  I64Value,
  I32Value,
  U8Value,
  SmallU8Value,
  F32Value,
  F64Value,
  BoolValue,
  SliceValue,
  SliceLikeValue,
  OptionalValue,
  VectorValue,
  HashMapValue,
  OpaqueValue,
} from "./value";

// Native conversion
export { OpaquePayload, fromNative, toNative } from "./native";
export type { NativeInput, NativeOutput, ToNativeOptions } from "./native";

// Codec
export { encodeValue, decodeValue, encodedSize } from "./codec";

// Writer
import { Writer } from "./writer";
export { Writer };

// Reader
import { Reader } from "./reader";
export { Reader };

import { decodeValue, encodeValue, encodedSize } from "./codec";
import { TrailingBytesError } from "./errors";
import { fromNative, toNative } from "./native";
import type { NativeInput, NativeOutput, ToNativeOptions } from "./native";
import type { DecodeOptions, EncodeOptions } from "./types";
import type { Value } from "./value";

/**
 * Library version.
 */
export const VERSION = "0.1.0";

/**
 * Serialize encodes one value into a new, exactly-sized buffer.
 */
export function serialize(value: Value, options: EncodeOptions = {}): Uint8Array {
  const writer = new Writer(encodedSize(value, options));
  encodeValue(writer, value, options);
  return writer.bytes();
}

/**
 * Deserialize decodes one value that must span the whole buffer, unless
 * `allowTrailingBytes` is set. Slices in the result borrow from `data`.
 */
export function deserialize(data: Uint8Array, options: DecodeOptions = {}): Value {
  const reader = new Reader(data);
  const value = decodeValue(reader, options);
  if (!options.allowTrailingBytes && reader.hasMore) {
    throw new TrailingBytesError(reader.remaining);
  }
  return value;
}

/**
 * DeserializeMany decodes back-to-back values until the buffer is used up.
 */
export function deserializeMany(data: Uint8Array, options: DecodeOptions = {}): Value[] {
  const reader = new Reader(data);
  const values: Value[] = [];
  while (reader.hasMore) {
    values.push(decodeValue(reader, options));
  }
  return values;
}

/**
 * SerializeNative converts a plain JavaScript value with `fromNative` and
 * serializes the result.
 */
export function serializeNative(x: NativeInput, options: EncodeOptions = {}): Uint8Array {
  return serialize(fromNative(x, options), options);
}

/**
 * DeserializeNative deserializes a value and converts it with `toNative`.
 */
export function deserializeNative(
  data: Uint8Array,
  options: DecodeOptions & ToNativeOptions = {}
): NativeOutput {
  return toNative(deserialize(data, options), options);
}
