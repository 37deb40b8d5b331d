import {
  DecodeError,
  EncodeError,
  LengthOverflowError,
  NestingDepthError,
  TruncationError,
  UnknownVariantError,
} from "./errors";
import { Reader } from "./reader";
import {
  ABSENT,
  DEFAULT_MAX_DEPTH,
  LENGTH_PREFIX_SIZE,
  MAX_LENGTH,
  PRESENT,
  SMALL_U8_BASE,
  Tag,
  isSmallU8Tag,
} from "./types";
import type { DecodeOptions, EncodeOptions } from "./types";
import { validateScalar } from "./value";
import type { Value } from "./value";
import { Writer } from "./writer";

interface DecodeLimits {
  maxDepth: number;
  maxLength: number;
}

/**
 * Encodes a value tree depth-first into `writer`.
 *
 * On failure the writer is rolled back to where it was when this call
 * started, so no partial value is left behind.
 *
 * @throws ConstructionError if a scalar is outside its domain
 * @throws LengthOverflowError if a slice or composite is too long for its prefix
 * @throws NestingDepthError if the tree nests deeper than `maxDepth`
 */
export function encodeValue(writer: Writer, value: Value, options: EncodeOptions = {}): void {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const start = writer.position;
  try {
    encodeNode(writer, value, 0, maxDepth);
  } catch (err) {
    writer.truncate(start);
    throw err;
  }
}

function encodeNode(writer: Writer, value: Value, depth: number, maxDepth: number): void {
  if (depth > maxDepth) {
    throw new NestingDepthError(maxDepth);
  }
  validateScalar(value);

  const kind: string = value.kind;
  switch (value.kind) {
    case "i64":
      writer.writeByte(Tag.I64);
      writer.writeInt64(value.value);
      return;
    case "i32":
      writer.writeByte(Tag.I32);
      writer.writeInt32(value.value);
      return;
    case "u8":
      writer.writeByte(Tag.U8);
      writer.writeByte(value.value);
      return;
    case "smallU8":
      writer.writeByte(SMALL_U8_BASE + value.value);
      return;
    case "f32":
      writer.writeByte(Tag.F32);
      writer.writeFloat32(value.value);
      return;
    case "f64":
      writer.writeByte(Tag.F64);
      writer.writeFloat64(value.value);
      return;
    case "bool":
      writer.writeByte(value.value ? Tag.True : Tag.False);
      return;
    case "slice":
    case "sliceLike":
      writer.writeByte(Tag.Slice);
      writer.writeLengthPrefixedBytes(value.bytes);
      return;
    case "opaque":
      writer.writeByte(Tag.Opaque);
      writer.writeLengthPrefixedBytes(value.bytes);
      return;
    case "optional":
      writer.writeByte(Tag.Optional);
      if (value.value === null) {
        writer.writeByte(ABSENT);
        return;
      }
      writer.writeByte(PRESENT);
      encodeNode(writer, value.value, depth + 1, maxDepth);
      return;
    case "vector":
      writer.writeByte(Tag.Vector);
      writer.writeLength(value.items.length);
      for (const item of value.items) {
        encodeNode(writer, item, depth + 1, maxDepth);
      }
      return;
    case "hashMap":
      writer.writeByte(Tag.HashMap);
      writer.writeLength(value.entries.length);
      for (const [key, val] of value.entries) {
        encodeNode(writer, key, depth + 1, maxDepth);
        encodeNode(writer, val, depth + 1, maxDepth);
      }
      return;
    default:
      throw new EncodeError(`Unknown value kind: ${kind}`);
  }
}

/**
 * Returns the number of bytes `encodeValue` would append for `value`.
 * Applies the same validation as the encoder.
 */
export function encodedSize(value: Value, options: EncodeOptions = {}): number {
  return sizeNode(value, 0, options.maxDepth ?? DEFAULT_MAX_DEPTH);
}

function lengthPrefixed(length: number): number {
  if (length > MAX_LENGTH) {
    throw new LengthOverflowError(length, MAX_LENGTH);
  }
  return 1 + LENGTH_PREFIX_SIZE + length;
}

function sizeNode(value: Value, depth: number, maxDepth: number): number {
  if (depth > maxDepth) {
    throw new NestingDepthError(maxDepth);
  }
  validateScalar(value);

  const kind: string = value.kind;
  switch (value.kind) {
    case "smallU8":
    case "bool":
      return 1;
    case "u8":
      return 2;
    case "i32":
    case "f32":
      return 5;
    case "i64":
    case "f64":
      return 9;
    case "slice":
    case "sliceLike":
    case "opaque":
      return lengthPrefixed(value.bytes.length);
    case "optional":
      return value.value === null ? 2 : 2 + sizeNode(value.value, depth + 1, maxDepth);
    case "vector": {
      let size = lengthPrefixed(0);
      for (const item of value.items) {
        size += sizeNode(item, depth + 1, maxDepth);
      }
      return size;
    }
    case "hashMap": {
      let size = lengthPrefixed(0);
      for (const [key, val] of value.entries) {
        size += sizeNode(key, depth + 1, maxDepth) + sizeNode(val, depth + 1, maxDepth);
      }
      return size;
    }
    default:
      throw new EncodeError(`Unknown value kind: ${kind}`);
  }
}

/**
 * Decodes one complete value starting at the reader's position and leaves the
 * reader just past it. Slices in the result are views into the reader's
 * buffer. After a failure the reader's position is unspecified.
 *
 * @throws TruncationError if the buffer ends inside the value
 * @throws UnknownVariantError if a tag byte matches no variant
 * @throws LengthOverflowError if a length prefix exceeds `maxLength`
 * @throws NestingDepthError if the data nests deeper than `maxDepth`
 */
export function decodeValue(reader: Reader, options: DecodeOptions = {}): Value {
  const limits: DecodeLimits = {
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    maxLength: options.maxLength ?? MAX_LENGTH,
  };
  return decodeNode(reader, 0, limits);
}

function decodeNode(reader: Reader, depth: number, limits: DecodeLimits): Value {
  if (depth > limits.maxDepth) {
    throw new NestingDepthError(limits.maxDepth);
  }

  const tag = reader.readByte();
  if (isSmallU8Tag(tag)) {
    return { kind: "smallU8", value: tag - SMALL_U8_BASE };
  }

  switch (tag) {
    case Tag.I64:
      return { kind: "i64", value: reader.readInt64() };
    case Tag.I32:
      return { kind: "i32", value: reader.readInt32() };
    case Tag.U8:
      return { kind: "u8", value: reader.readByte() };
    case Tag.F32:
      return { kind: "f32", value: reader.readFloat32() };
    case Tag.F64:
      return { kind: "f64", value: reader.readFloat64() };
    case Tag.True:
      return { kind: "bool", value: true };
    case Tag.False:
      return { kind: "bool", value: false };
    case Tag.Slice:
      return { kind: "slice", bytes: reader.readLengthPrefixedBytes(limits.maxLength) };
    case Tag.Opaque:
      return { kind: "opaque", bytes: reader.readLengthPrefixedBytes(limits.maxLength).slice() };
    case Tag.Optional: {
      const presence = reader.readByte();
      if (presence === ABSENT) {
        return { kind: "optional", value: null };
      }
      if (presence !== PRESENT) {
        throw new DecodeError(`Invalid presence byte: 0x${presence.toString(16).padStart(2, "0")}`);
      }
      return { kind: "optional", value: decodeNode(reader, depth + 1, limits) };
    }
    case Tag.Vector: {
      const count = reader.readLength(limits.maxLength);
      // Every element takes at least one byte.
      if (count > reader.remaining) {
        throw new TruncationError(count, reader.remaining);
      }
      const items: Value[] = [];
      for (let i = 0; i < count; i++) {
        items.push(decodeNode(reader, depth + 1, limits));
      }
      return { kind: "vector", items };
    }
    case Tag.HashMap: {
      const count = reader.readLength(limits.maxLength);
      if (count * 2 > reader.remaining) {
        throw new TruncationError(count * 2, reader.remaining);
      }
      const entries: [Value, Value][] = [];
      for (let i = 0; i < count; i++) {
        const key = decodeNode(reader, depth + 1, limits);
        const val = decodeNode(reader, depth + 1, limits);
        entries.push([key, val]);
      }
      return { kind: "hashMap", entries };
    }
    default:
      throw new UnknownVariantError(tag);
  }
}
