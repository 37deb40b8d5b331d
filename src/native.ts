/**
 * Conversions between plain JavaScript values and the valpack value model.
 *
 * These sit outside the wire contract: they decide which variant a native
 * value becomes before encoding, and how a decoded variant is presented
 * afterwards.
 */

import { ConstructionError, NestingDepthError } from "./errors";
import { DEFAULT_MAX_DEPTH, MaxInt64, MinInt64 } from "./types";
import type { EncodeOptions } from "./types";
import { Value, hashMap, none, opaque, sliceLike, vector } from "./value";

// Module-level singleton to avoid repeated instantiation
const textDecoder = new TextDecoder();

/**
 * Inert bytes produced and consumed by an external runtime, such as a
 * marshaled function body. valpack stores them without interpreting them.
 */
export class OpaquePayload {
  readonly bytes: Uint8Array;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes.slice();
  }
}

/**
 * Native values accepted by `fromNative`.
 */
export type NativeInput =
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | null
  | undefined
  | OpaquePayload
  | NativeInput[]
  | Map<NativeInput, NativeInput>
  | { readonly [key: string]: NativeInput };

/**
 * Native values produced by `toNative`.
 */
export type NativeOutput =
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | null
  | OpaquePayload
  | NativeOutput[]
  | Map<NativeOutput, NativeOutput>;

/**
 * Options for `toNative`.
 */
export interface ToNativeOptions {
  /** How I64 values are returned. Default: "number" */
  int64As?: "number" | "bigint";
  /** How slices are returned. Default: "string" (UTF-8, lossy) */
  bytesAs?: "string" | "bytes";
  /** Warn when an I64 does not fit a safe integer. Default: true */
  warnOnPrecisionLoss?: boolean;
}

function isPlainObject(x: object): x is { readonly [key: string]: NativeInput } {
  const proto: unknown = Object.getPrototypeOf(x);
  return proto === Object.prototype || proto === null;
}

/**
 * Maps a native value to the variant that represents it.
 *
 * Safe integers and bigints become I64, other numbers (and -0) F64. Strings and byte
 * arrays become owned slices, null and undefined an absent Optional. Arrays,
 * Maps and plain objects become Vectors and HashMaps in iteration order.
 *
 * @throws ConstructionError for values with no representation
 * @throws NestingDepthError if the input nests deeper than `maxDepth`, as a
 *   cyclic array, Map or object does
 */
export function fromNative(x: NativeInput, options: EncodeOptions = {}): Value {
  return fromNativeNode(x, 0, options.maxDepth ?? DEFAULT_MAX_DEPTH);
}

function fromNativeNode(x: NativeInput, depth: number, maxDepth: number): Value {
  if (depth > maxDepth) {
    throw new NestingDepthError(maxDepth);
  }
  if (x === null || x === undefined) {
    return none();
  }

  if (typeof x === "boolean") {
    return { kind: "bool", value: x };
  }
  if (typeof x === "bigint") {
    if (x < MinInt64 || x > MaxInt64) {
      throw new ConstructionError(`bigint ${x} is outside the 64-bit signed range`);
    }
    return { kind: "i64", value: x };
  }
  if (typeof x === "number") {
    return Number.isSafeInteger(x) && !Object.is(x, -0)
      ? { kind: "i64", value: BigInt(x) }
      : { kind: "f64", value: x };
  }
  if (typeof x === "string") {
    return sliceLike(x);
  }
  if (x instanceof Uint8Array) {
    return sliceLike(x);
  }
  if (x instanceof OpaquePayload) {
    return opaque(x.bytes);
  }
  if (Array.isArray(x)) {
    return vector(x.map((item) => fromNativeNode(item, depth + 1, maxDepth)));
  }
  if (x instanceof Map) {
    const entries: [Value, Value][] = [];
    for (const [key, val] of x) {
      entries.push([
        fromNativeNode(key, depth + 1, maxDepth),
        fromNativeNode(val, depth + 1, maxDepth),
      ]);
    }
    return hashMap(entries);
  }
  if (isPlainObject(x)) {
    return hashMap(
      Object.entries(x).map(([key, val]): [Value, Value] => [
        sliceLike(key),
        fromNativeNode(val, depth + 1, maxDepth),
      ])
    );
  }

  throw new ConstructionError(`Cannot represent ${Object.prototype.toString.call(x)}`);
}

function int64ToNative(value: bigint, options: ToNativeOptions): number | bigint {
  if (options.int64As === "bigint") {
    return value;
  }
  if (options.warnOnPrecisionLoss ?? true) {
    if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
      console.warn(
        `valpack: int64 value ${value} exceeds safe integer range ` +
          `(${Number.MIN_SAFE_INTEGER} to ${Number.MAX_SAFE_INTEGER}), ` +
          `precision may be lost. Use int64As: "bigint" for full precision.`
      );
    }
  }
  return Number(value);
}

/**
 * Maps a value back to plain JavaScript. HashMaps become Maps in wire order.
 */
export function toNative(value: Value, options: ToNativeOptions = {}): NativeOutput {
  switch (value.kind) {
    case "bool":
    case "i32":
    case "u8":
    case "smallU8":
    case "f32":
    case "f64":
      return value.value;
    case "i64":
      return int64ToNative(value.value, options);
    case "slice":
    case "sliceLike":
      return options.bytesAs === "bytes" ? value.bytes : textDecoder.decode(value.bytes);
    case "opaque":
      return new OpaquePayload(value.bytes);
    case "optional":
      return value.value === null ? null : toNative(value.value, options);
    case "vector":
      return value.items.map((item) => toNative(item, options));
    case "hashMap": {
      const map = new Map<NativeOutput, NativeOutput>();
      for (const [key, val] of value.entries) {
        map.set(toNative(key, options), toNative(val, options));
      }
      return map;
    }
  }
}
