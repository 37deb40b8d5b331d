import { ConstructionError } from "./errors";
import { MaxInt32, MaxInt64, MaxUint8, MinInt32, MinInt64, SMALL_U8_MAX } from "./types";

// Module-level singletons to avoid repeated instantiation
const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

export interface I64Value {
  readonly kind: "i64";
  readonly value: bigint;
}

export interface I32Value {
  readonly kind: "i32";
  readonly value: number;
}

export interface U8Value {
  readonly kind: "u8";
  readonly value: number;
}

/**
 * Unsigned integer in [0, 235], encoded as one byte with no separate tag.
 */
export interface SmallU8Value {
  readonly kind: "smallU8";
  readonly value: number;
}

export interface F32Value {
  readonly kind: "f32";
  readonly value: number;
}

export interface F64Value {
  readonly kind: "f64";
  readonly value: number;
}

export interface BoolValue {
  readonly kind: "bool";
  readonly value: boolean;
}

/**
 * Borrowed byte range. Values produced by the decoder are views into the
 * decoded buffer, which must stay untouched while they are in use.
 */
export interface SliceValue {
  readonly kind: "slice";
  readonly bytes: Uint8Array;
}

/**
 * Owned byte buffer. Encodes exactly like a slice and is never produced by
 * the decoder.
 */
export interface SliceLikeValue {
  readonly kind: "sliceLike";
  readonly bytes: Uint8Array;
}

export interface OptionalValue {
  readonly kind: "optional";
  readonly value: Value | null;
}

export interface VectorValue {
  readonly kind: "vector";
  readonly items: readonly Value[];
}

/**
 * Key-value pairs kept in insertion order. Keys are not hashed or sorted.
 */
export interface HashMapValue {
  readonly kind: "hashMap";
  readonly entries: readonly (readonly [Value, Value])[];
}

/**
 * Bytes owned by an external runtime, stored and returned verbatim.
 */
export interface OpaqueValue {
  readonly kind: "opaque";
  readonly bytes: Uint8Array;
}

/**
 * Every shape the format can represent.
 */
export type Value =
  | I64Value
  | I32Value
  | U8Value
  | SmallU8Value
  | F32Value
  | F64Value
  | BoolValue
  | SliceValue
  | SliceLikeValue
  | OptionalValue
  | VectorValue
  | HashMapValue
  | OpaqueValue;

export type ValueKind = Value["kind"];

function isIntegerIn(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

/**
 * Checks that a value's own payload is inside its variant's domain.
 * Children of composites are not visited.
 *
 * @throws ConstructionError if the payload is out of range or of the wrong type
 */
export function validateScalar(value: Value): void {
  switch (value.kind) {
    case "i64":
      if (typeof value.value !== "bigint" || value.value < MinInt64 || value.value > MaxInt64) {
        throw new ConstructionError(
          `I64 value ${String(value.value)} is outside [${MinInt64}, ${MaxInt64}]`
        );
      }
      return;
    case "i32":
      if (!isIntegerIn(value.value, MinInt32, MaxInt32)) {
        throw new ConstructionError(
          `I32 value ${value.value} is not an integer in [${MinInt32}, ${MaxInt32}]`
        );
      }
      return;
    case "u8":
      if (!isIntegerIn(value.value, 0, MaxUint8)) {
        throw new ConstructionError(`U8 value ${value.value} is not an integer in [0, ${MaxUint8}]`);
      }
      return;
    case "smallU8":
      if (!isIntegerIn(value.value, 0, SMALL_U8_MAX)) {
        throw new ConstructionError(
          `SmallU8 value ${value.value} is not an integer in [0, ${SMALL_U8_MAX}]`
        );
      }
      return;
    case "f32":
      if (typeof value.value !== "number") {
        throw new ConstructionError("Float value must be a number");
      }
      if (Number.isFinite(value.value) && !Number.isFinite(Math.fround(value.value))) {
        throw new ConstructionError(`F32 value ${value.value} is outside single-precision range`);
      }
      return;
    case "f64":
      if (typeof value.value !== "number") {
        throw new ConstructionError("Float value must be a number");
      }
      return;
    case "bool":
      if (typeof value.value !== "boolean") {
        throw new ConstructionError("Bool value must be a boolean");
      }
      return;
    case "slice":
    case "sliceLike":
    case "opaque":
      if (!(value.bytes instanceof Uint8Array)) {
        throw new ConstructionError("Byte payload must be a Uint8Array");
      }
      return;
    case "optional":
    case "vector":
    case "hashMap":
      return;
  }
}

function checked<T extends Value>(value: T): T {
  validateScalar(value);
  return value;
}

/**
 * Creates an I64. Numbers must be safe integers.
 */
export function i64(value: bigint | number): I64Value {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new ConstructionError(`I64 value ${value} is not a safe integer; pass a bigint`);
    }
    return { kind: "i64", value: BigInt(value) };
  }
  return checked({ kind: "i64", value });
}

export function i32(value: number): I32Value {
  return checked({ kind: "i32", value });
}

export function u8(value: number): U8Value {
  return checked({ kind: "u8", value });
}

export function smallU8(value: number): SmallU8Value {
  return checked({ kind: "smallU8", value });
}

/**
 * Creates an F32 holding the value rounded to single precision.
 */
export function f32(value: number): F32Value {
  checked({ kind: "f32", value });
  return { kind: "f32", value: Math.fround(value) };
}

export function f64(value: number): F64Value {
  return checked({ kind: "f64", value });
}

export function bool(value: boolean): BoolValue {
  return { kind: "bool", value };
}

/**
 * Wraps a byte range without copying it. A string is stored as its UTF-8 bytes.
 */
export function slice(bytes: Uint8Array | string): SliceValue {
  return { kind: "slice", bytes: typeof bytes === "string" ? textEncoder.encode(bytes) : bytes };
}

/**
 * Creates an owned copy of the given bytes.
 */
export function sliceLike(bytes: Uint8Array | string): SliceLikeValue {
  return {
    kind: "sliceLike",
    bytes: typeof bytes === "string" ? textEncoder.encode(bytes) : bytes.slice(),
  };
}

export function optional(value: Value | null): OptionalValue {
  return { kind: "optional", value };
}

export function none(): OptionalValue {
  return { kind: "optional", value: null };
}

export function vector(items: readonly Value[]): VectorValue {
  return { kind: "vector", items };
}

/**
 * Creates a mapping from pairs, keeping their order.
 */
export function hashMap(entries: readonly (readonly [Value, Value])[]): HashMapValue {
  return { kind: "hashMap", entries };
}

/**
 * Creates an opaque payload holding a copy of the given bytes.
 */
export function opaque(bytes: Uint8Array): OpaqueValue {
  return { kind: "opaque", bytes: bytes.slice() };
}

export function asI64(value: Value): bigint | undefined {
  return value.kind === "i64" ? value.value : undefined;
}

export function asI32(value: Value): number | undefined {
  return value.kind === "i32" ? value.value : undefined;
}

export function asF64(value: Value): number | undefined {
  return value.kind === "f64" ? value.value : undefined;
}

export function asF32(value: Value): number | undefined {
  return value.kind === "f32" ? value.value : undefined;
}

export function asBool(value: Value): boolean | undefined {
  return value.kind === "bool" ? value.value : undefined;
}

/**
 * Reads either unsigned 8-bit variant.
 */
export function asU8(value: Value): number | undefined {
  return value.kind === "u8" || value.kind === "smallU8" ? value.value : undefined;
}

/**
 * Reads the bytes of a slice or a sliceLike.
 */
export function asBytes(value: Value): Uint8Array | undefined {
  return value.kind === "slice" || value.kind === "sliceLike" ? value.bytes : undefined;
}

/**
 * Decodes the bytes of a slice or sliceLike as UTF-8.
 */
export function asString(value: Value): string | undefined {
  const bytes = asBytes(value);
  return bytes === undefined ? undefined : textDecoder.decode(bytes);
}

/**
 * Returns the inner value of an optional, or null when it is absent.
 */
export function asOptional(value: Value): Value | null | undefined {
  return value.kind === "optional" ? value.value : undefined;
}

export function asVector(value: Value): readonly Value[] | undefined {
  return value.kind === "vector" ? value.items : undefined;
}

export function asHashMap(value: Value): readonly (readonly [Value, Value])[] | undefined {
  return value.kind === "hashMap" ? value.entries : undefined;
}

export function asOpaque(value: Value): Uint8Array | undefined {
  return value.kind === "opaque" ? value.bytes : undefined;
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Structural equality that also requires matching variants.
 * NaN equals NaN; F32 payloads compare at single precision.
 */
export function valueEquals(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "i64":
    case "i32":
    case "u8":
    case "smallU8":
    case "bool":
      return b.kind === a.kind && b.value === a.value;
    case "f64":
      return b.kind === "f64" && Object.is(a.value, b.value);
    case "f32":
      return b.kind === "f32" && Object.is(Math.fround(a.value), Math.fround(b.value));
    case "slice":
    case "sliceLike":
    case "opaque":
      return b.kind === a.kind && bytesEqual(a.bytes, b.bytes);
    case "optional":
      if (b.kind !== "optional") {
        return false;
      }
      if (a.value === null || b.value === null) {
        return a.value === b.value;
      }
      return valueEquals(a.value, b.value);
    case "vector":
      return (
        b.kind === "vector" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => valueEquals(item, b.items[i]))
      );
    case "hashMap":
      return (
        b.kind === "hashMap" &&
        a.entries.length === b.entries.length &&
        a.entries.every(
          ([key, val], i) => valueEquals(key, b.entries[i][0]) && valueEquals(val, b.entries[i][1])
        )
      );
  }
}

/**
 * Finds the value stored under the first key equal to `key`.
 */
export function getEntry(map: HashMapValue, key: Value): Value | undefined {
  for (const [k, v] of map.entries) {
    if (valueEquals(k, key)) {
      return v;
    }
  }
  return undefined;
}
