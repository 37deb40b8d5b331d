/**
 * End-to-end tests through the public API: serialize, deserialize and the
 * native convenience pair.
 */

import { describe, it, expect } from 'vitest';
import {
  ConstructionError,
  OpaquePayload,
  TrailingBytesError,
  TruncationError,
  UnknownVariantError,
  Value,
  asBytes,
  asString,
  bool,
  deserialize,
  deserializeMany,
  deserializeNative,
  f32,
  f64,
  getEntry,
  hashMap,
  i32,
  i64,
  none,
  opaque,
  optional,
  serialize,
  serializeNative,
  slice,
  sliceLike,
  smallU8,
  u8,
  valueEquals,
  vector,
} from '../../src';

const nested = hashMap([[slice('k'), optional(vector([i64(1n), bool(false)]))]]);

const composites: Value[] = [
  nested,
  vector([u8(1), slice('two'), f32(3.5)]),
  hashMap([
    [slice('a'), i32(1)],
    [slice('b'), none()],
  ]),
  optional(vector([hashMap([[smallU8(4), f64(0.25)]])])),
  vector([opaque(new Uint8Array([0xca, 0xfe]))]),
];

describe('round trip', () => {
  it('reproduces every composite fixture', () => {
    for (const value of composites) {
      expect(valueEquals(deserialize(serialize(value)), value)).toBe(true);
    }
  });

  it('keeps the single pair and inner order of a nested map', () => {
    const decoded = deserialize(serialize(nested));
    expect(decoded.kind).toBe('hashMap');
    if (decoded.kind !== 'hashMap') {
      return;
    }
    expect(decoded.entries.length).toBe(1);
    expect(asString(decoded.entries[0][0])).toBe('k');
    expect(getEntry(decoded, slice('k'))).toEqual({
      kind: 'optional',
      value: {
        kind: 'vector',
        items: [
          { kind: 'i64', value: 1n },
          { kind: 'bool', value: false },
        ],
      },
    });
  });

  it('keeps map insertion order', () => {
    const value = hashMap([
      [slice('c'), u8(3)],
      [slice('a'), u8(1)],
      [slice('b'), u8(2)],
    ]);
    const decoded = deserialize(serialize(value));
    if (decoded.kind !== 'hashMap') {
      throw new Error(`expected hashMap, got ${decoded.kind}`);
    }
    expect(decoded.entries.map(([key]) => asString(key))).toEqual(['c', 'a', 'b']);
  });

  it('returns an f32 structurally equal to the one encoded', () => {
    const value = f32(0.1);
    expect(deserialize(serialize(value))).toEqual(value);
  });

  it('refuses to encode an f32 that would overflow to infinity', () => {
    expect(() => f32(1e39)).toThrow(ConstructionError);
    expect(() => serialize({ kind: 'f32', value: 1e39 })).toThrow(ConstructionError);
  });

  it('encodes empty composites as tag and zero count', () => {
    expect(serialize(vector([]))).toEqual(new Uint8Array([0x02, 0, 0, 0, 0]));
    expect(serialize(hashMap([]))).toEqual(new Uint8Array([0x04, 0, 0, 0, 0]));
    expect(deserialize(serialize(vector([])))).toEqual({ kind: 'vector', items: [] });
    expect(deserialize(serialize(hashMap([])))).toEqual({ kind: 'hashMap', entries: [] });
  });
});

describe('slice and sliceLike', () => {
  it('share one encoding', () => {
    const content = new Uint8Array([0, 1, 2, 0xff]);
    expect(serialize(sliceLike(content))).toEqual(serialize(slice(content)));
  });

  it('always decode to slice', () => {
    for (const value of [slice('x'), sliceLike('x')]) {
      const decoded = deserialize(serialize(value));
      expect(decoded.kind).toBe('slice');
      expect(asBytes(decoded)).toEqual(new Uint8Array([0x78]));
    }
  });
});

describe('SmallU8 bound', () => {
  it('round-trips the largest legal value', () => {
    expect(serialize(smallU8(235))).toEqual(new Uint8Array([0xff]));
    expect(deserialize(new Uint8Array([0xff]))).toEqual({ kind: 'smallU8', value: 235 });
  });

  it('rejects one past the bound', () => {
    expect(() => smallU8(236)).toThrow(ConstructionError);
    expect(() => serialize({ kind: 'smallU8', value: 236 })).toThrow(ConstructionError);
  });
});

describe('malformed input', () => {
  it('detects every truncation of a composite', () => {
    for (const value of composites) {
      const data = serialize(value);
      for (let cut = 1; cut <= data.length; cut++) {
        expect(() => deserialize(data.subarray(0, data.length - cut))).toThrow(TruncationError);
      }
    }
  });

  it('rejects an unknown leading tag', () => {
    expect(() => deserialize(new Uint8Array([0x05, 0x06]))).toThrow(UnknownVariantError);
  });

  it('rejects trailing bytes unless allowed', () => {
    const data = new Uint8Array([0x06, 0x07]);
    expect(() => deserialize(data)).toThrow(TrailingBytesError);
    expect(() => deserialize(data)).toThrow('Trailing bytes: 1 bytes left after value');
    expect(deserialize(data, { allowTrailingBytes: true })).toEqual(bool(true));
  });
});

describe('deserializeMany', () => {
  it('decodes back-to-back values', () => {
    const data = new Uint8Array([...serialize(i32(7)), ...serialize(vector([bool(false)])), 0x14]);
    expect(deserializeMany(data)).toEqual([
      { kind: 'i32', value: 7 },
      { kind: 'vector', items: [{ kind: 'bool', value: false }] },
      { kind: 'smallU8', value: 0 },
    ]);
  });

  it('returns nothing for an empty buffer', () => {
    expect(deserializeMany(new Uint8Array([]))).toEqual([]);
  });
});

describe('native convenience', () => {
  it('encodes a string as a slice', () => {
    expect(serializeNative('hi')).toEqual(new Uint8Array([0x01, 2, 0, 0, 0, 0x68, 0x69]));
  });

  it('round-trips plain values', () => {
    const decoded = deserializeNative(serializeNative({ name: 'widget', sizes: [1, 2.5], note: null }));
    expect(decoded).toEqual(
      new Map<string, unknown>([
        ['name', 'widget'],
        ['sizes', [1, 2.5]],
        ['note', null],
      ])
    );
  });

  it('passes opaque payloads through untouched', () => {
    const body = new Uint8Array([0xe3, 0x00, 0x01, 0x7f]);
    const marshaled = serializeNative([new OpaquePayload(body), 'add', [1]]);
    const decoded = deserializeNative(marshaled);
    expect(Array.isArray(decoded)).toBe(true);
    if (Array.isArray(decoded)) {
      expect(decoded[0]).toBeInstanceOf(OpaquePayload);
      expect(decoded[0]).toEqual(new OpaquePayload(body));
      expect(decoded.slice(1)).toEqual(['add', [1]]);
    }
  });

  it('returns bytes when asked', () => {
    expect(deserializeNative(serializeNative('ok'), { bytesAs: 'bytes' })).toEqual(
      new Uint8Array([0x6f, 0x6b])
    );
  });
});
