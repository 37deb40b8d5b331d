import { LengthOverflowError } from "./errors";
import { LENGTH_PREFIX_SIZE, MAX_LENGTH } from "./types";

const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

/**
 * Writer appends valpack data to a growable binary buffer.
 * Fixed-width numbers are written little-endian.
 */
export class Writer {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity));
    this.view = new DataView(this.buffer.buffer);
    this.pos = 0;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Discards everything written after `position`.
   */
  truncate(position: number): void {
    if (position < 0 || position > this.pos) {
      throw new RangeError(`Cannot truncate to ${position}: writer is at ${this.pos}`);
    }
    this.pos = position;
  }

  /**
   * Ensures the buffer has at least the specified capacity.
   */
  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = this.buffer.length * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer.subarray(0, this.pos));
    this.buffer = newBuffer;
    this.view = new DataView(this.buffer.buffer);
  }

  /**
   * Writes a raw byte.
   */
  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value & 0xff;
  }

  /**
   * Writes raw bytes.
   */
  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }

  /**
   * Writes a fixed 32-bit unsigned value.
   */
  writeUint32(value: number): void {
    this.ensureCapacity(4);
    this.view.setUint32(this.pos, value, true);
    this.pos += 4;
  }

  /**
   * Writes a fixed 32-bit signed value.
   */
  writeInt32(value: number): void {
    this.ensureCapacity(4);
    this.view.setInt32(this.pos, value, true);
    this.pos += 4;
  }

  /**
   * Writes a fixed 64-bit signed value.
   */
  writeInt64(value: bigint): void {
    this.ensureCapacity(8);
    this.view.setBigInt64(this.pos, value, true);
    this.pos += 8;
  }

  /**
   * Writes a 32-bit float (IEEE 754).
   */
  writeFloat32(value: number): void {
    this.ensureCapacity(4);
    this.view.setFloat32(this.pos, value, true);
    this.pos += 4;
  }

  /**
   * Writes a 64-bit float (IEEE 754).
   */
  writeFloat64(value: number): void {
    this.ensureCapacity(8);
    this.view.setFloat64(this.pos, value, true);
    this.pos += 8;
  }

  /**
   * Writes a length or count prefix.
   * @throws LengthOverflowError if the length does not fit the prefix
   */
  writeLength(length: number): void {
    if (length > MAX_LENGTH) {
      throw new LengthOverflowError(length, MAX_LENGTH);
    }
    this.ensureCapacity(LENGTH_PREFIX_SIZE);
    this.view.setUint32(this.pos, length, true);
    this.pos += LENGTH_PREFIX_SIZE;
  }

  /**
   * Writes length-prefixed bytes.
   */
  writeLengthPrefixedBytes(data: Uint8Array): void {
    this.writeLength(data.length);
    this.writeBytes(data);
  }
}
