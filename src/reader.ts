import { LengthOverflowError, TruncationError } from "./errors";
import { LENGTH_PREFIX_SIZE, MAX_LENGTH } from "./types";

/**
 * Reader consumes valpack data from a binary buffer. Every read is checked
 * against the remaining length before it happens.
 */
export class Reader {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private end: number;

  constructor(data: Uint8Array) {
    this.buffer = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.pos = 0;
    this.end = data.length;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.end - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  /**
   * Checks if there are enough bytes available.
   */
  private checkAvailable(needed: number): void {
    if (needed > this.remaining) {
      throw new TruncationError(needed, this.remaining);
    }
  }

  /**
   * Reads a raw byte.
   */
  readByte(): number {
    this.checkAvailable(1);
    return this.buffer[this.pos++];
  }

  /**
   * Reads raw bytes. The result is a view into the source buffer, not a copy.
   */
  readBytes(length: number): Uint8Array {
    this.checkAvailable(length);
    const bytes = this.buffer.subarray(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  /**
   * Reads a fixed 32-bit unsigned value.
   */
  readUint32(): number {
    this.checkAvailable(4);
    const value = this.view.getUint32(this.pos, true);
    this.pos += 4;
    return value;
  }

  /**
   * Reads a fixed 32-bit signed value.
   */
  readInt32(): number {
    this.checkAvailable(4);
    const value = this.view.getInt32(this.pos, true);
    this.pos += 4;
    return value;
  }

  /**
   * Reads a fixed 64-bit signed value.
   */
  readInt64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigInt64(this.pos, true);
    this.pos += 8;
    return value;
  }

  /**
   * Reads a 32-bit float (IEEE 754).
   */
  readFloat32(): number {
    this.checkAvailable(4);
    const value = this.view.getFloat32(this.pos, true);
    this.pos += 4;
    return value;
  }

  /**
   * Reads a 64-bit float (IEEE 754).
   */
  readFloat64(): number {
    this.checkAvailable(8);
    const value = this.view.getFloat64(this.pos, true);
    this.pos += 8;
    return value;
  }

  /**
   * Reads a length or count prefix.
   * @throws LengthOverflowError if the declared length is above `max`
   */
  readLength(max: number = MAX_LENGTH): number {
    this.checkAvailable(LENGTH_PREFIX_SIZE);
    const length = this.view.getUint32(this.pos, true);
    if (length > max) {
      throw new LengthOverflowError(length, max);
    }
    this.pos += LENGTH_PREFIX_SIZE;
    return length;
  }

  /**
   * Reads length-prefixed bytes.
   */
  readLengthPrefixedBytes(max: number = MAX_LENGTH): Uint8Array {
    const length = this.readLength(max);
    return this.readBytes(length);
  }
}
