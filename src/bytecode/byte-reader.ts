/**
 * Bounds-checked big-endian cursor over a byte array.
 *
 * @module bytecode/byte-reader
 */

import { BytecodeFormatError } from '../errors.js';

const decoder = new TextDecoder('utf-8', { fatal: true });

export class ByteReader {
  offset: number;

  constructor(
    private readonly data: Uint8Array,
    offset = 0,
  ) {
    this.offset = offset;
  }

  get length(): number {
    return this.data.length;
  }

  readByte(): number {
    this.ensure(1);
    return this.data[this.offset++];
  }

  readShort(): number {
    this.ensure(2);
    const value = (this.data[this.offset] << 8) | this.data[this.offset + 1];
    this.offset += 2;
    return value;
  }

  /** Signed 32-bit */
  readInt(): number {
    this.ensure(4);
    const d = this.data;
    const o = this.offset;
    const value = (d[o] << 24) | (d[o + 1] << 16) | (d[o + 2] << 8) | d[o + 3];
    this.offset += 4;
    return value;
  }

  readUtf(): string {
    const length = this.readShort();
    this.ensure(length);
    const start = this.offset;
    this.offset += length;
    try {
      return decoder.decode(this.data.subarray(start, start + length));
    } catch (err) {
      throw new BytecodeFormatError(`Invalid UTF-8 string at offset ${start}`, { cause: err });
    }
  }

  private ensure(count: number): void {
    if (this.offset < 0 || this.offset + count > this.data.length) {
      throw new BytecodeFormatError(
        `Unexpected end of bytecode: need ${count} bytes at offset ${this.offset}, have ${this.data.length - this.offset}`,
      );
    }
  }
}
