/**
 * Growable big-endian byte sink with back-patching.
 *
 * @module bytecode/byte-buffer
 */

import { MAX_UTF_LENGTH } from './format.js';

const encoder = new TextEncoder();

export class ByteBuffer {
  private bytes: Uint8Array;
  private length = 0;

  constructor(initialCapacity = 256) {
    this.bytes = new Uint8Array(Math.max(initialCapacity, 16));
  }

  get size(): number {
    return this.length;
  }

  writeByte(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new RangeError(`Byte value out of range: ${value}`);
    }
    this.ensureCapacity(1);
    this.bytes[this.length++] = value;
  }

  writeShort(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
      throw new RangeError(`Short value out of range: ${value}`);
    }
    this.ensureCapacity(2);
    this.bytes[this.length++] = (value >> 8) & 0xff;
    this.bytes[this.length++] = value & 0xff;
  }

  writeInt(value: number): void {
    if (!Number.isInteger(value) || value < -0x80000000 || value > 0x7fffffff) {
      throw new RangeError(`Int value out of range: ${value}`);
    }
    this.ensureCapacity(4);
    this.setInt(this.length, value);
    this.length += 4;
  }

  /** 2-byte length prefix followed by UTF-8 bytes */
  writeUtf(value: string): void {
    const encoded = encoder.encode(value);
    if (encoded.length > MAX_UTF_LENGTH) {
      throw new RangeError(`String too long to encode (${encoded.length} bytes)`);
    }
    this.writeShort(encoded.length);
    this.writeBytes(encoded);
  }

  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.bytes.set(data, this.length);
    this.length += data.length;
  }

  patchShort(position: number, value: number): void {
    if (position < 0 || position + 2 > this.length) {
      throw new RangeError(`Patch position ${position} outside buffer of ${this.length} bytes`);
    }
    if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
      throw new RangeError(`Short value out of range: ${value}`);
    }
    this.bytes[position] = (value >> 8) & 0xff;
    this.bytes[position + 1] = value & 0xff;
  }

  patchInt(position: number, value: number): void {
    if (position < 0 || position + 4 > this.length) {
      throw new RangeError(`Patch position ${position} outside buffer of ${this.length} bytes`);
    }
    this.setInt(position, value);
  }

  toUint8Array(): Uint8Array {
    return this.bytes.slice(0, this.length);
  }

  private setInt(position: number, value: number): void {
    this.bytes[position] = (value >>> 24) & 0xff;
    this.bytes[position + 1] = (value >>> 16) & 0xff;
    this.bytes[position + 2] = (value >>> 8) & 0xff;
    this.bytes[position + 3] = value & 0xff;
  }

  private ensureCapacity(extra: number): void {
    const needed = this.length + extra;
    if (needed <= this.bytes.length) return;
    let capacity = this.bytes.length * 2;
    while (capacity < needed) capacity *= 2;
    const grown = new Uint8Array(capacity);
    grown.set(this.bytes.subarray(0, this.length));
    this.bytes = grown;
  }
}
