/**
 * Deduplicating constant pool used while building a program.
 *
 * @module bytecode/constant-pool
 */

import { RulesCompileError } from '../errors.js';
import type { RuntimeValue } from '../runtime/values.js';
import { ByteBuffer } from './byte-buffer.js';
import { constantKey, encodeConstant } from './constants.js';
import { MAX_CONSTANTS } from './format.js';

export class ConstantPool {
  private readonly values: RuntimeValue[] = [];
  private readonly indexByKey = new Map<string, number>();

  /**
   * Index of an equal constant already in the pool, or of `value` after
   * appending it.
   */
  getConstantIndex(value: RuntimeValue): number {
    const key = constantKey(value);
    const existing = this.indexByKey.get(key);
    if (existing !== undefined) {
      return existing;
    }
    if (this.values.length >= MAX_CONSTANTS) {
      throw new RulesCompileError(`Too many constants (max ${MAX_CONSTANTS})`);
    }
    // Reject values the binary format cannot hold before they get an index
    encodeConstant(new ByteBuffer(16), value);

    const index = this.values.length;
    this.values.push(value);
    this.indexByKey.set(key, index);
    return index;
  }

  get(index: number): RuntimeValue {
    if (index < 0 || index >= this.values.length) {
      throw new RangeError(`Constant index ${index} out of range`);
    }
    return this.values[index];
  }

  get size(): number {
    return this.values.length;
  }

  toArray(): RuntimeValue[] {
    return [...this.values];
  }
}
