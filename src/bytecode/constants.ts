/**
 * Constant encoding, decoding and identity.
 *
 * @module bytecode/constants
 */

import { BytecodeFormatError, RulesCompileError } from '../errors.js';
import { ParsedUri } from '../runtime/uri.js';
import type { RuntimeValue } from '../runtime/values.js';
import type { ByteBuffer } from './byte-buffer.js';
import type { ByteReader } from './byte-reader.js';
import { ConstantTag, MAX_CONSTANT_DEPTH } from './format.js';

const MAX_ENTRIES = 0xffff;

/**
 * Key under which equal constants collapse to a single pool entry. Map keys
 * are sorted so entry order does not matter; type tags keep `1` and `"1"`
 * apart.
 */
export function constantKey(value: RuntimeValue): string {
  if (value === null) return 'n';
  switch (typeof value) {
    case 'string':
      return `s${JSON.stringify(value)}`;
    case 'number':
      return `i${value}`;
    case 'boolean':
      return value ? 'T' : 'F';
    default:
      break;
  }
  if (value instanceof ParsedUri) return `u${JSON.stringify(value.toString())}`;
  if (Array.isArray(value)) return `[${value.map(constantKey).join(',')}]`;
  const entries = Object.keys(value)
    .sort()
    .map((key) => `${JSON.stringify(key)}:${constantKey(value[key])}`);
  return `{${entries.join(',')}}`;
}

export function encodeConstant(out: ByteBuffer, value: RuntimeValue, depth = 0): void {
  if (depth > MAX_CONSTANT_DEPTH) {
    throw new RulesCompileError(`Constant nesting depth exceeds ${MAX_CONSTANT_DEPTH}`);
  }
  if (value === null) {
    out.writeByte(ConstantTag.NULL);
    return;
  }
  switch (typeof value) {
    case 'string':
      out.writeByte(ConstantTag.STRING);
      out.writeUtf(value);
      return;
    case 'number':
      if (!Number.isInteger(value) || value < -0x80000000 || value > 0x7fffffff) {
        throw new RulesCompileError(`Integer constant out of 32-bit range: ${value}`);
      }
      out.writeByte(ConstantTag.INTEGER);
      out.writeInt(value);
      return;
    case 'boolean':
      out.writeByte(ConstantTag.BOOLEAN);
      out.writeByte(value ? 1 : 0);
      return;
    default:
      break;
  }
  if (value instanceof ParsedUri) {
    throw new RulesCompileError(`URI values cannot be stored as constants: ${value.toString()}`);
  }
  if (Array.isArray(value)) {
    if (value.length > MAX_ENTRIES) {
      throw new RulesCompileError(`List constant has too many items: ${value.length}`);
    }
    out.writeByte(ConstantTag.LIST);
    out.writeShort(value.length);
    for (const item of value) encodeConstant(out, item, depth + 1);
    return;
  }
  const keys = Object.keys(value);
  if (keys.length > MAX_ENTRIES) {
    throw new RulesCompileError(`Map constant has too many entries: ${keys.length}`);
  }
  out.writeByte(ConstantTag.MAP);
  out.writeShort(keys.length);
  for (const key of keys) {
    out.writeUtf(key);
    encodeConstant(out, value[key], depth + 1);
  }
}

export function decodeConstant(reader: ByteReader, depth = 0): RuntimeValue {
  if (depth > MAX_CONSTANT_DEPTH) {
    throw new BytecodeFormatError(`Constant nesting depth exceeds ${MAX_CONSTANT_DEPTH}`);
  }
  const offset = reader.offset;
  const tag = reader.readByte();
  switch (tag) {
    case ConstantTag.NULL:
      return null;
    case ConstantTag.STRING:
      return reader.readUtf();
    case ConstantTag.INTEGER:
      return reader.readInt();
    case ConstantTag.BOOLEAN:
      return reader.readByte() !== 0;
    case ConstantTag.LIST: {
      const count = reader.readShort();
      const items: RuntimeValue[] = [];
      for (let i = 0; i < count; i++) items.push(decodeConstant(reader, depth + 1));
      return items;
    }
    case ConstantTag.MAP: {
      const count = reader.readShort();
      const entries: Array<[string, RuntimeValue]> = [];
      for (let i = 0; i < count; i++) {
        const key = reader.readUtf();
        entries.push([key, decodeConstant(reader, depth + 1)]);
      }
      return Object.fromEntries(entries);
    }
    default:
      throw new BytecodeFormatError(`Unknown constant type tag ${tag} at offset ${offset}`);
  }
}
