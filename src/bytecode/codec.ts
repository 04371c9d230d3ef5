/**
 * Binary serialization of compiled programs. See `format.ts` for the layout.
 *
 * @module bytecode/codec
 */

import { BytecodeFormatError, RulesCompileError } from '../errors.js';
import type { RuntimeValue } from '../runtime/values.js';
import type { RulesFunction } from '../vm/functions.js';
import { ByteBuffer } from './byte-buffer.js';
import { ByteReader } from './byte-reader.js';
import { Bytecode, type RegisterDefinition } from './bytecode.js';
import { decodeConstant, encodeConstant } from './constants.js';
import { HEADER_SIZE, MAGIC, VERSION, formatVersion } from './format.js';

/** Offsets of the header fields patched after the sections are laid out */
const CONDITION_TABLE_FIELD = 24;

export type FunctionLookup = ReadonlyMap<string, RulesFunction>;

export function serializeBytecode(bytecode: Bytecode): Uint8Array {
  const out = new ByteBuffer(HEADER_SIZE + bytecode.instructions.length * 2);

  out.writeInt(MAGIC);
  out.writeShort(VERSION);
  out.writeShort(bytecode.conditionCount);
  out.writeShort(bytecode.resultCount);
  out.writeShort(bytecode.registerDefinitions.length);
  out.writeShort(bytecode.constants.length);
  out.writeShort(bytecode.functions.length);
  out.writeInt(bytecode.bddNodeCount);
  out.writeInt(bytecode.bddRootRef);
  for (let i = 0; i < 5; i++) out.writeInt(0);

  const conditionTableOffset = out.size;
  const resultTableOffset = conditionTableOffset + bytecode.conditionCount * 4;
  const functionTableOffset = resultTableOffset + bytecode.resultCount * 4;

  const functionTable = new ByteBuffer();
  for (const fn of bytecode.functions) functionTable.writeUtf(fn.name);
  const registerTable = new ByteBuffer();
  for (const reg of bytecode.registerDefinitions) writeRegister(registerTable, reg);

  const bddTableOffset = functionTableOffset + functionTable.size + registerTable.size;
  const instructionsOffset = bddTableOffset + bytecode.bddNodes.length * 4;

  for (const offset of bytecode.conditionOffsets) out.writeInt(instructionsOffset + offset);
  for (const offset of bytecode.resultOffsets) out.writeInt(instructionsOffset + offset);
  out.writeBytes(functionTable.toUint8Array());
  out.writeBytes(registerTable.toUint8Array());
  for (const value of bytecode.bddNodes) out.writeInt(value);
  out.writeBytes(bytecode.instructions);

  const constantPoolOffset = out.size;
  for (const constant of bytecode.constants) encodeConstant(out, constant);

  out.patchInt(CONDITION_TABLE_FIELD, conditionTableOffset);
  out.patchInt(CONDITION_TABLE_FIELD + 4, resultTableOffset);
  out.patchInt(CONDITION_TABLE_FIELD + 8, functionTableOffset);
  out.patchInt(CONDITION_TABLE_FIELD + 12, constantPoolOffset);
  out.patchInt(CONDITION_TABLE_FIELD + 16, bddTableOffset);
  return out.toUint8Array();
}

function writeRegister(out: ByteBuffer, reg: RegisterDefinition): void {
  out.writeUtf(reg.name);
  out.writeByte(reg.required ? 1 : 0);
  out.writeByte(reg.temporary ? 1 : 0);
  if (reg.defaultValue !== null) {
    out.writeByte(1);
    encodeConstant(out, reg.defaultValue);
  } else {
    out.writeByte(0);
  }
  if (reg.builtin !== null) {
    out.writeByte(1);
    out.writeUtf(reg.builtin);
  } else {
    out.writeByte(0);
  }
}

function readRegister(reader: ByteReader): RegisterDefinition {
  const name = reader.readUtf();
  const required = reader.readByte() !== 0;
  const temporary = reader.readByte() !== 0;
  const defaultValue: RuntimeValue = reader.readByte() !== 0 ? decodeConstant(reader) : null;
  const builtin = reader.readByte() !== 0 ? reader.readUtf() : null;
  return { name, required, defaultValue, builtin, temporary };
}

/**
 * Decode a serialized program and link its function table against
 * `functions`. Every function the program names must be present.
 */
export function deserializeBytecode(data: Uint8Array, functions: FunctionLookup): Bytecode {
  if (data.length < HEADER_SIZE) {
    throw new BytecodeFormatError(
      `Invalid bytecode: too short (${data.length} bytes, header is ${HEADER_SIZE})`,
    );
  }

  const reader = new ByteReader(data);
  const magic = reader.readInt() >>> 0;
  if (magic !== MAGIC) {
    throw new BytecodeFormatError(
      `Invalid magic number: 0x${magic.toString(16).padStart(8, '0')} (expected 0x${MAGIC.toString(16)})`,
    );
  }
  const version = reader.readShort();
  if (version !== VERSION) {
    throw new BytecodeFormatError(
      `Unsupported bytecode version: ${formatVersion(version)} (expected ${formatVersion(VERSION)})`,
    );
  }

  const conditionCount = reader.readShort();
  const resultCount = reader.readShort();
  const registerCount = reader.readShort();
  const constantCount = reader.readShort();
  const functionCount = reader.readShort();
  const bddNodeCount = reader.readInt();
  const bddRootRef = reader.readInt();

  const conditionTableOffset = reader.readInt();
  const resultTableOffset = reader.readInt();
  const functionTableOffset = reader.readInt();
  const constantPoolOffset = reader.readInt();
  const bddTableOffset = reader.readInt();

  if (
    conditionTableOffset < HEADER_SIZE ||
    conditionTableOffset > data.length ||
    resultTableOffset < conditionTableOffset ||
    resultTableOffset > data.length ||
    functionTableOffset < resultTableOffset ||
    functionTableOffset > data.length ||
    bddTableOffset < functionTableOffset ||
    bddTableOffset > data.length ||
    constantPoolOffset < bddTableOffset ||
    constantPoolOffset > data.length
  ) {
    throw new BytecodeFormatError('Invalid offsets in bytecode header');
  }
  if (bddNodeCount < 0 || bddTableOffset + bddNodeCount * 12 > constantPoolOffset) {
    throw new BytecodeFormatError(`Invalid BDD node count: ${bddNodeCount}`);
  }

  reader.offset = conditionTableOffset;
  const conditionOffsets = readOffsets(reader, conditionCount);
  reader.offset = resultTableOffset;
  const resultOffsets = readOffsets(reader, resultCount);

  reader.offset = functionTableOffset;
  const functionNames: string[] = [];
  for (let i = 0; i < functionCount; i++) functionNames.push(reader.readUtf());

  // Register table directly follows the function table
  const registers: RegisterDefinition[] = [];
  for (let i = 0; i < registerCount; i++) registers.push(readRegister(reader));
  if (reader.offset > bddTableOffset) {
    throw new BytecodeFormatError('Register table overlaps the BDD table');
  }

  reader.offset = bddTableOffset;
  const bddNodes = new Int32Array(bddNodeCount * 3);
  for (let i = 0; i < bddNodes.length; i++) bddNodes[i] = reader.readInt();

  const instructionsStart = bddTableOffset + bddNodeCount * 12;
  const instructionsLength = constantPoolOffset - instructionsStart;
  const instructions = new Uint8Array(data.subarray(instructionsStart, constantPoolOffset));

  const relativize = (offsets: number[], kind: string): number[] =>
    offsets.map((absolute, i) => {
      const relative = absolute - instructionsStart;
      if (relative < 0 || relative >= instructionsLength) {
        throw new BytecodeFormatError(`Invalid ${kind} offset at index ${i}`);
      }
      return relative;
    });

  const relativeConditions = relativize(conditionOffsets, 'condition');
  const relativeResults = relativize(resultOffsets, 'result');

  reader.offset = constantPoolOffset;
  const constants: RuntimeValue[] = [];
  for (let i = 0; i < constantCount; i++) constants.push(decodeConstant(reader));

  const missing = functionNames.filter((name) => !functions.has(name));
  if (missing.length > 0) {
    throw new RulesCompileError(`Missing bytecode functions: [${missing.join(', ')}]`);
  }
  const resolved = functionNames.flatMap((name) => {
    const fn = functions.get(name);
    return fn ? [fn] : [];
  });

  return new Bytecode({
    instructions,
    conditionOffsets: relativeConditions,
    resultOffsets: relativeResults,
    registerDefinitions: registers,
    constants,
    functions: resolved,
    bddNodes,
    bddRootRef,
  });
}

function readOffsets(reader: ByteReader, count: number): number[] {
  const offsets: number[] = [];
  for (let i = 0; i < count; i++) offsets.push(reader.readInt());
  return offsets;
}
