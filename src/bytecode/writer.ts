/**
 * Program builder.
 *
 * Instruction bodies are appended in order: mark the start of a condition
 * or result, emit its instructions, repeat. Jumps may reference labels that
 * are marked later; each reserves a 2-byte placeholder that is patched
 * with `target - (placeholder + 2)` when the label is marked.
 *
 * @module bytecode/writer
 */

import { RulesCompileError } from '../errors.js';
import type { RuntimeValue } from '../runtime/values.js';
import type { RulesFunction } from '../vm/functions.js';
import { ByteBuffer } from './byte-buffer.js';
import { Bytecode, type RegisterDefinition } from './bytecode.js';
import { ConstantPool } from './constant-pool.js';
import { MAX_FUNCTIONS } from './format.js';
import { Opcode, getOpcodeInfo, formatByte } from './opcodes.js';
import { RegisterAllocator } from './register-allocator.js';

export interface BuildOptions {
  registers?: RegisterAllocator | readonly RegisterDefinition[];
  bddNodes?: ArrayLike<number>;
  bddRootRef: number;
}

export class BytecodeWriter {
  private readonly code = new ByteBuffer();
  private readonly constants = new ConstantPool();
  private readonly functions: RulesFunction[] = [];
  private readonly functionIndex = new Map<string, number>();
  private readonly conditionOffsets: number[] = [];
  private readonly resultOffsets: number[] = [];
  private readonly labels = new Map<string, number>();
  private readonly pendingJumps = new Map<string, number[]>();

  /** Offset of the next byte to be written */
  get position(): number {
    return this.code.size;
  }

  writeByte(value: number): void {
    this.code.writeByte(value);
  }

  writeShort(value: number): void {
    this.code.writeShort(value);
  }

  /**
   * Write an opcode and its operands using the widths from the opcode
   * table. Jump operands must go through {@link writeJump}.
   */
  emit(opcode: Opcode, ...operands: number[]): void {
    const info = getOpcodeInfo(opcode);
    if (!info) {
      throw new RulesCompileError(`Unknown opcode ${formatByte(opcode)}`);
    }
    if (info.operands.some((op) => op.kind === 'jump')) {
      throw new RulesCompileError(`${info.name} takes a label; use writeJump`);
    }
    if (operands.length !== info.operands.length) {
      throw new RulesCompileError(
        `${info.name} takes ${info.operands.length} operands, got ${operands.length}`,
      );
    }
    this.writeByte(opcode);
    info.operands.forEach((spec, i) => {
      if (spec.width === 1) this.writeByte(operands[i]);
      else this.writeShort(operands[i]);
    });
  }

  /** Push a constant with the narrowest load instruction */
  loadConstant(value: RuntimeValue): number {
    const index = this.getConstantIndex(value);
    if (index <= 0xff) {
      this.emit(Opcode.LOAD_CONST, index);
    } else {
      this.emit(Opcode.LOAD_CONST_W, index);
    }
    return index;
  }

  getConstantIndex(value: RuntimeValue): number {
    return this.constants.getConstantIndex(value);
  }

  /** Index of the function in the program's function table, by name */
  registerFunction(fn: RulesFunction): number {
    const existing = this.functionIndex.get(fn.name);
    if (existing !== undefined) {
      return existing;
    }
    if (this.functions.length >= MAX_FUNCTIONS) {
      throw new RulesCompileError(`Too many functions (max ${MAX_FUNCTIONS})`);
    }
    const index = this.functions.length;
    this.functions.push(fn);
    this.functionIndex.set(fn.name, index);
    return index;
  }

  markConditionStart(): number {
    this.conditionOffsets.push(this.position);
    return this.conditionOffsets.length - 1;
  }

  markResultStart(): number {
    this.resultOffsets.push(this.position);
    return this.resultOffsets.length - 1;
  }

  /** Reserve a forward-jump placeholder for `label` */
  writeJump(label: string): void {
    if (this.labels.has(label)) {
      throw new RulesCompileError(`Backward jump to label '${label}' is not supported`);
    }
    const pending = this.pendingJumps.get(label) ?? [];
    pending.push(this.position);
    this.pendingJumps.set(label, pending);
    this.writeShort(0);
  }

  /** JNN_OR_POP to `label` */
  jumpIfSetOrPop(label: string): void {
    this.writeByte(Opcode.JNN_OR_POP);
    this.writeJump(label);
  }

  markLabel(label: string): void {
    if (this.labels.has(label)) {
      throw new RulesCompileError(`Label '${label}' is already defined`);
    }
    const target = this.position;
    this.labels.set(label, target);
    for (const placeholder of this.pendingJumps.get(label) ?? []) {
      const offset = target - (placeholder + 2);
      if (offset > 0xffff) {
        throw new RulesCompileError(`Jump to label '${label}' is too far (${offset} bytes)`);
      }
      this.code.patchShort(placeholder, offset);
    }
    this.pendingJumps.delete(label);
  }

  build(options: BuildOptions): Bytecode {
    if (this.pendingJumps.size > 0) {
      throw new RulesCompileError(`Unresolved labels: ${[...this.pendingJumps.keys()].join(', ')}`);
    }
    const registers = options.registers ?? [];
    return new Bytecode({
      instructions: this.code.toUint8Array(),
      conditionOffsets: this.conditionOffsets,
      resultOffsets: this.resultOffsets,
      registerDefinitions: registers instanceof RegisterAllocator ? registers.getDefinitions() : registers,
      constants: this.constants.toArray(),
      functions: this.functions,
      bddNodes: options.bddNodes ?? [],
      bddRootRef: options.bddRootRef,
    });
  }
}
