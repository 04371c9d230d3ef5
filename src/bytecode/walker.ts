/**
 * Instruction-level cursor over an instruction buffer.
 *
 * @module bytecode/walker
 */

import { RulesEvaluationError } from '../errors.js';
import { formatByte, getOpcodeInfo, type OpcodeInfo } from './opcodes.js';

export class BytecodeWalker {
  private position: number;

  constructor(
    private readonly code: Uint8Array,
    start = 0,
  ) {
    if (start < 0 || start > code.length) {
      throw new RangeError(`Start offset ${start} outside instruction buffer of ${code.length} bytes`);
    }
    this.position = start;
  }

  /** Address of the current instruction */
  get pc(): number {
    return this.position;
  }

  hasNext(): boolean {
    return this.position < this.code.length;
  }

  get opcode(): number {
    if (!this.hasNext()) {
      throw new RangeError(`No instruction at address ${this.position}`);
    }
    return this.code[this.position];
  }

  get info(): OpcodeInfo {
    const opcode = this.opcode;
    const info = getOpcodeInfo(opcode);
    if (!info) {
      throw new RulesEvaluationError(`Unknown opcode ${formatByte(opcode)} at address ${this.position}`, {
        address: this.position,
      });
    }
    return info;
  }

  get instructionLength(): number {
    return this.info.length;
  }

  get operandCount(): number {
    return this.info.operands.length;
  }

  getOperand(index: number): number {
    const info = this.info;
    if (!Number.isInteger(index) || index < 0 || index >= info.operands.length) {
      throw new RangeError(
        `Operand index ${index} out of range for ${info.name} (${info.operands.length} operands)`,
      );
    }
    let offset = this.position + 1;
    for (let i = 0; i < index; i++) {
      offset += info.operands[i].width;
    }
    const width = info.operands[index].width;
    if (offset + width > this.code.length) {
      throw new RulesEvaluationError(`Truncated ${info.name} instruction at address ${this.position}`, {
        address: this.position,
      });
    }
    return width === 1 ? this.code[offset] : (this.code[offset] << 8) | this.code[offset + 1];
  }

  isJump(): boolean {
    return this.info.operands.some((op) => op.kind === 'jump');
  }

  isReturn(): boolean {
    return this.info.terminal;
  }

  /** Absolute target: the address after this instruction plus the encoded offset */
  jumpTarget(): number {
    const info = this.info;
    const operand = info.operands.findIndex((op) => op.kind === 'jump');
    if (operand === -1) {
      throw new RangeError(`${info.name} at address ${this.position} is not a jump`);
    }
    return this.position + info.length + this.getOperand(operand);
  }

  /** Move past the current instruction; may land on the end of the buffer. */
  advance(): boolean {
    this.position += this.instructionLength;
    return this.hasNext();
  }
}
