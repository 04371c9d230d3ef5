/**
 * Human-readable rendering of a compiled program.
 *
 * @module bytecode/disassembler
 */

import { describeRef } from '../bdd/bdd.js';
import { ParsedUri } from '../runtime/uri.js';
import type { RuntimeValue } from '../runtime/values.js';
import { formatArity } from '../vm/functions.js';
import type { Bytecode, RegisterDefinition } from './bytecode.js';
import type { OperandSpec } from './opcodes.js';
import { BytecodeWalker } from './walker.js';

export function formatConstant(value: RuntimeValue): string {
  if (value === null) return 'null';
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
      return `Integer[${value}]`;
    case 'boolean':
      return `Boolean[${value}]`;
    default:
      break;
  }
  if (value instanceof ParsedUri) return `URI[${value.toString()}]`;
  if (Array.isArray(value)) return `List[${value.length} items]`;
  return `Map[${Object.keys(value).length} entries]`;
}

function formatRegister(index: number, reg: RegisterDefinition): string {
  let line = `  r${index}: ${reg.name}`;
  const markers: string[] = [];
  if (reg.required) markers.push('required');
  if (reg.temporary) markers.push('temp');
  if (markers.length > 0) line += ` [${markers.join(', ')}]`;
  if (reg.defaultValue !== null) line += ` default=${formatConstant(reg.defaultValue)}`;
  if (reg.builtin !== null) line += ` builtin=${reg.builtin}`;
  return line;
}

function address(pc: number): string {
  return pc.toString().padStart(4, '0');
}

export class BytecodeDisassembler {
  constructor(private readonly bytecode: Bytecode) {}

  disassemble(): string {
    const lines: string[] = [];
    this.writeHeader(lines);
    this.writeRegisters(lines);
    this.writeConstants(lines);
    this.writeBdd(lines);
    this.writeBodies(lines);
    return lines.join('\n') + '\n';
  }

  /** Render the instructions of one body, one line per instruction. */
  disassembleBody(start: number, end: number): string[] {
    const lines: string[] = [];
    const walker = new BytecodeWalker(this.bytecode.instructions, start);
    while (walker.hasNext() && walker.pc < end) {
      lines.push(this.formatInstruction(walker));
      walker.advance();
    }
    return lines;
  }

  formatInstruction(walker: BytecodeWalker): string {
    const info = walker.info;
    const operands = info.operands.map((spec, i) => this.formatOperand(spec, walker.getOperand(i), walker));
    const text = operands.length > 0 ? `${info.name} ${operands.join(', ')}` : info.name;
    return `  ${address(walker.pc)}: ${text}`;
  }

  private formatOperand(spec: OperandSpec, value: number, walker: BytecodeWalker): string {
    const { constants, registerDefinitions, functions } = this.bytecode;
    switch (spec.kind) {
      case 'constant': {
        const constant = constants[value];
        return constant === undefined ? `c${value} <missing>` : `c${value} ${formatConstant(constant)}`;
      }
      case 'register': {
        const reg = registerDefinitions[value];
        return reg ? `r${value} (${reg.name})` : `r${value} <missing>`;
      }
      case 'function': {
        const fn = functions[value];
        return fn ? `fn${value} (${fn.name}/${formatArity(fn.argCount)})` : `fn${value} <missing>`;
      }
      case 'jump':
        return `+${value} -> ${address(walker.jumpTarget())}`;
      default:
        return String(value);
    }
  }

  private writeHeader(lines: string[]): void {
    const b = this.bytecode;
    lines.push('=== Program ===');
    lines.push(`Conditions: ${b.conditionCount}`);
    lines.push(`Results: ${b.resultCount}`);
    lines.push(`Registers: ${b.registerDefinitions.length}`);
    lines.push(`Constants: ${b.constants.length}`);
    lines.push(
      `Functions: ${b.functions.length}` +
        (b.functions.length > 0 ? ` (${b.functions.map((f) => `${f.name}/${formatArity(f.argCount)}`).join(', ')})` : ''),
    );
    lines.push(`BDD nodes: ${b.bddNodeCount}`);
    lines.push(`Instruction bytes: ${b.instructions.length}`);
    lines.push('');
  }

  private writeRegisters(lines: string[]): void {
    lines.push('=== Registers ===');
    this.bytecode.registerDefinitions.forEach((reg, i) => lines.push(formatRegister(i, reg)));
    lines.push('');
  }

  private writeConstants(lines: string[]): void {
    lines.push('=== Constants ===');
    this.bytecode.constants.forEach((value, i) => lines.push(`  c${i}: ${formatConstant(value)}`));
    lines.push('');
  }

  private writeBdd(lines: string[]): void {
    const nodes = this.bytecode.bddNodes;
    lines.push('=== BDD ===');
    lines.push(`Nodes: ${this.bytecode.bddNodeCount}`);
    lines.push(`Root: ${describeRef(this.bytecode.bddRootRef)}`);
    for (let i = 0; i < this.bytecode.bddNodeCount; i++) {
      const base = i * 3;
      lines.push(
        i === 0
          ? '  node[0]: terminal'
          : `  node[${i}]: condition ${nodes[base]}, high ${describeRef(nodes[base + 1])}, low ${describeRef(nodes[base + 2])}`,
      );
    }
    lines.push('');
  }

  private writeBodies(lines: string[]): void {
    const { conditionOffsets, resultOffsets, instructions } = this.bytecode;
    const starts = [...new Set([...conditionOffsets, ...resultOffsets, instructions.length])].sort((a, b) => a - b);
    const endOf = (start: number): number => starts.find((s) => s > start) ?? instructions.length;

    lines.push('=== Instructions ===');
    conditionOffsets.forEach((start, i) => {
      lines.push(`Condition ${i} @ ${address(start)}:`);
      lines.push(...this.disassembleBody(start, endOf(start)));
    });
    resultOffsets.forEach((start, i) => {
      lines.push(`Result ${i} @ ${address(start)}:`);
      lines.push(...this.disassembleBody(start, endOf(start)));
    });
  }
}

export function disassemble(bytecode: Bytecode): string {
  return new BytecodeDisassembler(bytecode).disassemble();
}
