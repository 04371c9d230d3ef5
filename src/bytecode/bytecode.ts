/**
 * In-memory compiled program.
 *
 * Immutable once constructed. Construction validates and links the
 * program: section sizes, BDD references, and every instruction operand
 * (constants, registers, functions and their arity, jump targets), so an
 * invalid program fails before any evaluation.
 *
 * @module bytecode/bytecode
 */

import { RulesCompileError, RulesEvaluationError, errorMessage } from '../errors.js';
import { validateBdd } from '../bdd/bdd.js';
import type { RuntimeValue } from '../runtime/values.js';
import { VARIADIC, formatArity, type RulesFunction } from '../vm/functions.js';
import { MAX_CONSTANTS, MAX_FUNCTIONS, MAX_REGISTERS } from './format.js';
import { Opcode, fixedArity } from './opcodes.js';
import { BytecodeWalker } from './walker.js';

export interface RegisterDefinition {
  readonly name: string;
  readonly required: boolean;
  /** Static default; null when there is none */
  readonly defaultValue: RuntimeValue;
  /** Name of the builtin provider consulted when no parameter is supplied */
  readonly builtin: string | null;
  /** Temporaries are written by bytecode only, never from parameters */
  readonly temporary: boolean;
}

export interface BytecodeInit {
  instructions: Uint8Array;
  conditionOffsets: readonly number[];
  resultOffsets: readonly number[];
  registerDefinitions: readonly RegisterDefinition[];
  constants: readonly RuntimeValue[];
  functions: readonly RulesFunction[];
  bddNodes: ArrayLike<number>;
  bddRootRef: number;
}

export class Bytecode {
  readonly instructions: Uint8Array;
  readonly conditionOffsets: readonly number[];
  readonly resultOffsets: readonly number[];
  readonly registerDefinitions: readonly RegisterDefinition[];
  readonly constants: readonly RuntimeValue[];
  readonly functions: readonly RulesFunction[];
  readonly bddNodes: Int32Array;
  readonly bddRootRef: number;

  /** Initial register file: static defaults, null elsewhere */
  readonly registerTemplate: readonly RuntimeValue[];
  /** Parameter name to register index, temporaries excluded */
  readonly inputRegisters: ReadonlyMap<string, number>;
  /** Registers with a builtin source */
  readonly builtinIndices: readonly number[];
  /** Required registers that only a caller can fill */
  readonly hardRequiredIndices: readonly number[];

  constructor(init: BytecodeInit) {
    this.instructions = new Uint8Array(init.instructions);
    this.conditionOffsets = Object.freeze([...init.conditionOffsets]);
    this.resultOffsets = Object.freeze([...init.resultOffsets]);
    this.registerDefinitions = Object.freeze([...init.registerDefinitions]);
    this.constants = Object.freeze([...init.constants]);
    this.functions = Object.freeze([...init.functions]);
    this.bddNodes = Int32Array.from(init.bddNodes);
    this.bddRootRef = init.bddRootRef;

    this.validateTables();
    validateBdd(this.bddNodes, this.bddRootRef, this.conditionOffsets.length, this.resultOffsets.length);
    this.link();

    const template: RuntimeValue[] = [];
    const inputs = new Map<string, number>();
    const builtins: number[] = [];
    const hardRequired: number[] = [];
    this.registerDefinitions.forEach((reg, i) => {
      template.push(reg.defaultValue);
      if (!reg.temporary) inputs.set(reg.name, i);
      if (reg.builtin !== null) builtins.push(i);
      if (reg.required && reg.defaultValue === null && reg.builtin === null && !reg.temporary) {
        hardRequired.push(i);
      }
    });
    this.registerTemplate = Object.freeze(template);
    this.inputRegisters = inputs;
    this.builtinIndices = Object.freeze(builtins);
    this.hardRequiredIndices = Object.freeze(hardRequired);
  }

  get conditionCount(): number {
    return this.conditionOffsets.length;
  }

  get resultCount(): number {
    return this.resultOffsets.length;
  }

  get bddNodeCount(): number {
    return this.bddNodes.length / 3;
  }

  getConditionOffset(index: number): number {
    const offset = this.conditionOffsets[index];
    if (offset === undefined) {
      throw new RulesEvaluationError(`Condition index ${index} out of range (${this.conditionCount} conditions)`);
    }
    return offset;
  }

  getResultOffset(index: number): number {
    const offset = this.resultOffsets[index];
    if (offset === undefined) {
      throw new RulesEvaluationError(`Result index ${index} out of range (${this.resultCount} results)`);
    }
    return offset;
  }

  private validateTables(): void {
    const registers = this.registerDefinitions;
    if (registers.length > MAX_REGISTERS) {
      throw new RulesCompileError(`Too many registers: ${registers.length} (max ${MAX_REGISTERS})`);
    }
    const names = new Set<string>();
    for (const reg of registers) {
      if (names.has(reg.name)) {
        throw new RulesCompileError(`Duplicate register name: ${reg.name}`);
      }
      names.add(reg.name);
    }
    if (this.functions.length > MAX_FUNCTIONS) {
      throw new RulesCompileError(`Too many functions: ${this.functions.length} (max ${MAX_FUNCTIONS})`);
    }
    if (this.constants.length > MAX_CONSTANTS) {
      throw new RulesCompileError(`Too many constants: ${this.constants.length} (max ${MAX_CONSTANTS})`);
    }
    const check = (offsets: readonly number[], kind: string): void => {
      offsets.forEach((offset, i) => {
        if (!Number.isInteger(offset) || offset < 0 || offset >= this.instructions.length) {
          throw new RulesCompileError(`Invalid ${kind} offset at index ${i}: ${offset}`);
        }
      });
    };
    check(this.conditionOffsets, 'condition');
    check(this.resultOffsets, 'result');
  }

  /** Walk every instruction once and resolve its operands. */
  private link(): void {
    const boundaries = new Set<number>();
    const jumpTargets: Array<{ from: number; target: number }> = [];
    const walker = new BytecodeWalker(this.instructions);

    try {
      while (walker.hasNext()) {
        const pc = walker.pc;
        boundaries.add(pc);
        const info = walker.info;
        info.operands.forEach((spec, i) => {
          const value = walker.getOperand(i);
          switch (spec.kind) {
            case 'constant':
              if (value >= this.constants.length) {
                throw new RulesCompileError(`${info.name} at address ${pc} references missing constant ${value}`);
              }
              break;
            case 'register':
              if (value >= this.registerDefinitions.length) {
                throw new RulesCompileError(`${info.name} at address ${pc} references missing register ${value}`);
              }
              break;
            case 'function':
              this.checkCall(info.code, value, pc, walker);
              break;
            case 'jump':
              jumpTargets.push({ from: pc, target: walker.jumpTarget() });
              break;
            default:
              break;
          }
        });
        walker.advance();
      }
    } catch (err) {
      if (err instanceof RulesCompileError) throw err;
      throw new RulesCompileError(`Invalid instruction stream: ${errorMessage(err)}`, { cause: err });
    }

    for (const { from, target } of jumpTargets) {
      if (target !== this.instructions.length && !boundaries.has(target)) {
        throw new RulesCompileError(`Jump at address ${from} targets ${target}, which is not an instruction`);
      }
    }
    const checkBodies = (offsets: readonly number[], kind: string): void => {
      offsets.forEach((offset, i) => {
        if (!boundaries.has(offset)) {
          throw new RulesCompileError(`${kind} ${i} starts at ${offset}, which is not an instruction`);
        }
      });
    };
    checkBodies(this.conditionOffsets, 'Condition');
    checkBodies(this.resultOffsets, 'Result');
  }

  private checkCall(opcode: number, fnIndex: number, pc: number, walker: BytecodeWalker): void {
    const fn = this.functions[fnIndex];
    if (!fn) {
      throw new RulesCompileError(`Call at address ${pc} references unregistered function index ${fnIndex}`);
    }
    const arity = fixedArity(opcode);
    if (opcode === Opcode.FN_VARIADIC) {
      if (fn.argCount !== VARIADIC && fn.argCount !== walker.getOperand(1)) {
        throw new RulesCompileError(
          `Function '${fn.name}' takes ${fn.argCount} arguments but is called with ${walker.getOperand(1)} at address ${pc}`,
        );
      }
    } else if (fn.argCount === VARIADIC) {
      throw new RulesCompileError(`Variadic function '${fn.name}' must be called with FN_VARIADIC (address ${pc})`);
    } else if (arity !== undefined && arity !== fn.argCount) {
      throw new RulesCompileError(
        `Function '${fn.name}' takes ${formatArity(fn.argCount)} arguments but is called with ${arity} at address ${pc}`,
      );
    }
  }
}
