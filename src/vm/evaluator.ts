/**
 * Stack machine that runs condition and result bodies.
 *
 * One evaluator holds the mutable state of one evaluation (registers,
 * operand stack); the program it runs is shared and never written.
 *
 * @module vm/evaluator
 */

import { evaluateBdd } from '../bdd/bdd.js';
import type { Bytecode } from '../bytecode/bytecode.js';
import { EndpointFlag, Opcode, formatByte } from '../bytecode/opcodes.js';
import type { RulesExtension } from '../engine/extension.js';
import { RulesEvaluationError, errorMessage } from '../errors.js';
import { isValidHostLabel, split, substring, uriEncode } from '../runtime/string-functions.js';
import { UriCache } from '../runtime/uri-cache.js';
import { ParsedUri } from '../runtime/uri.js';
import {
  isRuntimeMap,
  stringifyValue,
  typeName,
  valuesEqual,
  type RuntimeMap,
  type RuntimeValue,
} from '../runtime/values.js';
import { Endpoint, EndpointBuilder, type HeaderMap, type RulesResult } from './endpoint.js';
import type { EvaluationContext, Parameters, RegisterFiller } from './register-filler.js';

const INITIAL_STACK_SIZE = 16;

export interface EvaluatorOptions {
  registerFiller: RegisterFiller;
  extensions?: readonly RulesExtension[];
  uriCache?: UriCache;
}

export class BytecodeEvaluator {
  private readonly registerFiller: RegisterFiller;
  private readonly extensions: readonly RulesExtension[];
  private readonly uriCache: UriCache;
  private registers: RuntimeValue[] = [];
  private stack: RuntimeValue[] = new Array<RuntimeValue>(INITIAL_STACK_SIZE).fill(null);
  private sp = 0;
  private context: EvaluationContext = {};

  constructor(
    private readonly bytecode: Bytecode,
    options: EvaluatorOptions,
  ) {
    this.registerFiller = options.registerFiller;
    this.extensions = options.extensions ?? [];
    this.uriCache = options.uriCache ?? new UriCache();
  }

  /** Fill the registers for a new evaluation. */
  reset(params: Parameters, context: EvaluationContext = {}): void {
    this.context = context;
    this.sp = 0;
    this.registers = this.registerFiller.createRegisters(context, params);
  }

  /** Run condition `conditionIndex`; set and not false counts as true. */
  test(conditionIndex: number): boolean {
    this.sp = 0;
    const result = this.run(this.bytecode.getConditionOffset(conditionIndex));
    return result !== null && result !== false;
  }

  resolveResult(resultIndex: number): RulesResult {
    this.sp = 0;
    return this.run(this.bytecode.getResultOffset(resultIndex));
  }

  /**
   * Traverse the BDD from the root and run the selected result. Returns
   * null when traversal ends on a terminal (no rule matched).
   */
  evaluate(): RulesResult {
    const outcome = evaluateBdd(this.bytecode.bddNodes, this.bytecode.bddRootRef, (i) => this.test(i));
    return outcome.kind === 'result' ? this.resolveResult(outcome.index) : null;
  }

  private push(value: RuntimeValue): void {
    if (this.sp === this.stack.length) {
      const grown = new Array<RuntimeValue>(this.stack.length * 2).fill(null);
      for (let i = 0; i < this.sp; i++) grown[i] = this.stack[i];
      this.stack = grown;
    }
    this.stack[this.sp++] = value;
  }

  private pop(): RuntimeValue {
    if (this.sp === 0) {
      throw new RulesEvaluationError('Stack underflow');
    }
    const value = this.stack[--this.sp];
    this.stack[this.sp] = null;
    return value;
  }

  private peek(): RuntimeValue {
    if (this.sp === 0) {
      throw new RulesEvaluationError('Stack underflow');
    }
    return this.stack[this.sp - 1];
  }

  /** Pop `count` values, returned in push order */
  private popN(count: number): RuntimeValue[] {
    if (count > this.sp) {
      throw new RulesEvaluationError(`Stack underflow: need ${count} values, have ${this.sp}`);
    }
    const values = this.stack.slice(this.sp - count, this.sp);
    for (let i = 0; i < count; i++) this.stack[--this.sp] = null;
    return values;
  }

  /** Pop `count` (value, key) pairs, key on top, into a map in push order */
  private popMap(count: number): RuntimeMap {
    const entries: Array<[string, RuntimeValue]> = [];
    for (let i = 0; i < count; i++) {
      const key = this.pop();
      if (typeof key !== 'string') {
        throw typeError('map key', 'string', key);
      }
      entries.push([key, this.pop()]);
    }
    return Object.fromEntries(entries.reverse());
  }

  private run(start: number): RulesResult {
    const code = this.bytecode.instructions;
    const constants = this.bytecode.constants;
    const functions = this.bytecode.functions;
    const registers = this.registers;
    let pc = start;
    let address = start;

    try {
      while (pc < code.length) {
        address = pc;
        const opcode = code[pc++];
        switch (opcode) {
          case Opcode.LOAD_CONST:
            this.push(constants[code[pc++]]);
            break;
          case Opcode.LOAD_CONST_W:
            this.push(constants[(code[pc] << 8) | code[pc + 1]]);
            pc += 2;
            break;
          case Opcode.SET_REGISTER:
            registers[code[pc++]] = this.pop();
            break;
          case Opcode.LOAD_REGISTER:
            this.push(registers[code[pc++]]);
            break;
          case Opcode.NOT:
            this.push(this.pop() === false);
            break;
          case Opcode.ISSET:
            this.push(this.pop() !== null);
            break;
          case Opcode.TEST_REGISTER_ISSET:
            this.push(registers[code[pc++]] !== null);
            break;
          case Opcode.TEST_REGISTER_NOT_SET:
            this.push(registers[code[pc++]] === null);
            break;
          case Opcode.LIST0:
            this.push([]);
            break;
          case Opcode.LIST1:
            this.push(this.popN(1));
            break;
          case Opcode.LIST2:
            this.push(this.popN(2));
            break;
          case Opcode.LISTN:
            this.push(this.popN(code[pc++]));
            break;
          case Opcode.MAP0:
          case Opcode.MAP1:
          case Opcode.MAP2:
          case Opcode.MAP3:
          case Opcode.MAP4:
            this.push(this.popMap(opcode - Opcode.MAP0));
            break;
          case Opcode.MAPN:
            this.push(this.popMap(code[pc++]));
            break;
          case Opcode.RESOLVE_TEMPLATE:
            this.push(this.resolveTemplate(code[pc++]));
            break;
          case Opcode.FN0:
          case Opcode.FN1:
          case Opcode.FN2:
          case Opcode.FN3:
          case Opcode.FN: {
            const fn = functions[code[pc++]];
            this.push(fn.apply(this.popN(fn.argCount)) ?? null);
            break;
          }
          case Opcode.FN_VARIADIC: {
            const fn = functions[code[pc++]];
            this.push(fn.apply(this.popN(code[pc++])) ?? null);
            break;
          }
          case Opcode.GET_PROPERTY: {
            const name = this.propertyName((code[pc] << 8) | code[pc + 1]);
            pc += 2;
            this.push(getProperty(this.pop(), name));
            break;
          }
          case Opcode.GET_INDEX:
            this.push(getIndex(this.pop(), code[pc++]));
            break;
          case Opcode.GET_PROPERTY_REG: {
            const target = registers[code[pc]];
            const name = this.propertyName((code[pc + 1] << 8) | code[pc + 2]);
            pc += 3;
            this.push(getProperty(target, name));
            break;
          }
          case Opcode.GET_INDEX_REG:
            this.push(getIndex(registers[code[pc]], code[pc + 1]));
            pc += 2;
            break;
          case Opcode.IS_TRUE:
            this.push(this.pop() === true);
            break;
          case Opcode.TEST_REGISTER_IS_TRUE:
            this.push(registers[code[pc++]] === true);
            break;
          case Opcode.TEST_REGISTER_IS_FALSE:
            this.push(registers[code[pc++]] === false);
            break;
          case Opcode.EQUALS: {
            const b = this.pop();
            this.push(valuesEqual(this.pop(), b));
            break;
          }
          case Opcode.STRING_EQUALS: {
            const b = this.pop();
            const a = this.pop();
            if (a === null || b === null) {
              this.push(false);
              break;
            }
            if (typeof a !== 'string' || typeof b !== 'string') {
              throw new RulesEvaluationError(
                `STRING_EQUALS expects two strings, got ${typeName(a)} and ${typeName(b)}`,
              );
            }
            this.push(a === b);
            break;
          }
          case Opcode.BOOLEAN_EQUALS: {
            const b = this.pop();
            const a = this.pop();
            if (a === null || b === null) {
              this.push(false);
              break;
            }
            if (typeof a !== 'boolean' || typeof b !== 'boolean') {
              throw new RulesEvaluationError(
                `BOOLEAN_EQUALS expects two booleans, got ${typeName(a)} and ${typeName(b)}`,
              );
            }
            this.push(a === b);
            break;
          }
          case Opcode.SUBSTRING: {
            const start = code[pc];
            const end = code[pc + 1];
            const reverse = code[pc + 2] !== 0;
            pc += 3;
            const value = this.pop();
            if (value === null) {
              this.push(null);
            } else if (typeof value === 'string') {
              this.push(substring(value, start, end, reverse));
            } else {
              throw typeError('SUBSTRING input', 'string', value);
            }
            break;
          }
          case Opcode.IS_VALID_HOST_LABEL: {
            const allowDots = this.pop();
            const value = this.pop();
            if (allowDots !== null && typeof allowDots !== 'boolean') {
              throw typeError('IS_VALID_HOST_LABEL allowDots', 'boolean', allowDots);
            }
            if (value !== null && typeof value !== 'string') {
              throw typeError('IS_VALID_HOST_LABEL input', 'string', value);
            }
            this.push(value !== null && isValidHostLabel(value, allowDots === true));
            break;
          }
          case Opcode.PARSE_URL: {
            const value = this.pop();
            if (value !== null && typeof value !== 'string') {
              throw typeError('PARSE_URL input', 'string', value);
            }
            const uri = value === null ? null : this.uriCache.getOrParse(value);
            this.push(uri !== null && uri.query === null ? uri : null);
            break;
          }
          case Opcode.URI_ENCODE: {
            const value = this.pop();
            if (typeof value !== 'string') {
              throw typeError('URI_ENCODE input', 'string', value);
            }
            this.push(uriEncode(value));
            break;
          }
          case Opcode.SPLIT: {
            const limit = this.pop();
            const delimiter = this.pop();
            const value = this.pop();
            if (typeof value !== 'string') throw typeError('SPLIT input', 'string', value);
            if (typeof delimiter !== 'string') throw typeError('SPLIT delimiter', 'string', delimiter);
            if (typeof limit !== 'number') throw typeError('SPLIT limit', 'integer', limit);
            this.push(split(value, delimiter, limit));
            break;
          }
          case Opcode.JNN_OR_POP: {
            const offset = (code[pc] << 8) | code[pc + 1];
            pc += 2;
            if (this.peek() !== null) {
              pc += offset;
            } else {
              this.pop();
            }
            break;
          }
          case Opcode.RETURN_ERROR:
            throw new RulesEvaluationError(stringifyValue(this.pop()), { address });
          case Opcode.RETURN_ENDPOINT:
            return this.buildEndpoint(code[pc]);
          case Opcode.RETURN_VALUE:
            return this.pop();
          default:
            throw new RulesEvaluationError(`Unknown opcode ${formatByte(opcode)} at address ${address}`, {
              address,
            });
        }
      }
    } catch (err) {
      if (err instanceof RulesEvaluationError && err.address !== undefined) {
        throw err;
      }
      throw new RulesEvaluationError(`${errorMessage(err)} at address ${address}`, { address, cause: err });
    }

    throw new RulesEvaluationError(
      `Malformed bytecode: body starting at address ${start} ended without a return`,
      { address: start },
    );
  }

  private propertyName(constantIndex: number): string {
    const name = this.bytecode.constants[constantIndex];
    if (typeof name !== 'string') {
      throw typeError('property name', 'string', name);
    }
    return name;
  }

  private resolveTemplate(count: number): string {
    const parts = this.popN(count);
    let result = '';
    for (const part of parts) {
      if (typeof part !== 'string') {
        throw typeError('RESOLVE_TEMPLATE part', 'string', part);
      }
      result += part;
    }
    return result;
  }

  private buildEndpoint(flags: number): Endpoint {
    const url = this.pop();
    const properties: RuntimeValue = flags & EndpointFlag.PROPERTIES ? this.pop() : {};
    const headers: RuntimeValue = flags & EndpointFlag.HEADERS ? this.pop() : {};

    let uri: ParsedUri | null;
    if (url instanceof ParsedUri) {
      uri = url;
    } else if (typeof url === 'string') {
      uri = this.uriCache.getOrParse(url);
      if (uri === null) {
        throw new RulesEvaluationError(`Invalid endpoint URI: ${url}`);
      }
    } else {
      throw typeError('endpoint URL', 'string', url);
    }
    if (!isRuntimeMap(properties)) {
      throw typeError('endpoint properties', 'map', properties);
    }
    const headerMap = toHeaderMap(headers);

    const builder = new EndpointBuilder(uri);
    for (const [name, values] of Object.entries(headerMap)) builder.putHeader(name, values);
    for (const [key, value] of Object.entries(properties)) builder.putProperty(key, value);
    for (const extension of this.extensions) {
      extension.extractEndpointProperties?.(builder, this.context, properties, headerMap);
    }
    return builder.build();
  }
}

function typeError(what: string, expected: string, value: RuntimeValue): RulesEvaluationError {
  return new RulesEvaluationError(`Expected ${what} to be ${expected}, got ${typeName(value)}`);
}

function toHeaderMap(value: RuntimeValue): HeaderMap {
  if (!isRuntimeMap(value)) {
    throw typeError('endpoint headers', 'map', value);
  }
  return Object.fromEntries(
    Object.entries(value).map(([name, values]): [string, readonly string[]] => {
      if (!Array.isArray(values)) {
        throw typeError(`header '${name}'`, 'list', values);
      }
      return [
        name,
        values.map((v) => {
          if (typeof v !== 'string') throw typeError(`header '${name}' value`, 'string', v);
          return v;
        }),
      ];
    }),
  );
}

function getProperty(target: RuntimeValue, name: string): RuntimeValue {
  if (target instanceof ParsedUri) {
    switch (name) {
      case 'scheme':
        return target.scheme;
      case 'authority':
        return target.authority;
      case 'path':
        return target.path;
      case 'normalizedPath':
        return target.normalizedPath;
      case 'isIp':
        return target.isIp;
      default:
        return null;
    }
  }
  if (isRuntimeMap(target)) {
    return Object.hasOwn(target, name) ? target[name] : null;
  }
  return null;
}

function getIndex(target: RuntimeValue, index: number): RuntimeValue {
  if (Array.isArray(target) && index < target.length) {
    return target[index];
  }
  return null;
}
