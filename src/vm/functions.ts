/**
 * Functions callable from bytecode through the FN opcodes.
 *
 * @module vm/functions
 */

import { RulesEvaluationError } from '../errors.js';
import { typeName, type RuntimeValue } from '../runtime/values.js';

/** Declared arity of a function called through FN_VARIADIC */
export const VARIADIC = -1;

export interface RulesFunction {
  readonly name: string;
  /** Fixed argument count, or {@link VARIADIC} */
  readonly argCount: number;
  apply(args: readonly RuntimeValue[]): RuntimeValue;
}

export function defineFunction(
  name: string,
  argCount: number,
  apply: (args: readonly RuntimeValue[]) => RuntimeValue,
): RulesFunction {
  if (argCount !== VARIADIC && (!Number.isInteger(argCount) || argCount < 0 || argCount > 255)) {
    throw new RangeError(`Invalid argument count for function '${name}': ${argCount}`);
  }
  return { name, argCount, apply };
}

export function formatArity(argCount: number): string {
  return argCount === VARIADIC ? 'variadic' : String(argCount);
}

function argumentTypeError(fn: string, position: number, expected: string, value: RuntimeValue): RulesEvaluationError {
  return new RulesEvaluationError(
    `Expected ${fn} argument ${position} to be ${expected}, but given ${typeName(value)}`,
  );
}

export function stringArg(fn: string, args: readonly RuntimeValue[], position: number): string {
  const value = args[position] ?? null;
  if (typeof value !== 'string') throw argumentTypeError(fn, position, 'string', value);
  return value;
}

export function optionalStringArg(fn: string, args: readonly RuntimeValue[], position: number): string | null {
  const value = args[position] ?? null;
  return value === null ? null : stringArg(fn, args, position);
}

export function booleanArg(fn: string, args: readonly RuntimeValue[], position: number): boolean {
  const value = args[position] ?? null;
  if (typeof value !== 'boolean') throw argumentTypeError(fn, position, 'boolean', value);
  return value;
}

export function integerArg(fn: string, args: readonly RuntimeValue[], position: number): number {
  const value = args[position] ?? null;
  if (typeof value !== 'number' || !Number.isInteger(value)) throw argumentTypeError(fn, position, 'integer', value);
  return value;
}
