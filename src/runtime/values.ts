/**
 * Runtime value model shared by the constant pool, registers and the
 * operand stack.
 *
 * @module runtime/values
 */

import { RulesEvaluationError } from '../errors.js';
import { ParsedUri } from './uri.js';

export interface RuntimeMap {
  readonly [key: string]: RuntimeValue;
}

export type RuntimeValue = null | string | number | boolean | ParsedUri | RuntimeValue[] | RuntimeMap;

export type RuntimeTypeName = 'null' | 'string' | 'integer' | 'boolean' | 'uri' | 'list' | 'map';

/** A value is set iff it is not null */
export function isSet(value: RuntimeValue): boolean {
  return value !== null;
}

export function isRuntimeMap(value: RuntimeValue): value is RuntimeMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof ParsedUri);
}

export function typeName(value: RuntimeValue): RuntimeTypeName {
  if (value === null) return 'null';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'number') return 'integer';
  if (typeof value === 'boolean') return 'boolean';
  if (value instanceof ParsedUri) return 'uri';
  if (Array.isArray(value)) return 'list';
  return 'map';
}

/**
 * Deep value equality.
 */
export function valuesEqual(a: RuntimeValue, b: RuntimeValue): boolean {
  if (a === b) return true;
  if (a === null || b === null || typeof a !== 'object' || typeof b !== 'object') {
    return false;
  }
  if (a instanceof ParsedUri || b instanceof ParsedUri) {
    return a instanceof ParsedUri && b instanceof ParsedUri && a.equals(b);
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => valuesEqual(item, b[i]));
  }
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  return aKeys.every((key) => Object.hasOwn(b, key) && valuesEqual(a[key], b[key]));
}

/** String form used for error messages and templates. */
export function stringifyValue(value: RuntimeValue): string {
  if (typeof value === 'string') return value;
  if (value === null || typeof value !== 'object' || value instanceof ParsedUri) {
    return String(value);
  }
  return JSON.stringify(value);
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Validate a caller-supplied value and convert it to a runtime value.
 * `undefined` means unset.
 */
export function normalizeValue(value: unknown, path: string): RuntimeValue {
  if (value === undefined || value === null) return null;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      if (Number.isFinite(value)) return value;
      break;
    case 'object':
      if (value instanceof ParsedUri) return value;
      if (Array.isArray(value)) {
        return value.map((item: unknown, i) => normalizeValue(item, `${path}[${i}]`));
      }
      if (isPlainObject(value)) {
        return Object.fromEntries(
          Object.entries(value).map(([key, item]): [string, RuntimeValue] => [key, normalizeValue(item, `${path}.${key}`)]),
        );
      }
      break;
    default:
      break;
  }
  throw new RulesEvaluationError(`Unsupported value for parameter '${path}': ${describe(value)}`);
}

function describe(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return value.constructor?.name ?? 'object';
  }
  return typeof value === 'number' ? String(value) : typeof value;
}
