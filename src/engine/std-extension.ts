/**
 * Standard rule functions and builtins.
 *
 * Most of these also have a dedicated opcode; the function forms let
 * programs call them through FN when a compiler does not specialize.
 *
 * @module engine/std-extension
 */

import { isValidHostLabel, split, substring, uriEncode } from '../runtime/string-functions.js';
import { ParsedUri } from '../runtime/uri.js';
import type { RuntimeValue } from '../runtime/values.js';
import {
  VARIADIC,
  booleanArg,
  defineFunction,
  integerArg,
  optionalStringArg,
  stringArg,
  type RulesFunction,
} from '../vm/functions.js';
import type { EvaluationContext } from '../vm/register-filler.js';
import type { RulesExtension } from './extension.js';

export const ENDPOINT_BUILTIN = 'SDK::Endpoint';

export const STANDARD_FUNCTIONS: readonly RulesFunction[] = [
  defineFunction('stringEquals', 2, (args) => {
    if (args[0] === null || args[1] === null) return false;
    return stringArg('stringEquals', args, 0) === stringArg('stringEquals', args, 1);
  }),
  defineFunction('booleanEquals', 2, (args) => {
    if (args[0] === null || args[1] === null) return false;
    return booleanArg('booleanEquals', args, 0) === booleanArg('booleanEquals', args, 1);
  }),
  defineFunction('isSet', 1, (args) => args[0] !== null),
  defineFunction('not', 1, (args) => !booleanArg('not', args, 0)),
  defineFunction('isValidHostLabel', 2, (args) => {
    const value = optionalStringArg('isValidHostLabel', args, 0);
    return value !== null && isValidHostLabel(value, booleanArg('isValidHostLabel', args, 1));
  }),
  defineFunction('substring', 4, (args) => {
    const value = optionalStringArg('substring', args, 0);
    if (value === null) return null;
    return substring(
      value,
      integerArg('substring', args, 1),
      integerArg('substring', args, 2),
      booleanArg('substring', args, 3),
    );
  }),
  defineFunction('uriEncode', 1, (args) => uriEncode(stringArg('uriEncode', args, 0))),
  defineFunction('parseURL', 1, (args) => {
    const value = optionalStringArg('parseURL', args, 0);
    const uri = value === null ? null : ParsedUri.tryParse(value);
    return uri !== null && uri.query === null ? uri : null;
  }),
  defineFunction('split', 3, (args) =>
    split(stringArg('split', args, 0), stringArg('split', args, 1), integerArg('split', args, 2)),
  ),
  defineFunction('ite', 3, (args) => (booleanArg('ite', args, 0) ? args[1] : args[2])),
  defineFunction('coalesce', VARIADIC, (args) => args.find((arg) => arg !== null) ?? null),
];

function endpointFromContext(context: EvaluationContext): RuntimeValue {
  const endpoint = context['endpoint'];
  if (typeof endpoint === 'string') return endpoint;
  return endpoint instanceof URL ? endpoint.toString() : null;
}

export const standardExtension: RulesExtension = {
  name: 'std',
  functions: () => STANDARD_FUNCTIONS,
  builtinProviders: () => ({ [ENDPOINT_BUILTIN]: endpointFromContext }),
};
