/**
 * A loaded, linked program ready to resolve endpoints.
 *
 * @module engine/rules-program
 */

import type { Bytecode } from '../bytecode/bytecode.js';
import { serializeBytecode } from '../bytecode/codec.js';
import { disassemble } from '../bytecode/disassembler.js';
import { RulesEvaluationError } from '../errors.js';
import { UriCache, DEFAULT_URI_CACHE_SIZE } from '../runtime/uri-cache.js';
import { typeName, type RuntimeValue } from '../runtime/values.js';
import { Endpoint, type RulesResult } from '../vm/endpoint.js';
import { BytecodeEvaluator } from '../vm/evaluator.js';
import {
  RegisterFiller,
  type BuiltinProvider,
  type EvaluationContext,
  type Parameters,
} from '../vm/register-filler.js';
import type { RulesExtension } from './extension.js';

export interface RulesProgramOptions {
  builtinProviders?: ReadonlyMap<string, BuiltinProvider>;
  extensions?: readonly RulesExtension[];
  uriCacheSize?: number;
}

export interface ParameterDefinition {
  name: string;
  required: boolean;
  defaultValue: RuntimeValue;
  builtin: string | null;
}

export class RulesProgram {
  private readonly registerFiller: RegisterFiller;
  private readonly extensions: readonly RulesExtension[];
  private readonly uriCache: UriCache;

  constructor(
    readonly bytecode: Bytecode,
    options: RulesProgramOptions = {},
  ) {
    this.registerFiller = new RegisterFiller(bytecode, options.builtinProviders ?? new Map());
    this.extensions = options.extensions ?? [];
    this.uriCache = new UriCache(options.uriCacheSize ?? DEFAULT_URI_CACHE_SIZE);
  }

  /** Parameters a caller may supply, in register order */
  get parameters(): ParameterDefinition[] {
    return this.bytecode.registerDefinitions
      .filter((reg) => !reg.temporary)
      .map(({ name, required, defaultValue, builtin }) => ({ name, required, defaultValue, builtin }));
  }

  /** Builtin names referenced by the program with no registered provider */
  get missingBuiltins(): string[] {
    return this.registerFiller.missingBuiltins();
  }

  /** Fresh evaluator with its own registers and stack */
  createEvaluator(params: Parameters = {}, context: EvaluationContext = {}): BytecodeEvaluator {
    const evaluator = new BytecodeEvaluator(this.bytecode, {
      registerFiller: this.registerFiller,
      extensions: this.extensions,
      uriCache: this.uriCache,
    });
    evaluator.reset(params, context);
    return evaluator;
  }

  /** Evaluate and return whatever the selected result produces; null when nothing matched. */
  run(params: Parameters = {}, context: EvaluationContext = {}): RulesResult {
    return this.createEvaluator(params, context).evaluate();
  }

  /** Evaluate and require an endpoint; null when nothing matched. */
  resolveEndpoint(params: Parameters = {}, context: EvaluationContext = {}): Endpoint | null {
    const result = this.run(params, context);
    if (result === null || result instanceof Endpoint) {
      return result;
    }
    throw new RulesEvaluationError(`Expected an endpoint result, got ${typeName(result)}`);
  }

  disassemble(): string {
    return disassemble(this.bytecode);
  }

  serialize(): Uint8Array {
    return serializeBytecode(this.bytecode);
  }
}
