/**
 * Registry of functions, builtin providers and extensions, and the entry
 * point for loading programs.
 *
 * @module engine/rules-engine
 */

import { readFileSync } from 'node:fs';
import type { Bytecode } from '../bytecode/bytecode.js';
import { deserializeBytecode } from '../bytecode/codec.js';
import { DEFAULT_URI_CACHE_SIZE } from '../runtime/uri-cache.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { RulesFunction } from '../vm/functions.js';
import type { BuiltinProvider, EvaluationContext } from '../vm/register-filler.js';
import type { RulesExtension } from './extension.js';
import { RulesProgram } from './rules-program.js';
import { standardExtension } from './std-extension.js';

export interface RulesEngineOptions {
  logger?: Logger;
  /** Entries in each program's URI cache */
  uriCacheSize?: number;
  /** Install the standard functions and builtins (default true) */
  standardLibrary?: boolean;
}

export class RulesEngine {
  private readonly functions = new Map<string, RulesFunction>();
  private readonly builtinProviders = new Map<string, BuiltinProvider[]>();
  private readonly extensions: RulesExtension[] = [];
  private readonly logger: Logger;
  private readonly uriCacheSize: number;

  constructor(options: RulesEngineOptions = {}) {
    this.logger = options.logger ?? createLogger('silent');
    this.uriCacheSize = options.uriCacheSize ?? DEFAULT_URI_CACHE_SIZE;
    if (options.standardLibrary ?? true) {
      this.addExtension(standardExtension);
    }
  }

  addFunction(fn: RulesFunction): this {
    if (this.functions.has(fn.name)) {
      this.logger.debug('Replacing rules function', { name: fn.name });
    }
    this.functions.set(fn.name, fn);
    return this;
  }

  /**
   * Register a provider for a builtin. Several providers may serve the same
   * builtin; the first to return a non-null value wins.
   */
  addBuiltinProvider(name: string, provider: BuiltinProvider): this {
    const providers = this.builtinProviders.get(name) ?? [];
    providers.push(provider);
    this.builtinProviders.set(name, providers);
    return this;
  }

  addExtension(extension: RulesExtension): this {
    this.extensions.push(extension);
    for (const fn of extension.functions?.() ?? []) {
      this.addFunction(fn);
    }
    for (const [name, provider] of Object.entries(extension.builtinProviders?.() ?? {})) {
      this.addBuiltinProvider(name, provider);
    }
    this.logger.debug('Registered rules extension', { name: extension.name });
    return this;
  }

  getFunctions(): ReadonlyMap<string, RulesFunction> {
    return this.functions;
  }

  getExtensions(): readonly RulesExtension[] {
    return this.extensions;
  }

  /** Decode, link and wrap a serialized program. */
  load(data: Uint8Array): RulesProgram {
    const bytecode = deserializeBytecode(data, this.functions);
    this.logger.debug('Loaded rules program', {
      bytes: data.length,
      conditions: bytecode.conditionCount,
      results: bytecode.resultCount,
      registers: bytecode.registerDefinitions.length,
      bddNodes: bytecode.bddNodeCount,
    });
    return this.fromBytecode(bytecode);
  }

  loadFile(path: string): RulesProgram {
    return this.load(readFileSync(path));
  }

  fromBytecode(bytecode: Bytecode): RulesProgram {
    const program = new RulesProgram(bytecode, {
      builtinProviders: this.composeBuiltinProviders(),
      extensions: [...this.extensions],
      uriCacheSize: this.uriCacheSize,
    });
    for (const builtin of program.missingBuiltins) {
      this.logger.warn('No provider registered for builtin; register default applies', { builtin });
    }
    return program;
  }

  private composeBuiltinProviders(): Map<string, BuiltinProvider> {
    const composed = new Map<string, BuiltinProvider>();
    for (const [name, providers] of this.builtinProviders) {
      const chain = [...providers];
      composed.set(name, (context: EvaluationContext) => {
        for (const provider of chain) {
          const value = provider(context);
          if (value !== null && value !== undefined) return value;
        }
        return null;
      });
    }
    return composed;
  }
}
