/**
 * Compile-time register assignment.
 *
 * @module bytecode/register-allocator
 */

import { RulesCompileError } from '../errors.js';
import type { RuntimeValue } from '../runtime/values.js';
import type { RegisterDefinition } from './bytecode.js';
import { MAX_REGISTERS } from './format.js';

export interface RegisterOptions {
  required?: boolean;
  defaultValue?: RuntimeValue;
  builtin?: string | null;
  temporary?: boolean;
}

/**
 * Hands out register indices in allocation order, starting at 0.
 */
export class RegisterAllocator {
  private readonly definitions: RegisterDefinition[] = [];
  private readonly indexByName = new Map<string, number>();

  allocate(name: string, options: RegisterOptions = {}): number {
    if (this.indexByName.has(name)) {
      throw new RulesCompileError(`Register '${name}' is already allocated`);
    }
    if (this.definitions.length >= MAX_REGISTERS) {
      throw new RulesCompileError(`Too many registers: cannot allocate '${name}' (max ${MAX_REGISTERS})`);
    }
    const index = this.definitions.length;
    this.definitions.push({
      name,
      required: options.required ?? false,
      defaultValue: options.defaultValue ?? null,
      builtin: options.builtin ?? null,
      temporary: options.temporary ?? false,
    });
    this.indexByName.set(name, index);
    return index;
  }

  /** Existing index, or a new temporary register */
  getOrAllocateRegister(name: string): number {
    return this.indexByName.get(name) ?? this.allocate(name, { temporary: true });
  }

  getRegister(name: string): number {
    const index = this.indexByName.get(name);
    if (index === undefined) {
      throw new RulesCompileError(`Register '${name}' has not been allocated`);
    }
    return index;
  }

  has(name: string): boolean {
    return this.indexByName.has(name);
  }

  get size(): number {
    return this.definitions.length;
  }

  getDefinitions(): RegisterDefinition[] {
    return [...this.definitions];
  }
}
