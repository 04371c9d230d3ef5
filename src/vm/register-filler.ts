/**
 * Populates the register file for one evaluation.
 *
 * Precedence per register: supplied parameter (never for temporaries),
 * then a non-null builtin value, then the static default, then null.
 * A builtin name with no registered provider behaves like a provider that
 * returned null.
 *
 * @module vm/register-filler
 */

import type { Bytecode } from '../bytecode/bytecode.js';
import { RulesEvaluationError } from '../errors.js';
import { normalizeValue, type RuntimeValue } from '../runtime/values.js';

export type EvaluationContext = Readonly<Record<string, unknown>>;

export type BuiltinProvider = (context: EvaluationContext) => unknown;

export type Parameters = Readonly<Record<string, unknown>>;

export class RegisterFiller {
  private readonly requiredIndices: readonly number[];

  constructor(
    private readonly bytecode: Bytecode,
    private readonly builtins: ReadonlyMap<string, BuiltinProvider>,
  ) {
    this.requiredIndices = bytecode.registerDefinitions.flatMap((reg, i) =>
      reg.required && !reg.temporary ? [i] : [],
    );
  }

  /** Builtin names used by the program that have no provider */
  missingBuiltins(): string[] {
    const names = this.bytecode.builtinIndices.flatMap((i) => {
      const builtin = this.bytecode.registerDefinitions[i].builtin;
      return builtin !== null && !this.builtins.has(builtin) ? [builtin] : [];
    });
    return [...new Set(names)];
  }

  createRegisters(context: EvaluationContext, params: Parameters): RuntimeValue[] {
    const registers: RuntimeValue[] = new Array(this.bytecode.registerDefinitions.length);
    this.fillRegisters(registers, context, params);
    return registers;
  }

  fillRegisters(registers: RuntimeValue[], context: EvaluationContext, params: Parameters): void {
    const { registerTemplate, inputRegisters, registerDefinitions } = this.bytecode;
    const supplied = new Uint8Array(registerTemplate.length);

    for (let i = 0; i < registerTemplate.length; i++) {
      registers[i] = registerTemplate[i];
    }

    for (const [name, raw] of Object.entries(params)) {
      const index = inputRegisters.get(name);
      if (index === undefined) continue;
      const value = normalizeValue(raw, name);
      if (value !== null) {
        registers[index] = value;
        supplied[index] = 1;
      }
    }

    // Fail before running any builtin provider when a caller-only value is absent
    for (const index of this.bytecode.hardRequiredIndices) {
      if (supplied[index] === 0) {
        throw missingParameter(registerDefinitions[index].name);
      }
    }

    for (const index of this.bytecode.builtinIndices) {
      if (supplied[index] === 1) continue;
      const reg = registerDefinitions[index];
      const provider = reg.builtin === null ? undefined : this.builtins.get(reg.builtin);
      if (!provider) continue;
      const value = normalizeValue(provider(context), reg.builtin ?? reg.name);
      if (value !== null) {
        registers[index] = value;
      }
    }

    for (const index of this.requiredIndices) {
      if (registers[index] === null) {
        throw missingParameter(registerDefinitions[index].name);
      }
    }
  }
}

function missingParameter(name: string): RulesEvaluationError {
  return new RulesEvaluationError(`Missing required parameter: ${name}`);
}
