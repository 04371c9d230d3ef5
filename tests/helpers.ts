import { vi } from 'vitest';
import type { Bytecode } from '../src/bytecode/bytecode.js';
import { Opcode } from '../src/bytecode/opcodes.js';
import { RegisterAllocator } from '../src/bytecode/register-allocator.js';
import { BytecodeWriter } from '../src/bytecode/writer.js';
import { FALSE_REF, TRUE_REF, resultRef } from '../src/bdd/bdd.js';
import { RulesProgram, type RulesProgramOptions } from '../src/engine/rules-program.js';
import type { Logger } from '../src/utils/logger.js';
import type { RulesResult } from '../src/vm/endpoint.js';
import type { EvaluationContext, Parameters } from '../src/vm/register-filler.js';

export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/** Program whose BDD root points straight at its only result */
export function singleResult(
  emit: (writer: BytecodeWriter) => void,
  registers: RegisterAllocator = new RegisterAllocator(),
): Bytecode {
  const writer = new BytecodeWriter();
  writer.markResultStart();
  emit(writer);
  return writer.build({ registers, bddRootRef: resultRef(0) });
}

export function runResult(
  bytecode: Bytecode,
  params: Parameters = {},
  context: EvaluationContext = {},
  options: RulesProgramOptions = {},
): RulesResult {
  return new RulesProgram(bytecode, options).run(params, context);
}

/**
 * Registers: r0 region (required), r1 useDualStack (default false),
 * r2 endpoint (builtin SDK::Endpoint).
 */
export function fixtureRegisters(): RegisterAllocator {
  const registers = new RegisterAllocator();
  registers.allocate('region', { required: true });
  registers.allocate('useDualStack', { defaultValue: false });
  registers.allocate('endpoint', { builtin: 'SDK::Endpoint' });
  return registers;
}

/**
 * Condition 0: endpoint is set.
 * Result 0: the endpoint register as the URI.
 * Result 1: `https://{region}.example.com`.
 * BDD: condition 0 ? result 0 : result 1.
 */
export function buildRegionalProgram(): Bytecode {
  const writer = new BytecodeWriter();

  writer.markConditionStart();
  writer.emit(Opcode.TEST_REGISTER_ISSET, 2);
  writer.emit(Opcode.RETURN_VALUE);

  writer.markResultStart();
  writer.emit(Opcode.LOAD_REGISTER, 2);
  writer.emit(Opcode.RETURN_ENDPOINT, 0);

  writer.markResultStart();
  writer.loadConstant('https://');
  writer.emit(Opcode.LOAD_REGISTER, 0);
  writer.loadConstant('.example.com');
  writer.emit(Opcode.RESOLVE_TEMPLATE, 3);
  writer.emit(Opcode.RETURN_ENDPOINT, 0);

  writer.getConstantIndex(['a', 'b']);
  writer.getConstantIndex({ k: 1 });
  writer.getConstantIndex(7);
  writer.getConstantIndex(true);
  writer.getConstantIndex(null);

  return writer.build({
    registers: fixtureRegisters(),
    bddNodes: [-1, TRUE_REF, FALSE_REF, 0, resultRef(0), resultRef(1)],
    bddRootRef: 2,
  });
}
