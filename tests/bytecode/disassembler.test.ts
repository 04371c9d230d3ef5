import { describe, it, expect } from 'vitest';
import { BytecodeDisassembler, disassemble, formatConstant } from '../../src/bytecode/disassembler.js';
import { Opcode } from '../../src/bytecode/opcodes.js';
import { BytecodeWalker } from '../../src/bytecode/walker.js';
import { ParsedUri } from '../../src/runtime/uri.js';
import { defineFunction, VARIADIC } from '../../src/vm/functions.js';
import { buildRegionalProgram, singleResult } from '../helpers.js';

describe('disassembler', () => {
  it('renders every section of a program', () => {
    expect(disassemble(buildRegionalProgram()).split('\n')).toEqual([
      '=== Program ===',
      'Conditions: 1',
      'Results: 2',
      'Registers: 3',
      'Constants: 7',
      'Functions: 0',
      'BDD nodes: 2',
      'Instruction bytes: 17',
      '',
      '=== Registers ===',
      '  r0: region [required]',
      '  r1: useDualStack default=Boolean[false]',
      '  r2: endpoint builtin=SDK::Endpoint',
      '',
      '=== Constants ===',
      '  c0: "https://"',
      '  c1: ".example.com"',
      '  c2: List[2 items]',
      '  c3: Map[1 entries]',
      '  c4: Integer[7]',
      '  c5: Boolean[true]',
      '  c6: null',
      '',
      '=== BDD ===',
      'Nodes: 2',
      'Root: node[1]',
      '  node[0]: terminal',
      '  node[1]: condition 0, high result[0], low result[1]',
      '',
      '=== Instructions ===',
      'Condition 0 @ 0000:',
      '  0000: TEST_REGISTER_ISSET r2 (endpoint)',
      '  0002: RETURN_VALUE',
      'Result 0 @ 0003:',
      '  0003: LOAD_REGISTER r2 (endpoint)',
      '  0005: RETURN_ENDPOINT 0',
      'Result 1 @ 0007:',
      '  0007: LOAD_CONST c0 "https://"',
      '  0009: LOAD_REGISTER r0 (region)',
      '  0011: LOAD_CONST c1 ".example.com"',
      '  0013: RESOLVE_TEMPLATE 3',
      '  0015: RETURN_ENDPOINT 0',
      '',
    ]);
  });

  it('lists functions with their arity', () => {
    const coalesce = defineFunction('coalesce', VARIADIC, (args) => args[0] ?? null);
    const bytecode = singleResult((w) => {
      w.loadConstant('a');
      w.loadConstant('b');
      w.emit(Opcode.FN_VARIADIC, w.registerFunction(coalesce), 2);
      w.emit(Opcode.RETURN_VALUE);
    });

    const output = disassemble(bytecode);
    expect(output).toContain('Functions: 1 (coalesce/variadic)\n');
    expect(output).toContain('  0004: FN_VARIADIC fn0 (coalesce/variadic), 2\n');
  });

  it('shows jump offsets with their absolute target', () => {
    const bytecode = singleResult((w) => {
      w.loadConstant(null);
      w.jumpIfSetOrPop('end');
      w.loadConstant('fallback');
      w.markLabel('end');
      w.emit(Opcode.RETURN_VALUE);
    });

    const walker = new BytecodeWalker(bytecode.instructions, 2);
    expect(new BytecodeDisassembler(bytecode).formatInstruction(walker)).toBe('  0002: JNN_OR_POP +2 -> 0007');
  });

  it('formats constants by type', () => {
    expect(formatConstant('a"b')).toBe('"a\\"b"');
    expect(formatConstant(-3)).toBe('Integer[-3]');
    expect(formatConstant(ParsedUri.parse('https://example.com'))).toBe('URI[https://example.com]');
  });
});
