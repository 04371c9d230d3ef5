import { describe, it, expect, vi } from 'vitest';
import { Opcode } from '../../src/bytecode/opcodes.js';
import { RegisterAllocator } from '../../src/bytecode/register-allocator.js';
import { RulesEvaluationError } from '../../src/errors.js';
import { RegisterFiller, type BuiltinProvider } from '../../src/vm/register-filler.js';
import { fixtureRegisters, singleResult } from '../helpers.js';

function programWith(registers: RegisterAllocator) {
  return singleResult((w) => {
    w.loadConstant(null);
    w.emit(Opcode.RETURN_VALUE);
  }, registers);
}

function fillerFor(registers: RegisterAllocator, builtins: Record<string, BuiltinProvider> = {}) {
  return new RegisterFiller(programWith(registers), new Map(Object.entries(builtins)));
}

describe('RegisterFiller', () => {
  it('starts from the static defaults', () => {
    const filler = fillerFor(fixtureRegisters());
    expect(filler.createRegisters({}, { region: 'us-west-2' })).toEqual(['us-west-2', false, null]);
  });

  it('lets parameters override defaults', () => {
    const filler = fillerFor(fixtureRegisters());
    expect(filler.createRegisters({}, { region: 'eu-west-1', useDualStack: true })).toEqual([
      'eu-west-1',
      true,
      null,
    ]);
  });

  it('ignores parameters the program does not declare', () => {
    const filler = fillerFor(fixtureRegisters());
    expect(filler.createRegisters({}, { region: 'r', unknown: 'x' })).toEqual(['r', false, null]);
  });

  it('uses a builtin when no parameter is supplied', () => {
    const filler = fillerFor(fixtureRegisters(), {
      'SDK::Endpoint': (context) => (typeof context['endpoint'] === 'string' ? context['endpoint'] : null),
    });
    expect(filler.createRegisters({ endpoint: 'https://custom.example' }, { region: 'r' })).toEqual([
      'r',
      false,
      'https://custom.example',
    ]);
  });

  it('prefers a supplied parameter over a builtin', () => {
    const provider = vi.fn(() => 'https://builtin.example');
    const filler = fillerFor(fixtureRegisters(), { 'SDK::Endpoint': provider });
    const registers = filler.createRegisters({}, { region: 'r', endpoint: 'https://param.example' });

    expect(registers[2]).toBe('https://param.example');
    expect(provider).not.toHaveBeenCalled();
  });

  it('prefers a non-null builtin over the default', () => {
    const registers = new RegisterAllocator();
    registers.allocate('flag', { defaultValue: true, builtin: 'Flag' });
    const filler = fillerFor(registers, { Flag: () => false });
    expect(filler.createRegisters({}, {})).toEqual([false]);
  });

  it('falls back to the default when the builtin yields null or is missing', () => {
    const registers = new RegisterAllocator();
    registers.allocate('flag', { defaultValue: true, builtin: 'Flag' });

    expect(fillerFor(registers, { Flag: () => null }).createRegisters({}, {})).toEqual([true]);
    expect(fillerFor(registers, { Flag: () => undefined }).createRegisters({}, {})).toEqual([true]);
    expect(fillerFor(registers).createRegisters({}, {})).toEqual([true]);
  });

  it('treats a null parameter as not supplied', () => {
    const filler = fillerFor(fixtureRegisters());
    expect(filler.createRegisters({}, { region: 'r', useDualStack: null })).toEqual(['r', false, null]);
  });

  it('never writes temporaries from parameters', () => {
    const registers = new RegisterAllocator();
    registers.allocate('scratch', { temporary: true });
    expect(fillerFor(registers).createRegisters({}, { scratch: 'x' })).toEqual([null]);
  });

  it('names the first missing required parameter', () => {
    const filler = fillerFor(fixtureRegisters());
    expect(() => filler.createRegisters({}, {})).toThrow(RulesEvaluationError);
    expect(() => filler.createRegisters({}, {})).toThrow('Missing required parameter: region');
  });

  it('checks caller-only parameters before running providers', () => {
    const provider = vi.fn(() => 'https://builtin.example');
    const filler = fillerFor(fixtureRegisters(), { 'SDK::Endpoint': provider });

    expect(() => filler.createRegisters({}, {})).toThrow('Missing required parameter: region');
    expect(provider).not.toHaveBeenCalled();
  });

  it('fails when a required builtin register stays unset', () => {
    const registers = new RegisterAllocator();
    registers.allocate('endpoint', { required: true, builtin: 'SDK::Endpoint' });
    const filler = fillerFor(registers, { 'SDK::Endpoint': () => null });
    expect(() => filler.createRegisters({}, {})).toThrow('Missing required parameter: endpoint');
  });

  it('rejects parameter values outside the runtime model', () => {
    const filler = fillerFor(fixtureRegisters());
    expect(() => filler.createRegisters({}, { region: () => 'r' })).toThrow(
      "Unsupported value for parameter 'region': function",
    );
  });

  it('reuses a register file between evaluations', () => {
    const filler = fillerFor(fixtureRegisters());
    const registers = filler.createRegisters({}, { region: 'a', useDualStack: true });
    filler.fillRegisters(registers, {}, { region: 'b' });
    expect(registers).toEqual(['b', false, null]);
  });

  it('lists builtins without a provider once', () => {
    const registers = new RegisterAllocator();
    registers.allocate('a', { builtin: 'Shared' });
    registers.allocate('b', { builtin: 'Shared' });
    registers.allocate('c', { builtin: 'Provided' });
    const filler = fillerFor(registers, { Provided: () => 'x' });
    expect(filler.missingBuiltins()).toEqual(['Shared']);
  });
});
