import { describe, it, expect, vi } from 'vitest';
import { Opcode, EndpointFlag } from '../../src/bytecode/opcodes.js';
import { RegisterAllocator } from '../../src/bytecode/register-allocator.js';
import { BytecodeWriter } from '../../src/bytecode/writer.js';
import { FALSE_REF, TRUE_REF, resultRef } from '../../src/bdd/bdd.js';
import type { RulesExtension } from '../../src/engine/extension.js';
import { RulesProgram } from '../../src/engine/rules-program.js';
import { RulesEvaluationError } from '../../src/errors.js';
import { ParsedUri } from '../../src/runtime/uri.js';
import { Endpoint } from '../../src/vm/endpoint.js';
import { defineFunction, VARIADIC } from '../../src/vm/functions.js';
import { buildRegionalProgram, runResult, singleResult } from '../helpers.js';

function registersNamed(...names: string[]): RegisterAllocator {
  const registers = new RegisterAllocator();
  for (const name of names) registers.allocate(name);
  return registers;
}

function evaluationError(run: () => unknown): RulesEvaluationError {
  try {
    run();
  } catch (err) {
    if (err instanceof RulesEvaluationError) return err;
    throw err;
  }
  throw new Error('expected evaluation to fail');
}

describe('BytecodeEvaluator', () => {
  describe('results', () => {
    it('returns an endpoint built from a constant URL', () => {
      const bytecode = singleResult((w) => {
        w.loadConstant('https://example.com');
        w.emit(Opcode.RETURN_ENDPOINT, 0);
      });

      const result = runResult(bytecode);
      expect(result).toBeInstanceOf(Endpoint);
      if (!(result instanceof Endpoint)) return;
      expect(result.uri.toString()).toBe('https://example.com');
      expect(result.headers).toEqual({});
      expect(result.properties).toEqual({});
    });

    it('returns plain values', () => {
      const isSet = (value: string | null) =>
        runResult(
          singleResult((w) => {
            w.loadConstant(value);
            w.emit(Opcode.ISSET);
            w.emit(Opcode.RETURN_VALUE);
          }),
        );
      expect(isSet(null)).toBe(false);
      expect(isSet('x')).toBe(true);
    });

    it('raises the error message a rule returns', () => {
      const bytecode = singleResult((w) => {
        w.loadConstant('boom');
        w.emit(Opcode.RETURN_ERROR);
      });

      const error = evaluationError(() => runResult(bytecode));
      expect(error.message).toBe('boom');
      expect(error.address).toBe(2);
    });

    it('returns null when traversal ends on a terminal', () => {
      const writer = new BytecodeWriter();
      writer.markConditionStart();
      writer.loadConstant(true);
      writer.emit(Opcode.RETURN_VALUE);
      const bytecode = writer.build({ bddNodes: [-1, 1, -1, 0, TRUE_REF, FALSE_REF], bddRootRef: 2 });

      expect(runResult(bytecode)).toBeNull();
    });
  });

  describe('conditions', () => {
    it('selects results through the BDD', () => {
      const program = new RulesProgram(buildRegionalProgram(), {
        builtinProviders: new Map([['SDK::Endpoint', () => null]]),
      });
      expect(String(program.run({ region: 'us-east-1' }))).toBe('https://us-east-1.example.com');
      expect(String(program.run({ region: 'us-east-1', endpoint: 'https://override.example' }))).toBe(
        'https://override.example',
      );
    });

    it('fails on a missing required parameter before any condition runs', () => {
      const condition = vi.fn(() => true);
      const writer = new BytecodeWriter();
      writer.markConditionStart();
      writer.emit(Opcode.FN0, writer.registerFunction(defineFunction('check', 0, condition)));
      writer.emit(Opcode.RETURN_VALUE);
      writer.markResultStart();
      writer.loadConstant('https://x.example');
      writer.emit(Opcode.RETURN_ENDPOINT, 0);
      const registers = new RegisterAllocator();
      registers.allocate('region', { required: true });
      const bytecode = writer.build({
        registers,
        bddNodes: [-1, 1, -1, 0, resultRef(0), FALSE_REF],
        bddRootRef: 2,
      });

      expect(() => runResult(bytecode, {})).toThrow('Missing required parameter: region');
      expect(condition).not.toHaveBeenCalled();
    });

    it('treats any set value other than false as true', () => {
      const writer = new BytecodeWriter();
      writer.markConditionStart();
      writer.emit(Opcode.LOAD_REGISTER, 0);
      writer.emit(Opcode.RETURN_VALUE);
      const bytecode = writer.build({ registers: registersNamed('value'), bddRootRef: FALSE_REF });
      const program = new RulesProgram(bytecode);

      expect(program.createEvaluator({ value: '' }).test(0)).toBe(true);
      expect(program.createEvaluator({ value: 0 }).test(0)).toBe(true);
      expect(program.createEvaluator({ value: false }).test(0)).toBe(false);
      expect(program.createEvaluator({}).test(0)).toBe(false);
    });

    it('takes the low edge when an unset parameter is compared', () => {
      const writer = new BytecodeWriter();
      writer.markConditionStart();
      writer.emit(Opcode.LOAD_REGISTER, 0);
      writer.loadConstant('us-east-1');
      writer.emit(Opcode.STRING_EQUALS);
      writer.emit(Opcode.RETURN_VALUE);
      writer.markResultStart();
      writer.loadConstant('matched');
      writer.emit(Opcode.RETURN_VALUE);
      writer.markResultStart();
      writer.loadConstant('fallback');
      writer.emit(Opcode.RETURN_VALUE);
      const bytecode = writer.build({
        registers: registersNamed('region'),
        bddNodes: [-1, 1, -1, 0, resultRef(0), resultRef(1)],
        bddRootRef: 2,
      });

      expect(runResult(bytecode, {})).toBe('fallback');
      expect(runResult(bytecode, { region: 'us-east-1' })).toBe('matched');
    });

    it('gives the same answer on repeated runs', () => {
      const program = new RulesProgram(buildRegionalProgram());
      const first = program.run({ region: 'ap-south-1' });
      const second = program.run({ region: 'ap-south-1' });
      expect(String(second)).toBe(String(first));
    });
  });

  describe('registers', () => {
    it('stores into temporaries and reads them back', () => {
      const registers = registersNamed('input');
      registers.allocate('scratch', { temporary: true });
      const bytecode = singleResult((w) => {
        w.loadConstant('stored');
        w.emit(Opcode.SET_REGISTER, 1);
        w.emit(Opcode.LOAD_REGISTER, 1);
        w.emit(Opcode.RETURN_VALUE);
      }, registers);
      expect(runResult(bytecode)).toBe('stored');
    });

    it('pops the value it stores', () => {
      const registers = registersNamed('a');
      const bytecode = singleResult((w) => {
        w.loadConstant('x');
        w.emit(Opcode.SET_REGISTER, 0);
        w.emit(Opcode.RETURN_VALUE);
      }, registers);
      expect(() => runResult(bytecode)).toThrow('Stack underflow at address 4');
    });

    it('tests registers in place', () => {
      const registers = registersNamed('flag');
      const run = (op: Opcode, flag: unknown) =>
        runResult(
          singleResult((w) => {
            w.emit(op, 0);
            w.emit(Opcode.RETURN_VALUE);
          }, registers),
          { flag },
        );

      expect(run(Opcode.TEST_REGISTER_IS_TRUE, true)).toBe(true);
      expect(run(Opcode.TEST_REGISTER_IS_TRUE, 'true')).toBe(false);
      expect(run(Opcode.TEST_REGISTER_IS_FALSE, false)).toBe(true);
      expect(run(Opcode.TEST_REGISTER_IS_FALSE, undefined)).toBe(false);
      expect(run(Opcode.TEST_REGISTER_NOT_SET, undefined)).toBe(true);
      expect(run(Opcode.TEST_REGISTER_ISSET, 'x')).toBe(true);
    });
  });

  describe('boolean and equality operators', () => {
    const unary = (op: Opcode, value: string | boolean | null) =>
      runResult(
        singleResult((w) => {
          w.loadConstant(value);
          w.emit(op);
          w.emit(Opcode.RETURN_VALUE);
        }),
      );

    it('negates only false', () => {
      expect(unary(Opcode.NOT, false)).toBe(true);
      expect(unary(Opcode.NOT, true)).toBe(false);
      expect(unary(Opcode.NOT, null)).toBe(false);
    });

    it('checks for exactly true', () => {
      expect(unary(Opcode.IS_TRUE, true)).toBe(true);
      expect(unary(Opcode.IS_TRUE, 'true')).toBe(false);
    });

    it('compares deeply with EQUALS', () => {
      const bytecode = singleResult((w) => {
        w.loadConstant({ a: ['x'] });
        w.emit(Opcode.LOAD_CONST, w.getConstantIndex('x'));
        w.emit(Opcode.LIST1);
        w.loadConstant('a');
        w.emit(Opcode.MAP1);
        w.emit(Opcode.EQUALS);
        w.emit(Opcode.RETURN_VALUE);
      });
      expect(runResult(bytecode)).toBe(true);
    });

    it('raises a type error from STRING_EQUALS with the address', () => {
      const bytecode = singleResult((w) => {
        w.loadConstant('a');
        w.loadConstant(1);
        w.emit(Opcode.STRING_EQUALS);
        w.emit(Opcode.RETURN_VALUE);
      });

      const error = evaluationError(() => runResult(bytecode));
      expect(error.message).toBe('STRING_EQUALS expects two strings, got string and integer at address 4');
      expect(error.address).toBe(4);
    });

    it('compares null as unequal in STRING_EQUALS and BOOLEAN_EQUALS', () => {
      const compare = (op: Opcode, left: string | boolean | null, right: string | boolean | null) =>
        runResult(
          singleResult((w) => {
            w.loadConstant(left);
            w.loadConstant(right);
            w.emit(op);
            w.emit(Opcode.RETURN_VALUE);
          }),
        );

      expect(compare(Opcode.STRING_EQUALS, null, 'x')).toBe(false);
      expect(compare(Opcode.STRING_EQUALS, 'x', null)).toBe(false);
      expect(compare(Opcode.STRING_EQUALS, null, null)).toBe(false);
      expect(compare(Opcode.BOOLEAN_EQUALS, null, true)).toBe(false);
      expect(compare(Opcode.BOOLEAN_EQUALS, false, null)).toBe(false);
    });

    it('compares booleans with BOOLEAN_EQUALS', () => {
      const bytecode = singleResult((w) => {
        w.loadConstant(false);
        w.loadConstant(false);
        w.emit(Opcode.BOOLEAN_EQUALS);
        w.emit(Opcode.RETURN_VALUE);
      });
      expect(runResult(bytecode)).toBe(true);
    });
  });

  describe('collections', () => {
    it('builds lists in push order', () => {
      const bytecode = singleResult((w) => {
        w.loadConstant('a');
        w.loadConstant('b');
        w.emit(Opcode.LIST2);
        w.emit(Opcode.RETURN_VALUE);
      });
      expect(runResult(bytecode)).toEqual(['a', 'b']);
    });

    it('grows the stack past its initial size', () => {
      const bytecode = singleResult((w) => {
        for (let i = 0; i < 40; i++) w.loadConstant(i);
        w.emit(Opcode.LISTN, 40);
        w.emit(Opcode.RETURN_VALUE);
      });
      expect(runResult(bytecode)).toEqual(Array.from({ length: 40 }, (_, i) => i));
    });

    it('builds maps from value and key pairs', () => {
      const bytecode = singleResult((w) => {
        w.loadConstant('v1');
        w.loadConstant('k1');
        w.loadConstant('v2');
        w.loadConstant('k2');
        w.emit(Opcode.MAP2);
        w.emit(Opcode.RETURN_VALUE);
      });
      expect(runResult(bytecode)).toEqual({ k1: 'v1', k2: 'v2' });
    });

    it('builds empty containers', () => {
      const bytecode = singleResult((w) => {
        w.emit(Opcode.LIST0);
        w.emit(Opcode.MAP0);
        w.emit(Opcode.LIST2);
        w.emit(Opcode.RETURN_VALUE);
      });
      expect(runResult(bytecode)).toEqual([[], {}]);
    });

    it('reads properties and indices, null when absent', () => {
      const registers = registersNamed('config');
      const read = (emit: (w: BytecodeWriter) => void) =>
        runResult(
          singleResult((w) => {
            emit(w);
            w.emit(Opcode.RETURN_VALUE);
          }, registers),
          { config: { name: 'svc', parts: ['a', 'b'] } },
        );

      expect(read((w) => w.emit(Opcode.GET_PROPERTY_REG, 0, w.getConstantIndex('name')))).toBe('svc');
      expect(read((w) => w.emit(Opcode.GET_PROPERTY_REG, 0, w.getConstantIndex('missing')))).toBeNull();
      expect(
        read((w) => {
          w.emit(Opcode.GET_PROPERTY_REG, 0, w.getConstantIndex('parts'));
          w.emit(Opcode.GET_INDEX, 1);
        }),
      ).toBe('b');
      expect(
        read((w) => {
          w.emit(Opcode.GET_PROPERTY_REG, 0, w.getConstantIndex('parts'));
          w.emit(Opcode.GET_INDEX, 2);
        }),
      ).toBeNull();
      expect(
        read((w) => {
          w.emit(Opcode.LOAD_REGISTER, 0);
          w.emit(Opcode.GET_INDEX, 0);
        }),
      ).toBeNull();
    });

    it('indexes registers holding lists', () => {
      const registers = registersNamed('parts');
      const bytecode = singleResult((w) => {
        w.emit(Opcode.GET_INDEX_REG, 0, 0);
        w.emit(Opcode.RETURN_VALUE);
      }, registers);
      expect(runResult(bytecode, { parts: ['first'] })).toBe('first');
    });
  });

  describe('strings and URIs', () => {
    it('resolves templates from their parts', () => {
      const bytecode = singleResult((w) => {
        w.loadConstant('https://');
        w.emit(Opcode.LOAD_REGISTER, 0);
        w.loadConstant('.example.com');
        w.emit(Opcode.RESOLVE_TEMPLATE, 3);
        w.emit(Opcode.RETURN_VALUE);
      }, registersNamed('region'));
      expect(runResult(bytecode, { region: 'us-east-1' })).toBe('https://us-east-1.example.com');
    });

    it('rejects non-string template parts', () => {
      const bytecode = singleResult((w) => {
        w.loadConstant('https://');
        w.emit(Opcode.LOAD_REGISTER, 0);
        w.emit(Opcode.RESOLVE_TEMPLATE, 2);
        w.emit(Opcode.RETURN_VALUE);
      }, registersNamed('region'));
      expect(() => runResult(bytecode)).toThrow('Expected RESOLVE_TEMPLATE part to be string, got null at address 4');
    });

    it('validates host labels', () => {
      const check = (value: string, allowDots: boolean) =>
        runResult(
          singleResult((w) => {
            w.loadConstant(value);
            w.loadConstant(allowDots);
            w.emit(Opcode.IS_VALID_HOST_LABEL);
            w.emit(Opcode.RETURN_VALUE);
          }),
        );

      expect(check('-example', false)).toBe(false);
      expect(check('a.b', true)).toBe(true);
      expect(check('a.b', false)).toBe(false);
      expect(check('example.com', true)).toBe(true);
      expect(check('example..com', true)).toBe(false);
      expect(check('', false)).toBe(false);
    });

    it('takes substrings', () => {
      const sub = (start: number, end: number, reverse: number) =>
        runResult(
          singleResult((w) => {
            w.loadConstant('abcdef');
            w.emit(Opcode.SUBSTRING, start, end, reverse);
            w.emit(Opcode.RETURN_VALUE);
          }),
        );
      expect(sub(0, 3, 0)).toBe('abc');
      expect(sub(0, 3, 1)).toBe('def');
      expect(sub(0, 7, 0)).toBeNull();
    });

    it('splits with a limit', () => {
      const bytecode = singleResult((w) => {
        w.loadConstant('a--b--c');
        w.loadConstant('--');
        w.loadConstant(2);
        w.emit(Opcode.SPLIT);
        w.emit(Opcode.RETURN_VALUE);
      });
      expect(runResult(bytecode)).toEqual(['a', 'b--c']);
    });

    it('percent-encodes', () => {
      const bytecode = singleResult((w) => {
        w.loadConstant('a b/c');
        w.emit(Opcode.URI_ENCODE);
        w.emit(Opcode.RETURN_VALUE);
      });
      expect(runResult(bytecode)).toBe('a%20b%2Fc');
    });

    it('parses URLs and exposes their parts', () => {
      const property = (url: string, name: string) =>
        runResult(
          singleResult((w) => {
            w.loadConstant(url);
            w.emit(Opcode.PARSE_URL);
            w.emit(Opcode.GET_PROPERTY, w.getConstantIndex(name));
            w.emit(Opcode.RETURN_VALUE);
          }),
        );

      expect(property('https://example.com:8443/a/b', 'scheme')).toBe('https');
      expect(property('https://example.com:8443/a/b', 'authority')).toBe('example.com:8443');
      expect(property('https://example.com:8443/a/b', 'path')).toBe('/a/b');
      expect(property('https://example.com:8443/a/b', 'normalizedPath')).toBe('/a/b/');
      expect(property('http://127.0.0.1/x', 'isIp')).toBe(true);
      expect(property('https://example.com', 'isIp')).toBe(false);
      expect(property('https://example.com', 'nope')).toBeNull();
    });

    it('yields null for unparsable URLs and URLs with a query', () => {
      const parse = (url: string) =>
        runResult(
          singleResult((w) => {
            w.loadConstant(url);
            w.emit(Opcode.PARSE_URL);
            w.emit(Opcode.RETURN_VALUE);
          }),
        );

      expect(parse('not a url')).toBeNull();
      expect(parse('https://example.com/?a=b')).toBeNull();
      expect(parse('https://example.com/')).toBeInstanceOf(ParsedUri);
    });
  });

  describe('JNN_OR_POP', () => {
    const coalesce = () =>
      singleResult((w) => {
        w.emit(Opcode.LOAD_REGISTER, 0);
        w.jumpIfSetOrPop('done');
        w.loadConstant('fallback');
        w.markLabel('done');
        w.emit(Opcode.RETURN_VALUE);
      }, registersNamed('value'));

    it('keeps a set value and jumps', () => {
      expect(runResult(coalesce(), { value: 'given' })).toBe('given');
    });

    it('pops null and falls through', () => {
      expect(runResult(coalesce())).toBe('fallback');
    });
  });

  describe('functions', () => {
    it('passes arguments in push order', () => {
      const concat = defineFunction('concat', 3, (args) => args.join(''));
      const bytecode = singleResult((w) => {
        w.loadConstant('a');
        w.loadConstant('b');
        w.loadConstant('c');
        w.emit(Opcode.FN3, w.registerFunction(concat));
        w.emit(Opcode.RETURN_VALUE);
      });
      expect(runResult(bytecode)).toBe('abc');
    });

    it('calls through FN with the declared arity', () => {
      const four = defineFunction('four', 4, (args) => args.length);
      const bytecode = singleResult((w) => {
        for (const v of ['a', 'b', 'c', 'd']) w.loadConstant(v);
        w.emit(Opcode.FN, w.registerFunction(four));
        w.emit(Opcode.RETURN_VALUE);
      });
      expect(runResult(bytecode)).toBe(4);
    });

    it('calls variadic functions with the encoded count', () => {
      const first = defineFunction('firstSet', VARIADIC, (args) => args.find((a) => a !== null) ?? null);
      const bytecode = singleResult((w) => {
        w.loadConstant(null);
        w.loadConstant('second');
        w.loadConstant('third');
        w.emit(Opcode.FN_VARIADIC, w.registerFunction(first), 3);
        w.emit(Opcode.RETURN_VALUE);
      });
      expect(runResult(bytecode)).toBe('second');
    });

    it('wraps function failures with the call address', () => {
      const failure = new Error('kaput');
      const broken = defineFunction('broken', 0, () => {
        throw failure;
      });
      const bytecode = singleResult((w) => {
        w.emit(Opcode.FN0, w.registerFunction(broken));
        w.emit(Opcode.RETURN_VALUE);
      });

      const error = evaluationError(() => runResult(bytecode));
      expect(error.message).toBe('kaput at address 0');
      expect(error.cause).toBe(failure);
    });
  });

  describe('endpoints', () => {
    it('collects headers and properties', () => {
      const bytecode = singleResult((w) => {
        w.loadConstant({ 'x-test': ['a', 'b'] });
        w.loadConstant({ authScheme: 'v4' });
        w.loadConstant('https://example.com/path');
        w.emit(Opcode.RETURN_ENDPOINT, EndpointFlag.HEADERS | EndpointFlag.PROPERTIES);
      });

      const result = runResult(bytecode);
      if (!(result instanceof Endpoint)) throw new Error('expected an endpoint');
      expect(result.headers).toEqual({ 'x-test': ['a', 'b'] });
      expect(result.properties).toEqual({ authScheme: 'v4' });
      expect(result.toJSON()).toEqual({
        uri: 'https://example.com/path',
        headers: { 'x-test': ['a', 'b'] },
        properties: { authScheme: 'v4' },
      });
    });

    it('rejects header values that are not string lists', () => {
      const bytecode = singleResult((w) => {
        w.loadConstant({ 'x-test': 'a' });
        w.loadConstant('https://example.com');
        w.emit(Opcode.RETURN_ENDPOINT, EndpointFlag.HEADERS);
      });
      expect(() => runResult(bytecode)).toThrow("Expected header 'x-test' to be list, got string at address 4");
    });

    it('rejects invalid endpoint URLs', () => {
      const bytecode = singleResult((w) => {
        w.loadConstant('not a url');
        w.emit(Opcode.RETURN_ENDPOINT, 0);
      });
      expect(() => runResult(bytecode)).toThrow('Invalid endpoint URI: not a url at address 2');
    });

    it('lets extensions add endpoint properties', () => {
      const extension: RulesExtension = {
        name: 'signing',
        extractEndpointProperties: (builder, context, properties) => {
          const region = context['signingRegion'];
          if (typeof region === 'string') builder.putProperty('signingRegion', region);
          if (properties['authScheme'] !== undefined) builder.addHeaderValue('x-auth', 'present');
        },
      };
      const bytecode = singleResult((w) => {
        w.loadConstant({ authScheme: 'v4' });
        w.loadConstant('https://example.com');
        w.emit(Opcode.RETURN_ENDPOINT, EndpointFlag.PROPERTIES);
      });

      const result = runResult(bytecode, {}, { signingRegion: 'us-west-2' }, { extensions: [extension] });
      if (!(result instanceof Endpoint)) throw new Error('expected an endpoint');
      expect(result.properties).toEqual({ authScheme: 'v4', signingRegion: 'us-west-2' });
      expect(result.headers).toEqual({ 'x-auth': ['present'] });
    });
  });

  describe('malformed bodies', () => {
    it('fails when a body runs off the end without returning', () => {
      const bytecode = singleResult((w) => {
        w.loadConstant('dangling');
      });
      expect(() => runResult(bytecode)).toThrow(
        'Malformed bytecode: body starting at address 0 ended without a return',
      );
    });

    it('reports stack underflow with the address', () => {
      const bytecode = singleResult((w) => {
        w.emit(Opcode.RETURN_VALUE);
      });
      expect(() => runResult(bytecode)).toThrow('Stack underflow at address 0');
    });
  });
});
