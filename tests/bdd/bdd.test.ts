import { describe, it, expect } from 'vitest';
import {
  FALSE_REF,
  TRUE_REF,
  describeRef,
  evaluateBdd,
  isComplementRef,
  isNodeRef,
  nodeIndexOf,
  nodeRef,
  resultRef,
  validateBdd,
} from '../../src/bdd/bdd.js';
import { RulesCompileError, RulesEvaluationError } from '../../src/errors.js';

// node 1: c0 ? node 2 : result 2
// node 2: c1 ? result 0 : result 1
const NODES = [-1, TRUE_REF, FALSE_REF, 0, nodeRef(2), resultRef(2), 1, resultRef(0), resultRef(1)];

describe('BDD', () => {
  describe('references', () => {
    it('encodes nodes and complements', () => {
      expect(nodeRef(1)).toBe(2);
      expect(nodeRef(1, true)).toBe(-2);
      expect(nodeIndexOf(-2)).toBe(1);
      expect(isComplementRef(-2)).toBe(true);
      expect(isNodeRef(FALSE_REF)).toBe(false);
      expect(isNodeRef(resultRef(0))).toBe(false);
    });

    it('cannot reference the terminal placeholder', () => {
      expect(() => nodeRef(0)).toThrow(RangeError);
    });

    it('describes references', () => {
      expect(describeRef(TRUE_REF)).toBe('TRUE');
      expect(describeRef(FALSE_REF)).toBe('FALSE');
      expect(describeRef(resultRef(4))).toBe('result[4]');
      expect(describeRef(3)).toBe('node[2]');
      expect(describeRef(-3)).toBe('!node[2]');
      expect(describeRef(0)).toBe('invalid(0)');
    });
  });

  describe('evaluateBdd', () => {
    it('follows high and low edges', () => {
      expect(evaluateBdd(NODES, 2, (c) => c === 0 || c === 1)).toEqual({ kind: 'result', index: 0 });
      expect(evaluateBdd(NODES, 2, (c) => c === 0)).toEqual({ kind: 'result', index: 1 });
      expect(evaluateBdd(NODES, 2, () => false)).toEqual({ kind: 'result', index: 2 });
    });

    it('only tests conditions on the path', () => {
      const tested: number[] = [];
      evaluateBdd(NODES, 2, (c) => {
        tested.push(c);
        return false;
      });
      expect(tested).toEqual([0]);
    });

    it('swaps edges through a complement reference', () => {
      expect(evaluateBdd(NODES, -2, () => true)).toEqual({ kind: 'result', index: 2 });
      expect(evaluateBdd(NODES, -2, () => false)).toEqual({ kind: 'result', index: 1 });
    });

    it('stops on terminals', () => {
      expect(evaluateBdd(NODES, FALSE_REF, () => true)).toEqual({ kind: 'terminal', value: false });
      const withTerminal = [-1, 1, -1, 0, TRUE_REF, FALSE_REF];
      expect(evaluateBdd(withTerminal, 2, () => true)).toEqual({ kind: 'terminal', value: true });
    });

    it('detects cycles', () => {
      const cyclic = [-1, 1, -1, 0, 2, 2];
      expect(() => evaluateBdd(cyclic, 2, () => true)).toThrow(RulesEvaluationError);
    });
  });

  describe('validateBdd', () => {
    it('accepts a well-formed table', () => {
      expect(() => validateBdd(NODES, 2, 2, 3)).not.toThrow();
    });

    it('rejects a partial node', () => {
      expect(() => validateBdd([-1, 1, -1, 0], 2, 1, 1)).toThrow(
        'BDD node array length must be a multiple of 3, got 4',
      );
    });

    it('rejects conditions out of range', () => {
      expect(() => validateBdd(NODES, 2, 1, 3)).toThrow('BDD node 2 tests condition 1 of 1');
    });

    it('rejects results out of range', () => {
      expect(() => validateBdd(NODES, 2, 2, 2)).toThrow(RulesCompileError);
    });

    it('rejects node references past the table', () => {
      expect(() => validateBdd(NODES, 4, 2, 3)).toThrow('BDD root has invalid reference 4');
    });
  });
});
