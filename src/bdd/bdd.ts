/**
 * Binary decision diagram references and traversal.
 *
 * Nodes are stored flat as `(conditionIndex, highRef, lowRef)` triples.
 * A reference is one of:
 *
 * - `1` / `-1`: the TRUE / FALSE terminals
 * - `k >= 2`: node `k - 1` (node 0 is the terminal placeholder)
 * - `-k <= -2`: node `k - 1` with high and low swapped (complement edge)
 * - `>= 100_000_000`: result `ref - 100_000_000`
 *
 * @module bdd/bdd
 */

import { RulesCompileError, RulesEvaluationError } from '../errors.js';

export const TRUE_REF = 1;
export const FALSE_REF = -1;
export const RESULT_OFFSET = 100_000_000;

export type BddOutcome = { kind: 'result'; index: number } | { kind: 'terminal'; value: boolean };

export function isTerminalRef(ref: number): boolean {
  return ref === TRUE_REF || ref === FALSE_REF;
}

export function isResultRef(ref: number): boolean {
  return ref >= RESULT_OFFSET;
}

export function isNodeRef(ref: number): boolean {
  return (ref >= 2 && ref < RESULT_OFFSET) || ref <= -2;
}

export function isComplementRef(ref: number): boolean {
  return ref <= -2;
}

export function resultRef(resultIndex: number): number {
  return RESULT_OFFSET + resultIndex;
}

export function resultIndexOf(ref: number): number {
  return ref - RESULT_OFFSET;
}

export function nodeRef(nodeIndex: number, complement = false): number {
  if (nodeIndex < 1) {
    throw new RangeError(`Node ${nodeIndex} cannot be referenced; node 0 is the terminal`);
  }
  return complement ? -(nodeIndex + 1) : nodeIndex + 1;
}

export function nodeIndexOf(ref: number): number {
  return Math.abs(ref) - 1;
}

export function describeRef(ref: number): string {
  if (ref === TRUE_REF) return 'TRUE';
  if (ref === FALSE_REF) return 'FALSE';
  if (isResultRef(ref)) return `result[${resultIndexOf(ref)}]`;
  if (isNodeRef(ref)) return `${isComplementRef(ref) ? '!' : ''}node[${nodeIndexOf(ref)}]`;
  return `invalid(${ref})`;
}

/**
 * Walk from `rootRef`, testing conditions until a result or terminal is
 * reached. Each node is visited at most once on a path, so a walk longer
 * than the node count means the diagram has a cycle.
 */
export function evaluateBdd(
  nodes: ArrayLike<number>,
  rootRef: number,
  test: (conditionIndex: number) => boolean,
): BddOutcome {
  const nodeCount = nodes.length / 3;
  let ref = rootRef;
  let steps = 0;

  while (isNodeRef(ref)) {
    if (++steps > nodeCount) {
      throw new RulesEvaluationError('BDD traversal did not terminate; the node table contains a cycle');
    }
    const base = nodeIndexOf(ref) * 3;
    const outcome = test(nodes[base]) !== isComplementRef(ref);
    ref = outcome ? nodes[base + 1] : nodes[base + 2];
  }

  if (isResultRef(ref)) {
    return { kind: 'result', index: resultIndexOf(ref) };
  }
  if (isTerminalRef(ref)) {
    return { kind: 'terminal', value: ref === TRUE_REF };
  }
  throw new RulesEvaluationError(`Invalid BDD reference ${ref}`);
}

/**
 * Check that every reference points at an existing node, condition or
 * result.
 */
export function validateBdd(
  nodes: ArrayLike<number>,
  rootRef: number,
  conditionCount: number,
  resultCount: number,
): void {
  if (nodes.length % 3 !== 0) {
    throw new RulesCompileError(`BDD node array length must be a multiple of 3, got ${nodes.length}`);
  }
  const nodeCount = nodes.length / 3;

  const checkRef = (ref: number, where: string): void => {
    if (isTerminalRef(ref)) return;
    if (isResultRef(ref)) {
      if (resultIndexOf(ref) >= resultCount) {
        throw new RulesCompileError(`${where} references result ${resultIndexOf(ref)} of ${resultCount}`);
      }
      return;
    }
    if (!isNodeRef(ref) || nodeIndexOf(ref) >= nodeCount) {
      throw new RulesCompileError(`${where} has invalid reference ${ref}`);
    }
  };

  checkRef(rootRef, 'BDD root');
  // node 0 is the terminal placeholder and is never tested
  for (let i = 1; i < nodeCount; i++) {
    const condition = nodes[i * 3];
    if (condition < 0 || condition >= conditionCount) {
      throw new RulesCompileError(`BDD node ${i} tests condition ${condition} of ${conditionCount}`);
    }
    checkRef(nodes[i * 3 + 1], `BDD node ${i} high edge`);
    checkRef(nodes[i * 3 + 2], `BDD node ${i} low edge`);
  }
}
