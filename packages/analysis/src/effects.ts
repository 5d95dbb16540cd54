/**
 * Effect and value-kind predicates used by the cleanup passes
 */

import type { IRNode, IRRemote } from '@reshape/ir';

// comparisons and the relaxed boolean operators accept any operands; every
// other operator raises on a wrong operand type, and some on zero
const TOTAL_BINARY_OPS = new Set(['==', '!=', '===', '!==', '<', '>', '<=', '>=', '&&', '||']);
const TOTAL_UNARY_OPS = new Set(['!']);

/**
 * No side effect and cannot raise: dropping the statement is unobservable
 */
export function isPure(node: IRNode): boolean {
  switch (node.kind) {
    case 'var':
    case 'literal':
    case 'fn':
      return true;
    case 'interpolation':
      return node.parts.every((part) => part.kind === 'text' || isPure(part.expr));
    case 'tuple':
      return node.elements.every(isPure);
    case 'list':
      return node.elements.every(isPure) && (node.tail === undefined || isPure(node.tail));
    case 'map':
      return node.entries.every((entry) => isPure(entry.key) && isPure(entry.value));
    case 'struct':
      return node.fields.every((entry) => isPure(entry.value));
    case 'binary':
      return TOTAL_BINARY_OPS.has(node.op) && isPure(node.left) && isPure(node.right);
    case 'unary':
      return TOTAL_UNARY_OPS.has(node.op) && isPure(node.operand);
    default:
      return false;
  }
}

export function isNumericOrNil(node: IRNode): boolean {
  if (node.kind !== 'literal') return false;
  const type = node.literal.type;
  return type === 'integer' || type === 'float' || type === 'nil';
}

/**
 * Sequence or aggregation expression: a comprehension, a call on one of the
 * collection modules, or a pipeline ending in one
 */
export function isAggregation(node: IRNode, collectionModules: readonly string[]): boolean {
  switch (node.kind) {
    case 'for':
      return true;
    case 'remote':
      return collectionModules.includes(node.module);
    case 'pipe':
      return isAggregation(node.right, collectionModules);
    default:
      return false;
  }
}

export function isCollectionCall(node: IRNode, collectionModules: readonly string[]): node is IRRemote {
  return node.kind === 'remote' && collectionModules.includes(node.module);
}
