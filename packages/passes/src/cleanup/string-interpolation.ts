/**
 * String interpolation
 *
 * `"Hello " <> name <> "!"` reads better as `"Hello #{name}!"`. A `<>`
 * chain is rewritten when it has at least one string part and at least
 * one part that is not a string literal. `to_string(x)` operands lose
 * the wrapper, since interpolation already converts.
 */

import { transformBottomUp } from '@reshape/ir';
import type { IRNode, IRInterpolation, InterpolationPart } from '@reshape/ir';
import type { Pass } from '../pass.js';

function operands(node: IRNode, into: IRNode[] = []): IRNode[] {
  if (node.kind === 'binary' && node.op === '<>') {
    operands(node.left, into);
    operands(node.right, into);
  } else {
    into.push(node);
  }
  return into;
}

function isStringLiteral(node: IRNode): boolean {
  return node.kind === 'literal' && node.literal.type === 'string';
}

function unwrapToString(node: IRNode): IRNode {
  if (node.kind !== 'call' && node.kind !== 'remote') return node;
  if (node.name !== 'to_string' || node.args.length !== 1) return node;
  if (node.kind === 'remote' && node.module !== 'Kernel') return node;
  return node.args[0];
}

function partsOf(node: IRNode): InterpolationPart[] {
  if (node.kind === 'literal' && node.literal.type === 'string') return [{ kind: 'text', text: node.literal.value }];
  if (node.kind === 'interpolation') return [...node.parts];
  return [{ kind: 'expr', expr: unwrapToString(node) }];
}

function merge(parts: readonly InterpolationPart[]): InterpolationPart[] {
  const merged: InterpolationPart[] = [];
  for (const part of parts) {
    const previous = merged[merged.length - 1];
    if (part.kind === 'text' && previous?.kind === 'text') {
      merged[merged.length - 1] = { kind: 'text', text: previous.text + part.text };
    } else if (part.kind !== 'text' || part.text.length > 0) {
      merged.push(part);
    }
  }
  return merged;
}

export function toInterpolation(node: IRNode): IRInterpolation | undefined {
  if (node.kind !== 'binary' || node.op !== '<>') return undefined;
  const items = operands(node);
  const hasString = items.some((item) => isStringLiteral(item) || item.kind === 'interpolation');
  const hasOther = items.some((item) => !isStringLiteral(item));
  if (!hasString || !hasOther) return undefined;

  const result: IRInterpolation = { kind: 'interpolation', parts: merge(items.flatMap(partsOf)) };
  return node.pos ? { ...result, pos: node.pos } : result;
}

export const stringInterpolation: Pass = {
  name: 'string-interpolation',
  tier: 'cleanup',
  description: 'Rewrite `<>` concatenations of strings and values as interpolation',

  run(tree) {
    return transformBottomUp(tree, (node) => toInterpolation(node) ?? node);
  },
};
