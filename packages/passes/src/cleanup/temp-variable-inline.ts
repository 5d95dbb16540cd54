/**
 * `t = expr; t` at the end of a block is just `expr`
 */

import { transformBottomUp } from '@reshape/ir';
import type { IRNode } from '@reshape/ir';
import type { Pass } from '../pass.js';

function inlineTail(body: readonly IRNode[]): readonly IRNode[] {
  let current = body;
  while (current.length >= 2) {
    const last = current[current.length - 1];
    const previous = current[current.length - 2];
    if (
      last.kind !== 'var' ||
      previous.kind !== 'bind' ||
      previous.pattern.kind !== 'var' ||
      previous.pattern.name !== last.name
    ) {
      break;
    }
    current = [...current.slice(0, -2), previous.value];
  }
  return current;
}

export const tempVariableInline: Pass = {
  name: 'temp-variable-inline',
  tier: 'cleanup',
  description: 'Replace a trailing `t = expr; t` with `expr`',

  run(tree) {
    return transformBottomUp(tree, (node) => {
      if (node.kind !== 'block') return node;
      const body = inlineTail(node.body);
      return body === node.body ? node : { ...node, body };
    });
  },
};
