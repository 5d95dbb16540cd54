/**
 * Drop `x = x`. As the last statement it is reduced to `x`, which keeps the
 * block's value.
 */

import { transformBottomUp } from '@reshape/ir';
import type { IRNode } from '@reshape/ir';
import type { Pass } from '../pass.js';

function isSelfRebind(statement: IRNode): boolean {
  return (
    statement.kind === 'bind' &&
    statement.pattern.kind === 'var' &&
    statement.value.kind === 'var' &&
    statement.pattern.name === statement.value.name
  );
}

export const selfRebindRemoval: Pass = {
  name: 'self-rebind-removal',
  tier: 'cleanup',
  description: 'Remove bindings of a variable to itself',

  run(tree) {
    return transformBottomUp(tree, (node) => {
      if (node.kind !== 'block' || !node.body.some(isSelfRebind)) return node;

      const last = node.body.length - 1;
      const body = node.body.flatMap((statement, i): IRNode[] => {
        if (statement.kind !== 'bind' || !isSelfRebind(statement)) return [statement];
        return i === last ? [statement.value] : [];
      });
      return { ...node, body };
    });
  },
};
