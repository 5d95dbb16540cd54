/**
 * Dead sentinel elimination
 *
 * Lowering leaves numeric and nil placeholders in statement position (loop
 * counters, "no value" markers). Anywhere but the last statement of a block
 * they are dead, and the target compiler rejects them.
 */

import { transformBottomUp } from '@reshape/ir';
import type { IRNode } from '@reshape/ir';
import { isNumericOrNil } from '@reshape/analysis';
import type { Pass } from '../pass.js';

function isSentinel(statement: IRNode): boolean {
  return isNumericOrNil(statement) || (statement.kind === 'literal' && statement.meta?.sentinel === true);
}

export const deadSentinelElimination: Pass = {
  name: 'dead-sentinel-elimination',
  tier: 'cleanup',
  description: 'Remove numeric, nil and sentinel literals from non-terminal statement positions',

  run(tree) {
    return transformBottomUp(tree, (node) => {
      if (node.kind !== 'block') return node;

      const last = node.body.length - 1;
      const body = node.body.filter((statement, i) => i === last || !isSentinel(statement));
      return body.length === node.body.length ? node : { ...node, body };
    });
  },
};
