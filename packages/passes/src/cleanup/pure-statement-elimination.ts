/**
 * Drop side-effect-free statements whose value is discarded. Numeric and
 * nil literals are left to dead-sentinel-elimination, which reports on
 * them separately.
 */

import { transformBottomUp } from '@reshape/ir';
import { isNumericOrNil, isPure } from '@reshape/analysis';
import type { Pass } from '../pass.js';

export const pureStatementElimination: Pass = {
  name: 'pure-statement-elimination',
  tier: 'cleanup',
  after: ['dead-pure-binding'],
  description: 'Remove non-terminal statements without side effects',

  run(tree) {
    return transformBottomUp(tree, (node) => {
      if (node.kind !== 'block' && node.kind !== 'module') return node;

      const last = node.body.length - 1;
      const body = node.body.filter((statement, i) => {
        if (i === last && node.kind === 'block') return true;
        return !isPure(statement) || isNumericOrNil(statement);
      });
      return body.length === node.body.length ? node : { ...node, body };
    });
  },
};
