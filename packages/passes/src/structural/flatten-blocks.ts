/**
 * Splice nested blocks in statement position into their parent
 */

import { transformBottomUp, nil } from '@reshape/ir';
import type { IRNode } from '@reshape/ir';
import type { Pass } from '../pass.js';

export const flattenBlocks: Pass = {
  name: 'flatten-blocks',
  tier: 'structural',
  description: 'Splice nested statement blocks into the enclosing block',

  run(tree) {
    return transformBottomUp(tree, (node) => {
      if (node.kind !== 'block' && node.kind !== 'module') return node;
      if (!node.body.some((statement) => statement.kind === 'block')) return node;

      const body: IRNode[] = [];
      node.body.forEach((statement, i) => {
        if (statement.kind !== 'block') {
          body.push(statement);
        } else if (statement.body.length > 0) {
          body.push(...statement.body);
        } else if (i === node.body.length - 1 && node.kind === 'block') {
          // an empty trailing block still has a value
          body.push(nil());
        }
      });
      return { ...node, body };
    });
  },
};
