/**
 * A block holding one expression is that expression; an empty one is nil
 */

import { nil, transformBottomUp } from '@reshape/ir';
import type { Pass } from '../pass.js';

export const blockUnwrap: Pass = {
  name: 'block-unwrap',
  tier: 'cleanup',
  description: 'Replace single-statement blocks with their statement and empty blocks with nil',

  run(tree) {
    return transformBottomUp(tree, (node) => {
      if (node.kind !== 'block' || node.body.length > 1) return node;
      return node.body.length === 1 ? node.body[0] : nil();
    });
  },
};
