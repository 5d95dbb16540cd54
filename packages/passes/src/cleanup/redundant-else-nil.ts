/**
 * An `if` without an else already yields nil
 */

import { transformBottomUp } from '@reshape/ir';
import type { Pass } from '../pass.js';

export const redundantElseNil: Pass = {
  name: 'redundant-else-nil',
  tier: 'cleanup',
  description: 'Drop `else: nil` from conditionals',

  run(tree) {
    return transformBottomUp(tree, (node) => {
      if (node.kind !== 'if' || !node.else) return node;
      if (node.else.kind !== 'literal' || node.else.literal.type !== 'nil') return node;
      const { else: _dropped, ...rest } = node;
      return rest;
    });
  },
};
