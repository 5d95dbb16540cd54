/**
 * Align unread function parameters with the single name the body reads
 * but never binds
 */

import { transformBottomUp } from '@reshape/ir';
import type { IRNode } from '@reshape/ir';
import { harmonize } from '@reshape/analysis';
import type { Pass } from '../pass.js';
import { reportUnapplied } from './report.js';

export const parameterHarmonization: Pass = {
  name: 'parameter-harmonization',
  tier: 'semantic',
  description: 'Rename an unread def parameter to the single undefined name its body reads',

  run(tree, context) {
    return transformBottomUp(tree, (node) => {
      if (node.kind !== 'def') return node;

      const scope: IRNode[] = node.guard ? [node.guard, node.body] : [node.body];
      const { decision, result } = harmonize({ patterns: node.params, scope });
      reportUnapplied(context, decision, `parameters of ${node.name}`, node);
      if (decision.action === 'unchanged') return node;

      const [first, second] = result.scope;
      return node.guard
        ? { ...node, params: result.patterns, guard: first, body: second }
        : { ...node, params: result.patterns, body: first };
    });
  },
};
