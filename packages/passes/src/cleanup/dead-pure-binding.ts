/**
 * Dead pure binding
 *
 * `x = <pure>` with `x` never read again has no observable effect. Only
 * simple binders are considered: a destructuring bind can fail to match.
 */

import { isPure } from '@reshape/analysis';
import type { Pass } from '../pass.js';
import { rewriteScoped } from '../walker.js';
import { rewriteStatements } from '../statements.js';

export const deadPureBinding: Pass = {
  name: 'dead-pure-binding',
  tier: 'cleanup',
  description: 'Remove non-terminal bindings of side-effect-free values that are never read',

  run(tree) {
    return rewriteScoped(tree, (node, scope) => {
      if (node.kind !== 'block') return node;

      return rewriteStatements(node, scope, (statement, site) => {
        if (site.terminal || statement.kind !== 'bind' || !isPure(statement.value)) return statement;
        const { pattern } = statement;
        if (pattern.kind === 'wildcard') return [];
        if (pattern.kind === 'var' && !site.index.readBeforeRebind(site.position + 1, pattern.name)) return [];
        return statement;
      });
    });
  },
};
