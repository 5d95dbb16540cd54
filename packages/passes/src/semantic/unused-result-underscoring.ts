/**
 * Unused result underscoring
 *
 * `{evens, odds} = Enum.split_with(xs, pred)` where `odds` is never read
 * again becomes `{evens, _odds} = ...`. "Read again" covers the rest of the
 * enclosing scope, not just the block the binding sits in: the walker hands
 * each block the names its parent reads after it.
 */

import type { IRPattern } from '@reshape/ir';
import { boundNames, isAggregation, renameBinder } from '@reshape/analysis';
import type { Pass } from '../pass.js';
import { rewriteScoped } from '../walker.js';
import { rewriteStatements } from '../statements.js';

export const unusedResultUnderscoring: Pass = {
  name: 'unused-result-underscoring',
  tier: 'semantic',
  after: ['discard-vs-rebind'],
  description: 'Prefix names bound from aggregation results and never read afterwards with an underscore',

  run(tree, context) {
    const modules = context.options.collectionModules;

    return rewriteScoped(tree, (node, scope) => {
      if (node.kind !== 'block') return node;

      return rewriteStatements(node, scope, (statement, site) => {
        if (statement.kind !== 'bind' || !isAggregation(statement.value, modules)) return statement;

        const unused = (name: string): boolean => !site.index.usedFrom(site.position + 1, name);
        const names = boundNames(statement.pattern);
        let pattern: IRPattern = statement.pattern;
        for (const name of names) {
          const underscored = `_${name}`;
          if (name.startsWith('_') || names.has(underscored) || !unused(name) || !unused(underscored)) continue;
          pattern = renameBinder(pattern, name, underscored);
        }
        return pattern === statement.pattern ? statement : { ...statement, pattern };
      });
    });
  },
};
