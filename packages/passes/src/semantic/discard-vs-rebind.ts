/**
 * Discard vs rebind
 *
 * A call kept only for its effect must not leave an unused local behind.
 * A mutation-flagged call on `x` is rebound to `x` when later code reads
 * `x`, and discarded otherwise. A temporary bound from a call and never read
 * is discarded as well. Aggregation results are left to
 * unused-result-underscoring.
 */

import { bind, pVar, pWild } from '@reshape/ir';
import type { IRNode, IRPattern } from '@reshape/ir';
import { isAggregation } from '@reshape/analysis';
import type { Pass } from '../pass.js';
import { rewriteScoped } from '../walker.js';
import { rewriteStatements } from '../statements.js';

function mutationTarget(statement: IRNode): string | undefined {
  if ((statement.kind !== 'call' && statement.kind !== 'remote') || !statement.meta?.mutation) return undefined;
  const first = statement.args[0];
  return first !== undefined && first.kind === 'var' ? first.name : undefined;
}

function isCallValue(node: IRNode): boolean {
  return node.kind === 'call' || node.kind === 'remote' || node.kind === 'apply';
}

export const discardVsRebind: Pass = {
  name: 'discard-vs-rebind',
  tier: 'semantic',
  description: 'Bind effect-only calls to the discard name, or rebind a mutated variable read later',

  run(tree, context) {
    const { discardName, collectionModules } = context.options;
    const discard = (): IRPattern => (discardName === '_' ? pWild() : pVar(discardName));

    return rewriteScoped(tree, (node, scope) => {
      if (node.kind !== 'block') return node;

      return rewriteStatements(node, scope, (statement, site) => {
        if (site.terminal) return statement;

        const target = mutationTarget(statement);
        if (target !== undefined) {
          const pattern = site.index.usedFrom(site.position + 1, target) ? pVar(target) : discard();
          return { ...bind(pattern, statement), pos: statement.pos };
        }

        if (
          statement.kind === 'bind' &&
          statement.pattern.kind === 'var' &&
          !statement.pattern.name.startsWith('_') &&
          isCallValue(statement.value) &&
          !isAggregation(statement.value, collectionModules) &&
          !site.index.usedFrom(site.position + 1, statement.pattern.name)
        ) {
          return { ...statement, pattern: discard() };
        }
        return statement;
      });
    });
  },
};
