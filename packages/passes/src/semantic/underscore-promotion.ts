/**
 * Underscore promotion
 *
 * An underscore prefix marks a binder as unused. When the code does read
 * `_x`, the prefix is wrong: the binder and its reads become `x`, provided
 * `x` means nothing else where they are.
 */

import { mapArray } from '@reshape/ir';
import type { IRNode, IRClause, IRPattern } from '@reshape/ir';
import {
  applyRename,
  boundNames,
  boundNamesOf,
  declaredInSubtree,
  referencedNamesOf,
  renameBinder,
  renameSequence,
} from '@reshape/analysis';
import type { Pass } from '../pass.js';
import { rewriteScoped } from '../walker.js';

function promotable(name: string): string | undefined {
  const bare = name.replace(/^_+/, '');
  return bare !== name && bare.length > 0 ? bare : undefined;
}

/**
 * Whether `bare` is free to take over: not read, not bound and not visible
 * anywhere in `scope`
 */
function isFreeIn(bare: string, scope: readonly IRNode[], taken: ReadonlySet<string>): boolean {
  if (taken.has(bare) || referencedNamesOf(scope).has(bare)) return false;
  const declared = new Set<string>();
  for (const node of scope) declaredInSubtree(node, declared);
  return !declared.has(bare);
}

/**
 * Promote the binders of `patterns` whose reads in `scope` use the
 * underscored name
 */
function promoteBinders(
  patterns: readonly IRPattern[],
  scope: readonly IRNode[],
  visible: ReadonlySet<string>
): { patterns: readonly IRPattern[]; scope: readonly IRNode[] } {
  let current = { patterns, scope };
  for (const name of boundNamesOf(patterns)) {
    const bare = promotable(name);
    if (bare === undefined) continue;
    const taken = new Set([...visible, ...boundNamesOf(current.patterns)]);
    if (!isFreeIn(bare, current.scope, taken)) continue;

    const renamed = applyRename(current, name, bare);
    // reads shadowed by an inner rebinding are not reads of this binder
    if (renamed.scope.every((node, i) => node === current.scope[i])) continue;
    current = renamed;
  }
  return current;
}

function promoteClause(c: IRClause, visible: ReadonlySet<string>): IRClause {
  const scope: IRNode[] = c.guard ? [c.guard, c.body] : [c.body];
  const result = promoteBinders(c.patterns, scope, visible);
  if (result.patterns === c.patterns) return c;
  const [first, second] = result.scope;
  return c.guard ? { ...c, patterns: result.patterns, guard: first, body: second } : { ...c, patterns: result.patterns, body: first };
}

function promoteStatements(body: readonly IRNode[], visible: ReadonlySet<string>): readonly IRNode[] {
  let current = body;
  const bound = new Set(visible);

  for (let i = 0; i < current.length - 1; i++) {
    const statement = current[i];
    if (statement.kind !== 'bind') continue;

    for (const name of boundNames(statement.pattern)) {
      const bare = promotable(name);
      const latest = current[i];
      if (bare === undefined || latest.kind !== 'bind') continue;

      const rest = current.slice(i + 1);
      const taken = new Set([...bound, ...boundNames(latest.pattern)]);
      if (!isFreeIn(bare, rest, taken)) continue;
      const renamed = renameSequence(rest, name, bare);
      if (renamed === rest) continue;

      current = [...current.slice(0, i), { ...latest, pattern: renameBinder(latest.pattern, name, bare) }, ...renamed];
    }
    const settled = current[i];
    if (settled.kind === 'bind') boundNames(settled.pattern, bound);
  }
  return current;
}

export const underscorePromotion: Pass = {
  name: 'underscore-promotion',
  tier: 'semantic',
  after: ['unused-result-underscoring'],
  description: 'Drop the underscore from binders whose underscored name is read',

  run(tree) {
    return rewriteScoped(tree, (node, scope) => {
      switch (node.kind) {
        case 'block': {
          const body = promoteStatements(node.body, scope.visible);
          return body === node.body ? node : { ...node, body };
        }
        case 'def': {
          const nodes: IRNode[] = node.guard ? [node.guard, node.body] : [node.body];
          const result = promoteBinders(node.params, nodes, new Set());
          if (result.patterns === node.params) return node;
          const [first, second] = result.scope;
          return node.guard
            ? { ...node, params: result.patterns, guard: first, body: second }
            : { ...node, params: result.patterns, body: first };
        }
        case 'case':
        case 'fn':
        case 'receive': {
          const clauses = mapArray(node.clauses, (c) => promoteClause(c, scope.visible));
          return clauses === node.clauses ? node : { ...node, clauses };
        }
        case 'try': {
          const rescue = mapArray(node.rescue, (c) => promoteClause(c, scope.visible));
          return rescue === node.rescue ? node : { ...node, rescue };
        }
        default:
          return node;
      }
    });
  },
};
