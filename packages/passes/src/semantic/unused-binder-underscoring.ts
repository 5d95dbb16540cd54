/**
 * Prefix binders that are never read with an underscore, so the target
 * compiler does not flag them. Covers clause, closure and def parameters,
 * with and for steps, and statement-level bindings.
 */

import { mapArray } from '@reshape/ir';
import type { IRNode, IRClause, IRPattern, IRWithClause, IRQualifier } from '@reshape/ir';
import { boundNamesOf, patternReads, referencedNamesOf, renameBinder } from '@reshape/analysis';
import type { Pass } from '../pass.js';
import { rewriteScoped } from '../walker.js';
import { rewriteStatements } from '../statements.js';

/**
 * Rename every unread binder `x` to `_x`, unless `_x` is itself read or
 * bound alongside it
 */
function underscoreUnread(patterns: readonly IRPattern[], isRead: (name: string) => boolean): readonly IRPattern[] {
  const names = boundNamesOf(patterns);
  let current = patterns;
  for (const name of names) {
    const underscored = `_${name}`;
    if (name.startsWith('_') || isRead(name) || isRead(underscored) || names.has(underscored)) continue;
    current = mapArray(current, (pattern) => renameBinder(pattern, name, underscored));
  }
  return current;
}

function readsOf(nodes: readonly IRNode[], patterns: readonly IRPattern[]): Set<string> {
  const reads = referencedNamesOf(nodes);
  for (const pattern of patterns) patternReads(pattern, reads);
  return reads;
}

function clauseScope(c: { guard?: IRNode; body: IRNode }): IRNode[] {
  return c.guard ? [c.guard, c.body] : [c.body];
}

function underscoreClause(c: IRClause): IRClause {
  const reads = readsOf(clauseScope(c), c.patterns);
  const patterns = underscoreUnread(c.patterns, (name) => reads.has(name));
  return patterns === c.patterns ? c : { ...c, patterns };
}

function underscoreClauses(clauses: readonly IRClause[]): readonly IRClause[] {
  return mapArray(clauses, underscoreClause);
}

function underscoreWithSteps(steps: readonly IRWithClause[], body: IRNode): readonly IRWithClause[] {
  return mapArray(steps, (step, k) => {
    const later = steps.slice(k + 1);
    const nodes: IRNode[] = [
      ...(step.guard ? [step.guard] : []),
      ...later.flatMap((s) => (s.guard ? [s.value, s.guard] : [s.value])),
      body,
    ];
    const reads = readsOf(nodes, [step.pattern, ...later.map((s) => s.pattern)]);
    const [pattern] = underscoreUnread([step.pattern], (name) => reads.has(name));
    return pattern === step.pattern ? step : { ...step, pattern };
  });
}

function underscoreQualifiers(qualifiers: readonly IRQualifier[], body: IRNode): readonly IRQualifier[] {
  return mapArray(qualifiers, (q, k) => {
    if (q.kind !== 'generator') return q;
    const later = qualifiers.slice(k + 1);
    const nodes: IRNode[] = [...later.map((l) => (l.kind === 'filter' ? l.condition : l.source)), body];
    const laterPatterns = later.flatMap((l) => (l.kind === 'generator' ? [l.pattern] : []));
    const reads = readsOf(nodes, [q.pattern, ...laterPatterns]);
    const [pattern] = underscoreUnread([q.pattern], (name) => reads.has(name));
    return pattern === q.pattern ? q : { ...q, pattern };
  });
}

export const unusedBinderUnderscoring: Pass = {
  name: 'unused-binder-underscoring',
  tier: 'semantic',
  after: ['underscore-promotion'],
  description: 'Prefix never-read binders with an underscore',

  run(tree) {
    return rewriteScoped(tree, (node, scope) => {
      switch (node.kind) {
        case 'block':
          return rewriteStatements(node, scope, (statement, site) => {
            if (statement.kind !== 'bind') return statement;
            const own = patternReads(statement.pattern);
            const [pattern] = underscoreUnread(
              [statement.pattern],
              (name) => own.has(name) || site.index.readBeforeRebind(site.position + 1, name)
            );
            return pattern === statement.pattern ? statement : { ...statement, pattern };
          });

        case 'def': {
          const reads = readsOf(clauseScope(node), node.params);
          const params = underscoreUnread(node.params, (name) => reads.has(name));
          return params === node.params ? node : { ...node, params };
        }

        case 'case':
        case 'fn':
        case 'receive': {
          const clauses = underscoreClauses(node.clauses);
          return clauses === node.clauses ? node : { ...node, clauses };
        }

        case 'try': {
          const rescue = underscoreClauses(node.rescue);
          return rescue === node.rescue ? node : { ...node, rescue };
        }

        case 'with': {
          const clauses = underscoreWithSteps(node.clauses, node.body);
          const otherwise = node.else ? underscoreClauses(node.else) : undefined;
          if (clauses === node.clauses && otherwise === node.else) return node;
          return otherwise === undefined ? { ...node, clauses } : { ...node, clauses, else: otherwise };
        }

        case 'for': {
          const qualifiers = underscoreQualifiers(node.qualifiers, node.body);
          return qualifiers === node.qualifiers ? node : { ...node, qualifiers };
        }

        default:
          return node;
      }
    });
  },
};
