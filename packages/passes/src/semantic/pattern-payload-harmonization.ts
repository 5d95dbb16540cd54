/**
 * Pattern payload harmonization
 *
 * `{:tag, payload}` is the result/option encoding. When a clause binds the
 * payload under a name its body never reads, and the body reads exactly one
 * name nothing binds, the payload binder takes that name:
 *
 *   (case r (-> ((tuple :ok _value)) (f order)))  =>  (-> ((tuple :ok order)) (f order))
 *
 * An underscored payload `_x` whose body reads `x` is promoted outright.
 * Ties among several undefined names are broken by the configured priority
 * list, and left alone when it has none of them.
 */

import { mapArray } from '@reshape/ir';
import type { IRNode, IRClause, IRPattern, IRWithClause, PatternTuple } from '@reshape/ir';
import { boundNames, boundNamesOf, extend, harmonize } from '@reshape/analysis';
import type { Pass, PassContext } from '../pass.js';
import { rewriteScoped } from '../walker.js';
import { reportUnapplied } from './report.js';

type TaggedPayload = PatternTuple & { readonly elements: readonly [IRPattern, IRPattern] };

function isTaggedPayload(pattern: IRPattern): pattern is TaggedPayload {
  if (pattern.kind !== 'tuple' || pattern.elements.length !== 2) return false;
  const [tag, payload] = pattern.elements;
  return tag.kind === 'literal' && tag.literal.type === 'atom' && payload.kind === 'var';
}

class PayloadHarmonizer {
  constructor(
    private readonly context: PassContext,
    private readonly node: IRNode
  ) {}

  /**
   * Harmonize one tagged pattern against `scope`; returns the new pattern
   * or undefined when nothing changes
   */
  private payload(pattern: TaggedPayload, scope: readonly IRNode[], enclosing: ReadonlySet<string>): IRPattern | undefined {
    const { decision, result } = harmonize({
      patterns: [pattern.elements[1]],
      scope,
      enclosing,
      tieBreak: this.context.options.tieBreakPriority,
      preferBareName: true,
    });
    reportUnapplied(this.context, decision, 'payload binder', this.node);
    if (decision.action === 'unchanged') return undefined;
    return { ...pattern, elements: [pattern.elements[0], result.patterns[0]] };
  }

  clause(c: IRClause, visible: ReadonlySet<string>): IRClause {
    let patterns = c.patterns;
    patterns.forEach((pattern, i) => {
      if (!isTaggedPayload(pattern)) return;
      const others = patterns.filter((_, j) => j !== i);
      const enclosing = extend(visible, boundNamesOf(others));
      const scope = c.guard ? [c.guard, c.body] : [c.body];
      const next = this.payload(pattern, scope, enclosing);
      if (next) patterns = patterns.map((p, j) => (j === i ? next : p));
    });
    return patterns === c.patterns ? c : { ...c, patterns };
  }

  clauses(clauses: readonly IRClause[], visible: ReadonlySet<string>): readonly IRClause[] {
    return mapArray(clauses, (c) => this.clause(c, visible));
  }

  withSteps(steps: readonly IRWithClause[], body: IRNode, visible: ReadonlySet<string>): readonly IRWithClause[] {
    let current = steps;
    steps.forEach((step, k) => {
      if (!isTaggedPayload(step.pattern)) return;
      const earlier = current.slice(0, k);
      const later = current.slice(k + 1);
      const enclosing = extend(
        visible,
        [...earlier, ...later].flatMap((s) => [...boundNames(s.pattern)])
      );
      const scope: IRNode[] = [
        ...(step.guard ? [step.guard] : []),
        ...later.flatMap((s) => (s.guard ? [s.value, s.guard] : [s.value])),
        body,
      ];
      const next = this.payload(step.pattern, scope, enclosing);
      if (next) current = current.map((s, j) => (j === k ? { ...s, pattern: next } : s));
    });
    return current;
  }
}

export const patternPayloadHarmonization: Pass = {
  name: 'pattern-payload-harmonization',
  tier: 'semantic',
  description: 'Align {tag, payload} binders with the single undefined name their clause reads',

  run(tree, context) {
    return rewriteScoped(tree, (node, scope) => {
      const harmonizer = new PayloadHarmonizer(context, node);
      switch (node.kind) {
        case 'case':
        case 'fn':
        case 'receive': {
          const clauses = harmonizer.clauses(node.clauses, scope.visible);
          return clauses === node.clauses ? node : { ...node, clauses };
        }
        case 'try': {
          const rescue = harmonizer.clauses(node.rescue, scope.visible);
          return rescue === node.rescue ? node : { ...node, rescue };
        }
        case 'with': {
          const clauses = harmonizer.withSteps(node.clauses, node.body, scope.visible);
          const otherwise = node.else ? harmonizer.clauses(node.else, scope.visible) : undefined;
          if (clauses === node.clauses && otherwise === node.else) return node;
          return otherwise === undefined ? { ...node, clauses } : { ...node, clauses, else: otherwise };
        }
        default:
          return node;
      }
    });
  },
};
