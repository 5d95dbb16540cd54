/**
 * Closure parameter alignment
 *
 * A closure handed to a collection call is sometimes built with one
 * parameter name while its body reads another:
 *
 *   (Enum.map orders (fn (-> (o) (field order total))))
 *     =>  (Enum.map orders (fn (-> (order) (field order total))))
 *
 * The parameter is renamed only when the body has exactly one free name
 * nothing binds, and that name is used as a field receiver or passed on as
 * a call argument.
 */

import { mapArray } from '@reshape/ir';
import type { IRNode, IRFn, IRClause } from '@reshape/ir';
import { harmonize, isCollectionCall } from '@reshape/analysis';
import type { Pass, PassContext } from '../pass.js';
import { rewriteScoped } from '../walker.js';
import { reportUnapplied } from './report.js';

const ALIGN_ROLES = ['field-receiver', 'call-argument'] as const;

function alignClause(c: IRClause, visible: ReadonlySet<string>, context: PassContext, fn: IRFn): IRClause {
  const scope: IRNode[] = c.guard ? [c.guard, c.body] : [c.body];
  const { decision, result } = harmonize({
    patterns: c.patterns,
    scope,
    enclosing: visible,
    requireRole: ALIGN_ROLES,
  });
  reportUnapplied(context, decision, 'closure parameter', fn);
  if (decision.action === 'unchanged') return c;

  const [first, second] = result.scope;
  return c.guard
    ? { ...c, patterns: result.patterns, guard: first, body: second }
    : { ...c, patterns: result.patterns, body: first };
}

function alignArgs(
  args: readonly IRNode[],
  visible: ReadonlySet<string>,
  context: PassContext
): readonly IRNode[] {
  return mapArray(args, (arg) => {
    if (arg.kind !== 'fn') return arg;
    const clauses = mapArray(arg.clauses, (c) => alignClause(c, visible, context, arg));
    return clauses === arg.clauses ? arg : { ...arg, clauses };
  });
}

export const closureParameterAlignment: Pass = {
  name: 'closure-parameter-alignment',
  tier: 'semantic',
  description: 'Rename a closure parameter to the element name its body reads, for closures passed to collection calls',

  run(tree, context) {
    const modules = context.options.collectionModules;

    // the right side of `xs |> Enum.map(fn ...)` is itself a remote call,
    // so piped closures are reached here as well
    return rewriteScoped(tree, (node, scope) => {
      if (!isCollectionCall(node, modules)) return node;
      const args = alignArgs(node.args, scope.visible, context);
      return args === node.args ? node : { ...node, args };
    });
  },
};
