/**
 * Scoped bottom-up rewrite
 *
 * Like transformBottomUp, but every callback also receives the scope the
 * node sits in: names visible at that point, names read after it (threaded
 * outward through enclosing blocks), and the enclosing function.
 */

import { mapArray, mapChildren, mapClause } from '@reshape/ir';
import type { IRNode, IRClause, IRWithClause, IRQualifier } from '@reshape/ir';
import { UsageIndex, NOTHING_LIVE, boundNames, boundNamesOf, extend, type LiveSet } from '@reshape/analysis';

/**
 * Enclosing named function, threaded down the walk
 */
export interface FunctionContext {
  readonly name?: string;
  readonly params: readonly string[];
}

export interface Scope {
  /** Valid for the duration of the callback only */
  readonly visible: ReadonlySet<string>;
  readonly live: LiveSet;
  readonly fn: FunctionContext;
}

export type ScopedRewriter = (node: IRNode, scope: Scope) => IRNode;

export const ROOT_SCOPE: Scope = { visible: new Set(), live: NOTHING_LIVE, fn: { params: [] } };

export function rewriteScoped(root: IRNode, leave: ScopedRewriter, scope: Scope = ROOT_SCOPE): IRNode {
  return walk(root, scope, leave);
}

function walk(node: IRNode, scope: Scope, leave: ScopedRewriter): IRNode {
  const recur = (n: IRNode, s: Scope): IRNode => walk(n, s, leave);
  const clauseIn = (c: IRClause, s: Scope): IRClause =>
    mapClause(c, (n) => recur(n, { ...s, visible: extend(s.visible, boundNamesOf(c.patterns)) }));

  switch (node.kind) {
    case 'block':
    case 'module': {
      const outer: Scope = node.kind === 'module' ? { ...scope, visible: new Set(), live: NOTHING_LIVE } : scope;
      const index = UsageIndex.build(node.body, { liveOut: outer.live });
      const visible = new Set(outer.visible);
      const body = mapArray(node.body, (statement, i) => {
        const next = recur(statement, { ...outer, visible, live: index.liveAfter(i) });
        if (statement.kind === 'bind') boundNames(statement.pattern, visible);
        return next;
      });
      return leave(body === node.body ? node : { ...node, body }, scope);
    }

    case 'def': {
      const params = boundNamesOf(node.params);
      const inner: Scope = { visible: params, live: NOTHING_LIVE, fn: { name: node.name, params: [...params] } };
      return leave(mapChildren(node, (n) => recur(n, inner)), scope);
    }

    case 'fn': {
      const inner: Scope = { ...scope, live: NOTHING_LIVE };
      const clauses = mapArray(node.clauses, (c) => clauseIn(c, inner));
      return leave(clauses === node.clauses ? node : { ...node, clauses }, scope);
    }

    case 'case': {
      const subject = recur(node.subject, scope);
      const clauses = mapArray(node.clauses, (c) => clauseIn(c, scope));
      return leave(subject === node.subject && clauses === node.clauses ? node : { ...node, subject, clauses }, scope);
    }

    case 'receive': {
      const clauses = mapArray(node.clauses, (c) => clauseIn(c, scope));
      let after = node.after;
      if (node.after) {
        const timeout = recur(node.after.timeout, scope);
        const body = recur(node.after.body, scope);
        if (timeout !== node.after.timeout || body !== node.after.body) after = { timeout, body };
      }
      if (clauses === node.clauses && after === node.after) return leave(node, scope);
      return leave(after === undefined ? { ...node, clauses } : { ...node, clauses, after }, scope);
    }

    case 'try': {
      const body = recur(node.body, scope);
      const rescue = mapArray(node.rescue, (c) => clauseIn(c, scope));
      const after = node.after ? recur(node.after, scope) : undefined;
      if (body === node.body && rescue === node.rescue && after === node.after) return leave(node, scope);
      return leave(after === undefined ? { ...node, body, rescue } : { ...node, body, rescue, after }, scope);
    }

    case 'with': {
      const visible = new Set(scope.visible);
      const clauses = mapArray(node.clauses, (step): IRWithClause => {
        const value = recur(step.value, { ...scope, visible });
        boundNames(step.pattern, visible);
        const guard = step.guard ? recur(step.guard, { ...scope, visible }) : undefined;
        if (value === step.value && guard === step.guard) return step;
        return guard === undefined ? { ...step, value } : { ...step, value, guard };
      });
      const body = recur(node.body, { ...scope, visible });
      const otherwise = node.else ? mapArray(node.else, (c) => clauseIn(c, scope)) : undefined;
      if (clauses === node.clauses && body === node.body && otherwise === node.else) return leave(node, scope);
      return leave(
        otherwise === undefined ? { ...node, clauses, body } : { ...node, clauses, body, else: otherwise },
        scope
      );
    }

    case 'for': {
      const visible = new Set(scope.visible);
      const qualifiers = mapArray(node.qualifiers, (q): IRQualifier => {
        if (q.kind === 'filter') {
          const condition = recur(q.condition, { ...scope, visible });
          return condition === q.condition ? q : { ...q, condition };
        }
        const source = recur(q.source, { ...scope, visible });
        boundNames(q.pattern, visible);
        return source === q.source ? q : { ...q, source };
      });
      const into = node.into ? recur(node.into, scope) : undefined;
      const body = recur(node.body, { ...scope, visible });
      if (qualifiers === node.qualifiers && into === node.into && body === node.body) return leave(node, scope);
      return leave(into === undefined ? { ...node, qualifiers, body } : { ...node, qualifiers, into, body }, scope);
    }

    default:
      return leave(mapChildren(node, (n) => recur(n, scope)), scope);
  }
}
