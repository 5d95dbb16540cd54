/**
 * Early-return reconstruction
 *
 * The lowering stage emits a host early return as a conditional whose
 * returning branch is flagged `fromEarlyReturn`, followed by the statements
 * that should only run when it is not taken. Those statements move into
 * every branch that falls through:
 *
 *   (block (if c (return a)) b c)  =>  (block (if c a (block b c)))
 *
 * A branch that is the return keeps just its value. A branch that only
 * contains one further down gets the statements appended and is processed
 * again, so chains of early returns nest. A binding whose value is such a
 * conditional is split the same way: the fall-through branches bind their
 * own value and continue.
 *
 *   (block (= x (case r (-> (err) (return e)) (-> (ok) v))) (f x))
 *     =>  (block (case r (-> (err) e) (-> (ok) (block (= x v) (f x)))))
 *
 * Once every return sits at the end of its function the flag is cleared.
 * A return that could not be moved there keeps its flag and is reported.
 */

import { block, children, clearMeta, findAll, mapArray, nil, transformBottomUp, traverse } from '@reshape/ir';
import type { IRNode, IRIf, IRCase, IRReceive, IRClause, IRBind } from '@reshape/ir';
import { boundNames, boundNamesOf, referencedNamesOf } from '@reshape/analysis';
import type { Pass, PassContext } from '../pass.js';
import { statementsOf, lastOf } from '../statements.js';

type Branching = IRIf | IRCase | IRReceive;

function isReturn(node: IRNode): boolean {
  return node.meta?.fromEarlyReturn === true;
}

/** A return somewhere inside, not counting nested functions */
function containsReturn(node: IRNode): boolean {
  if (isReturn(node)) return true;
  if (node.kind === 'fn' || node.kind === 'def') return false;
  return children(node).some(containsReturn);
}

/** The branch's own value is an early return */
function endsInReturn(branch: IRNode): boolean {
  if (isReturn(branch)) return true;
  const last = lastOf(statementsOf(branch));
  return branch.kind === 'block' && last !== undefined && isReturn(last);
}

function isBranching(node: IRNode): node is Branching {
  return node.kind === 'if' || node.kind === 'case' || node.kind === 'receive';
}

/** The conditional a statement hands its early return through, directly or as a bound value */
function branchingOf(statement: IRNode): Branching | undefined {
  if (isBranching(statement)) return statement;
  if (statement.kind === 'bind' && isBranching(statement.value)) return statement.value;
  return undefined;
}

function fallThroughClauses(node: Branching): readonly IRClause[] {
  return node.kind === 'if' ? [] : node.clauses.filter((c) => !endsInReturn(c.body));
}

class Reconstruction {
  /** Statements left in place, and the returns inside them, already reported */
  readonly refused = new Set<IRNode>();
  readonly reportedReturns = new Set<IRNode>();

  constructor(private readonly context: PassContext) {}

  restructure(statements: readonly IRNode[]): readonly IRNode[] {
    for (let i = 0; i < statements.length - 1; i++) {
      const statement = statements[i];

      if (isReturn(statement)) {
        this.context.report({
          severity: 'warning',
          code: 'unreachable-code',
          message: `${statements.length - 1 - i} statement(s) after an early return are unreachable and were removed`,
          pos: statements[i + 1].pos ?? statement.pos,
        });
        return statements.slice(0, i + 1);
      }

      const target = branchingOf(statement);
      if (target === undefined || this.refused.has(statement) || !containsReturn(target)) continue;

      const binding = statement.kind === 'bind' ? statement : undefined;
      const absorbed = this.absorb(statement, target, binding, statements.slice(i + 1));
      if (absorbed !== undefined) return [...statements.slice(0, i), absorbed];
    }
    return statements;
  }

  /**
   * Clause binders the moved statements would read instead of the outer
   * names they refer to now
   */
  private captured(target: Branching, binding: IRBind | undefined, rest: readonly IRNode[]): string[] {
    const reads = referencedNamesOf(rest);
    const own = binding ? boundNames(binding.pattern) : new Set<string>();
    const names = new Set<string>();
    for (const c of fallThroughClauses(target)) {
      boundNamesOf(c.patterns).forEach((name) => {
        if (reads.has(name) && !own.has(name)) names.add(name);
      });
    }
    return [...names].sort();
  }

  private absorb(
    statement: IRNode,
    target: Branching,
    binding: IRBind | undefined,
    rest: readonly IRNode[]
  ): IRNode | undefined {
    const captured = this.captured(target, binding, rest);
    if (captured.length > 0) {
      this.refused.add(statement);
      findAll(target, isReturn).forEach((node) => this.reportedReturns.add(node));
      this.context.report({
        severity: 'warning',
        code: 'unresolved-early-return',
        message: `Early return left in place: moving the statements after it into a clause would capture ${captured.join(', ')}`,
        pos: statement.pos,
      });
      return undefined;
    }

    const settled = this.restructure(rest);
    const continuation = (statements: readonly IRNode[]): IRNode[] => {
      if (!binding) return [...statements, ...settled];
      const value = lastOf(statements) ?? nil();
      return [...statements.slice(0, -1), { ...binding, value }, ...settled];
    };

    let fallsThrough = false;
    const branch = (b: IRNode): IRNode => {
      if (endsInReturn(b)) return b;
      fallsThrough = true;
      return block(...this.restructure(continuation(statementsOf(b))));
    };
    const clauses = (list: readonly IRClause[]): readonly IRClause[] =>
      mapArray(list, (c) => ({ ...c, body: branch(c.body) }));

    let result: IRNode;
    switch (target.kind) {
      case 'if':
        if (target.else) {
          result = { ...target, then: branch(target.then), else: branch(target.else) };
        } else {
          const then = branch(target.then);
          fallsThrough = true;
          result = { ...target, then, else: block(...continuation(binding ? [nil()] : [])) };
        }
        break;
      case 'case':
        result = { ...target, clauses: clauses(target.clauses) };
        break;
      case 'receive':
        result = target.after
          ? { ...target, clauses: clauses(target.clauses), after: { ...target.after, body: branch(target.after.body) } }
          : { ...target, clauses: clauses(target.clauses) };
        break;
    }

    if (!fallsThrough) {
      this.context.report({
        severity: 'warning',
        code: 'unreachable-code',
        message: `${rest.length} statement(s) after a conditional that returns on every branch are unreachable and were removed`,
        pos: rest[0]?.pos ?? statement.pos,
      });
    }
    return result;
  }
}

function settleClauses(clauses: readonly IRClause[]): readonly IRClause[] {
  return mapArray(clauses, (c) => {
    const body = settleTail(c.body);
    return body === c.body ? c : { ...c, body };
  });
}

/**
 * Clear the flag on every return whose value is the value of `node`
 */
function settleTail(node: IRNode): IRNode {
  const current = clearMeta(node, 'fromEarlyReturn');
  switch (current.kind) {
    case 'block': {
      const last = lastOf(current.body);
      if (last === undefined) return current;
      const settled = settleTail(last);
      return settled === last ? current : { ...current, body: [...current.body.slice(0, -1), settled] };
    }
    case 'bind': {
      const value = settleTail(current.value);
      return value === current.value ? current : { ...current, value };
    }
    case 'if': {
      const then = settleTail(current.then);
      const otherwise = current.else ? settleTail(current.else) : undefined;
      if (then === current.then && otherwise === current.else) return current;
      return otherwise === undefined ? { ...current, then } : { ...current, then, else: otherwise };
    }
    case 'case': {
      const clauses = settleClauses(current.clauses);
      return clauses === current.clauses ? current : { ...current, clauses };
    }
    case 'receive': {
      const clauses = settleClauses(current.clauses);
      const body = current.after ? settleTail(current.after.body) : undefined;
      if (clauses === current.clauses && body === current.after?.body) return current;
      return current.after && body ? { ...current, clauses, after: { ...current.after, body } } : { ...current, clauses };
    }
    case 'try': {
      const body = settleTail(current.body);
      const rescue = settleClauses(current.rescue);
      return body === current.body && rescue === current.rescue ? current : { ...current, body, rescue };
    }
    case 'with': {
      const body = settleTail(current.body);
      const otherwise = current.else ? settleClauses(current.else) : undefined;
      if (body === current.body && otherwise === current.else) return current;
      return otherwise === undefined ? { ...current, body } : { ...current, body, else: otherwise };
    }
    default:
      return current;
  }
}

export const earlyReturn: Pass = {
  name: 'early-return',
  tier: 'structural',
  after: ['flatten-blocks'],
  description: 'Move statements following an early-return conditional into its fall-through branches',

  run(tree, context) {
    const reconstruction = new Reconstruction(context);
    const rebuilt = transformBottomUp(tree, (node) => {
      if (node.kind !== 'block') return node;
      const body = reconstruction.restructure(node.body);
      return body === node.body ? node : { ...node, body };
    });

    const settled = settleTail(
      transformBottomUp(rebuilt, (node) => {
        if (node.kind === 'def') {
          const body = settleTail(node.body);
          return body === node.body ? node : { ...node, body };
        }
        if (node.kind === 'fn') {
          const clauses = settleClauses(node.clauses);
          return clauses === node.clauses ? node : { ...node, clauses };
        }
        return node;
      })
    );

    traverse(settled, (node) => {
      if (!isReturn(node) || reconstruction.reportedReturns.has(node)) return;
      context.report({
        severity: 'warning',
        code: 'unresolved-early-return',
        message: 'Early return could not be moved to the end of its function and is left flagged',
        pos: node.pos,
      });
    });
    return settled;
  },
};
