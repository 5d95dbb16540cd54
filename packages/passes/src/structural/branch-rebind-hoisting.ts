/**
 * Branch rebind hoisting
 *
 * Bindings made inside a branch do not escape it, so an imperative
 * "assign in one branch, read after" has to become a conditional whose
 * value carries the names out:
 *
 *   (block (= x 0) (if c (= x 1)) (f x))
 *     =>  (block (= x 0) (= x (if c (block (= x 1) x) x)) (f x))
 *
 * Several names travel as a tuple. A mutation-flagged call on `x` inside a
 * branch counts as rebinding `x`. A conditional that ends a branch is
 * searched too, and carries the names out the same way.
 */

import { bind, block, pTuple, pVar, ref, tuple } from '@reshape/ir';
import type { IRNode, IRIf, IRCase, IRPattern } from '@reshape/ir';
import { boundNames, boundNamesOf } from '@reshape/analysis';
import type { Pass } from '../pass.js';
import { rewriteScoped } from '../walker.js';
import { rewriteStatements, statementsOf, lastOf } from '../statements.js';

function mutatedName(statement: IRNode): string | undefined {
  if (statement.kind !== 'call' && statement.kind !== 'remote') return undefined;
  if (!statement.meta?.mutation) return undefined;
  const first = statement.args[0];
  return first !== undefined && first.kind === 'var' ? first.name : undefined;
}

/** A conditional ending the branch, whose own branches rebind for it */
function nestedConditional(branch: IRNode): IRIf | IRCase | undefined {
  const last = lastOf(statementsOf(branch));
  return last !== undefined && (last.kind === 'if' || last.kind === 'case') ? last : undefined;
}

function reboundIn(branch: IRNode, into: string[]): void {
  const nested = nestedConditional(branch);
  for (const statement of statementsOf(branch)) {
    const names = statement.kind === 'bind' ? [...boundNames(statement.pattern)] : [];
    const mutated = mutatedName(statement);
    if (mutated !== undefined) names.push(mutated);
    for (const name of names) {
      if (!into.includes(name)) into.push(name);
    }
  }
  if (nested) branchesOf(nested).forEach((b) => reboundIn(b, into));
}

function branchesOf(node: IRIf | IRCase): IRNode[] {
  if (node.kind === 'if') return node.else ? [node.then, node.else] : [node.then];
  return node.clauses.map((c) => c.body);
}

/** A clause pattern, here or in a nested conditional, binds one of the names */
function shadows(node: IRIf | IRCase, names: readonly string[]): boolean {
  if (node.kind === 'case' && node.clauses.some((c) => names.some((name) => boundNamesOf(c.patterns).has(name)))) {
    return true;
  }
  return branchesOf(node).some((branch) => {
    const nested = nestedConditional(branch);
    return nested !== undefined && shadows(nested, names);
  });
}

function rebinds(node: IRIf | IRCase, names: readonly string[]): boolean {
  const rebound: string[] = [];
  branchesOf(node).forEach((branch) => reboundIn(branch, rebound));
  return rebound.some((name) => names.includes(name));
}

function carry(branch: IRNode, names: readonly string[]): IRNode {
  const nested = nestedConditional(branch);
  const statements = statementsOf(branch).map((statement) => {
    if (nested !== undefined && statement === nested && rebinds(nested, names)) {
      return bind(bindingPattern(names), hoist(nested, names));
    }
    const mutated = mutatedName(statement);
    return mutated !== undefined && names.includes(mutated) ? bind(mutated, statement) : statement;
  });
  return block(...statements, carried(names));
}

function carried(names: readonly string[]): IRNode {
  return names.length === 1 ? ref(names[0]) : tuple(...names.map((name) => ref(name)));
}

function bindingPattern(names: readonly string[]): IRPattern {
  return names.length === 1 ? pVar(names[0]) : pTuple(...names.map((name) => pVar(name)));
}

function hoist(node: IRIf | IRCase, names: readonly string[]): IRNode {
  if (node.kind === 'if') {
    return {
      ...node,
      then: carry(node.then, names),
      else: node.else ? carry(node.else, names) : carried(names),
    };
  }
  return { ...node, clauses: node.clauses.map((c) => ({ ...c, body: carry(c.body, names) })) };
}

export const branchRebindHoisting: Pass = {
  name: 'branch-rebind-hoisting',
  tier: 'structural',
  after: ['early-return'],
  description: 'Turn branch-local rebinds read after a conditional into the conditional\'s value',

  run(tree) {
    return rewriteScoped(tree, (node, scope) => {
      if (node.kind !== 'block') return node;

      return rewriteStatements(node, scope, (statement, site) => {
        if (site.terminal || (statement.kind !== 'if' && statement.kind !== 'case')) return statement;

        const rebound: string[] = [];
        branchesOf(statement).forEach((branch) => reboundIn(branch, rebound));
        const names = rebound.filter(
          (name) => site.visible.has(name) && site.index.usedFrom(site.position + 1, name)
        );
        if (names.length === 0) return statement;

        // a clause that rebinds the name in its pattern would carry the wrong value
        if (shadows(statement, names)) return statement;

        return { ...bind(bindingPattern(names), hoist(statement, names)), pos: statement.pos };
      });
    });
  },
};
