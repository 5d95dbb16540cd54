/**
 * Output invariants
 *
 * Violations are defects in pass coverage. They are reported, never repaired
 * here: the target toolchain would reject the generated code.
 */

import { traverse } from '@reshape/ir';
import type { IRNode } from '@reshape/ir';
import { freeVariables, UsageIndex, type DiagnosticSink } from '@reshape/analysis';
import { rewriteScoped } from './walker.js';

export interface InvariantOptions {
  /** Names provided by the surrounding compilation unit */
  bound?: ReadonlySet<string>;
}

/**
 * Report unbound references, unused bare literals, unread rebinds and
 * early returns left flagged. Returns the number of error diagnostics.
 */
export function checkInvariants(tree: IRNode, sink: DiagnosticSink, options: InvariantOptions = {}): number {
  let errors = 0;

  for (const name of freeVariables(tree, options.bound)) {
    errors++;
    sink.report({
      severity: 'error',
      code: 'unbound-reference',
      message: `Reference to unbound name ${name}`,
      pos: firstPosOf(tree, name),
    });
  }

  traverse(tree, (node) => {
    if (node.meta?.fromEarlyReturn !== true) return;
    errors++;
    sink.report({
      severity: 'error',
      code: 'unresolved-early-return',
      message: 'Early return still flagged; its branch does not end the function',
      pos: node.pos,
    });
  });

  rewriteScoped(tree, (node, scope) => {
    if (node.kind !== 'block') return node;
    const index = UsageIndex.build(node.body, { liveOut: scope.live });

    node.body.forEach((statement, i) => {
      if (i === node.body.length - 1) return;
      if (statement.kind === 'literal') {
        errors++;
        sink.report({
          severity: 'error',
          code: 'unused-literal',
          message: `Unused literal in statement position ${i}`,
          pos: statement.pos,
        });
      } else if (
        statement.kind === 'bind' &&
        statement.pattern.kind === 'var' &&
        !statement.pattern.name.startsWith('_') &&
        !index.readBeforeRebind(i + 1, statement.pattern.name)
      ) {
        sink.report({
          severity: 'warning',
          code: 'unused-binding',
          message: `Variable ${statement.pattern.name} is bound but never read`,
          pos: statement.pos,
        });
      }
    });
    return node;
  });

  return errors;
}

function firstPosOf(tree: IRNode, name: string): IRNode['pos'] {
  let pos: IRNode['pos'];
  traverse(tree, (node) => {
    if (!pos && node.kind === 'var' && node.name === name) pos = node.pos;
  });
  return pos;
}
