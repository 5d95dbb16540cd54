/**
 * Diagnostics for harmonizer decisions that were not applied
 */

import type { IRNode } from '@reshape/ir';
import type { BinderDecision } from '@reshape/analysis';
import type { PassContext } from '../pass.js';

export function reportUnapplied(context: PassContext, decision: BinderDecision, site: string, node: IRNode): void {
  if (decision.action !== 'unchanged') return;
  if (decision.reason === 'ambiguous') {
    context.report({
      severity: 'info',
      code: 'ambiguous-rename',
      message: `${site}: left unchanged, several names are undefined (${decision.undefinedNames.join(', ')})`,
      pos: node.pos,
    });
  } else if (decision.reason === 'shape-mismatch') {
    context.report({
      severity: 'info',
      code: 'shape-mismatch',
      message: `${site}: rename to ${decision.undefinedNames.join(', ')} rejected, value shapes differ`,
      pos: node.pos,
    });
  }
}
