/**
 * Binder/Reference Harmonizer
 *
 * Given binding patterns and the scope they govern, finds names the scope
 * reads but nothing declares. When exactly one such name exists and exactly
 * one binder is unread, the binder is renamed to it. Anything less certain
 * is left alone.
 */

import { subPatterns } from '@reshape/ir';
import type { IRNode, IRPattern, PatternVar } from '@reshape/ir';
import { boundNamesOf, declaredInSubtree, referencedNamesOf } from './scope.js';
import { usageRoles, usageShape, shapesCompatible, type UsageRole } from './shape.js';
import { applyRename, type RenameTarget } from './rename.js';

export interface BinderAnalysis {
  patterns: readonly IRPattern[];
  scope: readonly IRNode[];
  /** Names visible from enclosing scopes; never treated as undefined */
  enclosing?: ReadonlySet<string>;
  /** Restricts which unread binders may be renamed */
  candidates?: (binder: PatternVar) => boolean;
  /** First listed name wins when several names are undefined */
  tieBreak?: readonly string[];
  /** Promote `_x` to `x` when `x` is undefined, whatever else is */
  preferBareName?: boolean;
  /** The undefined name must be used in one of these roles */
  requireRole?: readonly UsageRole[];
}

export type UnchangedReason = 'consistent' | 'ambiguous' | 'no-candidate' | 'shape-mismatch';

export type BinderDecision =
  | { action: 'unchanged'; reason: UnchangedReason; undefinedNames: string[] }
  | { action: 'rename'; from: string; to: string };

/**
 * Names read in `scope` that neither the patterns, the scope itself nor the
 * enclosing scopes declare, in first-read order
 */
export function undefinedNames(
  patterns: readonly IRPattern[],
  scope: readonly IRNode[],
  enclosing: ReadonlySet<string> = new Set()
): string[] {
  const declared = boundNamesOf(patterns);
  for (const node of scope) declaredInSubtree(node, declared);
  return [...referencedNamesOf(scope)].filter((name) => !declared.has(name) && !enclosing.has(name));
}

export function analyzeBinders(input: BinderAnalysis): BinderDecision {
  const missing = undefinedNames(input.patterns, input.scope, input.enclosing);
  if (missing.length === 0) return { action: 'unchanged', reason: 'consistent', undefinedNames: missing };

  const used = referencedNamesOf(input.scope);
  const eligible = input.candidates ?? (() => true);
  const candidates = input.patterns
    .flatMap(collectVarBinders)
    .filter((binder) => !used.has(binder.name) && eligible(binder));

  if (input.preferBareName) {
    for (const binder of candidates) {
      const bare = binder.name.replace(/^_+/, '');
      if (bare !== binder.name && bare.length > 0 && missing.includes(bare)) {
        return checkShape(binder, bare, input, missing);
      }
    }
  }

  if (candidates.length === 0) return { action: 'unchanged', reason: 'no-candidate', undefinedNames: missing };

  let target: string | undefined;
  if (missing.length === 1) {
    target = missing[0];
  } else if (input.tieBreak) {
    target = input.tieBreak.find((name) => missing.includes(name));
  }
  if (target === undefined || candidates.length > 1) {
    return { action: 'unchanged', reason: 'ambiguous', undefinedNames: missing };
  }

  if (input.requireRole) {
    const roles = usageRoles(target, input.scope);
    if (!input.requireRole.some((role) => roles.has(role))) {
      return { action: 'unchanged', reason: 'no-candidate', undefinedNames: missing };
    }
  }

  return checkShape(candidates[0], target, input, missing);
}

function checkShape(binder: PatternVar, target: string, input: BinderAnalysis, missing: string[]): BinderDecision {
  if (!shapesCompatible(binder.shape, usageShape(target, input.scope))) {
    return { action: 'unchanged', reason: 'shape-mismatch', undefinedNames: missing };
  }
  return { action: 'rename', from: binder.name, to: target };
}

/**
 * Analyze and, when the decision is a rename, apply it
 */
export function harmonize(input: BinderAnalysis): { decision: BinderDecision; result: RenameTarget } {
  const decision = analyzeBinders(input);
  if (decision.action === 'unchanged') {
    return { decision, result: { patterns: input.patterns, scope: input.scope } };
  }
  return { decision, result: applyRename(input, decision.from, decision.to) };
}

function collectVarBinders(pattern: IRPattern): PatternVar[] {
  if (pattern.kind === 'var') return pattern.name === '_' ? [] : [pattern];
  return subPatterns(pattern).flatMap(collectVarBinders);
}
