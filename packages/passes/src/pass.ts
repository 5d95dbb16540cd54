/**
 * Pass contract
 */

import type { IRNode } from '@reshape/ir';
import type { Diagnostic } from '@reshape/analysis';
import type { ResolvedOptions } from './options.js';

/**
 * Ordered groups: control-flow reconstruction, then binder harmonization,
 * then cleanup. A later tier relies on what earlier tiers established.
 */
export type Tier = 'structural' | 'semantic' | 'cleanup';

export const TIERS: readonly Tier[] = ['structural', 'semantic', 'cleanup'];

export interface PassContext {
  readonly options: ResolvedOptions;
  /** Report through the pipeline's diagnostics sink, tagged with the pass name */
  report(diagnostic: Omit<Diagnostic, 'pass'>): void;
}

export interface Pass {
  readonly name: string;
  readonly tier: Tier;
  /** Passes that must run earlier */
  readonly after?: readonly string[];
  readonly description: string;
  run(tree: IRNode, context: PassContext): IRNode;
}
