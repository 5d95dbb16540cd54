/**
 * Pass Scheduler - validates the pass list once, then runs it in order
 */

import type { IRNode } from '@reshape/ir';
import { DiagnosticCollector, type Diagnostic, type DiagnosticSink } from '@reshape/analysis';
import { TIERS, type Pass, type PassContext } from './pass.js';
import { resolveOptions, type NormalizeOptions, type ResolvedOptions } from './options.js';
import { checkInvariants } from './invariants.js';

/**
 * The pass list violates tier order, names or dependencies
 */
export class PipelineConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineConfigError';
  }
}

/**
 * A pass threw; the tree cannot be trusted past this point
 */
export class PipelineError extends Error {
  constructor(
    public passName: string,
    cause: unknown
  ) {
    super(`Pass ${passName} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'PipelineError';
  }
}

export interface NormalizeResult {
  tree: IRNode;
  diagnostics: Diagnostic[];
}

export interface Pipeline {
  readonly passes: readonly Pass[];
  readonly options: ResolvedOptions;
  /** Run every enabled pass; diagnostics go to `sink` as well as the result */
  run(tree: IRNode, sink?: DiagnosticSink): NormalizeResult;
}

export function validatePasses(passes: readonly Pass[], options: ResolvedOptions): void {
  const seen = new Set<string>();
  let tier = 0;

  for (const pass of passes) {
    const rank = TIERS.indexOf(pass.tier);
    if (rank < 0) {
      throw new PipelineConfigError(`Pass ${pass.name} has unknown tier "${pass.tier}"`);
    }
    if (rank < tier) {
      throw new PipelineConfigError(
        `Pass ${pass.name} (${pass.tier}) is scheduled after a ${TIERS[tier]} pass`
      );
    }
    if (seen.has(pass.name)) {
      throw new PipelineConfigError(`Pass ${pass.name} is registered twice`);
    }
    for (const dependency of pass.after ?? []) {
      if (!seen.has(dependency)) {
        throw new PipelineConfigError(`Pass ${pass.name} must run after ${dependency}, which is not scheduled before it`);
      }
    }
    seen.add(pass.name);
    tier = rank;
  }

  for (const name of options.disabledPasses) {
    if (!seen.has(name)) throw new PipelineConfigError(`Cannot disable unknown pass ${name}`);
  }
}

export function createPipeline(passes: readonly Pass[], options?: NormalizeOptions): Pipeline {
  const opts = resolveOptions(options);
  validatePasses(passes, opts);
  const disabled = new Set(opts.disabledPasses);
  const enabled = passes.filter((pass) => !disabled.has(pass.name));

  return {
    passes,
    options: opts,
    run(tree, sink) {
      const collector = new DiagnosticCollector();
      const forward = (diagnostic: Diagnostic): void => {
        collector.report(diagnostic);
        sink?.report(diagnostic);
      };

      let current = tree;
      for (const pass of enabled) {
        const context: PassContext = {
          options: opts,
          report: (diagnostic) => forward({ ...diagnostic, pass: pass.name }),
        };
        const started = performance.now();
        try {
          current = pass.run(current, context);
        } catch (error) {
          throw new PipelineError(pass.name, error);
        }
        if (opts.trace) {
          console.debug(`[reshape] ${pass.tier}/${pass.name} ${(performance.now() - started).toFixed(2)}ms`);
        }
      }

      if (opts.verify) checkInvariants(current, { report: forward });

      return { tree: current, diagnostics: collector.diagnostics };
    },
  };
}
