import { dump } from '@reshape/ir';
import type { IRNode } from '@reshape/ir';
import type { Diagnostic } from '@reshape/analysis';
import { resolveOptions, type NormalizeOptions } from '../src/options.js';
import type { Pass, PassContext } from '../src/pass.js';

export interface PassRun {
  tree: IRNode;
  text: string;
  diagnostics: Array<Omit<Diagnostic, 'pass'>>;
}

/**
 * Run a single pass outside the scheduler
 */
export function runPass(pass: Pass, tree: IRNode, options?: NormalizeOptions): PassRun {
  const diagnostics: Array<Omit<Diagnostic, 'pass'>> = [];
  const context: PassContext = {
    options: resolveOptions(options),
    report: (diagnostic) => {
      diagnostics.push(diagnostic);
    },
  };
  const result = pass.run(tree, context);
  return { tree: result, text: dump(result), diagnostics };
}
