/**
 * Pipeline formation
 *
 *   (Enum.sum (Enum.map xs f))  =>  (|> (|> xs (Enum.map f)) (Enum.sum))
 *
 * Only remote calls nested through their first argument, at least
 * `pipelineMinDepth` deep, are rewritten. The right side of a pipe is a
 * call missing its first argument and is never rewritten itself.
 */

import { mapChildren } from '@reshape/ir';
import type { IRNode, IRRemote } from '@reshape/ir';
import type { Pass } from '../pass.js';

/** Outermost call first */
function chainOf(node: IRNode): { calls: IRRemote[]; base: IRNode } {
  const calls: IRRemote[] = [];
  let current = node;
  while (current.kind === 'remote' && current.args.length > 0) {
    calls.push(current);
    current = current.args[0];
  }
  return { calls, base: current };
}

class PipelineBuilder {
  constructor(private readonly minDepth: number) {}

  form(node: IRNode): IRNode {
    const recur = (n: IRNode): IRNode => this.form(n);

    if (node.kind === 'pipe') {
      const left = this.form(node.left);
      const right = mapChildren(node.right, recur);
      return left === node.left && right === node.right ? node : { ...node, left, right };
    }

    const { calls, base } = chainOf(node);
    if (calls.length < this.minDepth) return mapChildren(node, recur);

    let result = this.form(base);
    for (let i = calls.length - 1; i >= 0; i--) {
      const call = calls[i];
      const right: IRRemote = { ...call, args: call.args.slice(1).map(recur) };
      result = { kind: 'pipe', left: result, right };
    }
    return node.pos ? { ...result, pos: node.pos } : result;
  }
}

export const pipelineFormation: Pass = {
  name: 'pipeline-formation',
  tier: 'cleanup',
  after: ['string-interpolation'],
  description: 'Turn remote calls nested through their first argument into a pipeline',

  run(tree, context) {
    return new PipelineBuilder(context.options.pipelineMinDepth).form(tree);
  },
};
