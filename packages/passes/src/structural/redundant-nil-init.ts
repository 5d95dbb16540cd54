/**
 * Drop `x = nil` when the next statement that mentions x rebinds it
 * without reading it first
 */

import { transformBottomUp } from '@reshape/ir';
import type { IRNode } from '@reshape/ir';
import { UsageIndex } from '@reshape/analysis';
import type { Pass } from '../pass.js';

function nilInitName(statement: IRNode): string | undefined {
  if (statement.kind !== 'bind' || statement.pattern.kind !== 'var') return undefined;
  const value = statement.value;
  return value.kind === 'literal' && value.literal.type === 'nil' ? statement.pattern.name : undefined;
}

export const redundantNilInit: Pass = {
  name: 'redundant-nil-init',
  tier: 'structural',
  after: ['early-return'],
  description: 'Remove nil initializations that are overwritten before being read',

  run(tree) {
    return transformBottomUp(tree, (node) => {
      if (node.kind !== 'block' || !node.body.some((s) => nilInitName(s) !== undefined)) return node;

      const index = UsageIndex.build(node.body);
      const body = node.body.filter((statement, i) => {
        const name = nilInitName(statement);
        if (name === undefined || i === node.body.length - 1) return true;
        const write = index.nextWrite(i + 1, name);
        if (write === undefined) return true;
        const read = index.nextRead(i + 1, name);
        return read !== undefined && read <= write;
      });
      return body.length === node.body.length ? node : { ...node, body };
    });
  },
};
