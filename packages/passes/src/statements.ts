/**
 * Statement-sequence helpers shared by the passes that edit blocks
 */

import type { IRNode, IRBlock } from '@reshape/ir';
import { UsageIndex, boundNames } from '@reshape/analysis';
import type { Scope } from './walker.js';

export interface StatementSite {
  readonly position: number;
  readonly terminal: boolean;
  /** Built over the statements being rewritten, live-out from the scope */
  readonly index: UsageIndex;
  /** Names visible just before the statement */
  readonly visible: ReadonlySet<string>;
}

/**
 * What to put in place of a statement: itself, a replacement, or a list
 * (empty to drop it)
 */
export type StatementEdit = IRNode | readonly IRNode[];

export function rewriteStatements(
  block: IRBlock,
  scope: Scope,
  edit: (statement: IRNode, site: StatementSite) => StatementEdit
): IRBlock {
  const index = UsageIndex.build(block.body, { liveOut: scope.live });
  const visible = new Set(scope.visible);
  const body: IRNode[] = [];
  let changed = false;

  block.body.forEach((statement, position) => {
    const result = edit(statement, {
      position,
      terminal: position === block.body.length - 1,
      index,
      visible,
    });
    if (isNodeList(result)) {
      changed = true;
      body.push(...result);
    } else {
      if (result !== statement) changed = true;
      body.push(result);
    }
    if (statement.kind === 'bind') boundNames(statement.pattern, visible);
  });

  return changed ? { ...block, body } : block;
}

function isNodeList(edit: StatementEdit): edit is readonly IRNode[] {
  return Array.isArray(edit);
}

/**
 * The statements a branch runs: a block's body, or the node itself
 */
export function statementsOf(node: IRNode): readonly IRNode[] {
  return node.kind === 'block' ? node.body : [node];
}

export function lastOf(nodes: readonly IRNode[]): IRNode | undefined {
  return nodes.length > 0 ? nodes[nodes.length - 1] : undefined;
}
