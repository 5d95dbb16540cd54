/**
 * Shape classifier - scalar vs aggregate, from the operations around a name
 */

import { traverse } from '@reshape/ir';
import type { IRNode, Shape } from '@reshape/ir';

const SCALAR_OPS = new Set(['+', '-', '*', '/', 'div', 'rem', '<', '>', '<=', '>=', '<>']);

export type UsageRole = 'field-receiver' | 'call-argument' | 'operand';

/**
 * How `name` is used across `scope`: the roles it appears in
 */
export function usageRoles(name: string, scope: readonly IRNode[]): Set<UsageRole> {
  const roles = new Set<UsageRole>();
  for (const root of scope) {
    traverse(root, (node, parent) => {
      if (node.kind !== 'var' || node.name !== name || !parent) return;
      switch (parent.kind) {
        case 'field':
        case 'index':
        case 'update':
          if (parent.target === node) roles.add('field-receiver');
          break;
        case 'call':
        case 'remote':
          if (parent.args.includes(node)) roles.add('call-argument');
          break;
        case 'apply':
          if (parent.args.includes(node)) roles.add('call-argument');
          break;
        case 'pipe':
          if (parent.left === node) roles.add('call-argument');
          break;
        case 'binary':
          if (SCALAR_OPS.has(parent.op)) roles.add('operand');
          break;
      }
    });
  }
  return roles;
}

/**
 * Shape implied by the uses of `name`; undefined when unknown or contradictory
 */
export function usageShape(name: string, scope: readonly IRNode[]): Shape | undefined {
  const roles = usageRoles(name, scope);
  const aggregate = roles.has('field-receiver');
  const scalar = roles.has('operand');
  if (aggregate === scalar) return undefined;
  return aggregate ? 'aggregate' : 'scalar';
}

export function shapesCompatible(a: Shape | undefined, b: Shape | undefined): boolean {
  return a === undefined || b === undefined || a === b;
}
