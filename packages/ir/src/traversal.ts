/**
 * IR Traversal Helpers
 *
 * Generic child enumeration and rewriting. Rewrites are persistent: a
 * node whose children did not change is returned as-is, so unchanged
 * subtrees keep their identity.
 */

import type { IRNode, IRClause, IRPattern, InterpolationPart, IRQualifier, IRWithClause } from './types.js';

/**
 * Visitor function type
 */
export type Visitor = (node: IRNode, parent?: IRNode) => void;

export type Rewriter = (node: IRNode) => IRNode;

/**
 * Direct child nodes, in evaluation order
 */
export function children(node: IRNode): IRNode[] {
  switch (node.kind) {
    case 'var':
    case 'literal':
    case 'opaque':
      return [];
    case 'interpolation':
      return node.parts.flatMap((part) => (part.kind === 'expr' ? [part.expr] : []));
    case 'block':
      return [...node.body];
    case 'bind':
      return [node.value];
    case 'if':
      return node.else ? [node.condition, node.then, node.else] : [node.condition, node.then];
    case 'case':
      return [node.subject, ...node.clauses.flatMap(clauseNodes)];
    case 'fn':
      return node.clauses.flatMap(clauseNodes);
    case 'def':
      return node.guard ? [node.guard, node.body] : [node.body];
    case 'call':
    case 'remote':
      return [...node.args];
    case 'apply':
      return [node.fn, ...node.args];
    case 'field':
      return [node.target];
    case 'index':
      return [node.target, node.key];
    case 'tuple':
      return [...node.elements];
    case 'list':
      return node.tail ? [...node.elements, node.tail] : [...node.elements];
    case 'map':
      return node.entries.flatMap((entry) => [entry.key, entry.value]);
    case 'struct':
      return node.fields.map((entry) => entry.value);
    case 'update':
      return [node.target, ...node.fields.map((entry) => entry.value)];
    case 'pipe':
      return [node.left, node.right];
    case 'binary':
      return [node.left, node.right];
    case 'unary':
      return [node.operand];
    case 'with':
      return [
        ...node.clauses.flatMap((step) => (step.guard ? [step.value, step.guard] : [step.value])),
        node.body,
        ...(node.else ?? []).flatMap(clauseNodes),
      ];
    case 'for':
      return [
        ...node.qualifiers.map((q) => (q.kind === 'generator' ? q.source : q.condition)),
        ...(node.into ? [node.into] : []),
        node.body,
      ];
    case 'try':
      return [node.body, ...node.rescue.flatMap(clauseNodes), ...(node.after ? [node.after] : [])];
    case 'receive':
      return [
        ...node.clauses.flatMap(clauseNodes),
        ...(node.after ? [node.after.timeout, node.after.body] : []),
      ];
    case 'module':
      return [...node.body];
  }
}

function clauseNodes(c: IRClause): IRNode[] {
  return c.guard ? [c.guard, c.body] : [c.body];
}

/**
 * Rebuild a node with every direct child passed through `f`
 */
export function mapChildren(node: IRNode, f: Rewriter): IRNode {
  switch (node.kind) {
    case 'var':
    case 'literal':
    case 'opaque':
      return node;

    case 'interpolation': {
      const parts = mapArray(node.parts, (part): InterpolationPart => {
        if (part.kind === 'text') return part;
        const expr = f(part.expr);
        return expr === part.expr ? part : { kind: 'expr', expr };
      });
      return parts === node.parts ? node : { ...node, parts };
    }

    case 'block': {
      const body = mapArray(node.body, f);
      return body === node.body ? node : { ...node, body };
    }

    case 'bind': {
      const value = f(node.value);
      return value === node.value ? node : { ...node, value };
    }

    case 'if': {
      const condition = f(node.condition);
      const then = f(node.then);
      const otherwise = node.else ? f(node.else) : undefined;
      if (condition === node.condition && then === node.then && otherwise === node.else) return node;
      return otherwise === undefined
        ? { ...node, condition, then }
        : { ...node, condition, then, else: otherwise };
    }

    case 'case': {
      const subject = f(node.subject);
      const clauses = mapClauses(node.clauses, f);
      return subject === node.subject && clauses === node.clauses ? node : { ...node, subject, clauses };
    }

    case 'fn': {
      const clauses = mapClauses(node.clauses, f);
      return clauses === node.clauses ? node : { ...node, clauses };
    }

    case 'def': {
      const guard = node.guard ? f(node.guard) : undefined;
      const body = f(node.body);
      if (guard === node.guard && body === node.body) return node;
      return guard === undefined ? { ...node, body } : { ...node, guard, body };
    }

    case 'call':
    case 'remote': {
      const args = mapArray(node.args, f);
      return args === node.args ? node : { ...node, args };
    }

    case 'apply': {
      const target = f(node.fn);
      const args = mapArray(node.args, f);
      return target === node.fn && args === node.args ? node : { ...node, fn: target, args };
    }

    case 'field': {
      const target = f(node.target);
      return target === node.target ? node : { ...node, target };
    }

    case 'index': {
      const target = f(node.target);
      const key = f(node.key);
      return target === node.target && key === node.key ? node : { ...node, target, key };
    }

    case 'tuple': {
      const elements = mapArray(node.elements, f);
      return elements === node.elements ? node : { ...node, elements };
    }

    case 'list': {
      const elements = mapArray(node.elements, f);
      const tail = node.tail ? f(node.tail) : undefined;
      if (elements === node.elements && tail === node.tail) return node;
      return tail === undefined ? { ...node, elements } : { ...node, elements, tail };
    }

    case 'map': {
      const entries = mapArray(node.entries, (entry) => {
        const key = f(entry.key);
        const value = f(entry.value);
        return key === entry.key && value === entry.value ? entry : { key, value };
      });
      return entries === node.entries ? node : { ...node, entries };
    }

    case 'struct': {
      const fields = mapArray(node.fields, (entry) => {
        const value = f(entry.value);
        return value === entry.value ? entry : { ...entry, value };
      });
      return fields === node.fields ? node : { ...node, fields };
    }

    case 'update': {
      const target = f(node.target);
      const fields = mapArray(node.fields, (entry) => {
        const value = f(entry.value);
        return value === entry.value ? entry : { ...entry, value };
      });
      return target === node.target && fields === node.fields ? node : { ...node, target, fields };
    }

    case 'pipe': {
      const left = f(node.left);
      const right = f(node.right);
      return left === node.left && right === node.right ? node : { ...node, left, right };
    }

    case 'binary': {
      const left = f(node.left);
      const right = f(node.right);
      return left === node.left && right === node.right ? node : { ...node, left, right };
    }

    case 'unary': {
      const operand = f(node.operand);
      return operand === node.operand ? node : { ...node, operand };
    }

    case 'with': {
      const clauses = mapArray(node.clauses, (step): IRWithClause => {
        const value = f(step.value);
        const guard = step.guard ? f(step.guard) : undefined;
        if (value === step.value && guard === step.guard) return step;
        return guard === undefined ? { ...step, value } : { ...step, value, guard };
      });
      const body = f(node.body);
      const otherwise = node.else ? mapClauses(node.else, f) : undefined;
      if (clauses === node.clauses && body === node.body && otherwise === node.else) return node;
      return otherwise === undefined
        ? { ...node, clauses, body }
        : { ...node, clauses, body, else: otherwise };
    }

    case 'for': {
      const qualifiers = mapArray(node.qualifiers, (q): IRQualifier => {
        if (q.kind === 'generator') {
          const source = f(q.source);
          return source === q.source ? q : { ...q, source };
        }
        const condition = f(q.condition);
        return condition === q.condition ? q : { ...q, condition };
      });
      const into = node.into ? f(node.into) : undefined;
      const body = f(node.body);
      if (qualifiers === node.qualifiers && into === node.into && body === node.body) return node;
      return into === undefined
        ? { ...node, qualifiers, body }
        : { ...node, qualifiers, into, body };
    }

    case 'try': {
      const body = f(node.body);
      const rescue = mapClauses(node.rescue, f);
      const after = node.after ? f(node.after) : undefined;
      if (body === node.body && rescue === node.rescue && after === node.after) return node;
      return after === undefined ? { ...node, body, rescue } : { ...node, body, rescue, after };
    }

    case 'receive': {
      const clauses = mapClauses(node.clauses, f);
      let after = node.after;
      if (node.after) {
        const timeout = f(node.after.timeout);
        const body = f(node.after.body);
        if (timeout !== node.after.timeout || body !== node.after.body) after = { timeout, body };
      }
      if (clauses === node.clauses && after === node.after) return node;
      return after === undefined ? { ...node, clauses } : { ...node, clauses, after };
    }

    case 'module': {
      const body = mapArray(node.body, f);
      return body === node.body ? node : { ...node, body };
    }
  }
}

/**
 * Map guard and body of each clause; patterns are left alone
 */
export function mapClauses(clauses: readonly IRClause[], f: Rewriter): readonly IRClause[] {
  return mapArray(clauses, (c) => mapClause(c, f));
}

export function mapClause(c: IRClause, f: Rewriter): IRClause {
  const guard = c.guard ? f(c.guard) : undefined;
  const body = f(c.body);
  if (guard === c.guard && body === c.body) return c;
  return guard === undefined ? { ...c, body } : { ...c, guard, body };
}

/**
 * Map an array, returning the original array when no element changed
 */
export function mapArray<T>(items: readonly T[], f: (item: T, index: number) => T): readonly T[] {
  let result: T[] | undefined;
  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    const next = f(item, i);
    if (next !== item && !result) result = items.slice(0, i);
    if (result) result.push(next);
  }
  return result ?? items;
}

/**
 * Children first, then the node itself
 */
export function transformBottomUp(node: IRNode, f: Rewriter): IRNode {
  return f(mapChildren(node, (child) => transformBottomUp(child, f)));
}

/**
 * Traverse the tree depth-first, calling visitor on each node
 */
export function traverse(node: IRNode, visitor: Visitor, parent?: IRNode): void {
  visitor(node, parent);
  for (const child of children(node)) {
    traverse(child, visitor, node);
  }
}

/**
 * Find all nodes matching a predicate
 */
export function findAll(node: IRNode, predicate: (n: IRNode) => boolean): IRNode[] {
  const results: IRNode[] = [];
  traverse(node, (n) => {
    if (predicate(n)) results.push(n);
  });
  return results;
}

/**
 * Whether any node in the tree matches. Stops at the first hit.
 */
export function someNode(node: IRNode, predicate: (n: IRNode) => boolean): boolean {
  if (predicate(node)) return true;
  return children(node).some((child) => someNode(child, predicate));
}

/**
 * Direct sub-patterns
 */
export function subPatterns(pattern: IRPattern): IRPattern[] {
  switch (pattern.kind) {
    case 'var':
    case 'wildcard':
    case 'literal':
    case 'pin':
      return [];
    case 'tuple':
    case 'list':
      return [...pattern.elements];
    case 'cons':
      return [pattern.head, pattern.tail];
    case 'map':
      return pattern.entries.map((entry) => entry.value);
    case 'struct':
      return pattern.fields.map((entry) => entry.pattern);
    case 'alias':
      return [pattern.pattern];
    case 'binary':
      return pattern.segments.map((segment) => segment.pattern);
  }
}

/**
 * Rebuild a pattern with every direct sub-pattern passed through `f`
 */
export function mapSubPatterns(pattern: IRPattern, f: (p: IRPattern) => IRPattern): IRPattern {
  switch (pattern.kind) {
    case 'var':
    case 'wildcard':
    case 'literal':
    case 'pin':
      return pattern;
    case 'tuple':
    case 'list': {
      const elements = mapArray(pattern.elements, f);
      return elements === pattern.elements ? pattern : { ...pattern, elements };
    }
    case 'cons': {
      const head = f(pattern.head);
      const tail = f(pattern.tail);
      return head === pattern.head && tail === pattern.tail ? pattern : { ...pattern, head, tail };
    }
    case 'map': {
      const entries = mapArray(pattern.entries, (entry) => {
        const value = f(entry.value);
        return value === entry.value ? entry : { ...entry, value };
      });
      return entries === pattern.entries ? pattern : { ...pattern, entries };
    }
    case 'struct': {
      const fields = mapArray(pattern.fields, (entry) => {
        const sub = f(entry.pattern);
        return sub === entry.pattern ? entry : { ...entry, pattern: sub };
      });
      return fields === pattern.fields ? pattern : { ...pattern, fields };
    }
    case 'alias': {
      const sub = f(pattern.pattern);
      return sub === pattern.pattern ? pattern : { ...pattern, pattern: sub };
    }
    case 'binary': {
      const segments = mapArray(pattern.segments, (segment) => {
        const sub = f(segment.pattern);
        return sub === segment.pattern ? segment : { ...segment, pattern: sub };
      });
      return segments === pattern.segments ? pattern : { ...pattern, segments };
    }
  }
}
