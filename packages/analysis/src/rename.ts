/**
 * Scope-aware renaming
 *
 * Rewrites reads of one name into another, following the same scoping rules
 * as freeVariables: the walk stops wherever an inner binder rebinds the old
 * name, and never enters a `def` (its body cannot see outer names).
 */

import { mapArray, mapChildren, mapSubPatterns } from '@reshape/ir';
import type { IRNode, IRPattern, IRClause, IRWithClause, IRQualifier } from '@reshape/ir';
import { boundNames, boundNamesOf } from './scope.js';
import { replaceIdentifier } from './identifiers.js';

/**
 * Rename the binders `from` inside a pattern. Pins are reads and stay.
 */
export function renameBinder(pattern: IRPattern, from: string, to: string): IRPattern {
  if (pattern.kind === 'var') return pattern.name === from ? { ...pattern, name: to } : pattern;
  if (pattern.kind === 'alias') {
    const inner = renameBinder(pattern.pattern, from, to);
    if (pattern.name !== from && inner === pattern.pattern) return pattern;
    return { ...pattern, name: pattern.name === from ? to : pattern.name, pattern: inner };
  }
  return mapSubPatterns(pattern, (sub) => renameBinder(sub, from, to));
}

/**
 * Rename the reads inside a pattern: pins and segment sizes
 */
export function renamePatternReads(pattern: IRPattern, from: string, to: string): IRPattern {
  if (pattern.kind === 'pin') return pattern.name === from ? { ...pattern, name: to } : pattern;
  if (pattern.kind === 'binary') {
    const segments = mapArray(pattern.segments, (segment) => {
      const pat = renamePatternReads(segment.pattern, from, to);
      const size = segment.size ? renameInScope(segment.size, from, to) : undefined;
      if (pat === segment.pattern && size === segment.size) return segment;
      return size === undefined ? { ...segment, pattern: pat } : { ...segment, pattern: pat, size };
    });
    return segments === pattern.segments ? pattern : { ...pattern, segments };
  }
  return mapSubPatterns(pattern, (sub) => renamePatternReads(sub, from, to));
}

/**
 * Rename free reads of `from` to `to` inside `node`
 */
export function renameInScope(node: IRNode, from: string, to: string): IRNode {
  if (from === to) return node;
  const recur = (n: IRNode): IRNode => renameInScope(n, from, to);

  switch (node.kind) {
    case 'var':
      return node.name === from ? { ...node, name: to } : node;

    case 'opaque': {
      const text = replaceIdentifier(node.text, from, to);
      return text === node.text ? node : { ...node, text };
    }

    case 'def':
      return node;

    case 'block': {
      const body = renameSequence(node.body, from, to);
      return body === node.body ? node : { ...node, body };
    }

    case 'bind': {
      const value = recur(node.value);
      const pattern = renamePatternReads(node.pattern, from, to);
      return value === node.value && pattern === node.pattern ? node : { ...node, pattern, value };
    }

    case 'case': {
      const subject = recur(node.subject);
      const clauses = renameClauses(node.clauses, from, to);
      return subject === node.subject && clauses === node.clauses ? node : { ...node, subject, clauses };
    }

    case 'fn': {
      const clauses = renameClauses(node.clauses, from, to);
      return clauses === node.clauses ? node : { ...node, clauses };
    }

    case 'receive': {
      const clauses = renameClauses(node.clauses, from, to);
      let after = node.after;
      if (node.after) {
        const timeout = recur(node.after.timeout);
        const body = recur(node.after.body);
        if (timeout !== node.after.timeout || body !== node.after.body) after = { timeout, body };
      }
      if (clauses === node.clauses && after === node.after) return node;
      return after === undefined ? { ...node, clauses } : { ...node, clauses, after };
    }

    case 'try': {
      const body = recur(node.body);
      const rescue = renameClauses(node.rescue, from, to);
      const after = node.after ? recur(node.after) : undefined;
      if (body === node.body && rescue === node.rescue && after === node.after) return node;
      return after === undefined ? { ...node, body, rescue } : { ...node, body, rescue, after };
    }

    case 'with': {
      let shadowed = false;
      const clauses = mapArray(node.clauses, (step): IRWithClause => {
        if (shadowed) return step;
        const value = recur(step.value);
        const pattern = renamePatternReads(step.pattern, from, to);
        shadowed = boundNames(step.pattern).has(from);
        const guard = step.guard && !shadowed ? recur(step.guard) : step.guard;
        if (value === step.value && pattern === step.pattern && guard === step.guard) return step;
        return { ...step, pattern, value, ...(guard ? { guard } : {}) };
      });
      const body = shadowed ? node.body : recur(node.body);
      const otherwise = node.else ? renameClauses(node.else, from, to) : undefined;
      if (clauses === node.clauses && body === node.body && otherwise === node.else) return node;
      return otherwise === undefined ? { ...node, clauses, body } : { ...node, clauses, body, else: otherwise };
    }

    case 'for': {
      let shadowed = false;
      const qualifiers = mapArray(node.qualifiers, (q): IRQualifier => {
        if (shadowed) return q;
        if (q.kind === 'filter') {
          const condition = recur(q.condition);
          return condition === q.condition ? q : { ...q, condition };
        }
        const source = recur(q.source);
        const pattern = renamePatternReads(q.pattern, from, to);
        shadowed = boundNames(q.pattern).has(from);
        return source === q.source && pattern === q.pattern ? q : { ...q, pattern, source };
      });
      const into = node.into ? recur(node.into) : undefined;
      const body = shadowed ? node.body : recur(node.body);
      if (qualifiers === node.qualifiers && into === node.into && body === node.body) return node;
      return into === undefined ? { ...node, qualifiers, body } : { ...node, qualifiers, into, body };
    }

    case 'module':
      return node;

    default:
      return mapChildren(node, recur);
  }
}

/**
 * Rename through a statement sequence, stopping after the statement that
 * rebinds `from`
 */
export function renameSequence(statements: readonly IRNode[], from: string, to: string): readonly IRNode[] {
  let shadowed = false;
  return mapArray(statements, (statement) => {
    if (shadowed) return statement;
    const next = renameInScope(statement, from, to);
    if (statement.kind === 'bind' && boundNames(statement.pattern).has(from)) shadowed = true;
    return next;
  });
}

function renameClauses(clauses: readonly IRClause[], from: string, to: string): readonly IRClause[] {
  return mapArray(clauses, (c) => {
    const patterns = mapArray(c.patterns, (pattern) => renamePatternReads(pattern, from, to));
    if (boundNamesOf(c.patterns).has(from)) {
      return patterns === c.patterns ? c : { ...c, patterns };
    }
    const guard = c.guard ? renameInScope(c.guard, from, to) : undefined;
    const body = renameInScope(c.body, from, to);
    if (patterns === c.patterns && guard === c.guard && body === c.body) return c;
    return guard === undefined ? { ...c, patterns, body } : { ...c, patterns, guard, body };
  });
}

export interface RenameTarget {
  patterns: readonly IRPattern[];
  scope: readonly IRNode[];
}

/**
 * Rename a binder together with every in-scope read of it
 */
export function applyRename(target: RenameTarget, from: string, to: string): RenameTarget {
  return {
    patterns: mapArray(target.patterns, (pattern) => renameBinder(pattern, from, to)),
    scope: mapArray(target.scope, (node) => renameInScope(node, from, to)),
  };
}
