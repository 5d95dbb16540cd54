/**
 * Scope Walker - binder extraction and name collection
 *
 * Block bindings are visible to the later statements of the same block.
 * Clause, fn and comprehension bindings stay inside their construct, and a
 * `def` body sees its parameters only.
 */

import { children, subPatterns, traverse } from '@reshape/ir';
import type { IRNode, IRPattern, IRClause } from '@reshape/ir';
import { scanIdentifiers } from './identifiers.js';

/**
 * Names a pattern introduces. Alias names count, pins and `_` do not.
 */
export function boundNames(pattern: IRPattern, into: Set<string> = new Set()): Set<string> {
  switch (pattern.kind) {
    case 'var':
      if (pattern.name !== '_') into.add(pattern.name);
      return into;
    case 'alias':
      into.add(pattern.name);
      return boundNames(pattern.pattern, into);
    default:
      for (const sub of subPatterns(pattern)) boundNames(sub, into);
      return into;
  }
}

export function boundNamesOf(patterns: readonly IRPattern[]): Set<string> {
  const names = new Set<string>();
  for (const pattern of patterns) boundNames(pattern, names);
  return names;
}

/**
 * Names a pattern reads: pinned names and binary segment sizes
 */
export function patternReads(pattern: IRPattern, into: Set<string> = new Set()): Set<string> {
  if (pattern.kind === 'pin') {
    into.add(pattern.name);
    return into;
  }
  if (pattern.kind === 'binary') {
    for (const segment of pattern.segments) {
      if (segment.size) referencedNames(segment.size, undefined, into);
    }
  }
  for (const sub of subPatterns(pattern)) patternReads(sub, into);
  return into;
}

/**
 * Every name bound anywhere inside `node`, regardless of nesting
 */
export function declaredInSubtree(node: IRNode, into: Set<string> = new Set()): Set<string> {
  traverse(node, (n) => {
    switch (n.kind) {
      case 'bind':
        boundNames(n.pattern, into);
        break;
      case 'case':
      case 'fn':
      case 'receive':
        for (const c of n.clauses) boundNamesOf(c.patterns).forEach((name) => into.add(name));
        break;
      case 'try':
        for (const c of n.rescue) boundNamesOf(c.patterns).forEach((name) => into.add(name));
        break;
      case 'def':
        for (const param of n.params) boundNames(param, into);
        break;
      case 'with':
        for (const step of n.clauses) boundNames(step.pattern, into);
        for (const c of n.else ?? []) boundNamesOf(c.patterns).forEach((name) => into.add(name));
        break;
      case 'for':
        for (const q of n.qualifiers) {
          if (q.kind === 'generator') boundNames(q.pattern, into);
        }
        break;
    }
  });
  return into;
}

/**
 * Every name read anywhere inside `node`: variables, pins, segment sizes and
 * identifier tokens of opaque text. Scopes are not subtracted.
 */
export function referencedNames(
  node: IRNode,
  onVisit?: (node: IRNode) => void,
  into: Set<string> = new Set()
): Set<string> {
  const visit = (n: IRNode): void => {
    onVisit?.(n);
    switch (n.kind) {
      case 'var':
        into.add(n.name);
        return;
      case 'opaque':
        scanIdentifiers(n.text).forEach((name) => into.add(name));
        return;
      case 'bind':
        patternReads(n.pattern, into);
        break;
      case 'case':
      case 'fn':
      case 'receive':
        n.clauses.forEach(readClausePatterns);
        break;
      case 'try':
        n.rescue.forEach(readClausePatterns);
        break;
      case 'def':
        n.params.forEach((param) => patternReads(param, into));
        break;
      case 'with':
        n.clauses.forEach((step) => patternReads(step.pattern, into));
        (n.else ?? []).forEach(readClausePatterns);
        break;
      case 'for':
        for (const q of n.qualifiers) {
          if (q.kind === 'generator') patternReads(q.pattern, into);
        }
        break;
    }
    for (const child of children(n)) visit(child);
  };
  const readClausePatterns = (c: IRClause): void => {
    c.patterns.forEach((pattern) => patternReads(pattern, into));
  };

  visit(node);
  return into;
}

export function referencedNamesOf(nodes: readonly IRNode[]): Set<string> {
  const names = new Set<string>();
  for (const node of nodes) referencedNames(node, undefined, names);
  return names;
}

/**
 * Scope-exact free variables of `node` given the names already bound around it.
 * Opaque text is not scope-analysed and contributes nothing.
 */
export function freeVariables(node: IRNode, bound: ReadonlySet<string> = new Set()): Set<string> {
  const free = new Set<string>();
  collectFree(node, bound, free);
  return free;
}

function collectFree(node: IRNode, env: ReadonlySet<string>, free: Set<string>): void {
  const visit = (n: IRNode, scope: ReadonlySet<string>): void => collectFree(n, scope, free);

  switch (node.kind) {
    case 'var':
      if (!env.has(node.name)) free.add(node.name);
      return;

    case 'opaque':
      return;

    case 'block':
    case 'module': {
      let scope = node.kind === 'module' ? new Set<string>() : env;
      for (const statement of node.body) {
        if (statement.kind === 'bind') {
          visit(statement.value, scope);
          checkPattern(statement.pattern, scope, free);
          scope = extend(scope, boundNames(statement.pattern));
        } else {
          visit(statement, scope);
        }
      }
      return;
    }

    case 'bind':
      visit(node.value, env);
      checkPattern(node.pattern, env, free);
      return;

    case 'case':
      visit(node.subject, env);
      node.clauses.forEach((c) => clauseFree(c, env, free));
      return;

    case 'fn':
    case 'receive':
      node.clauses.forEach((c) => clauseFree(c, env, free));
      if (node.kind === 'receive' && node.after) {
        visit(node.after.timeout, env);
        visit(node.after.body, env);
      }
      return;

    case 'try':
      visit(node.body, env);
      node.rescue.forEach((c) => clauseFree(c, env, free));
      if (node.after) visit(node.after, env);
      return;

    case 'def': {
      const params = boundNamesOf(node.params);
      node.params.forEach((param) => checkPattern(param, params, free));
      if (node.guard) visit(node.guard, params);
      visit(node.body, params);
      return;
    }

    case 'with': {
      let scope = env;
      for (const step of node.clauses) {
        visit(step.value, scope);
        checkPattern(step.pattern, scope, free);
        scope = extend(scope, boundNames(step.pattern));
        if (step.guard) visit(step.guard, scope);
      }
      visit(node.body, scope);
      (node.else ?? []).forEach((c) => clauseFree(c, env, free));
      return;
    }

    case 'for': {
      let scope = env;
      for (const q of node.qualifiers) {
        if (q.kind === 'generator') {
          visit(q.source, scope);
          checkPattern(q.pattern, scope, free);
          scope = extend(scope, boundNames(q.pattern));
        } else {
          visit(q.condition, scope);
        }
      }
      if (node.into) visit(node.into, env);
      visit(node.body, scope);
      return;
    }

    default:
      for (const child of children(node)) visit(child, env);
  }
}

function clauseFree(c: IRClause, env: ReadonlySet<string>, free: Set<string>): void {
  c.patterns.forEach((pattern) => checkPattern(pattern, env, free));
  const scope = extend(env, boundNamesOf(c.patterns));
  if (c.guard) collectFree(c.guard, scope, free);
  collectFree(c.body, scope, free);
}

/** Pins resolve outside the pattern; segment sizes may use earlier segments */
function checkPattern(pattern: IRPattern, env: ReadonlySet<string>, free: Set<string>): void {
  if (pattern.kind === 'pin') {
    if (!env.has(pattern.name)) free.add(pattern.name);
    return;
  }
  if (pattern.kind === 'binary') {
    const own = extend(env, boundNames(pattern));
    for (const segment of pattern.segments) {
      if (segment.size) collectFree(segment.size, own, free);
    }
  }
  for (const sub of subPatterns(pattern)) checkPattern(sub, env, free);
}

export function extend(scope: ReadonlySet<string>, names: Iterable<string>): Set<string> {
  const next = new Set(scope);
  for (const name of names) next.add(name);
  return next;
}
