/**
 * Reserved word sanitization
 *
 * A variable called `case` or `end` does not compile. Every binder,
 * reference and pin with a reserved name is renamed, tree-wide and
 * consistently, by appending the configured suffix until the result is
 * neither reserved nor already used in the tree. Function names, atoms,
 * fields, keys, strings and opaque text are not variables and stay.
 */

import { mapArray, mapSubPatterns, subPatterns, transformBottomUp, traverse } from '@reshape/ir';
import type { IRNode, IRPattern, IRClause } from '@reshape/ir';
import { scanIdentifiers } from '@reshape/analysis';
import type { Pass } from '../pass.js';

type Renames = ReadonlyMap<string, string>;

function clausePatterns(clauses: readonly IRClause[]): IRPattern[] {
  return clauses.flatMap((c) => [...c.patterns]);
}

/** Patterns held directly by a node */
function patternsOf(node: IRNode): IRPattern[] {
  switch (node.kind) {
    case 'bind':
      return [node.pattern];
    case 'def':
      return [...node.params];
    case 'case':
    case 'fn':
    case 'receive':
      return clausePatterns(node.clauses);
    case 'try':
      return clausePatterns(node.rescue);
    case 'with':
      return [...node.clauses.map((step) => step.pattern), ...clausePatterns(node.else ?? [])];
    case 'for':
      return node.qualifiers.flatMap((q) => (q.kind === 'generator' ? [q.pattern] : []));
    default:
      return [];
  }
}

function mapClausePatterns(clauses: readonly IRClause[], f: (p: IRPattern) => IRPattern): readonly IRClause[] {
  return mapArray(clauses, (c) => {
    const patterns = mapArray(c.patterns, f);
    return patterns === c.patterns ? c : { ...c, patterns };
  });
}

/** Rebuild a node with its directly held patterns passed through `f` */
function mapPatterns(node: IRNode, f: (p: IRPattern) => IRPattern): IRNode {
  switch (node.kind) {
    case 'bind': {
      const pattern = f(node.pattern);
      return pattern === node.pattern ? node : { ...node, pattern };
    }
    case 'def': {
      const params = mapArray(node.params, f);
      return params === node.params ? node : { ...node, params };
    }
    case 'case':
    case 'fn':
    case 'receive': {
      const clauses = mapClausePatterns(node.clauses, f);
      return clauses === node.clauses ? node : { ...node, clauses };
    }
    case 'try': {
      const rescue = mapClausePatterns(node.rescue, f);
      return rescue === node.rescue ? node : { ...node, rescue };
    }
    case 'with': {
      const clauses = mapArray(node.clauses, (step) => {
        const pattern = f(step.pattern);
        return pattern === step.pattern ? step : { ...step, pattern };
      });
      const otherwise = node.else ? mapClausePatterns(node.else, f) : undefined;
      if (clauses === node.clauses && otherwise === node.else) return node;
      return otherwise === undefined ? { ...node, clauses } : { ...node, clauses, else: otherwise };
    }
    case 'for': {
      const qualifiers = mapArray(node.qualifiers, (q) => {
        if (q.kind !== 'generator') return q;
        const pattern = f(q.pattern);
        return pattern === q.pattern ? q : { ...q, pattern };
      });
      return qualifiers === node.qualifiers ? node : { ...node, qualifiers };
    }
    default:
      return node;
  }
}

function collectPatternNames(pattern: IRPattern, into: Set<string>): void {
  if (pattern.kind === 'var' || pattern.kind === 'alias' || pattern.kind === 'pin') into.add(pattern.name);
  if (pattern.kind === 'binary') {
    for (const segment of pattern.segments) {
      if (segment.size) collectNames(segment.size, into);
    }
  }
  for (const sub of subPatterns(pattern)) collectPatternNames(sub, into);
}

/** Every identifier in use: variables, binders, function names and opaque tokens */
function collectNames(root: IRNode, into: Set<string> = new Set()): Set<string> {
  traverse(root, (node) => {
    switch (node.kind) {
      case 'var':
      case 'call':
      case 'def':
        into.add(node.name);
        break;
      case 'opaque':
        scanIdentifiers(node.text).forEach((name) => into.add(name));
        break;
    }
    for (const pattern of patternsOf(node)) collectPatternNames(pattern, into);
  });
  return into;
}

function variableNames(root: IRNode): Set<string> {
  const names = new Set<string>();
  traverse(root, (node) => {
    if (node.kind === 'var') names.add(node.name);
    for (const pattern of patternsOf(node)) collectPatternNames(pattern, names);
  });
  return names;
}

export function planRenames(root: IRNode, reserved: readonly string[], suffix: string): Map<string, string> {
  const renames = new Map<string, string>();
  const colliding = [...variableNames(root)].filter((name) => reserved.includes(name));
  if (colliding.length === 0 || suffix.length === 0) return renames;

  const taken = collectNames(root);
  for (const name of colliding) {
    let candidate = name + suffix;
    while (reserved.includes(candidate) || taken.has(candidate)) candidate += suffix;
    taken.add(candidate);
    renames.set(name, candidate);
  }
  return renames;
}

function renamePattern(pattern: IRPattern, renames: Renames): IRPattern {
  const renamed = (name: string): string => renames.get(name) ?? name;
  switch (pattern.kind) {
    case 'var':
    case 'pin':
      return renames.has(pattern.name) ? { ...pattern, name: renamed(pattern.name) } : pattern;
    case 'alias': {
      const inner = renamePattern(pattern.pattern, renames);
      if (!renames.has(pattern.name) && inner === pattern.pattern) return pattern;
      return { ...pattern, name: renamed(pattern.name), pattern: inner };
    }
    case 'binary': {
      const segments = mapArray(pattern.segments, (segment) => {
        const inner = renamePattern(segment.pattern, renames);
        const size = segment.size ? renameTree(segment.size, renames) : undefined;
        if (inner === segment.pattern && size === segment.size) return segment;
        return size === undefined ? { ...segment, pattern: inner } : { ...segment, pattern: inner, size };
      });
      return segments === pattern.segments ? pattern : { ...pattern, segments };
    }
    default:
      return mapSubPatterns(pattern, (sub) => renamePattern(sub, renames));
  }
}

function renameTree(root: IRNode, renames: Renames): IRNode {
  return transformBottomUp(root, (node) => {
    if (node.kind === 'var') {
      const name = renames.get(node.name);
      return name === undefined ? node : { ...node, name };
    }
    return mapPatterns(node, (pattern) => renamePattern(pattern, renames));
  });
}

export const reservedWordSanitization: Pass = {
  name: 'reserved-word-sanitization',
  tier: 'cleanup',
  description: 'Suffix variables named after reserved words, in binders and references alike',

  run(tree, context) {
    const { reservedWords, reservedSuffix } = context.options;
    const renames = planRenames(tree, reservedWords, reservedSuffix);
    return renames.size === 0 ? tree : renameTree(tree, renames);
  },
};
