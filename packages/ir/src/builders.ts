/**
 * IR Builders - terse constructors for nodes and patterns
 */

import type {
  IRNode,
  IRVar,
  IRLiteral,
  IRBlock,
  IRBind,
  IRIf,
  IRCase,
  IRClause,
  IRFn,
  IRDef,
  IRCall,
  IRRemote,
  IRApply,
  IRField,
  IRIndex,
  IRTuple,
  IRList,
  IRMap,
  IRStruct,
  IRUpdate,
  IRPipe,
  IRBinary,
  IRUnary,
  IRWith,
  IRWithClause,
  IRFor,
  IRQualifier,
  IRTry,
  IRReceive,
  IRReceiveAfter,
  IRModule,
  IROpaque,
  IRInterpolation,
  InterpolationPart,
  IRMeta,
  IRPattern,
  Literal,
  Shape,
  PatternVar,
  PatternWildcard,
  PatternPin,
  PatternAlias,
  PatternCons,
  PatternSegment,
} from './types.js';

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

export function ref(name: string): IRVar {
  return { kind: 'var', name };
}

export function lit(literal: Literal): IRLiteral {
  return { kind: 'literal', literal };
}

export function int(value: number | bigint): IRLiteral {
  return lit({ type: 'integer', value: BigInt(value) });
}

export function float(value: number): IRLiteral {
  return lit({ type: 'float', value });
}

export function str(value: string): IRLiteral {
  return lit({ type: 'string', value });
}

export function atom(value: string): IRLiteral {
  return lit({ type: 'atom', value });
}

export function bool(value: boolean): IRLiteral {
  return lit({ type: 'boolean', value });
}

export function nil(): IRLiteral {
  return lit({ type: 'nil' });
}

export function interp(...parts: Array<string | IRNode>): IRInterpolation {
  return {
    kind: 'interpolation',
    parts: parts.map((part): InterpolationPart =>
      typeof part === 'string' ? { kind: 'text', text: part } : { kind: 'expr', expr: part }
    ),
  };
}

export function block(...body: IRNode[]): IRBlock {
  return { kind: 'block', body };
}

export function bind(pattern: IRPattern | string, value: IRNode): IRBind {
  return { kind: 'bind', pattern: typeof pattern === 'string' ? pVar(pattern) : pattern, value };
}

export function ifThen(condition: IRNode, then: IRNode, otherwise?: IRNode): IRIf {
  return otherwise === undefined
    ? { kind: 'if', condition, then }
    : { kind: 'if', condition, then, else: otherwise };
}

export function clause(patterns: IRPattern[], body: IRNode, guard?: IRNode): IRClause {
  return guard === undefined ? { patterns, body } : { patterns, guard, body };
}

export function caseOf(subject: IRNode, clauses: IRClause[]): IRCase {
  return { kind: 'case', subject, clauses };
}

export function fn(...clauses: IRClause[]): IRFn {
  return { kind: 'fn', clauses };
}

/** Single-clause anonymous function over plain variable parameters */
export function lambda(params: Array<string | IRPattern>, body: IRNode): IRFn {
  return fn(clause(params.map(toPattern), body));
}

export function def(name: string, params: Array<string | IRPattern>, body: IRNode, options: { private?: boolean; guard?: IRNode } = {}): IRDef {
  const node: IRDef = {
    kind: 'def',
    name,
    private: options.private ?? false,
    params: params.map(toPattern),
    body,
  };
  return options.guard === undefined ? node : { ...node, guard: options.guard };
}

export function call(name: string, ...args: IRNode[]): IRCall {
  return { kind: 'call', name, args };
}

export function remote(module: string, name: string, ...args: IRNode[]): IRRemote {
  return { kind: 'remote', module, name, args };
}

export function apply(target: IRNode, ...args: IRNode[]): IRApply {
  return { kind: 'apply', fn: target, args };
}

export function field(target: IRNode, name: string): IRField {
  return { kind: 'field', target, name };
}

export function index(target: IRNode, key: IRNode): IRIndex {
  return { kind: 'index', target, key };
}

export function tuple(...elements: IRNode[]): IRTuple {
  return { kind: 'tuple', elements };
}

export function list(...elements: IRNode[]): IRList {
  return { kind: 'list', elements };
}

export function map(...entries: Array<[IRNode, IRNode]>): IRMap {
  return { kind: 'map', entries: entries.map(([key, value]) => ({ key, value })) };
}

export function struct(module: string, fields: Record<string, IRNode>): IRStruct {
  return {
    kind: 'struct',
    module,
    fields: Object.entries(fields).map(([name, value]) => ({ name, value })),
  };
}

export function update(target: IRNode, fields: Record<string, IRNode>): IRUpdate {
  return {
    kind: 'update',
    target,
    fields: Object.entries(fields).map(([name, value]) => ({ name, value })),
  };
}

export function pipe(left: IRNode, right: IRNode): IRPipe {
  return { kind: 'pipe', left, right };
}

export function binary(op: string, left: IRNode, right: IRNode): IRBinary {
  return { kind: 'binary', op, left, right };
}

export function unary(op: string, operand: IRNode): IRUnary {
  return { kind: 'unary', op, operand };
}

export function withExpr(clauses: IRWithClause[], body: IRNode, otherwise?: IRClause[]): IRWith {
  return otherwise === undefined
    ? { kind: 'with', clauses, body }
    : { kind: 'with', clauses, body, else: otherwise };
}

export function generator(pattern: IRPattern | string, source: IRNode): IRQualifier {
  return { kind: 'generator', pattern: toPattern(pattern), source };
}

export function filter(condition: IRNode): IRQualifier {
  return { kind: 'filter', condition };
}

export function forExpr(qualifiers: IRQualifier[], body: IRNode, into?: IRNode): IRFor {
  return into === undefined
    ? { kind: 'for', qualifiers, body }
    : { kind: 'for', qualifiers, body, into };
}

export function tryExpr(body: IRNode, rescue: IRClause[], after?: IRNode): IRTry {
  return after === undefined
    ? { kind: 'try', body, rescue }
    : { kind: 'try', body, rescue, after };
}

export function receive(clauses: IRClause[], after?: IRReceiveAfter): IRReceive {
  return after === undefined
    ? { kind: 'receive', clauses }
    : { kind: 'receive', clauses, after };
}

export function module(name: string, ...body: IRNode[]): IRModule {
  return { kind: 'module', name, body };
}

export function opaque(text: string): IROpaque {
  return { kind: 'opaque', text };
}

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

export function withMeta<T extends IRNode>(node: T, meta: IRMeta): T {
  return { ...node, meta: { ...node.meta, ...meta } };
}

/** Mark a node as the value of an early return */
export function returning<T extends IRNode>(node: T): T {
  return withMeta(node, { fromEarlyReturn: true });
}

export function sentinel<T extends IRNode>(node: T): T {
  return withMeta(node, { sentinel: true });
}

export function clearMeta<T extends IRNode>(node: T, key: keyof IRMeta): T {
  const meta = node.meta;
  if (!meta || meta[key] === undefined) return node;

  const next: { -readonly [K in keyof IRMeta]: IRMeta[K] } = { ...meta };
  delete next[key];
  const empty = Object.values(next).every((value) => value === undefined);
  return { ...node, meta: empty ? undefined : next };
}

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

export function pVar(name: string, shape?: Shape): PatternVar {
  return shape === undefined ? { kind: 'var', name } : { kind: 'var', name, shape };
}

export function pWild(): PatternWildcard {
  return { kind: 'wildcard' };
}

export function pLit(literal: Literal): IRPattern {
  return { kind: 'literal', literal };
}

export function pAtom(value: string): IRPattern {
  return pLit({ type: 'atom', value });
}

export function pTuple(...elements: Array<IRPattern | string>): IRPattern {
  return { kind: 'tuple', elements: elements.map(toPattern) };
}

export function pList(...elements: Array<IRPattern | string>): IRPattern {
  return { kind: 'list', elements: elements.map(toPattern) };
}

export function pCons(head: IRPattern | string, tail: IRPattern | string): PatternCons {
  return { kind: 'cons', head: toPattern(head), tail: toPattern(tail) };
}

export function pMap(entries: Array<[Literal, IRPattern | string]>): IRPattern {
  return { kind: 'map', entries: entries.map(([key, value]) => ({ key, value: toPattern(value) })) };
}

export function pStruct(module: string, fields: Record<string, IRPattern | string>): IRPattern {
  return {
    kind: 'struct',
    module,
    fields: Object.entries(fields).map(([name, pattern]) => ({ name, pattern: toPattern(pattern) })),
  };
}

export function pPin(name: string): PatternPin {
  return { kind: 'pin', name };
}

export function pAlias(name: string, pattern: IRPattern): PatternAlias {
  return { kind: 'alias', name, pattern };
}

export function pBinary(...segments: PatternSegment[]): IRPattern {
  return { kind: 'binary', segments };
}

/** `{:tag, payload}` */
export function pTagged(tag: string, payload: IRPattern | string): IRPattern {
  return pTuple(pAtom(tag), payload);
}

function toPattern(pattern: IRPattern | string): IRPattern {
  if (typeof pattern !== 'string') return pattern;
  return pattern === '_' ? pWild() : pVar(pattern);
}
