/**
 * @reshape/ir - Intermediate Representation
 *
 * Tree handed over by the lowering stage and rewritten by the pass pipeline.
 * Nodes are immutable values: every rewrite builds a new spine and shares
 * untouched subtrees.
 */

/**
 * Source position token. Opaque to the pipeline, copied through rewrites.
 */
export interface SourcePos {
  readonly file?: string;
  readonly line: number;
  readonly column?: number;
}

/**
 * Statically known value shape
 */
export type Shape = 'scalar' | 'aggregate';

/**
 * Side-channel flags set by the lowering stage
 */
export interface IRMeta {
  /** Lowered from an early-return statement */
  readonly fromEarlyReturn?: boolean;
  /** Placeholder literal with no meaning */
  readonly sentinel?: boolean;
  /** Call lowered from an in-place update of its first argument */
  readonly mutation?: boolean;
  readonly shape?: Shape;
}

interface NodeBase {
  readonly meta?: IRMeta;
  readonly pos?: SourcePos;
}

export type Literal =
  | { readonly type: 'integer'; readonly value: bigint }
  | { readonly type: 'float'; readonly value: number }
  | { readonly type: 'string'; readonly value: string }
  | { readonly type: 'atom'; readonly value: string }
  | { readonly type: 'boolean'; readonly value: boolean }
  | { readonly type: 'nil' };

/**
 * IR Node - expressions and statements alike; a block's value is its last element
 */
export type IRNode =
  | IRVar
  | IRLiteral
  | IRInterpolation
  | IRBlock
  | IRBind
  | IRIf
  | IRCase
  | IRFn
  | IRDef
  | IRCall
  | IRRemote
  | IRApply
  | IRField
  | IRIndex
  | IRTuple
  | IRList
  | IRMap
  | IRStruct
  | IRUpdate
  | IRPipe
  | IRBinary
  | IRUnary
  | IRWith
  | IRFor
  | IRTry
  | IRReceive
  | IRModule
  | IROpaque;

export type IRNodeKind = IRNode['kind'];

export interface IRVar extends NodeBase {
  readonly kind: 'var';
  readonly name: string;
}

export interface IRLiteral extends NodeBase {
  readonly kind: 'literal';
  readonly literal: Literal;
}

export type InterpolationPart =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'expr'; readonly expr: IRNode };

export interface IRInterpolation extends NodeBase {
  readonly kind: 'interpolation';
  readonly parts: readonly InterpolationPart[];
}

export interface IRBlock extends NodeBase {
  readonly kind: 'block';
  readonly body: readonly IRNode[];
}

/** `pattern = value` */
export interface IRBind extends NodeBase {
  readonly kind: 'bind';
  readonly pattern: IRPattern;
  readonly value: IRNode;
}

export interface IRIf extends NodeBase {
  readonly kind: 'if';
  readonly condition: IRNode;
  readonly then: IRNode;
  readonly else?: IRNode;
}

/**
 * Shared by case, fn, receive, rescue and with-else
 */
export interface IRClause {
  readonly patterns: readonly IRPattern[];
  readonly guard?: IRNode;
  readonly body: IRNode;
  readonly pos?: SourcePos;
}

export interface IRCase extends NodeBase {
  readonly kind: 'case';
  readonly subject: IRNode;
  readonly clauses: readonly IRClause[];
}

/** Anonymous function */
export interface IRFn extends NodeBase {
  readonly kind: 'fn';
  readonly clauses: readonly IRClause[];
}

/** Named function definition */
export interface IRDef extends NodeBase {
  readonly kind: 'def';
  readonly name: string;
  readonly private: boolean;
  readonly params: readonly IRPattern[];
  readonly guard?: IRNode;
  readonly body: IRNode;
}

/** Local call `name(args)` */
export interface IRCall extends NodeBase {
  readonly kind: 'call';
  readonly name: string;
  readonly args: readonly IRNode[];
}

/** Qualified call `Module.name(args)` */
export interface IRRemote extends NodeBase {
  readonly kind: 'remote';
  readonly module: string;
  readonly name: string;
  readonly args: readonly IRNode[];
}

/** Call of a function value `fun.(args)` */
export interface IRApply extends NodeBase {
  readonly kind: 'apply';
  readonly fn: IRNode;
  readonly args: readonly IRNode[];
}

export interface IRField extends NodeBase {
  readonly kind: 'field';
  readonly target: IRNode;
  readonly name: string;
}

export interface IRIndex extends NodeBase {
  readonly kind: 'index';
  readonly target: IRNode;
  readonly key: IRNode;
}

export interface IRTuple extends NodeBase {
  readonly kind: 'tuple';
  readonly elements: readonly IRNode[];
}

export interface IRList extends NodeBase {
  readonly kind: 'list';
  readonly elements: readonly IRNode[];
  readonly tail?: IRNode;
}

export interface IRMapEntry {
  readonly key: IRNode;
  readonly value: IRNode;
}

export interface IRMap extends NodeBase {
  readonly kind: 'map';
  readonly entries: readonly IRMapEntry[];
}

export interface IRFieldEntry {
  readonly name: string;
  readonly value: IRNode;
}

export interface IRStruct extends NodeBase {
  readonly kind: 'struct';
  readonly module: string;
  readonly fields: readonly IRFieldEntry[];
}

/** Struct or map update `%{target | fields}` */
export interface IRUpdate extends NodeBase {
  readonly kind: 'update';
  readonly target: IRNode;
  readonly fields: readonly IRFieldEntry[];
}

/** `left |> right`, where right is a call missing its first argument */
export interface IRPipe extends NodeBase {
  readonly kind: 'pipe';
  readonly left: IRNode;
  readonly right: IRNode;
}

export interface IRBinary extends NodeBase {
  readonly kind: 'binary';
  readonly op: string;
  readonly left: IRNode;
  readonly right: IRNode;
}

export interface IRUnary extends NodeBase {
  readonly kind: 'unary';
  readonly op: string;
  readonly operand: IRNode;
}

/** `pattern <- value` step of a with expression */
export interface IRWithClause {
  readonly pattern: IRPattern;
  readonly value: IRNode;
  readonly guard?: IRNode;
}

export interface IRWith extends NodeBase {
  readonly kind: 'with';
  readonly clauses: readonly IRWithClause[];
  readonly body: IRNode;
  readonly else?: readonly IRClause[];
}

export type IRQualifier =
  | { readonly kind: 'generator'; readonly pattern: IRPattern; readonly source: IRNode }
  | { readonly kind: 'filter'; readonly condition: IRNode };

/** Comprehension */
export interface IRFor extends NodeBase {
  readonly kind: 'for';
  readonly qualifiers: readonly IRQualifier[];
  readonly into?: IRNode;
  readonly body: IRNode;
}

export interface IRTry extends NodeBase {
  readonly kind: 'try';
  readonly body: IRNode;
  readonly rescue: readonly IRClause[];
  readonly after?: IRNode;
}

export interface IRReceiveAfter {
  readonly timeout: IRNode;
  readonly body: IRNode;
}

export interface IRReceive extends NodeBase {
  readonly kind: 'receive';
  readonly clauses: readonly IRClause[];
  readonly after?: IRReceiveAfter;
}

export interface IRModule extends NodeBase {
  readonly kind: 'module';
  readonly name: string;
  readonly body: readonly IRNode[];
}

/** Raw target text for constructs the structured model does not cover */
export interface IROpaque extends NodeBase {
  readonly kind: 'opaque';
  readonly text: string;
}

/**
 * IR Pattern - binding positions
 */
export type IRPattern =
  | PatternVar
  | PatternWildcard
  | PatternLiteral
  | PatternTuple
  | PatternList
  | PatternCons
  | PatternMap
  | PatternStruct
  | PatternPin
  | PatternAlias
  | PatternBinary;

export interface PatternVar {
  readonly kind: 'var';
  readonly name: string;
  /** Shape of the bound value, when the lowering stage knows it */
  readonly shape?: Shape;
}

export interface PatternWildcard {
  readonly kind: 'wildcard';
}

export interface PatternLiteral {
  readonly kind: 'literal';
  readonly literal: Literal;
}

export interface PatternTuple {
  readonly kind: 'tuple';
  readonly elements: readonly IRPattern[];
}

export interface PatternList {
  readonly kind: 'list';
  readonly elements: readonly IRPattern[];
}

/** `[head | tail]` */
export interface PatternCons {
  readonly kind: 'cons';
  readonly head: IRPattern;
  readonly tail: IRPattern;
}

export interface PatternMapEntry {
  readonly key: Literal;
  readonly value: IRPattern;
}

export interface PatternMap {
  readonly kind: 'map';
  readonly entries: readonly PatternMapEntry[];
}

export interface PatternStructField {
  readonly name: string;
  readonly pattern: IRPattern;
}

export interface PatternStruct {
  readonly kind: 'struct';
  readonly module: string;
  readonly fields: readonly PatternStructField[];
}

/** `^name` - matches an already-bound value */
export interface PatternPin {
  readonly kind: 'pin';
  readonly name: string;
}

/** `pattern = name` */
export interface PatternAlias {
  readonly kind: 'alias';
  readonly name: string;
  readonly pattern: IRPattern;
}

export interface PatternSegment {
  readonly pattern: IRPattern;
  readonly size?: IRNode;
  readonly type?: string;
}

export interface PatternBinary {
  readonly kind: 'binary';
  readonly segments: readonly PatternSegment[];
}

export type IRPatternKind = IRPattern['kind'];
