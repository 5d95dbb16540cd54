/**
 * JSON codec for IR trees
 *
 * The lowering stage hands trees over as JSON. Decoding validates every
 * node and pattern variant so passes can rely on the declared shapes.
 * Integers are arbitrary precision: outside the safe range of a JSON number
 * they travel as a string of digits.
 */

import { z } from 'zod';
import type {
  IRNode,
  IRPattern,
  IRClause,
  IRMeta,
  Literal,
  SourcePos,
} from './types.js';

/**
 * Malformed IR input, with the path of the first offending value
 */
export class IRDecodeError extends Error {
  constructor(
    message: string,
    public path: (string | number)[] = []
  ) {
    super(path.length > 0 ? `${message} at ${path.join('.')}` : message);
    this.name = 'IRDecodeError';
  }
}

const shapeSchema = z.enum(['scalar', 'aggregate']);

const posSchema: z.ZodType<SourcePos> = z.object({
  file: z.string().optional(),
  line: z.number().int(),
  column: z.number().int().optional(),
});

const metaSchema: z.ZodType<IRMeta> = z.object({
  fromEarlyReturn: z.boolean().optional(),
  sentinel: z.boolean().optional(),
  mutation: z.boolean().optional(),
  shape: shapeSchema.optional(),
});

const integerSchema = z
  .union([
    z
      .number()
      .int()
      .refine((n) => Number.isSafeInteger(n), { message: 'Integer outside the safe range must be a digit string' }),
    z.string().regex(/^-?\d+$/, { message: 'Expected a string of digits' }),
  ])
  .transform((value) => BigInt(value));

// outputs hold bigint integers where the JSON input holds numbers or strings
export const literalSchema: z.ZodType<Literal, z.ZodTypeDef, unknown> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('integer'), value: integerSchema }),
  z.object({ type: z.literal('float'), value: z.number() }),
  z.object({ type: z.literal('string'), value: z.string() }),
  z.object({ type: z.literal('atom'), value: z.string() }),
  z.object({ type: z.literal('boolean'), value: z.boolean() }),
  z.object({ type: z.literal('nil') }),
]);

const base = {
  meta: metaSchema.optional(),
  pos: posSchema.optional(),
};

export const patternSchema: z.ZodType<IRPattern, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('var'), name: z.string().min(1), shape: shapeSchema.optional() }),
    z.object({ kind: z.literal('wildcard') }),
    z.object({ kind: z.literal('literal'), literal: literalSchema }),
    z.object({ kind: z.literal('tuple'), elements: z.array(patternSchema) }),
    z.object({ kind: z.literal('list'), elements: z.array(patternSchema) }),
    z.object({ kind: z.literal('cons'), head: patternSchema, tail: patternSchema }),
    z.object({
      kind: z.literal('map'),
      entries: z.array(z.object({ key: literalSchema, value: patternSchema })),
    }),
    z.object({
      kind: z.literal('struct'),
      module: z.string(),
      fields: z.array(z.object({ name: z.string(), pattern: patternSchema })),
    }),
    z.object({ kind: z.literal('pin'), name: z.string().min(1) }),
    z.object({ kind: z.literal('alias'), name: z.string().min(1), pattern: patternSchema }),
    z.object({
      kind: z.literal('binary'),
      segments: z.array(
        z.object({ pattern: patternSchema, size: nodeSchema.optional(), type: z.string().optional() })
      ),
    }),
  ])
);

const clauseSchema: z.ZodType<IRClause, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    patterns: z.array(patternSchema),
    guard: nodeSchema.optional(),
    body: nodeSchema,
    pos: posSchema.optional(),
  })
);

const fieldEntries = z.lazy(() => z.array(z.object({ name: z.string(), value: nodeSchema })));

export const nodeSchema: z.ZodType<IRNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ ...base, kind: z.literal('var'), name: z.string().min(1) }),
    z.object({ ...base, kind: z.literal('literal'), literal: literalSchema }),
    z.object({
      ...base,
      kind: z.literal('interpolation'),
      parts: z.array(
        z.discriminatedUnion('kind', [
          z.object({ kind: z.literal('text'), text: z.string() }),
          z.object({ kind: z.literal('expr'), expr: nodeSchema }),
        ])
      ),
    }),
    z.object({ ...base, kind: z.literal('block'), body: z.array(nodeSchema) }),
    z.object({ ...base, kind: z.literal('bind'), pattern: patternSchema, value: nodeSchema }),
    z.object({
      ...base,
      kind: z.literal('if'),
      condition: nodeSchema,
      then: nodeSchema,
      else: nodeSchema.optional(),
    }),
    z.object({ ...base, kind: z.literal('case'), subject: nodeSchema, clauses: z.array(clauseSchema) }),
    z.object({ ...base, kind: z.literal('fn'), clauses: z.array(clauseSchema) }),
    z.object({
      ...base,
      kind: z.literal('def'),
      name: z.string().min(1),
      private: z.boolean(),
      params: z.array(patternSchema),
      guard: nodeSchema.optional(),
      body: nodeSchema,
    }),
    z.object({ ...base, kind: z.literal('call'), name: z.string().min(1), args: z.array(nodeSchema) }),
    z.object({
      ...base,
      kind: z.literal('remote'),
      module: z.string().min(1),
      name: z.string().min(1),
      args: z.array(nodeSchema),
    }),
    z.object({ ...base, kind: z.literal('apply'), fn: nodeSchema, args: z.array(nodeSchema) }),
    z.object({ ...base, kind: z.literal('field'), target: nodeSchema, name: z.string().min(1) }),
    z.object({ ...base, kind: z.literal('index'), target: nodeSchema, key: nodeSchema }),
    z.object({ ...base, kind: z.literal('tuple'), elements: z.array(nodeSchema) }),
    z.object({ ...base, kind: z.literal('list'), elements: z.array(nodeSchema), tail: nodeSchema.optional() }),
    z.object({
      ...base,
      kind: z.literal('map'),
      entries: z.array(z.object({ key: nodeSchema, value: nodeSchema })),
    }),
    z.object({ ...base, kind: z.literal('struct'), module: z.string().min(1), fields: fieldEntries }),
    z.object({ ...base, kind: z.literal('update'), target: nodeSchema, fields: fieldEntries }),
    z.object({ ...base, kind: z.literal('pipe'), left: nodeSchema, right: nodeSchema }),
    z.object({ ...base, kind: z.literal('binary'), op: z.string().min(1), left: nodeSchema, right: nodeSchema }),
    z.object({ ...base, kind: z.literal('unary'), op: z.string().min(1), operand: nodeSchema }),
    z.object({
      ...base,
      kind: z.literal('with'),
      clauses: z.array(z.object({ pattern: patternSchema, value: nodeSchema, guard: nodeSchema.optional() })),
      body: nodeSchema,
      else: z.array(clauseSchema).optional(),
    }),
    z.object({
      ...base,
      kind: z.literal('for'),
      qualifiers: z.array(
        z.discriminatedUnion('kind', [
          z.object({ kind: z.literal('generator'), pattern: patternSchema, source: nodeSchema }),
          z.object({ kind: z.literal('filter'), condition: nodeSchema }),
        ])
      ),
      into: nodeSchema.optional(),
      body: nodeSchema,
    }),
    z.object({
      ...base,
      kind: z.literal('try'),
      body: nodeSchema,
      rescue: z.array(clauseSchema),
      after: nodeSchema.optional(),
    }),
    z.object({
      ...base,
      kind: z.literal('receive'),
      clauses: z.array(clauseSchema),
      after: z.object({ timeout: nodeSchema, body: nodeSchema }).optional(),
    }),
    z.object({ ...base, kind: z.literal('module'), name: z.string().min(1), body: z.array(nodeSchema) }),
    z.object({ ...base, kind: z.literal('opaque'), text: z.string() }),
  ])
);

/**
 * Validate an already-parsed JSON value as an IR tree
 */
export function decodeTree(value: unknown): IRNode {
  const result = nodeSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new IRDecodeError(issue ? issue.message : 'Invalid IR tree', issue ? issue.path : []);
  }
  return result.data;
}

/**
 * Parse JSON text and validate it as an IR tree
 */
export function parseTree(text: string): IRNode {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new IRDecodeError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return decodeTree(value);
}

/**
 * Serialize a tree for the next stage
 */
export function encodeTree(node: IRNode, indent = 2): string {
  return JSON.stringify(node, encodeInteger, indent);
}

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

function encodeInteger(_key: string, value: unknown): unknown {
  if (typeof value !== 'bigint') return value;
  return value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value.toString();
}
