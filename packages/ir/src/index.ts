/**
 * @reshape/ir - Intermediate Representation
 *
 * Node and pattern model shared by the lowering stage, the normalization
 * pipeline and the serializer.
 */

export * from './types.js';
export * from './builders.js';
export {
  children,
  mapChildren,
  mapClauses,
  mapClause,
  mapArray,
  transformBottomUp,
  traverse,
  findAll,
  someNode,
  subPatterns,
  mapSubPatterns,
  type Visitor,
  type Rewriter,
} from './traversal.js';
export { dump, dumpPattern, dumpLiteral } from './dump.js';
export {
  decodeTree,
  parseTree,
  encodeTree,
  nodeSchema,
  patternSchema,
  literalSchema,
  IRDecodeError,
} from './codec.js';
