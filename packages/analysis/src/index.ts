/**
 * @reshape/analysis - name and usage analysis over IR trees
 */

export {
  identifierTokens,
  scanIdentifiers,
  containsIdentifier,
  replaceIdentifier,
  type IdentifierToken,
} from './identifiers.js';
export {
  boundNames,
  boundNamesOf,
  patternReads,
  declaredInSubtree,
  referencedNames,
  referencedNamesOf,
  freeVariables,
  extend,
} from './scope.js';
export { UsageIndex, usedLater, NOTHING_LIVE, type LiveSet, type UsageIndexOptions } from './usage-index.js';
export { usageRoles, usageShape, shapesCompatible, type UsageRole } from './shape.js';
export { isPure, isNumericOrNil, isAggregation, isCollectionCall } from './effects.js';
export {
  renameBinder,
  renamePatternReads,
  renameInScope,
  renameSequence,
  applyRename,
  type RenameTarget,
} from './rename.js';
export {
  analyzeBinders,
  harmonize,
  undefinedNames,
  type BinderAnalysis,
  type BinderDecision,
  type UnchangedReason,
} from './harmonizer.js';
export {
  DiagnosticCollector,
  formatPos,
  type Diagnostic,
  type DiagnosticCode,
  type DiagnosticSink,
  type Severity,
} from './diagnostics.js';
