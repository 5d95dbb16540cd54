/**
 * @reshape/passes - the normalization pipeline
 */

import type { IRNode } from '@reshape/ir';
import type { DiagnosticSink } from '@reshape/analysis';
import { createPipeline, type NormalizeResult } from './scheduler.js';
import { defaultPasses } from './registry.js';
import type { NormalizeOptions } from './options.js';

export { DEFAULT_OPTIONS, resolveOptions, type NormalizeOptions, type ResolvedOptions } from './options.js';
export { TIERS, type Pass, type PassContext, type Tier } from './pass.js';
export {
  createPipeline,
  validatePasses,
  PipelineConfigError,
  PipelineError,
  type Pipeline,
  type NormalizeResult,
} from './scheduler.js';
export { checkInvariants, type InvariantOptions } from './invariants.js';
export { rewriteScoped, ROOT_SCOPE, type Scope, type ScopedRewriter, type FunctionContext } from './walker.js';
export { rewriteStatements, statementsOf, type StatementSite, type StatementEdit } from './statements.js';
export { defaultPasses } from './registry.js';

export { flattenBlocks } from './structural/flatten-blocks.js';
export { earlyReturn } from './structural/early-return.js';
export { redundantNilInit } from './structural/redundant-nil-init.js';
export { branchRebindHoisting } from './structural/branch-rebind-hoisting.js';
export { parameterHarmonization } from './semantic/parameter-harmonization.js';
export { patternPayloadHarmonization } from './semantic/pattern-payload-harmonization.js';
export { closureParameterAlignment } from './semantic/closure-parameter-alignment.js';
export { discardVsRebind } from './semantic/discard-vs-rebind.js';
export { unusedResultUnderscoring } from './semantic/unused-result-underscoring.js';
export { underscorePromotion } from './semantic/underscore-promotion.js';
export { unusedBinderUnderscoring } from './semantic/unused-binder-underscoring.js';
export { selfRebindRemoval } from './cleanup/self-rebind-removal.js';
export { deadPureBinding } from './cleanup/dead-pure-binding.js';
export { pureStatementElimination } from './cleanup/pure-statement-elimination.js';
export { deadSentinelElimination } from './cleanup/dead-sentinel-elimination.js';
export { tempVariableInline } from './cleanup/temp-variable-inline.js';
export { redundantElseNil } from './cleanup/redundant-else-nil.js';
export { stringInterpolation, toInterpolation } from './cleanup/string-interpolation.js';
export { pipelineFormation } from './cleanup/pipeline-formation.js';
export { blockUnwrap } from './cleanup/block-unwrap.js';
export { reservedWordSanitization, planRenames } from './cleanup/reserved-word-sanitization.js';

/**
 * Run the default pipeline over one compilation unit
 */
export function normalize(tree: IRNode, options?: NormalizeOptions, sink?: DiagnosticSink): NormalizeResult {
  return createPipeline(defaultPasses(), options).run(tree, sink);
}
