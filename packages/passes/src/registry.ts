/**
 * The default pass list, in pipeline order
 */

import type { Pass } from './pass.js';
import { flattenBlocks } from './structural/flatten-blocks.js';
import { earlyReturn } from './structural/early-return.js';
import { redundantNilInit } from './structural/redundant-nil-init.js';
import { branchRebindHoisting } from './structural/branch-rebind-hoisting.js';
import { parameterHarmonization } from './semantic/parameter-harmonization.js';
import { patternPayloadHarmonization } from './semantic/pattern-payload-harmonization.js';
import { closureParameterAlignment } from './semantic/closure-parameter-alignment.js';
import { discardVsRebind } from './semantic/discard-vs-rebind.js';
import { unusedResultUnderscoring } from './semantic/unused-result-underscoring.js';
import { underscorePromotion } from './semantic/underscore-promotion.js';
import { unusedBinderUnderscoring } from './semantic/unused-binder-underscoring.js';
import { selfRebindRemoval } from './cleanup/self-rebind-removal.js';
import { deadPureBinding } from './cleanup/dead-pure-binding.js';
import { pureStatementElimination } from './cleanup/pure-statement-elimination.js';
import { deadSentinelElimination } from './cleanup/dead-sentinel-elimination.js';
import { tempVariableInline } from './cleanup/temp-variable-inline.js';
import { redundantElseNil } from './cleanup/redundant-else-nil.js';
import { stringInterpolation } from './cleanup/string-interpolation.js';
import { pipelineFormation } from './cleanup/pipeline-formation.js';
import { blockUnwrap } from './cleanup/block-unwrap.js';
import { reservedWordSanitization } from './cleanup/reserved-word-sanitization.js';

export function defaultPasses(): Pass[] {
  return [
    flattenBlocks,
    earlyReturn,
    redundantNilInit,
    branchRebindHoisting,

    parameterHarmonization,
    patternPayloadHarmonization,
    closureParameterAlignment,
    discardVsRebind,
    unusedResultUnderscoring,
    underscorePromotion,
    unusedBinderUnderscoring,

    selfRebindRemoval,
    deadPureBinding,
    pureStatementElimination,
    deadSentinelElimination,
    tempVariableInline,
    redundantElseNil,
    stringInterpolation,
    pipelineFormation,
    blockUnwrap,
    reservedWordSanitization,
  ];
}
