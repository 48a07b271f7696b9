/**
 * Categorizer module: multi-label expense classification.
 */

export { classify } from './classify.js';
export { compileKeywordMap, findKeywords } from './keyword-map.js';
export { applyOverrides, CHAI_TERM, DINING_TERMS, COFFEE_TERMS } from './overrides.js';
export { validateKeyword, checkKeywordCollision } from './validate.js';
export type { KeywordMap, KeywordEntry } from './keyword-map.js';
export type { KeywordValidationResult, KeywordCollisionResult } from './validate.js';
export type {
    Tier,
    Evidence,
    LabelClassifier,
    EntityRecognizer,
    ClassifyOptions,
    ClassificationOutput,
} from './types.js';
