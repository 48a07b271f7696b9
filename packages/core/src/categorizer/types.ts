/**
 * Internal types for categorizer module.
 */

import type { Category, EntitySpan, ZeroShotResult } from '../types/index.js';
import type { KeywordMap } from './keyword-map.js';

/**
 * Pipeline stage that contributed a label.
 */
export type Tier = 'override' | 'mapping' | 'entity' | 'model' | 'fallback';

/**
 * Why a set of labels was added.
 */
export interface Evidence {
    tier: Tier;
    trigger: string;
    categories: readonly Category[];
    span?: string;
}

/**
 * Zero-shot text classification service.
 * Labels come back ordered by descending confidence.
 */
export interface LabelClassifier {
    readonly name: string;
    classify(text: string, candidateLabels: readonly string[]): Promise<ZeroShotResult>;
}

/**
 * Named-entity recognition service.
 */
export interface EntityRecognizer {
    readonly name: string;
    recognize(text: string): Promise<EntitySpan[]>;
}

/**
 * Options for classify().
 * A null or missing service is a normal branch: its tier is simply skipped.
 */
export interface ClassifyOptions {
    mapping: KeywordMap;
    classifier?: LabelClassifier | null;
    recognizer?: EntityRecognizer | null;
    timeoutMs?: number;
}

/**
 * classify() output: labels plus the trail that produced them.
 * Warnings describe skipped tiers; the core never logs them itself.
 */
export interface ClassificationOutput {
    categories: Category[];
    evidence: Evidence[];
    warnings: string[];
}
