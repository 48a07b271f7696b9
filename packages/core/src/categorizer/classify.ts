/**
 * Multi-label expense classification by evidence accumulation.
 *
 * Tiers (additive, every tier that fires contributes):
 * 1. Override rules
 * 2. Keyword mapping table
 * 3. Entity recognition, re-checked against the mapping table
 * 4. Zero-shot model (only while no label has been found)
 * 5. "others" fallback
 *
 * ARCHITECTURAL NOTE: No console.* calls. Skipped tiers are returned as warnings.
 */

import { normalizeDescription } from '../utils/normalize.js';
import { withTimeout } from '../utils/timeout.js';
import { errorMessage } from '../errors.js';
import {
    CATEGORIES,
    OTHERS_CATEGORY,
    SERVICE_TIMEOUT_MS,
    sortCategories,
    toCategory,
} from '../types/index.js';
import type { Category } from '../types/index.js';
import { applyOverrides } from './overrides.js';
import { findKeywords } from './keyword-map.js';
import type {
    ClassifyOptions,
    ClassificationOutput,
    Evidence,
    EntityRecognizer,
    LabelClassifier,
} from './types.js';
import type { KeywordMap } from './keyword-map.js';

/**
 * Classify an expense description into one or more categories.
 *
 * Never rejects: a failing or slow service only costs its own tier.
 *
 * @param text - Expense description as the user wrote it
 * @param options - Mapping table and optional inference services
 * @returns Sorted, deduplicated, non-empty categories with evidence and warnings
 */
export async function classify(text: string, options: ClassifyOptions): Promise<ClassificationOutput> {
    const warnings: string[] = [];
    const evidence: Evidence[] = [];
    const labels = new Set<Category>();
    const desc = normalizeDescription(text);
    const timeoutMs = options.timeoutMs ?? SERVICE_TIMEOUT_MS;

    function accept(item: Evidence): void {
        evidence.push(item);
        for (const category of item.categories) {
            labels.add(category);
        }
    }

    // Tier 1: Overrides
    applyOverrides(desc).forEach(accept);

    // Tier 2: Mapping table
    for (const entry of findKeywords(options.mapping, desc)) {
        accept({ tier: 'mapping', trigger: entry.phrase, categories: entry.categories });
    }

    // Tier 3: Entity recognition
    const recognizer = options.recognizer;
    if (recognizer) {
        try {
            const found = await recognizeMappedEntities(recognizer, options.mapping, text, timeoutMs);
            found.forEach(accept);
        } catch (err) {
            warnings.push(`Entity recognition skipped (${recognizer.name}): ${errorMessage(err)}`);
        }
    }

    // Tier 4: Zero-shot model, only when nothing matched so far
    const classifier = options.classifier;
    if (labels.size === 0 && classifier) {
        try {
            const item = await classifyWithModel(classifier, text, timeoutMs);
            if (item) {
                accept(item);
            } else {
                warnings.push(`Zero-shot classification (${classifier.name}) returned no usable label`);
            }
        } catch (err) {
            warnings.push(`Zero-shot classification skipped (${classifier.name}): ${errorMessage(err)}`);
        }
    }

    // Tier 5: Fallback
    if (labels.size === 0) {
        accept({ tier: 'fallback', trigger: OTHERS_CATEGORY, categories: [OTHERS_CATEGORY] });
    }

    return { categories: sortCategories(labels), evidence, warnings };
}

async function recognizeMappedEntities(
    recognizer: EntityRecognizer,
    mapping: KeywordMap,
    text: string,
    timeoutMs: number
): Promise<Evidence[]> {
    const spans = await withTimeout(recognizer.recognize(text), timeoutMs, recognizer.name);
    const evidence: Evidence[] = [];

    for (const span of spans) {
        const token = normalizeDescription(span.text);
        for (const entry of findKeywords(mapping, token)) {
            evidence.push({
                tier: 'entity',
                trigger: entry.phrase,
                categories: entry.categories,
                span: span.text,
            });
        }
    }

    return evidence;
}

async function classifyWithModel(
    classifier: LabelClassifier,
    text: string,
    timeoutMs: number
): Promise<Evidence | null> {
    const result = await withTimeout(classifier.classify(text, CATEGORIES), timeoutMs, classifier.name);
    const top = result.labels[0];
    if (top === undefined) return null;

    const category = toCategory(top);
    if (!category) return null;

    return { tier: 'model', trigger: top, categories: [category] };
}
