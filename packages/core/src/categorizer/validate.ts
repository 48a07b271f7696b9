/**
 * Keyword phrase validation utilities.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Results returned as data.
 */

import { normalizeDescription } from '../utils/normalize.js';
import { KEYWORD_VALIDATION, toCategory } from '../types/index.js';
import type { Category } from '../types/index.js';

export interface KeywordValidationResult {
    valid: boolean;
    errors: string[];
    categories: Category[];
}

export interface KeywordCollisionResult {
    hasCollision: boolean;
    collidingPhrases: string[];
}

/**
 * Validate a phrase and its labels before adding them to the mapping table.
 *
 * - Empty phrase = rejected
 * - Phrase shorter than KEYWORD_VALIDATION.MIN_LENGTH = rejected
 * - Label outside the category set = rejected
 */
export function validateKeyword(phrase: string, labels: readonly string[]): KeywordValidationResult {
    const errors: string[] = [];
    const categories: Category[] = [];
    const trimmed = phrase.trim();

    if (trimmed === '') {
        errors.push('Phrase cannot be empty');
    } else if (trimmed.length < KEYWORD_VALIDATION.MIN_LENGTH) {
        errors.push(
            `Phrase must be at least ${KEYWORD_VALIDATION.MIN_LENGTH} characters (got ${trimmed.length})`
        );
    }

    if (labels.length === 0) {
        errors.push('At least one category is required');
    }

    for (const label of labels) {
        const category = toCategory(label);
        if (category) {
            categories.push(category);
        } else {
            errors.push(`Unknown category: "${label}"`);
        }
    }

    return { valid: errors.length === 0, errors, categories };
}

/**
 * Check if a new phrase overlaps existing phrases (either contains the other).
 * Overlap is legal under union semantics but usually worth a warning.
 */
export function checkKeywordCollision(
    phrase: string,
    existingPhrases: readonly string[]
): KeywordCollisionResult {
    const collidingPhrases: string[] = [];
    const normalizedNew = normalizeDescription(phrase.trim());

    for (const existing of existingPhrases) {
        const normalizedExisting = normalizeDescription(existing.trim());
        if (normalizedNew.includes(normalizedExisting) || normalizedExisting.includes(normalizedNew)) {
            if (!collidingPhrases.includes(existing)) {
                collidingPhrases.push(existing);
            }
        }
    }

    return {
        hasCollision: collidingPhrases.length > 0,
        collidingPhrases,
    };
}
