/**
 * Override rules resolving overlapping food/coffee/dining keywords.
 *
 * Coffee terms suppress the chai and dining branches but never their own
 * coffee+food branch.
 */

import type { Evidence } from './types.js';

export const CHAI_TERM = 'chai';
export const DINING_TERMS = ['dinner', 'lunch', 'breakfast', 'restaurant'] as const;
export const COFFEE_TERMS = ['coffee', 'cappuccino', 'filter coffee', 'cold coffee'] as const;

/**
 * Apply override rules to a normalized description.
 */
export function applyOverrides(normalizedDesc: string): Evidence[] {
    const evidence: Evidence[] = [];
    const coffeeTerm = COFFEE_TERMS.find(term => normalizedDesc.includes(term));

    if (normalizedDesc.includes(CHAI_TERM) && !coffeeTerm) {
        evidence.push({ tier: 'override', trigger: CHAI_TERM, categories: ['food'] });
    }

    const diningTerm = DINING_TERMS.find(term => normalizedDesc.includes(term));
    if (diningTerm && !coffeeTerm) {
        evidence.push({ tier: 'override', trigger: diningTerm, categories: ['dining', 'food'] });
    }

    if (coffeeTerm) {
        evidence.push({ tier: 'override', trigger: coffeeTerm, categories: ['coffee', 'food'] });
    }

    return evidence;
}
