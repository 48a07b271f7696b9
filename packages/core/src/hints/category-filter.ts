/**
 * Query category filter derived from free text.
 *
 * Unlike classify(), selection is single-winner: rules are evaluated top to
 * bottom and the first one whose keyword occurs in the text decides.
 */

import type { Category } from '../types/index.js';

export interface CategoryFilterRule {
    category: Category;
    keywords: readonly string[];
}

/**
 * NOTE: the last rule folds subscription, investment and charity keywords into
 * "subscriptions", even though investments and charity are categories of their
 * own. Kept for compatibility with existing query phrasing.
 */
export const CATEGORY_FILTER_RULES: readonly CategoryFilterRule[] = [
    { category: 'coffee', keywords: ['coffee'] },
    { category: 'online_food', keywords: ['online', 'swiggy', 'blinkit'] },
    { category: 'groceries', keywords: ['grocery', 'groceries', 'bigbasket', 'zepto'] },
    { category: 'dining', keywords: ['dinner', 'lunch', 'restaurant', 'dining'] },
    { category: 'travel', keywords: ['travel', 'ola', 'uber', 'taxi', 'train', 'flight'] },
    { category: 'shopping', keywords: ['shopping', 'clothes', 'fashion'] },
    { category: 'books', keywords: ['book', 'books', 'novel', 'magazine'] },
    { category: 'food', keywords: ['food', 'snack', 'alcohol'] },
    { category: 'entertainment', keywords: ['entertainment', 'netflix', 'disney', 'prime'] },
    { category: 'utilities', keywords: ['utilities', 'electricity', 'water', 'internet', 'gas'] },
    { category: 'health', keywords: ['health', 'doctor', 'pharmacy', 'medicine'] },
    { category: 'education', keywords: ['education', 'tuition', 'school', 'college', 'course'] },
    { category: 'personal_care', keywords: ['personal care', 'salon', 'spa', 'beauty'] },
    { category: 'rent', keywords: ['rent', 'apartment'] },
    { category: 'fuel', keywords: ['fuel', 'petrol', 'diesel'] },
    { category: 'maintenance', keywords: ['repair', 'maintenance', 'service'] },
    { category: 'subscriptions', keywords: ['subscription', 'invest', 'donation', 'charity'] },
];

/**
 * First matching rule's category, or undefined (no category filter).
 */
export function resolveCategoryFilter(
    text: string,
    rules: readonly CategoryFilterRule[] = CATEGORY_FILTER_RULES
): Category | undefined {
    const lowered = text.toLowerCase();
    const winner = rules.find(rule => rule.keywords.some(keyword => lowered.includes(keyword)));
    return winner?.category;
}
