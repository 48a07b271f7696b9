/**
 * Hints module: amount, date and filter extraction from message text.
 */

import type { QueryFilter } from '../types/index.js';
import { resolveCategoryFilter } from './category-filter.js';
import { resolveQueryDate } from './date.js';

export { extractAmount } from './amount.js';
export { resolveExpenseDate, resolveQueryDate, ISO_DATE_IN_TEXT } from './date.js';
export { resolveCategoryFilter, CATEGORY_FILTER_RULES } from './category-filter.js';
export type { CategoryFilterRule } from './category-filter.js';

/**
 * Category and date filters for a query message.
 * Fields are omitted, not undefined, when the text does not name them.
 */
export function buildQueryFilter(text: string, today: Date): QueryFilter {
    const filter: QueryFilter = {};
    const category = resolveCategoryFilter(text);
    const date = resolveQueryDate(text, today);
    if (category) filter.category = category;
    if (date) filter.date = date;
    return filter;
}
