import { buildQueryFilter, parseIsoDate, toCategory, CATEGORIES, type QueryFilter } from '@spendwise/core';
import { fail } from '../utils/console.js';

/**
 * Query filter from free text, with --category and --date taking precedence.
 * Exits on an unknown category or a malformed date.
 */
export function resolveFilter(
    text: string,
    flags: { category?: string; date?: string },
    now: Date
): QueryFilter {
    const filter = buildQueryFilter(text, now);

    if (flags.category !== undefined) {
        const category = toCategory(flags.category);
        if (!category) {
            fail(`Unknown category "${flags.category}". Known categories: ${CATEGORIES.join(', ')}`);
            process.exit(1);
        }
        filter.category = category;
    }

    if (flags.date !== undefined) {
        if (!parseIsoDate(flags.date)) {
            fail(`Invalid date "${flags.date}". Use YYYY-MM-DD.`);
            process.exit(1);
        }
        filter.date = flags.date;
    }

    return filter;
}
