/**
 * Reply text for record confirmations and query summaries.
 * Markdown-flavoured, as rendered by chat relays.
 */

import { formatDisplayDate } from '../utils/date.js';
import { DEFAULT_CURRENCY, categoryDisplayName, categoryGlyph } from '../types/index.js';
import type { ExpenseRecord, QueryFilter, QueryResult } from '../types/index.js';
import type { FormatOptions } from './types.js';

export const NO_EXPENSES_MESSAGE = '❗ *No expenses found for the given criteria.*';
export const RECORDED_MESSAGE = '✅ *Expense Recorded Successfully!*';

/**
 * Format a query result as a header line plus one line per record.
 *
 * Header depends on which filters are active:
 * - category only: total for that category
 * - date only: expenses on that day
 * - both: category expenses on that day
 * - none: grand total
 */
export function formatQueryResponse(
    filter: QueryFilter,
    result: QueryResult,
    options: FormatOptions = {}
): string {
    if (result.records.length === 0) {
        return NO_EXPENSES_MESSAGE;
    }

    const currency = options.currency ?? DEFAULT_CURRENCY;
    const lines: string[] = [];

    if (filter.category && !filter.date) {
        const name = categoryDisplayName(filter.category);
        const glyph = categoryGlyph(filter.category);
        lines.push(`**Your total ${name} expenditure ${glyph} is ${currency}${result.total}, which includes:**`);
    } else if (filter.date && !filter.category) {
        lines.push(`**Expenses on ${formatDisplayDate(filter.date)}:**`);
    } else if (filter.date && filter.category) {
        const name = categoryDisplayName(filter.category);
        const glyph = categoryGlyph(filter.category);
        lines.push(`**Your ${name} expenses ${glyph} on ${formatDisplayDate(filter.date)}:**`);
    } else {
        lines.push(`**Your Total Expenses are ${currency}${result.total}:**`);
    }

    for (const record of result.records) {
        lines.push(formatRecordLine(record, currency));
    }

    return lines.join('\n');
}

/**
 * One listing line: "- **desc** – ₹250 on Oct 18, 2026 _(Categories: dining, food)_"
 */
export function formatRecordLine(record: ExpenseRecord, currency: string = DEFAULT_CURRENCY): string {
    const date = formatDisplayDate(record.date);
    const categories = record.categories.join(', ');
    return `- **${record.description}** – ${currency}${record.amount} on ${date} _(Categories: ${categories})_`;
}

/**
 * Confirmation sent after a successful record().
 */
export function formatRecordConfirmation(record: ExpenseRecord, options: FormatOptions = {}): string {
    const currency = options.currency ?? DEFAULT_CURRENCY;
    const details = `${currency}${record.amount} · ${record.categories.join(', ')} · ${formatDisplayDate(record.date)}`;
    return `${RECORDED_MESSAGE}\n${details}`;
}
