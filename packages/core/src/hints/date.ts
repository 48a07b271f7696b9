import { addDays, formatIsoDate, localCalendarDay, parseIsoDate } from '../utils/date.js';
import type { IsoDate } from '../types/index.js';

export const ISO_DATE_IN_TEXT = /\b\d{4}-\d{2}-\d{2}\b/g;

/**
 * Date an expense is attributed to.
 * "yesterday" -> today - 1, an explicit valid YYYY-MM-DD -> that day, otherwise today.
 * "today" is the local calendar day of `today`.
 */
export function resolveExpenseDate(text: string, today: Date): IsoDate {
    return resolveMentionedDate(text, today) ?? formatIsoDate(localCalendarDay(today));
}

/**
 * Date filter for a query, or undefined when the text names no day.
 * Accepts "yesterday", "today", or an explicit YYYY-MM-DD.
 */
export function resolveQueryDate(text: string, today: Date): IsoDate | undefined {
    const mentioned = resolveMentionedDate(text, today);
    if (mentioned) return mentioned;

    if (/\btoday\b/i.test(text)) {
        return formatIsoDate(localCalendarDay(today));
    }
    return undefined;
}

function resolveMentionedDate(text: string, today: Date): IsoDate | undefined {
    if (text.toLowerCase().includes('yesterday')) {
        return formatIsoDate(addDays(localCalendarDay(today), -1));
    }

    for (const candidate of text.match(ISO_DATE_IN_TEXT) ?? []) {
        if (parseIsoDate(candidate)) return candidate;
    }
    return undefined;
}
