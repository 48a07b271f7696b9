import Decimal from 'decimal.js';
import { AMOUNT_PATTERN } from '../types/index.js';
import { ISO_DATE_IN_TEXT } from './date.js';

/**
 * Resolve the expense amount for a message.
 *
 * An upstream entity hint wins when it is a positive number. Otherwise the
 * first amount-looking number in the text is used, ignoring ISO dates so that
 * "2026-10-18 lunch 250" yields 250.
 *
 * @returns Plain decimal string, or null when no positive amount is present
 */
export function extractAmount(text: string, entityHint?: string | number | null): string | null {
    if (entityHint !== undefined && entityHint !== null) {
        const fromHint = toPositiveDecimal(String(entityHint).trim());
        if (fromHint) return fromHint;
    }

    const match = text.replace(ISO_DATE_IN_TEXT, ' ').match(AMOUNT_PATTERN);
    if (!match) return null;

    return toPositiveDecimal(match[1]);
}

function toPositiveDecimal(value: string): string | null {
    if (!/^\d+(\.\d+)?$/.test(value)) return null;
    const amount = new Decimal(value);
    return amount.greaterThan(0) ? amount.toFixed() : null;
}
