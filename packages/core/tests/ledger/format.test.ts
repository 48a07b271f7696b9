import { describe, it, expect } from 'vitest';
import {
    formatQueryResponse,
    formatRecordConfirmation,
    formatRecordLine,
    NO_EXPENSES_MESSAGE,
} from '../../src/ledger/format.js';
import type { ExpenseRecord, QueryResult } from '../../src/types/index.js';

const lunch: ExpenseRecord = {
    id: 1,
    description: 'Paid 250 for lunch',
    amount: '250',
    categories: ['dining', 'food'],
    date: '2026-10-18',
    recorded_at: '2026-10-18T12:00:00.000Z',
};

const salon: ExpenseRecord = {
    id: 2,
    description: 'salon visit',
    amount: '600.5',
    categories: ['personal_care'],
    date: '2026-10-05',
    recorded_at: '2026-10-05T08:00:00.000Z',
};

const LUNCH_LINE = '- **Paid 250 for lunch** – ₹250 on Oct 18, 2026 _(Categories: dining, food)_';

describe('formatQueryResponse', () => {
    it('uses a category total header for a category filter', () => {
        const result: QueryResult = { records: [lunch], total: '250' };
        expect(formatQueryResponse({ category: 'dining' }, result)).toBe(
            '**Your total Dining expenditure 🍴 is ₹250, which includes:**\n' + LUNCH_LINE
        );
    });

    it('uses a dated header for a date filter', () => {
        const result: QueryResult = { records: [lunch], total: '250' };
        expect(formatQueryResponse({ date: '2026-10-18' }, result)).toBe(
            '**Expenses on Oct 18, 2026:**\n' + LUNCH_LINE
        );
    });

    it('combines category and date in the header', () => {
        const result: QueryResult = { records: [salon], total: '600.5' };
        expect(formatQueryResponse({ category: 'personal_care', date: '2026-10-05' }, result)).toBe(
            '**Your Personal Care expenses 💅 on Oct 05, 2026:**\n' +
            '- **salon visit** – ₹600.5 on Oct 05, 2026 _(Categories: personal_care)_'
        );
    });

    it('uses a grand total header without filters', () => {
        const result: QueryResult = { records: [lunch, salon], total: '850.5' };
        const lines = formatQueryResponse({}, result, { currency: '$' }).split('\n');
        expect(lines).toEqual([
            '**Your Total Expenses are $850.5:**',
            '- **Paid 250 for lunch** – $250 on Oct 18, 2026 _(Categories: dining, food)_',
            '- **salon visit** – $600.5 on Oct 05, 2026 _(Categories: personal_care)_',
        ]);
    });

    it('reports an empty result', () => {
        expect(formatQueryResponse({ category: 'rent' }, { records: [], total: '0' })).toBe(NO_EXPENSES_MESSAGE);
    });
});

describe('formatRecordLine', () => {
    it('keeps an unparseable date as stored', () => {
        expect(formatRecordLine({ ...lunch, date: '2026-13-01' })).toBe(
            '- **Paid 250 for lunch** – ₹250 on 2026-13-01 _(Categories: dining, food)_'
        );
    });
});

describe('formatRecordConfirmation', () => {
    it('confirms with amount, categories and date', () => {
        expect(formatRecordConfirmation(lunch)).toBe(
            '✅ *Expense Recorded Successfully!*\n₹250 · dining, food · Oct 18, 2026'
        );
    });
});
