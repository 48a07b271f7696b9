import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
    extractAmount,
    resolveExpenseDate,
    resolveQueryDate,
    resolveCategoryFilter,
    buildQueryFilter,
} from '../../src/hints/index.js';

const TODAY = new Date('2026-10-19T09:30:00Z');

describe('extractAmount', () => {
    it('takes the first number in the text', () => {
        expect(extractAmount('Paid 250 for lunch at restaurant yesterday')).toBe('250');
        expect(extractAmount('Uber to airport 800')).toBe('800');
    });

    it('accepts a currency sign and two decimals', () => {
        expect(extractAmount('₹99.50 cold coffee')).toBe('99.5');
        expect(extractAmount('taxi $12')).toBe('12');
    });

    it('prefers a valid entity hint', () => {
        expect(extractAmount('lunch for 2 people', '300')).toBe('300');
        expect(extractAmount('lunch', 45.5)).toBe('45.5');
    });

    it('falls back to the text when the hint is unusable', () => {
        expect(extractAmount('lunch 120', 'about fifty')).toBe('120');
        expect(extractAmount('lunch 120', null)).toBe('120');
    });

    it('skips ISO dates', () => {
        expect(extractAmount('2026-10-18 lunch 250')).toBe('250');
    });

    it('returns null when there is no positive amount', () => {
        expect(extractAmount('lunch at restaurant')).toBeNull();
        expect(extractAmount('paid 0 for parking')).toBeNull();
    });
});

describe('resolveExpenseDate', () => {
    it('uses yesterday when mentioned', () => {
        expect(resolveExpenseDate('lunch yesterday 200', TODAY)).toBe('2026-10-18');
        expect(resolveExpenseDate('Yesterday: taxi 90', TODAY)).toBe('2026-10-18');
    });

    it('uses an explicit ISO date', () => {
        expect(resolveExpenseDate('rent 2026-10-01 15000', TODAY)).toBe('2026-10-01');
    });

    it('ignores impossible dates and defaults to today', () => {
        expect(resolveExpenseDate('rent 2026-02-30 15000', TODAY)).toBe('2026-10-19');
        expect(resolveExpenseDate('coffee 90', TODAY)).toBe('2026-10-19');
    });
});

describe('resolveQueryDate', () => {
    it('resolves yesterday, today and explicit dates', () => {
        expect(resolveQueryDate('show expenses from yesterday', TODAY)).toBe('2026-10-18');
        expect(resolveQueryDate('what did I spend today', TODAY)).toBe('2026-10-19');
        expect(resolveQueryDate('expenses on 2026-09-30', TODAY)).toBe('2026-09-30');
    });

    it('applies no date filter otherwise', () => {
        expect(resolveQueryDate('show all expenses', TODAY)).toBeUndefined();
    });
});

describe('resolveCategoryFilter', () => {
    it.each([
        ['how much on coffee and lunch', 'coffee'],
        ['online groceries', 'online_food'],
        ['show groceries', 'groceries'],
        ['how much for dinner', 'dining'],
        ['travel expenses', 'travel'],
        ['netflix this month', 'entertainment'],
        ['salon and beauty', 'personal_care'],
        ['petrol', 'fuel'],
    ])('"%s" -> %s', (text, expected) => {
        expect(resolveCategoryFilter(text)).toBe(expected);
    });

    it('folds investments and charity into subscriptions', () => {
        expect(resolveCategoryFilter('my investments')).toBe('subscriptions');
        expect(resolveCategoryFilter('donation total')).toBe('subscriptions');
    });

    it('applies no category filter when no keyword matches', () => {
        expect(resolveCategoryFilter('total expenses')).toBeUndefined();
    });
});

describe('buildQueryFilter', () => {
    it('combines category and date', () => {
        expect(buildQueryFilter('food yesterday', TODAY)).toEqual({ category: 'food', date: '2026-10-18' });
    });

    it('is empty when the text names neither', () => {
        expect(buildQueryFilter('total expenses', TODAY)).toEqual({});
    });
});

describe('dates relative to the local day', () => {
    // 01:00 on Oct 19 in Kolkata, still Oct 18 in UTC
    const LATE_EVENING_UTC = new Date('2026-10-18T19:30:00Z');
    const originalTz = process.env.TZ;

    beforeEach(() => {
        process.env.TZ = 'Asia/Kolkata';
    });

    afterEach(() => {
        process.env.TZ = originalTz;
    });

    it('resolves today and yesterday from the local calendar day', () => {
        expect(resolveExpenseDate('lunch 250', LATE_EVENING_UTC)).toBe('2026-10-19');
        expect(resolveExpenseDate('lunch 250 yesterday', LATE_EVENING_UTC)).toBe('2026-10-18');
        expect(buildQueryFilter('show expenses today', LATE_EVENING_UTC).date).toBe('2026-10-19');
    });

    it('leaves explicit dates alone', () => {
        expect(resolveExpenseDate('rent 2026-10-01 15000', LATE_EVENING_UTC)).toBe('2026-10-01');
    });
});
