import { describe, it, expect } from 'vitest';
import {
    NewExpenseSchema,
    ExpenseRecordSchema,
    LedgerFileSchema,
    QueryFilterSchema,
    KeywordMappingSchema,
    ZeroShotResultSchema,
    SettingsSchema,
} from '../src/schemas.js';

describe('NewExpenseSchema', () => {
    const validExpense = {
        description: 'Paid 250 for lunch',
        amount: '250',
        categories: ['dining', 'food'],
        date: '2026-10-18',
    };

    it('validates a complete expense', () => {
        expect(NewExpenseSchema.safeParse(validExpense).success).toBe(true);
    });

    it('accepts decimal amounts', () => {
        expect(NewExpenseSchema.safeParse({ ...validExpense, amount: '12.50' }).success).toBe(true);
    });

    it('rejects zero and negative amounts', () => {
        expect(NewExpenseSchema.safeParse({ ...validExpense, amount: '0' }).success).toBe(false);
        expect(NewExpenseSchema.safeParse({ ...validExpense, amount: '0.00' }).success).toBe(false);
        expect(NewExpenseSchema.safeParse({ ...validExpense, amount: '-5' }).success).toBe(false);
    });

    it('rejects numeric amounts', () => {
        expect(NewExpenseSchema.safeParse({ ...validExpense, amount: 250 }).success).toBe(false);
    });

    it('rejects an empty category list', () => {
        expect(NewExpenseSchema.safeParse({ ...validExpense, categories: [] }).success).toBe(false);
    });

    it('rejects unsorted or duplicated categories', () => {
        expect(NewExpenseSchema.safeParse({ ...validExpense, categories: ['food', 'dining'] }).success).toBe(false);
        expect(NewExpenseSchema.safeParse({ ...validExpense, categories: ['food', 'food'] }).success).toBe(false);
    });

    it('rejects labels outside the category set', () => {
        expect(NewExpenseSchema.safeParse({ ...validExpense, categories: ['weather'] }).success).toBe(false);
    });

    it('rejects non-ISO dates', () => {
        expect(NewExpenseSchema.safeParse({ ...validExpense, date: '18/10/2026' }).success).toBe(false);
    });
});

describe('ExpenseRecordSchema', () => {
    const validRecord = {
        id: 1,
        description: 'Uber to airport',
        amount: '800',
        categories: ['transportation', 'travel'],
        date: '2026-10-19',
        recorded_at: '2026-10-19T09:30:00.000Z',
    };

    it('validates a stored record', () => {
        expect(ExpenseRecordSchema.safeParse(validRecord).success).toBe(true);
    });

    it('requires a positive integer id', () => {
        expect(ExpenseRecordSchema.safeParse({ ...validRecord, id: 0 }).success).toBe(false);
        expect(ExpenseRecordSchema.safeParse({ ...validRecord, id: 1.5 }).success).toBe(false);
    });

    it('requires an ISO timestamp', () => {
        expect(ExpenseRecordSchema.safeParse({ ...validRecord, recorded_at: 'yesterday' }).success).toBe(false);
    });
});

describe('LedgerFileSchema', () => {
    const record = {
        id: 3,
        description: 'book',
        amount: '300',
        categories: ['books'],
        date: '2026-10-19',
        recorded_at: '2026-10-19T09:30:00.000Z',
    };

    it('accepts an empty ledger', () => {
        expect(LedgerFileSchema.safeParse({ next_id: 1, records: [] }).success).toBe(true);
    });

    it('requires next_id above every stored id', () => {
        expect(LedgerFileSchema.safeParse({ next_id: 4, records: [record] }).success).toBe(true);
        expect(LedgerFileSchema.safeParse({ next_id: 3, records: [record] }).success).toBe(false);
    });
});

describe('QueryFilterSchema', () => {
    it('accepts an empty filter', () => {
        expect(QueryFilterSchema.parse({})).toEqual({});
    });

    it('accepts category and date', () => {
        const filter = { category: 'travel', date: '2026-10-18' };
        expect(QueryFilterSchema.parse(filter)).toEqual(filter);
    });

    it('rejects unknown categories', () => {
        expect(QueryFilterSchema.safeParse({ category: 'weather' }).success).toBe(false);
    });
});

describe('KeywordMappingSchema', () => {
    it('trims the phrase', () => {
        const parsed = KeywordMappingSchema.parse({ phrase: '  starbucks ', categories: ['coffee', 'food'] });
        expect(parsed.phrase).toBe('starbucks');
    });

    it('rejects a blank phrase', () => {
        expect(KeywordMappingSchema.safeParse({ phrase: '   ', categories: ['coffee'] }).success).toBe(false);
    });

    it('requires at least one category', () => {
        expect(KeywordMappingSchema.safeParse({ phrase: 'starbucks', categories: [] }).success).toBe(false);
    });

    it('accepts note and added_date', () => {
        const result = KeywordMappingSchema.safeParse({
            phrase: 'blue tokai',
            categories: ['coffee'],
            note: 'roastery',
            added_date: '2026-10-19',
        });
        expect(result.success).toBe(true);
    });
});

describe('ZeroShotResultSchema', () => {
    it('accepts labels with or without scores', () => {
        expect(ZeroShotResultSchema.safeParse({ labels: ['food'] }).success).toBe(true);
        expect(ZeroShotResultSchema.safeParse({ labels: ['food', 'travel'], scores: [0.9, 0.1] }).success).toBe(true);
    });

    it('rejects a missing label list', () => {
        expect(ZeroShotResultSchema.safeParse({ scores: [0.9] }).success).toBe(false);
    });
});

describe('SettingsSchema', () => {
    it('fills every default from an empty document', () => {
        expect(SettingsSchema.parse({})).toEqual({
            currency: '₹',
            ledger_file: 'data/expenses.json',
            inference: {
                endpoint: 'https://api-inference.huggingface.co/models',
                token_env: 'SPENDWISE_INFERENCE_TOKEN',
                timeout_ms: 5000,
                classifier: { enabled: true, model: 'valhalla/distilbart-mnli-12-1' },
                recognizer: { enabled: true, model: 'dslim/bert-base-NER' },
            },
        });
    });

    it('keeps partial overrides', () => {
        const settings = SettingsSchema.parse({
            currency: '$',
            inference: { recognizer: { enabled: false } },
        });
        expect(settings.currency).toBe('$');
        expect(settings.inference.recognizer).toEqual({ enabled: false, model: 'dslim/bert-base-NER' });
        expect(settings.inference.classifier.enabled).toBe(true);
    });

    it('rejects a non-positive timeout', () => {
        expect(SettingsSchema.safeParse({ inference: { timeout_ms: 0 } }).success).toBe(false);
    });
});
