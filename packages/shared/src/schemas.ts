/**
 * Zod schemas for Spendwise data structures.
 *
 * IMPORTANT: Amounts are stored as decimal strings in schemas.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';
import { CATEGORIES, DEFAULT_CURRENCY, INFERENCE_DEFAULTS, SERVICE_TIMEOUT_MS } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
export const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

export type IsoDate = z.infer<typeof isoDateString>;

/**
 * Strictly positive decimal amount as string (never native number for money).
 */
const positiveDecimalString = z
    .string()
    .regex(/^\d+(\.\d+)?$/, 'Must be valid decimal string')
    .refine(value => /[1-9]/.test(value), 'Amount must be greater than zero');

// ============================================================================
// Categories
// ============================================================================

export const CategorySchema = z.enum(CATEGORIES);

export type Category = z.infer<typeof CategorySchema>;

/**
 * Category list as stored on a record: non-empty, sorted, no duplicates.
 */
const categoryList = z
    .array(CategorySchema)
    .min(1, 'At least one category is required')
    .refine(
        list => list.every((value, i) => i === 0 || list[i - 1] < value),
        'Categories must be sorted and unique'
    );

// ============================================================================
// Expense Schemas
// ============================================================================

/**
 * Expense as handed to the store, before id and timestamp are assigned.
 */
export const NewExpenseSchema = z.object({
    description: z.string().min(1),
    amount: positiveDecimalString,
    categories: categoryList,
    date: isoDateString,
});

export type NewExpense = z.infer<typeof NewExpenseSchema>;

/**
 * Persisted expense record. Immutable once written.
 */
export const ExpenseRecordSchema = NewExpenseSchema.extend({
    id: z.number().int().positive(),
    recorded_at: z.string().datetime(),
});

export type ExpenseRecord = z.infer<typeof ExpenseRecordSchema>;

/**
 * On-disk ledger document.
 * next_id only grows, so ids are never handed out twice.
 */
export const LedgerFileSchema = z
    .object({
        next_id: z.number().int().positive(),
        records: z.array(ExpenseRecordSchema),
    })
    .refine(
        file => file.records.every(r => r.id < file.next_id),
        'next_id must be greater than every stored id'
    );

export type LedgerFile = z.infer<typeof LedgerFileSchema>;

// ============================================================================
// Query Schemas
// ============================================================================

export const QueryFilterSchema = z.object({
    category: CategorySchema.optional(),
    date: isoDateString.optional(),
});

export type QueryFilter = z.infer<typeof QueryFilterSchema>;

/**
 * Matching records in insertion order and their sum as a decimal string.
 */
export interface QueryResult {
    records: ExpenseRecord[];
    total: string;
}

// ============================================================================
// Inference Service Payloads
// ============================================================================

/**
 * Zero-shot classification output, labels in descending confidence.
 */
export const ZeroShotResultSchema = z.object({
    labels: z.array(z.string()),
    scores: z.array(z.number()).optional(),
});

export type ZeroShotResult = z.infer<typeof ZeroShotResultSchema>;

/**
 * One span found by entity recognition.
 */
export interface EntitySpan {
    text: string;
    label?: string;
    score?: number;
    start?: number;
    end?: number;
}

// ============================================================================
// Keyword Mapping Schemas
// ============================================================================

/**
 * Trigger phrase and the categories it adds when found in a description.
 */
export const KeywordMappingSchema = z.object({
    phrase: z.string().trim().min(1),
    categories: z.array(CategorySchema).min(1),
    note: z.string().optional(),
    added_date: isoDateString.optional(),
});

export type KeywordMapping = z.infer<typeof KeywordMappingSchema>;

// ============================================================================
// Workspace Settings
// ============================================================================

function inferenceServiceSchema(defaultModel: string) {
    return z
        .object({
            enabled: z.boolean().default(true),
            model: z.string().min(1).default(defaultModel),
        })
        .default({});
}

/**
 * config/settings.yaml. Every key is optional; an empty file gives the defaults.
 * The API token is never stored here, only the name of the variable holding it.
 */
export const SettingsSchema = z.object({
    currency: z.string().min(1).default(DEFAULT_CURRENCY),
    ledger_file: z.string().min(1).default('data/expenses.json'),
    inference: z
        .object({
            endpoint: z.string().url().default(INFERENCE_DEFAULTS.ENDPOINT),
            token_env: z.string().min(1).default(INFERENCE_DEFAULTS.TOKEN_ENV),
            timeout_ms: z.number().int().positive().default(SERVICE_TIMEOUT_MS),
            classifier: inferenceServiceSchema(INFERENCE_DEFAULTS.CLASSIFIER_MODEL),
            recognizer: inferenceServiceSchema(INFERENCE_DEFAULTS.RECOGNIZER_MODEL),
        })
        .default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type InferenceSettings = Settings['inference'];
