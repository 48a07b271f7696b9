/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    IsoDate,
    Category,
    NewExpense,
    ExpenseRecord,
    QueryFilter,
    QueryResult,
    ZeroShotResult,
    EntitySpan,
    KeywordMapping,
} from '@spendwise/shared';

export {
    NewExpenseSchema,
    CATEGORIES,
    OTHERS_CATEGORY,
    SERVICE_TIMEOUT_MS,
    DEFAULT_CURRENCY,
    AMOUNT_PATTERN,
    KEYWORD_VALIDATION,
    toCategory,
    categoryGlyph,
    categoryDisplayName,
    sortCategories,
} from '@spendwise/shared';
