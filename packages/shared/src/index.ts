// Schemas
export {
    isoDateString,
    CategorySchema,
    NewExpenseSchema,
    ExpenseRecordSchema,
    LedgerFileSchema,
    QueryFilterSchema,
    ZeroShotResultSchema,
    KeywordMappingSchema,
    SettingsSchema,
} from './schemas.js';

// Types
export type {
    IsoDate,
    Category,
    NewExpense,
    ExpenseRecord,
    LedgerFile,
    QueryFilter,
    QueryResult,
    ZeroShotResult,
    EntitySpan,
    KeywordMapping,
    Settings,
    InferenceSettings,
} from './schemas.js';

// Category helpers
export { toCategory, categoryGlyph, categoryDisplayName, sortCategories } from './categories.js';

// Constants
export {
    CATEGORIES,
    OTHERS_CATEGORY,
    CATEGORY_GLYPHS,
    SERVICE_TIMEOUT_MS,
    DEFAULT_CURRENCY,
    AMOUNT_PATTERN,
    INFERENCE_DEFAULTS,
    KEYWORD_VALIDATION,
} from './constants.js';
