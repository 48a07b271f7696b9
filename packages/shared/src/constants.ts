/**
 * Constants for Spendwise.
 */

/**
 * The closed set of expense categories.
 * Order here is the order candidate labels are offered to the zero-shot model.
 */
export const CATEGORIES = [
    'food',
    'coffee',
    'online_food',
    'groceries',
    'dining',
    'snacks',
    'alcohol',
    'travel',
    'lodging',
    'transportation',
    'shopping',
    'clothing',
    'electronics',
    'furniture',
    'entertainment',
    'utilities',
    'health',
    'insurance',
    'education',
    'books',
    'personal_care',
    'rent',
    'fuel',
    'maintenance',
    'subscriptions',
    'investments',
    'charity',
    'pet_care',
    'office_supplies',
    'communication',
    'fitness',
    'beauty',
    'stationery',
    'miscellaneous',
    'others',
] as const;

/**
 * Category assigned when no tier produced a label.
 */
export const OTHERS_CATEGORY = 'others';

/**
 * Display glyph per category.
 */
export const CATEGORY_GLYPHS: Readonly<Record<(typeof CATEGORIES)[number], string>> = {
    food: '🍽️',
    coffee: '☕️',
    online_food: '🍔',
    groceries: '🛒',
    dining: '🍴',
    snacks: '🍟',
    alcohol: '🍺',
    travel: '✈️',
    lodging: '🏨',
    transportation: '🚖',
    shopping: '🛍️',
    clothing: '👗',
    electronics: '📱',
    furniture: '🛋️',
    entertainment: '🎬',
    utilities: '💡',
    health: '🏥',
    insurance: '🛡️',
    education: '📚',
    books: '📖',
    personal_care: '💅',
    rent: '🏠',
    fuel: '⛽️',
    maintenance: '🔧',
    subscriptions: '🔔',
    investments: '💹',
    charity: '❤️',
    pet_care: '🐾',
    office_supplies: '🖊️',
    communication: '📞',
    fitness: '🏋️',
    beauty: '💄',
    stationery: '✏️',
    miscellaneous: '🗃️',
    others: '❓',
};

/**
 * Upper bound on a single call to an external inference service.
 */
export const SERVICE_TIMEOUT_MS = 5000;

/**
 * Currency symbol used in replies when the workspace sets none.
 * Amounts are currency-agnostic; this is presentation only.
 */
export const DEFAULT_CURRENCY = '₹';

/**
 * Amount recovered from free text: optional currency sign, integer part,
 * up to two decimals.
 */
export const AMOUNT_PATTERN = /[₹$]?(\d+(?:\.\d{1,2})?)/;

/**
 * Defaults for the hosted inference services.
 */
export const INFERENCE_DEFAULTS = {
    ENDPOINT: 'https://api-inference.huggingface.co/models',
    TOKEN_ENV: 'SPENDWISE_INFERENCE_TOKEN',
    CLASSIFIER_MODEL: 'valhalla/distilbart-mnli-12-1',
    RECOGNIZER_MODEL: 'dslim/bert-base-NER',
} as const;

/**
 * Keyword phrase validation.
 */
export const KEYWORD_VALIDATION = {
    MIN_LENGTH: 3,
} as const;
