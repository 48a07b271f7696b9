import type { Intent } from './types.js';

const QUERY_PATTERN = /\b(how much|show|list|total|summary|expenses|expenditure|what did i)\b/i;

/**
 * Route a message to expense recording or querying.
 * Anything that does not read as a question about past spending is a new expense.
 */
export function detectIntent(text: string): Intent {
    return QUERY_PATTERN.test(text) ? 'query_expense' : 'add_expense';
}
