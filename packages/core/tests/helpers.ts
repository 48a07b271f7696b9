import { compileKeywordMap } from '../src/categorizer/keyword-map.js';
import { MemoryExpenseStore } from '../src/store/memory.js';
import type { KeywordMapping } from '../src/types/index.js';

export const TEST_MAPPINGS: KeywordMapping[] = [
    { phrase: 'starbucks', categories: ['coffee', 'food'] },
    { phrase: 'cappuccino', categories: ['coffee', 'food'] },
    { phrase: 'lunch', categories: ['dining', 'food'] },
    { phrase: 'restaurant', categories: ['dining', 'food'] },
    { phrase: 'uber', categories: ['travel', 'transportation'] },
    { phrase: 'hotel', categories: ['lodging', 'travel'] },
    { phrase: 'netflix', categories: ['entertainment', 'subscriptions'] },
    { phrase: 'book', categories: ['books'] },
    { phrase: 'gas bill', categories: ['utilities'] },
];

export const TEST_MAP = compileKeywordMap(TEST_MAPPINGS);

export const FIXED_NOW = new Date('2026-10-19T09:30:00.000Z');

export function makeStore(): MemoryExpenseStore {
    return new MemoryExpenseStore(() => FIXED_NOW);
}
