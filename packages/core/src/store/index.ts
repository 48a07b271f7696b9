/**
 * Store module: persistence contract and in-memory implementation.
 */

export { MemoryExpenseStore } from './memory.js';
export type { ExpenseStore, RecordPredicate } from './types.js';
