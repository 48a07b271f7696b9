import type { ExpenseRecord, NewExpense } from '../types/index.js';

/**
 * Predicate used to filter a scan.
 */
export type RecordPredicate = (record: ExpenseRecord) => boolean;

/**
 * Append-only persistence contract for expense records.
 *
 * - insert() assigns id and recorded_at, and commits the whole record or nothing.
 * - scan() returns records in insertion order.
 * - Implementations raise StorageError on any persistence failure.
 */
export interface ExpenseStore {
    insert(expense: NewExpense): Promise<ExpenseRecord>;
    scan(predicate?: RecordPredicate): Promise<ExpenseRecord[]>;
}
