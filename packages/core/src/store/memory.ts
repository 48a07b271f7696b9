import type { ExpenseRecord, NewExpense } from '../types/index.js';
import type { ExpenseStore, RecordPredicate } from './types.js';

/**
 * In-process store. Used by tests and by `add --dry-run`.
 */
export class MemoryExpenseStore implements ExpenseStore {
    private readonly records: ExpenseRecord[] = [];
    private nextId = 1;

    constructor(private readonly clock: () => Date = () => new Date()) {}

    async insert(expense: NewExpense): Promise<ExpenseRecord> {
        const record: ExpenseRecord = {
            ...expense,
            categories: [...expense.categories],
            id: this.nextId,
            recorded_at: this.clock().toISOString(),
        };
        this.nextId++;
        this.records.push(record);
        return { ...record, categories: [...record.categories] };
    }

    async scan(predicate?: RecordPredicate): Promise<ExpenseRecord[]> {
        return this.records
            .filter(record => !predicate || predicate(record))
            .map(record => ({ ...record, categories: [...record.categories] }));
    }
}
