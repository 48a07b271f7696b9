/**
 * Expense ledger: classify-and-persist on write, filter-and-total on read.
 */

import Decimal from 'decimal.js';
import type { ExpenseRecord, QueryFilter, QueryResult } from '../types/index.js';
import { NewExpenseSchema } from '../types/index.js';
import { classify } from '../categorizer/classify.js';
import { AmountNotFoundError } from '../errors.js';
import type { ExpenseStore } from '../store/types.js';
import type { LedgerOptions, RecordInput, RecordOutcome } from './types.js';

export interface Ledger {
    record(input: RecordInput): Promise<RecordOutcome>;
    query(filter?: QueryFilter): Promise<QueryResult>;
}

/**
 * Create a ledger over a store.
 *
 * @param store - Append-only record store
 * @param options - Categorizer configuration used on every record()
 */
export function createLedger(store: ExpenseStore, options: LedgerOptions): Ledger {
    return {
        async record(input: RecordInput): Promise<RecordOutcome> {
            const amount = resolveAmount(input.amount);
            const { categories, evidence, warnings } = await classify(
                input.rawText ?? input.description,
                options.categorizer
            );

            const expense = NewExpenseSchema.parse({
                description: input.description,
                amount: amount.toFixed(),
                categories,
                date: input.date,
            });

            const record = await store.insert(expense);
            return { record, evidence, warnings };
        },

        async query(filter: QueryFilter = {}): Promise<QueryResult> {
            const records = await store.scan(record => matchesFilter(record, filter));
            return { records, total: sumAmounts(records).toFixed() };
        },
    };
}

/**
 * A record matches when every filter field that is set matches.
 * An empty filter matches everything.
 */
export function matchesFilter(record: ExpenseRecord, filter: QueryFilter): boolean {
    if (filter.category && !record.categories.includes(filter.category)) {
        return false;
    }
    if (filter.date && record.date !== filter.date) {
        return false;
    }
    return true;
}

/**
 * Sum record amounts with Decimal precision.
 */
export function sumAmounts(records: readonly ExpenseRecord[]): Decimal {
    return records.reduce((sum, r) => sum.plus(new Decimal(r.amount)), new Decimal(0));
}

function resolveAmount(value: string | Decimal): Decimal {
    let amount: Decimal;
    try {
        amount = new Decimal(value);
    } catch (err) {
        throw new AmountNotFoundError(`Invalid amount: ${String(value)}`, { cause: err });
    }
    if (!amount.isFinite() || !amount.greaterThan(0)) {
        throw new AmountNotFoundError(`Amount must be greater than zero (got ${amount.toString()})`);
    }
    return amount;
}
