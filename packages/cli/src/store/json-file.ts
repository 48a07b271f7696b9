import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
    StorageError,
    errorMessage,
    type ExpenseRecord,
    type ExpenseStore,
    type NewExpense,
    type RecordPredicate,
} from '@spendwise/core';
import { LedgerFileSchema, type LedgerFile } from '@spendwise/shared';

/**
 * Expense store backed by one JSON document: `{ next_id, records }`.
 *
 * Each insert rewrites the whole document to `<path>.tmp` and renames it over
 * the ledger, so the file holds either the old or the new state. Writers in
 * this process are queued; concurrent processes are not coordinated.
 */
export class JsonFileExpenseStore implements ExpenseStore {
    private queue: Promise<unknown> = Promise.resolve();

    constructor(
        private readonly path: string,
        private readonly clock: () => Date = () => new Date()
    ) {}

    insert(expense: NewExpense): Promise<ExpenseRecord> {
        return this.serialize(async () => {
            const ledger = await this.load();
            const record: ExpenseRecord = {
                ...expense,
                categories: [...expense.categories],
                id: ledger.next_id,
                recorded_at: this.clock().toISOString(),
            };
            await this.save({ next_id: ledger.next_id + 1, records: [...ledger.records, record] });
            return record;
        });
    }

    scan(predicate?: RecordPredicate): Promise<ExpenseRecord[]> {
        return this.serialize(async () => {
            const ledger = await this.load();
            return ledger.records.filter(record => !predicate || predicate(record));
        });
    }

    private serialize<T>(task: () => Promise<T>): Promise<T> {
        const run = this.queue.then(task, task);
        this.queue = run.catch(() => undefined);
        return run;
    }

    private async load(): Promise<LedgerFile> {
        let content: string;
        try {
            content = await readFile(this.path, 'utf8');
        } catch (err) {
            if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
                return { next_id: 1, records: [] };
            }
            throw new StorageError(`Failed to read ledger ${this.path}: ${errorMessage(err)}`, { cause: err });
        }

        let data: unknown;
        try {
            data = JSON.parse(content);
        } catch (err) {
            throw new StorageError(`Ledger ${this.path} is not valid JSON`, { cause: err });
        }

        const result = LedgerFileSchema.safeParse(data);
        if (!result.success) {
            throw new StorageError(`Ledger ${this.path} is corrupt: ${result.error.issues[0]?.message ?? 'invalid'}`);
        }
        return result.data;
    }

    private async save(ledger: LedgerFile): Promise<void> {
        const tmpPath = `${this.path}.tmp`;
        try {
            await mkdir(dirname(this.path), { recursive: true });
            await writeFile(tmpPath, JSON.stringify(ledger, null, 2) + '\n', 'utf8');
            await rename(tmpPath, this.path);
        } catch (err) {
            throw new StorageError(`Failed to write ledger ${this.path}: ${errorMessage(err)}`, { cause: err });
        }
    }
}
