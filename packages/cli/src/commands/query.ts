import { createLedger, formatQueryResponse, StorageError } from '@spendwise/core';
import { requireSession, classifyOptions } from '../workspace/session.js';
import { JsonFileExpenseStore } from '../store/json-file.js';
import { resolveFilter } from './filter.js';
import { log, fail } from '../utils/console.js';
import type { QueryOptions } from '../types.js';

export async function queryExpenses(text: string, options: QueryOptions, now: Date = new Date()): Promise<void> {
    const filter = resolveFilter(text, options, now);
    const session = requireSession(options);
    const ledger = createLedger(new JsonFileExpenseStore(session.ledgerPath), {
        categorizer: classifyOptions(session),
    });

    try {
        const result = await ledger.query(filter);
        log(formatQueryResponse(filter, result, { currency: session.settings.currency }));
    } catch (err) {
        if (err instanceof StorageError) {
            fail(`Could not read the ledger. ${err.message}`);
            process.exit(1);
        }
        throw err;
    }
}
