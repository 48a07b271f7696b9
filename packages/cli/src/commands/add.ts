import {
    createLedger,
    extractAmount,
    formatRecordConfirmation,
    parseIsoDate,
    resolveExpenseDate,
    MemoryExpenseStore,
    StorageError,
    type ExpenseStore,
} from '@spendwise/core';
import { requireSession, classifyOptions } from '../workspace/session.js';
import { JsonFileExpenseStore } from '../store/json-file.js';
import { reportClassification } from './report.js';
import { log, fail, arrow } from '../utils/console.js';
import type { AddOptions } from '../types.js';

export async function addExpense(text: string, options: AddOptions, now: Date = new Date()): Promise<void> {
    const description = text.trim();
    if (!description) {
        fail('Describe the expense, e.g. spendwise add "Paid 250 for lunch yesterday".');
        process.exit(1);
    }

    // --amount must itself be valid; text is only searched when it is absent
    const amount = options.amount !== undefined
        ? extractAmount('', options.amount)
        : extractAmount(description);
    if (!amount) {
        fail(options.amount !== undefined
            ? `Invalid amount "${options.amount}". Use a positive number.`
            : "Couldn't detect an expense amount. Include one in the text or pass --amount.");
        process.exit(1);
    }

    if (options.date !== undefined && !parseIsoDate(options.date)) {
        fail(`Invalid date "${options.date}". Use YYYY-MM-DD.`);
        process.exit(1);
    }
    const date = options.date ?? resolveExpenseDate(description, now);

    const session = requireSession(options);

    for (const note of session.services.notes) {
        arrow(note);
    }

    const store: ExpenseStore = options.dryRun
        ? new MemoryExpenseStore()
        : new JsonFileExpenseStore(session.ledgerPath);
    const ledger = createLedger(store, { categorizer: classifyOptions(session) });

    try {
        const { record, evidence, warnings } = await ledger.record({ description, amount, date });
        reportClassification(evidence, warnings, options.verbose);
        log(formatRecordConfirmation(record, { currency: session.settings.currency }));
        if (options.dryRun) {
            log('\n[DRY RUN] Nothing was written to the ledger.');
        }
    } catch (err) {
        if (err instanceof StorageError) {
            fail(`Could not record the expense. ${err.message}`);
            process.exit(1);
        }
        throw err;
    }
}
