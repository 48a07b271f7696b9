import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLedger, StorageError, errorMessage } from '@spendwise/core';
import { requireSession, classifyOptions } from '../workspace/session.js';
import { getOutputPath } from '../workspace/paths.js';
import { JsonFileExpenseStore } from '../store/json-file.js';
import { generateExpensesExcel } from '../excel/expenses.js';
import { resolveFilter } from './filter.js';
import { success, arrow, fail } from '../utils/console.js';
import type { ExportOptions } from '../types.js';

export async function exportExpenses(filename: string, options: ExportOptions, now: Date = new Date()): Promise<void> {
    if (!filename.endsWith('.xlsx')) {
        fail(`Export file must end in .xlsx (got "${filename}").`);
        process.exit(1);
    }

    const filter = resolveFilter('', options, now);
    const session = requireSession({ ...options, offline: true });
    const ledger = createLedger(new JsonFileExpenseStore(session.ledgerPath), {
        categorizer: classifyOptions(session),
    });

    const result = await ledger.query(filter).catch((err: unknown) => {
        if (err instanceof StorageError) {
            fail(`Could not read the ledger. ${err.message}`);
            process.exit(1);
        }
        throw err;
    });

    const outputPath = getOutputPath(session.workspace, filename);
    try {
        const workbook = await generateExpensesExcel(result.records);
        await mkdir(dirname(outputPath), { recursive: true });
        await workbook.xlsx.writeFile(outputPath);
    } catch (err) {
        fail(`Failed to write ${outputPath}: ${errorMessage(err)}`);
        process.exit(1);
    }

    success(`Exported ${result.records.length} expense(s) to ${outputPath}`);
    arrow(`Total: ${session.settings.currency}${result.total}`);
}
