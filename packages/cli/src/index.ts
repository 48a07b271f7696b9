#!/usr/bin/env node
/**
 * Spendwise CLI
 *
 * The shell around the headless core:
 * - CLI handles all file I/O, HTTP and console output
 * - Core classifies, records and queries, returning warnings as data
 */

import { parseArgs } from 'node:util';
import { addExpense } from './commands/add.js';
import { queryExpenses } from './commands/query.js';
import { chat } from './commands/chat.js';
import { classifyText } from './commands/classify.js';
import { addKeyword } from './commands/add-keyword.js';
import { exportExpenses } from './commands/export.js';
import { fail, log } from './utils/console.js';
import { errorMessage } from '@spendwise/core';

const USAGE = `Spendwise - multi-label expense tracking

Usage:
  spendwise add <text...> [--amount <n>] [--date <YYYY-MM-DD>] [--dry-run] [--verbose]
  spendwise query [text...] [--category <c>] [--date <YYYY-MM-DD>]
  spendwise chat <text...> [--sender <id>]
  spendwise classify <text...> [--verbose]
  spendwise add-keyword <phrase> <category...> [--note <text>]
  spendwise export <file.xlsx> [--category <c>] [--date <YYYY-MM-DD>]

Global options:
  --workspace <dir>   Workspace root (default: nearest parent with config/settings.yaml)
  --offline           Keyword rules only; no inference services

Examples:
  spendwise add "Paid 250 for lunch at restaurant yesterday"
  spendwise query "travel expenses"
  spendwise add-keyword "blue tokai" coffee food --note "roastery"`;

async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            amount: { type: 'string' },
            date: { type: 'string' },
            category: { type: 'string' },
            sender: { type: 'string' },
            note: { type: 'string' },
            workspace: { type: 'string' },
            offline: { type: 'boolean', default: false },
            'dry-run': { type: 'boolean', default: false },
            verbose: { type: 'boolean', default: false },
            help: { type: 'boolean', short: 'h', default: false },
        },
    });

    const [command, ...rest] = positionals;
    const global = { workspace: values.workspace, offline: values.offline === true };

    if (!command || values.help === true) {
        log(USAGE);
        return;
    }

    switch (command) {
        case 'add':
            await addExpense(rest.join(' '), {
                ...global,
                amount: values.amount,
                date: values.date,
                dryRun: values['dry-run'] === true,
                verbose: values.verbose === true,
            });
            break;
        case 'query':
            await queryExpenses(rest.join(' '), { ...global, category: values.category, date: values.date });
            break;
        case 'chat':
            await chat(rest.join(' '), { ...global, sender: values.sender ?? 'cli' });
            break;
        case 'classify':
            await classifyText(rest.join(' '), { ...global, verbose: values.verbose === true });
            break;
        case 'add-keyword': {
            const [phrase, ...labels] = rest;
            if (!phrase || labels.length === 0) {
                fail('Usage: spendwise add-keyword <phrase> <category...> [--note <text>]');
                process.exit(1);
            }
            await addKeyword(phrase, labels, { ...global, note: values.note });
            break;
        }
        case 'export': {
            const [filename] = rest;
            if (!filename) {
                fail('Usage: spendwise export <file.xlsx> [--category <c>] [--date <YYYY-MM-DD>]');
                process.exit(1);
            }
            await exportExpenses(filename, { ...global, category: values.category, date: values.date });
            break;
        }
        default:
            fail(`Unknown command "${command}".`);
            log(`\n${USAGE}`);
            process.exit(1);
    }
}

main().catch((err: unknown) => {
    fail(`Unexpected error: ${errorMessage(err)}`);
    process.exit(1);
});
