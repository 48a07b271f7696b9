import type Decimal from 'decimal.js';
import type { ExpenseRecord, IsoDate } from '../types/index.js';
import type { ClassifyOptions, Evidence } from '../categorizer/types.js';

/**
 * Input to Ledger.record().
 * The amount is already resolved; text without an amount never reaches the ledger.
 */
export interface RecordInput {
    description: string;
    amount: string | Decimal;
    rawText?: string;   // Text to classify. Default: description
    date: IsoDate;
}

export interface RecordOutcome {
    record: ExpenseRecord;
    evidence: Evidence[];
    warnings: string[];
}

/**
 * Options for ledger creation.
 */
export interface LedgerOptions {
    categorizer: ClassifyOptions;
}

/**
 * Options for reply formatting.
 */
export interface FormatOptions {
    currency?: string;  // Default: DEFAULT_CURRENCY
}
