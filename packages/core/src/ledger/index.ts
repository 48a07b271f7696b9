/**
 * Ledger module: expense recording, filtered queries, reply formatting.
 */

export { createLedger, matchesFilter, sumAmounts } from './ledger.js';
export {
    formatQueryResponse,
    formatRecordLine,
    formatRecordConfirmation,
    NO_EXPENSES_MESSAGE,
    RECORDED_MESSAGE,
} from './format.js';
export type { Ledger } from './ledger.js';
export type { RecordInput, RecordOutcome, LedgerOptions, FormatOptions } from './types.js';
