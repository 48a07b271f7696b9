/**
 * @spendwise/core
 *
 * Headless core: no file system access, no console.* calls.
 * Diagnostics are returned as data for the shell to print.
 */

// Types (re-exported from shared)
export * from './types/index.js';

// Errors
export {
    SpendwiseError,
    AmountNotFoundError,
    ExternalServiceError,
    StorageError,
    TransportError,
    errorMessage,
} from './errors.js';
export type { SpendwiseErrorCode } from './errors.js';

// Utils
export { normalizeDescription } from './utils/normalize.js';
export { withTimeout } from './utils/timeout.js';
export { parseIsoDate, formatIsoDate, formatDisplayDate, addDays, localCalendarDay, isValidDate } from './utils/date.js';

// Modules
export * from './categorizer/index.js';
export * from './store/index.js';
export * from './ledger/index.js';
export * from './hints/index.js';
export * from './assistant/index.js';
