import type { Evidence } from '@spendwise/core';
import { info, warn } from '../utils/console.js';

/**
 * Print classification warnings, and evidence when verbose.
 */
export function reportClassification(evidence: readonly Evidence[], warnings: readonly string[], verbose: boolean): void {
    for (const w of warnings) {
        warn(w);
    }
    if (!verbose) return;
    for (const e of evidence) {
        const span = e.span ? ` in "${e.span}"` : '';
        info(`${e.tier}: "${e.trigger}"${span} -> ${e.categories.join(', ')}`);
    }
}
