import { classify, categoryGlyph } from '@spendwise/core';
import { requireSession, classifyOptions } from '../workspace/session.js';
import { reportClassification } from './report.js';
import { arrow, fail, log } from '../utils/console.js';
import type { ClassifyCommandOptions } from '../types.js';

/**
 * Print the categories a description would get. Writes nothing.
 */
export async function classifyText(text: string, options: ClassifyCommandOptions): Promise<void> {
    if (!text.trim()) {
        fail('Text to classify is required.');
        process.exit(1);
    }

    const session = requireSession(options);
    for (const note of session.services.notes) {
        arrow(note);
    }

    const { categories, evidence, warnings } = await classify(text, classifyOptions(session));
    reportClassification(evidence, warnings, options.verbose);
    log(categories.map(category => `${categoryGlyph(category)} ${category}`).join('  '));
}
