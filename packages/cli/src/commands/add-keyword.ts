import { validateKeyword, checkKeywordCollision, formatIsoDate, localCalendarDay, sortCategories, errorMessage } from '@spendwise/core';
import { requireSession } from '../workspace/session.js';
import { appendKeywordToYaml } from '../yaml/keywords.js';
import { success, log, arrow, warn, fail } from '../utils/console.js';
import type { AddKeywordOptions } from '../types.js';

export async function addKeyword(
    phrase: string,
    labels: string[],
    options: AddKeywordOptions,
    now: Date = new Date()
): Promise<void> {
    const validation = validateKeyword(phrase, labels);
    if (!validation.valid) {
        fail(validation.errors.join(', '));
        process.exit(1);
    }

    const session = requireSession({ ...options, offline: true });
    const keywordsPath = session.workspace.config.userKeywordsPath;

    // Overlap is allowed: matching unions every phrase found
    const collision = checkKeywordCollision(phrase, session.mappings.map(m => m.phrase));
    if (collision.hasCollision) {
        warn('Keyword overlap detected.');
        log(`  "${phrase.trim()}" overlaps existing phrase(s): ${collision.collidingPhrases.map(p => `"${p}"`).join(', ')}`);
        log('  Both will apply when they match.\n');
    }

    log(`Adding new keyword to: ${keywordsPath}`);

    const categories = sortCategories(validation.categories);
    try {
        await appendKeywordToYaml(keywordsPath, {
            phrase: phrase.trim(),
            categories,
            note: options.note,
            added_date: formatIsoDate(localCalendarDay(now)),
        });
    } catch (err) {
        fail(`Failed to add keyword: ${errorMessage(err)}`);
        process.exit(1);
    }

    success('Keyword successfully added!');
    arrow(`Phrase:     "${phrase.trim()}"`);
    arrow(`Categories: ${categories.join(', ')}`);
    if (options.note) {
        arrow(`Note:       ${options.note}`);
    }
}
