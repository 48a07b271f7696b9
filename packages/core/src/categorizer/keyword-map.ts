/**
 * Keyword mapping table compiled into a character trie.
 *
 * One left-to-right scan of a description finds every phrase that occurs
 * anywhere in it (union-all, never first-match).
 */

import { normalizeDescription } from '../utils/normalize.js';
import { sortCategories } from '../types/index.js';
import type { Category } from '../types/index.js';

export interface KeywordEntry {
    phrase: string;
    categories: readonly Category[];
}

interface TrieNode {
    children: Map<string, TrieNode>;
    entryIndex?: number;
}

export interface KeywordMap {
    readonly entries: readonly KeywordEntry[];
    readonly root: TrieNode;
}

/**
 * Compile an ordered list of (phrase, categories) pairs.
 *
 * Phrases are normalized like descriptions. A phrase listed twice keeps its
 * first position and the union of both label sets. Blank phrases are dropped.
 */
export function compileKeywordMap(
    mappings: Iterable<{ phrase: string; categories: readonly Category[] }>
): KeywordMap {
    const entries: KeywordEntry[] = [];
    const indexByPhrase = new Map<string, number>();

    for (const mapping of mappings) {
        const phrase = normalizeDescription(mapping.phrase.trim());
        if (phrase === '') continue;

        const existing = indexByPhrase.get(phrase);
        if (existing === undefined) {
            indexByPhrase.set(phrase, entries.length);
            entries.push({ phrase, categories: sortCategories(mapping.categories) });
        } else {
            entries[existing] = {
                phrase,
                categories: sortCategories([...entries[existing].categories, ...mapping.categories]),
            };
        }
    }

    const root: TrieNode = { children: new Map() };
    entries.forEach((entry, index) => {
        let node = root;
        for (const char of entry.phrase) {
            let next = node.children.get(char);
            if (!next) {
                next = { children: new Map() };
                node.children.set(char, next);
            }
            node = next;
        }
        node.entryIndex = index;
    });

    return { entries, root };
}

/**
 * Every table entry whose phrase is a substring of the normalized text,
 * in table order.
 *
 * @param map - Compiled mapping table
 * @param normalizedText - Text already passed through normalizeDescription
 */
export function findKeywords(map: KeywordMap, normalizedText: string): KeywordEntry[] {
    const chars = [...normalizedText];
    const hits = new Set<number>();

    for (let start = 0; start < chars.length; start++) {
        let node: TrieNode | undefined = map.root;
        for (let i = start; i < chars.length; i++) {
            node = node.children.get(chars[i]);
            if (!node) break;
            if (node.entryIndex !== undefined) hits.add(node.entryIndex);
        }
    }

    return [...hits].sort((a, b) => a - b).map(i => map.entries[i]);
}
