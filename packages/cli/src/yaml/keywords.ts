import { parseDocument, isSeq, isMap, type Node } from 'yaml';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { KeywordMapping } from '@spendwise/shared';

/**
 * Appends a keyword mapping to a YAML file while preserving comments.
 * The file may hold a top-level list or a `mappings:` list.
 */
export async function appendKeywordToYaml(filePath: string, mapping: KeywordMapping): Promise<void> {
    let content = '';
    try {
        content = await readFile(filePath, 'utf8');
    } catch (err) {
        if (isNodeError(err) && err.code === 'ENOENT') {
            content = '# Workspace keyword mappings\nmappings:\n';
        } else {
            throw err;
        }
    }

    const doc = parseDocument<Node>(content || 'mappings:');
    const root = doc.contents;
    const entry = toPlainEntry(mapping);

    if (isSeq(root)) {
        root.add(doc.createNode(entry));
    } else if (isMap(root)) {
        const mappings = root.get('mappings', true);
        if (mappings === undefined || mappings === null || isEmptyScalar(mappings)) {
            root.set('mappings', doc.createNode([entry]));
        } else if (isSeq(mappings)) {
            mappings.add(doc.createNode(entry));
        } else {
            throw new Error(`Invalid YAML structure in ${filePath}: "mappings" must be a list.`);
        }
    } else {
        doc.set('mappings', doc.createNode([entry]));
    }

    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, doc.toString());
}

// Omit absent optional keys so the file carries no `note: null` lines.
function toPlainEntry(mapping: KeywordMapping): Record<string, string | string[]> {
    const entry: Record<string, string | string[]> = {
        phrase: mapping.phrase,
        categories: [...mapping.categories],
    };
    if (mapping.note) entry.note = mapping.note;
    if (mapping.added_date) entry.added_date = mapping.added_date;
    return entry;
}

function isEmptyScalar(node: unknown): boolean {
    return typeof node === 'object' && node !== null && 'value' in node && node.value === null;
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}
