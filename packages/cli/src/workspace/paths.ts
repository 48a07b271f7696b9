import { join, dirname, isAbsolute } from 'node:path';
import { fileURLToPath } from 'node:url';
import { existsSync } from 'node:fs';
import type { Workspace } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        outputs: join(root, 'outputs'),
        config: {
            settingsPath: join(root, 'config', 'settings.yaml'),
            userKeywordsPath: join(root, 'config', 'keywords.yaml'),
            defaultKeywordsPath: resolveDefaultKeywordsPath(),
        },
    };
}

/**
 * Default keyword table shipped with the CLI package.
 */
export function resolveDefaultKeywordsPath(): string {
    // packages/cli/src/workspace -> packages/cli/assets
    const path = join(__dirname, '..', '..', 'assets', 'default-keywords.yaml');

    if (!existsSync(path)) {
        console.warn(`\n⚠️  Warning: Default keywords not found at ${path}`);
        console.warn('Proceeding with workspace keywords only.\n');
    }

    return path;
}

/**
 * Ledger file location; relative settings paths are taken from the workspace root.
 */
export function getLedgerPath(workspace: Workspace, ledgerFile: string): string {
    return isAbsolute(ledgerFile) ? ledgerFile : join(workspace.root, ledgerFile);
}

export function getOutputPath(workspace: Workspace, filename: string): string {
    return isAbsolute(filename) ? filename : join(workspace.outputs, filename);
}
