import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

/** File whose presence marks a workspace root, relative to that root. */
export const WORKSPACE_MARKER = join('config', 'settings.yaml');

/**
 * Nearest directory at or above startPath that contains config/settings.yaml.
 */
export function detectWorkspaceRoot(startPath: string = process.cwd()): string | null {
    for (let dir = resolve(startPath); ; dir = dirname(dir)) {
        if (existsSync(join(dir, WORKSPACE_MARKER))) {
            return dir;
        }
        if (dirname(dir) === dir) {
            return null;
        }
    }
}
