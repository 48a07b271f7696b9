import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Temporary workspace with config/settings.yaml, removed by cleanup().
 */
export async function makeTempWorkspace(settings = '# defaults\n'): Promise<{ root: string; cleanup: () => Promise<void> }> {
    const root = await mkdtemp(join(tmpdir(), 'spendwise-'));
    await mkdir(join(root, 'config'), { recursive: true });
    await writeFile(join(root, 'config', 'settings.yaml'), settings, 'utf8');
    return {
        root,
        cleanup: () => rm(root, { recursive: true, force: true }),
    };
}
