import { compileKeywordMap, errorMessage, type ClassifyOptions, type KeywordMap, type KeywordMapping } from '@spendwise/core';
import type { Settings } from '@spendwise/shared';
import { createInferenceServices, type InferenceServices } from '../inference/http.js';
import { detectWorkspaceRoot } from './detect.js';
import { resolveWorkspace, getLedgerPath } from './paths.js';
import { loadSettings, loadKeywordMappings } from './config.js';
import { fail } from '../utils/console.js';
import type { GlobalOptions, Workspace } from '../types.js';

/**
 * Everything a command needs from the workspace, loaded once.
 */
export interface Session {
    workspace: Workspace;
    settings: Settings;
    mappings: KeywordMapping[];
    keywordMap: KeywordMap;
    services: InferenceServices;
    ledgerPath: string;
}

export class WorkspaceNotFoundError extends Error {
    constructor() {
        super('Workspace not found. Expected "config/settings.yaml" in this directory or a parent (or pass --workspace).');
        this.name = 'WorkspaceNotFoundError';
    }
}

/**
 * Detect the workspace and load settings, keywords and inference clients.
 * Throws on a missing workspace or invalid configuration.
 */
export function openSession(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): Session {
    const root = options.workspace || detectWorkspaceRoot();
    if (!root) {
        throw new WorkspaceNotFoundError();
    }
    const workspace = resolveWorkspace(root);
    const settings = loadSettings(workspace);
    const mappings = loadKeywordMappings(workspace);

    return {
        workspace,
        settings,
        mappings,
        keywordMap: compileKeywordMap(mappings),
        services: createInferenceServices(settings.inference, env, options.offline),
        ledgerPath: getLedgerPath(workspace, settings.ledger_file),
    };
}

/**
 * Categorizer options for this session.
 */
export function classifyOptions(session: Session): ClassifyOptions {
    return {
        mapping: session.keywordMap,
        classifier: session.services.classifier,
        recognizer: session.services.recognizer,
        timeoutMs: session.settings.inference.timeout_ms,
    };
}

/**
 * openSession() for commands: prints the error and exits on failure.
 */
export function requireSession(options: GlobalOptions): Session {
    try {
        return openSession(options);
    } catch (err) {
        fail(errorMessage(err));
        process.exit(1);
    }
}
