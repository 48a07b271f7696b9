/**
 * Spendwise CLI - Core Types
 */

export interface GlobalOptions {
    workspace?: string;
    offline: boolean;
}

export interface AddOptions extends GlobalOptions {
    amount?: string;
    date?: string;
    dryRun: boolean;
    verbose: boolean;
}

export interface QueryOptions extends GlobalOptions {
    category?: string;
    date?: string;
}

export interface ChatOptions extends GlobalOptions {
    sender: string;
}

export interface ClassifyCommandOptions extends GlobalOptions {
    verbose: boolean;
}

export interface AddKeywordOptions extends GlobalOptions {
    note?: string;
}

export interface ExportOptions extends GlobalOptions {
    category?: string;
    date?: string;
}

export interface WorkspaceConfig {
    settingsPath: string;
    userKeywordsPath: string;
    defaultKeywordsPath: string;
}

export interface Workspace {
    root: string;
    outputs: string;
    config: WorkspaceConfig;
}
