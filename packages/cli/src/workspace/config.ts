import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import {
    SettingsSchema,
    KeywordMappingSchema,
    type KeywordMapping,
    type Settings,
} from '@spendwise/shared';
import type { Workspace } from '../types.js';

/**
 * Loads workspace settings (config/settings.yaml).
 * A missing or empty file gives the defaults.
 */
export function loadSettings(workspace: Workspace): Settings {
    const path = workspace.config.settingsPath;
    if (!existsSync(path)) {
        return SettingsSchema.parse({});
    }
    const data: unknown = parse(readFileSync(path, 'utf-8'));
    const result = SettingsSchema.safeParse(data ?? {});
    if (!result.success) {
        throw new Error(`Invalid settings in ${path}: ${formatIssues(result.error.issues)}`);
    }
    return result.data;
}

/**
 * Loads the keyword table: shipped defaults first, then workspace additions.
 * Order matters only for evidence reporting; matching is union-all.
 */
export function loadKeywordMappings(workspace: Workspace): KeywordMapping[] {
    const defaults = loadYamlMappings(workspace.config.defaultKeywordsPath);
    const user = loadYamlMappings(workspace.config.userKeywordsPath);
    return [...defaults, ...user];
}

/**
 * Reads a keyword YAML file. Accepts a bare list or a `{ mappings: [...] }` document.
 */
export function loadYamlMappings(path: string): KeywordMapping[] {
    if (!existsSync(path)) {
        return [];
    }
    const data: unknown = parse(readFileSync(path, 'utf-8'));
    if (data === null || data === undefined) return [];

    let entries: unknown[] = [];
    if (Array.isArray(data)) {
        entries = data;
    } else if (isRecord(data) && Array.isArray(data.mappings)) {
        entries = data.mappings;
    } else if (isRecord(data) && data.mappings === null) {
        return [];
    } else {
        throw new Error(`Invalid keyword file ${path}: expected a list or a "mappings" list.`);
    }

    return entries.map((entry, index) => {
        const result = KeywordMappingSchema.safeParse(entry);
        if (!result.success) {
            throw new Error(`Invalid keyword #${index + 1} in ${path}: ${formatIssues(result.error.issues)}`);
        }
        return result.data;
    });
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatIssues(issues: ReadonlyArray<{ path: (string | number)[]; message: string }>): string {
    return issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}
