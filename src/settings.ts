/**
 * Server Settings
 *
 * Resolved once during `initialize`. Sources, lowest precedence first:
 * defaults, command-line flags, then the client's initializationOptions.
 * An invalid value falls back to its default and is reported.
 */

import { z } from 'zod';
import { LANGUAGE_IDS } from './language';

export const ServerSettingsSchema = z.object({
    /** Language variant served by this process */
    language: z.enum(LANGUAGE_IDS).default('tally'),
    /** Whether closing a document drops it from the store */
    closePolicy: z.enum(['remove', 'retain']).default('remove'),
    /** Where an opened document's text comes from */
    documentSource: z.enum(['client', 'disk']).default('client'),
    logLevel: z.enum(['error', 'warn', 'info', 'log']).default('info')
});

export type ServerSettings = z.infer<typeof ServerSettingsSchema>;

export const DEFAULT_SETTINGS: ServerSettings = ServerSettingsSchema.parse({});

type SettingKey = keyof ServerSettings;

const FLAGS: Record<string, SettingKey> = {
    '--language': 'language',
    '--close-policy': 'closePolicy',
    '--document-source': 'documentSource',
    '--log-level': 'logLevel'
};

export interface ResolvedSettings {
    settings: ServerSettings;
    /** Human-readable problems with the input */
    issues: string[];
}

/**
 * Read `--flag=value` and `--flag value` pairs
 */
export function parseArguments(argv: readonly string[]): Partial<Record<SettingKey, string>> {
    const result: Partial<Record<SettingKey, string>> = {};

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const eq = arg.indexOf('=');
        const flag = eq === -1 ? arg : arg.substring(0, eq);
        const key = FLAGS[flag];
        if (!key) continue;

        if (eq !== -1) {
            result[key] = arg.substring(eq + 1);
        } else if (i + 1 < argv.length) {
            result[key] = argv[++i];
        }
    }

    return result;
}

export function resolveSettings(argv: readonly string[], initializationOptions: unknown): ResolvedSettings {
    const issues: string[] = [];
    const fromClient = isRecord(initializationOptions) ? initializationOptions : {};
    if (initializationOptions !== undefined && initializationOptions !== null && !isRecord(initializationOptions)) {
        issues.push('initializationOptions must be an object');
    }

    const merged: Record<string, unknown> = { ...parseArguments(argv) };
    for (const key of Object.keys(ServerSettingsSchema.shape)) {
        if (fromClient[key] !== undefined) merged[key] = fromClient[key];
    }

    const parsed = ServerSettingsSchema.safeParse(merged);
    if (parsed.success) {
        return { settings: parsed.data, issues };
    }

    // Keep what is valid, default the rest
    const invalid = new Set<string>();
    for (const issue of parsed.error.issues) {
        const key = String(issue.path[0]);
        invalid.add(key);
        issues.push(`${key}: ${issue.message}`);
    }
    for (const key of invalid) {
        delete merged[key];
    }

    return { settings: ServerSettingsSchema.parse(merged), issues };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
