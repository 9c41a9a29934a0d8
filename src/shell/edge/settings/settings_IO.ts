import { promises as fs } from 'fs';
import * as E from 'fp-ts/lib/Either.js';
import { z } from 'zod';
import type { GraphDashSettings } from '@/pure/settings/types';
import { DEFAULT_SETTINGS } from '@/pure/settings';

export type SettingsError = {
    readonly _tag: 'SettingsError';
    readonly path: string;
    readonly issues: readonly string[];
    readonly message: string;
};

function createSettingsError(path: string, issues: readonly string[]): SettingsError {
    return {
        _tag: 'SettingsError',
        path,
        issues,
        message: `Invalid settings file ${path}: ${issues.join('; ')}`,
    };
}

const logLevelSchema = z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']);

// Every key optional; unknown keys rejected so typos surface instead of being ignored
const settingsFileSchema = z.object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
    layout: z.string(),
    colorBy: z.string().nullable(),
    neighborhoodPolicy: z.enum(['successors', 'predecessors', 'both']),
    debug: z.boolean(),
    logLevel: logLevelSchema,
    logFile: z.string().nullable(),
    generator: z.object({
        nodes: z.number().int().positive(),
        maxEdges: z.number().int().nonnegative(),
        directed: z.boolean(),
    }).partial().strict(),
}).partial().strict();

export type SettingsFile = z.infer<typeof settingsFileSchema>;

/**
 * Merge strategy: file values override defaults key by key; the nested
 * generator block merges the same way.
 */
export function mergeSettings(defaults: GraphDashSettings, file: SettingsFile): GraphDashSettings {
    return {
        ...defaults,
        ...file,
        generator: { ...defaults.generator, ...file.generator },
    };
}

export function parseSettingsFile(path: string, raw: unknown): E.Either<SettingsError, GraphDashSettings> {
    const parsed: ReturnType<typeof settingsFileSchema.safeParse> = settingsFileSchema.safeParse(raw);
    if (!parsed.success) {
        return E.left(createSettingsError(
            path,
            parsed.error.issues.map((issue: z.ZodIssue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        ));
    }
    return E.right(mergeSettings(DEFAULT_SETTINGS, parsed.data));
}

/**
 * Defaults when no path is given. A given path must exist and hold valid
 * JSON; read errors other than a missing file propagate.
 */
export async function loadSettings(settingsPath?: string): Promise<E.Either<SettingsError, GraphDashSettings>> {
    if (settingsPath === undefined) {
        return E.right(DEFAULT_SETTINGS);
    }

    let data: string;
    try {
        data = await fs.readFile(settingsPath, 'utf-8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return E.left(createSettingsError(settingsPath, ['file not found']));
        }
        throw error;
    }

    let raw: unknown;
    try {
        raw = JSON.parse(data);
    } catch (error) {
        return E.left(createSettingsError(settingsPath, [error instanceof Error ? error.message : String(error)]));
    }
    return parseSettingsFile(settingsPath, raw);
}
