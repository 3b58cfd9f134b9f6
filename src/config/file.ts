import { promises as fs } from 'fs';
import { SystemConfig } from '../models/config';
import { defaultConfig } from './defaults';

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively overlays `overrides` on `base`. Arrays and scalars replace.
 */
export function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
    const merged: Record<string, unknown> = { ...base };

    for (const [key, value] of Object.entries(overrides)) {
        const current = merged[key];
        merged[key] = isPlainObject(current) && isPlainObject(value)
            ? deepMerge(current, value)
            : value;
    }

    return merged;
}

export async function loadFromFile(configPath: string, defaults: SystemConfig = defaultConfig): Promise<Record<string, unknown>> {
    let configData: string;
    try {
        configData = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw new Error(`Configuration file not found: ${configPath}`);
        }
        throw new Error(`Failed to load configuration file: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(configData);
    } catch (error) {
        throw new Error(`Failed to parse configuration file: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }

    if (!isPlainObject(parsed)) {
        throw new Error(`Configuration file must contain a JSON object: ${configPath}`);
    }

    return deepMerge({ ...defaults }, parsed);
}
