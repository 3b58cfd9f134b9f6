import { SystemConfig } from '../models/config';
import { loadFromEnv } from './env';
import { deepMerge, loadFromFile } from './file';
import { validateConfig } from './validation';

export class ConfigManager {
    private static instance: ConfigManager | undefined;
    private config: SystemConfig | null = null;

    private constructor() { }

    public static getInstance(): ConfigManager {
        if (!ConfigManager.instance) {
            ConfigManager.instance = new ConfigManager();
        }
        return ConfigManager.instance;
    }

    /**
     * Loads from a JSON file when a path is given, otherwise from the environment.
     */
    public async loadConfig(configPath?: string): Promise<SystemConfig> {
        const rawConfig = configPath
            ? await loadFromFile(configPath)
            : loadFromEnv();

        this.config = validateConfig(rawConfig);
        return this.config;
    }

    public getConfig(): SystemConfig {
        if (!this.config) {
            throw new Error('Configuration not loaded. Call loadConfig() first.');
        }
        return this.config;
    }

    public updateConfig(updates: Record<string, unknown>): SystemConfig {
        if (!this.config) {
            throw new Error('Configuration not loaded. Call loadConfig() first.');
        }

        this.config = validateConfig(deepMerge({ ...this.config }, updates));
        return this.config;
    }

    public reloadConfig(configPath?: string): Promise<SystemConfig> {
        this.config = null;
        return this.loadConfig(configPath);
    }
}

export * from './defaults';
export * from './env';
export * from './file';
export * from './validation';

const SECRET_KEYS = new Set(['apiKey', 'redisUrl']);

/**
 * Copy of the configuration safe to print: secret values keep only their
 * last four characters.
 */
export function maskSecrets(config: SystemConfig): Record<string, unknown> {
    const mask = (value: unknown, key: string): unknown => {
        if (typeof value === 'string' && SECRET_KEYS.has(key)) {
            return value.length > 4 ? `****${value.slice(-4)}` : value ? '****' : value;
        }
        if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
            return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, mask(v, k)]));
        }
        return value;
    };

    return Object.fromEntries(Object.entries(config).map(([key, value]) => [key, mask(value, key)]));
}
