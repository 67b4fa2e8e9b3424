import { cosmiconfig } from 'cosmiconfig';
import {
    DEFAULT_CONFIG,
    PUBMED_RATE_LIMIT,
    PUBMED_RATE_LIMIT_WITH_KEY,
    type IndustryPapersConfig,
    type LogLevel,
} from '../types/index.js';
import { getLogger } from './logger.js';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

type FileConfig = Partial<Omit<IndustryPapersConfig, 'query' | 'apiKey'>>;

/**
 * Keep only the known keys of the expected type; anything else in the file is ignored.
 */
export function pickFileConfig(raw: unknown): FileConfig {
    if (typeof raw !== 'object' || raw === null) return {};
    const source = new Map<string, unknown>(Object.entries(raw));
    const picked: FileConfig = {};

    const num = (key: string): number | undefined => {
        const value = source.get(key);
        return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
    };
    const str = (key: string): string | undefined => {
        const value = source.get(key);
        return typeof value === 'string' && value.trim() ? value : undefined;
    };
    const bool = (key: string): boolean | undefined => {
        const value = source.get(key);
        return typeof value === 'boolean' ? value : undefined;
    };

    const assign = <K extends keyof FileConfig>(key: K, value: FileConfig[K] | undefined): void => {
        if (value !== undefined) picked[key] = value;
    };

    assign('maxResults', num('maxResults'));
    assign('batchSize', num('batchSize'));
    assign('requestsPerSecond', num('requestsPerSecond'));
    assign('timeoutMs', num('timeoutMs'));
    assign('out', str('out'));
    assign('companiesFile', str('companiesFile'));
    assign('email', str('email'));
    assign('tool', str('tool'));
    assign('debug', bool('debug'));
    assign('jsonLogs', bool('jsonLogs'));

    const level = str('logLevel');
    const knownLevel = LOG_LEVELS.find((l) => l === level);
    assign('logLevel', knownLevel);

    return picked;
}

/**
 * Load configuration from industry-papers.config.json using cosmiconfig.
 * Returns null if no config file is found.
 */
async function loadConfigFile(): Promise<FileConfig | null> {
    const explorer = cosmiconfig('industry-papers', {
        searchPlaces: ['industry-papers.config.json'],
    });

    try {
        const result = await explorer.search();
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return pickFileConfig(result.config);
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): Partial<IndustryPapersConfig> {
    const env: Partial<IndustryPapersConfig> = {};

    const apiKey = getApiKey('NCBI_API_KEY');
    if (apiKey) {
        env.apiKey = apiKey;
        getLogger().debug('NCBI_API_KEY detected in environment');
    }

    const email = process.env['NCBI_EMAIL'];
    if (email) env.email = email;

    return env;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<IndustryPapersConfig> & { query: string }
): Promise<IndustryPapersConfig> {
    const fileConfig = await loadConfigFile();
    return mergeConfig(cliFlags, fileConfig ?? {}, loadEnvVars());
}

/**
 * The pure part of `resolveConfig`. Callers leave unset keys out rather than
 * passing `undefined`, which would override a lower-precedence value.
 */
export function mergeConfig(
    cliFlags: Partial<IndustryPapersConfig> & { query: string },
    fileConfig: FileConfig,
    envConfig: Partial<IndustryPapersConfig>
): IndustryPapersConfig {
    const merged: IndustryPapersConfig = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
    };

    // The rate limit follows the key unless someone pinned it explicitly
    const pinnedRate = cliFlags.requestsPerSecond ?? fileConfig.requestsPerSecond;
    const ceiling = merged.apiKey ? PUBMED_RATE_LIMIT_WITH_KEY : PUBMED_RATE_LIMIT;
    merged.requestsPerSecond = Math.min(pinnedRate ?? ceiling, ceiling);

    if (merged.debug) {
        merged.logLevel = 'debug';
    }

    return merged;
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name];
}
