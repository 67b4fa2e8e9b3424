/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface IndustryPapersConfig {
    // Input
    query: string;
    maxResults: number;

    // Output (stdout when unset)
    out?: string;

    // Reference data (bundled data/companies.json when unset)
    companiesFile?: string;

    // PubMed E-utilities
    email: string;
    tool: string;
    apiKey?: string;
    batchSize: number;
    requestsPerSecond: number;
    timeoutMs: number;

    // Logging
    debug: boolean;
    logLevel: LogLevel;
    jsonLogs: boolean;
}

export const VERSION = '1.0.0';

/** Records per efetch call; NCBI recommends no more than this */
export const MAX_BATCH_SIZE = 50;

/** Hard ceiling on PMIDs a single esearch call may return */
export const MAX_SEARCH_RESULTS = 10000;

/** NCBI allows 3 requests/s without a key and 10 requests/s with one */
export const PUBMED_RATE_LIMIT = 3;
export const PUBMED_RATE_LIMIT_WITH_KEY = 10;

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Omit<IndustryPapersConfig, 'query'> = {
    maxResults: 100,
    email: 'user@example.com',
    tool: 'industry-papers',
    batchSize: MAX_BATCH_SIZE,
    requestsPerSecond: PUBMED_RATE_LIMIT,
    timeoutMs: 30000,
    debug: false,
    logLevel: 'info',
    jsonLogs: false,
};
