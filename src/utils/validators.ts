import { extname } from 'node:path';
import { MAX_BATCH_SIZE, MAX_SEARCH_RESULTS, type IndustryPapersConfig } from '../types/index.js';
import { InputValidationError } from './errors.js';

/** Characters that are never part of PubMed query syntax */
const QUERY_FORBIDDEN = ['<', '>', ';', '\\', '`'];

/** Characters not allowed in output file names on common file systems */
const FILENAME_FORBIDDEN = ['<', '>', '"', '|', '?', '*'];

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/**
 * Validate a PubMed query string, then return it with whitespace collapsed.
 * Field tags, boolean operators, parentheses and quoted phrases pass through.
 */
export function validateQuery(query: string): string {
    const trimmed = query.replace(/\s+/g, ' ').trim();

    if (!trimmed) {
        throw new InputValidationError('Query cannot be empty', 'query');
    }
    if (trimmed.length < 2) {
        throw new InputValidationError('Query must be at least 2 characters long', 'query');
    }
    if (CONTROL_CHARS.test(query.replace(/[\t\n\r]/g, ' '))) {
        throw new InputValidationError('Query contains control characters', 'query');
    }

    const forbidden = QUERY_FORBIDDEN.find((c) => trimmed.includes(c));
    if (forbidden) {
        throw new InputValidationError(`Query contains invalid character: ${forbidden}`, 'query');
    }

    if ((trimmed.match(/"/g) ?? []).length % 2 !== 0) {
        throw new InputValidationError('Query has an unterminated quoted phrase', 'query');
    }

    let depth = 0;
    for (const ch of trimmed) {
        if (ch === '(') depth++;
        if (ch === ')') depth--;
        if (depth < 0) break;
    }
    if (depth !== 0) {
        throw new InputValidationError('Query has unbalanced parentheses', 'query');
    }

    return trimmed;
}

/**
 * Validate the output file path. It must name a .csv file and contain no
 * characters that are unsafe in file names.
 */
export function validateOutputPath(path: string): string {
    const trimmed = path.trim();

    if (!trimmed) {
        throw new InputValidationError('Filename cannot be empty', 'file');
    }
    if (CONTROL_CHARS.test(trimmed)) {
        throw new InputValidationError('Filename contains control characters', 'file');
    }

    const forbidden = FILENAME_FORBIDDEN.find((c) => trimmed.includes(c));
    if (forbidden) {
        throw new InputValidationError(`Filename contains invalid character: ${forbidden}`, 'file');
    }

    if (extname(trimmed).toLowerCase() !== '.csv') {
        throw new InputValidationError('Filename must have .csv extension', 'file');
    }

    return trimmed;
}

/**
 * Parse and range-check --max-results.
 */
export function validateMaxResults(value: string | number): number {
    const parsed = typeof value === 'number' ? value : Number(value.trim());

    if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_SEARCH_RESULTS) {
        throw new InputValidationError(
            `Max results must be an integer between 1 and ${MAX_SEARCH_RESULTS}, got ${value}`,
            'maxResults'
        );
    }

    return parsed;
}

/**
 * Check the request settings a config file may override.
 */
export function validateRequestSettings(
    config: Pick<IndustryPapersConfig, 'batchSize' | 'requestsPerSecond' | 'timeoutMs'>
): void {
    const { batchSize, requestsPerSecond, timeoutMs } = config;

    if (!Number.isInteger(batchSize) || batchSize < 1 || batchSize > MAX_BATCH_SIZE) {
        throw new InputValidationError(
            `Batch size must be an integer between 1 and ${MAX_BATCH_SIZE}, got ${batchSize}`,
            'batchSize'
        );
    }
    if (!(requestsPerSecond > 0)) {
        throw new InputValidationError(
            `Requests per second must be positive, got ${requestsPerSecond}`,
            'requestsPerSecond'
        );
    }
    if (!(timeoutMs > 0)) {
        throw new InputValidationError(`Timeout must be positive, got ${timeoutMs}`, 'timeoutMs');
    }
}
