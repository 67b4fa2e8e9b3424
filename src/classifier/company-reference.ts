import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { CompanyReferenceData } from '../types/index.js';
import { ReferenceDataError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { normalizeText } from './text.js';

/**
 * Bundled reference file. Resolves to <root>/data/companies.json from both
 * src/classifier and dist/classifier.
 */
export const DEFAULT_COMPANIES_PATH = fileURLToPath(new URL('../../data/companies.json', import.meta.url));

export interface CompanyEntry {
    /** Normalized lookup key */
    readonly key: string;
    readonly canonical: string;
}

/**
 * Immutable lookup table built once at startup.
 *
 * Entries are kept longest key first so that "merck sharp dohme" is tried
 * before "merck".
 */
export class CompanyReferenceSet {
    readonly entries: readonly CompanyEntry[];
    readonly academicMarkers: readonly string[];
    readonly corporateKeywords: readonly string[];
    readonly nonCommercialEmailSuffixes: readonly string[];
    private readonly byKey: ReadonlyMap<string, string>;

    private constructor(data: CompanyReferenceData) {
        const byKey = new Map<string, string>();
        for (const [rawKey, canonical] of Object.entries(data.companies)) {
            const key = normalizeText(rawKey);
            if (key) byKey.set(key, canonical.trim());
        }

        this.byKey = byKey;
        this.entries = Object.freeze(
            [...byKey.entries()]
                .map(([key, canonical]) => Object.freeze({ key, canonical }))
                .sort((a, b) => b.key.length - a.key.length || a.key.localeCompare(b.key))
        );
        this.academicMarkers = Object.freeze(uniqueLower(data.academicMarkers));
        this.corporateKeywords = Object.freeze(uniqueLower(data.corporateKeywords));
        this.nonCommercialEmailSuffixes = Object.freeze(uniqueLower(data.nonCommercialEmailSuffixes));
        Object.freeze(this);
    }

    static fromData(data: CompanyReferenceData): CompanyReferenceSet {
        return new CompanyReferenceSet(data);
    }

    get size(): number {
        return this.entries.length;
    }

    /**
     * Canonical name for a company string, compared case- and punctuation-insensitively.
     */
    canonicalFor(name: string): string | undefined {
        return this.byKey.get(normalizeText(name));
    }
}

function uniqueLower(values: readonly string[]): string[] {
    return [...new Set(values.map((v) => v.trim().toLowerCase()).filter(Boolean))];
}

/**
 * Check the parsed JSON against the reference file shape.
 */
export function parseReferenceData(raw: unknown, path: string): CompanyReferenceData {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new ReferenceDataError('Reference data must be a JSON object', path);
    }
    const fields = new Map<string, unknown>(Object.entries(raw));

    const companiesRaw = fields.get('companies');
    if (typeof companiesRaw !== 'object' || companiesRaw === null || Array.isArray(companiesRaw)) {
        throw new ReferenceDataError('"companies" must map company keys to canonical names', path);
    }
    const companies: Record<string, string> = {};
    for (const [key, value] of Object.entries(companiesRaw)) {
        if (typeof value !== 'string' || !value.trim()) {
            throw new ReferenceDataError(`Company "${key}" has no canonical name`, path);
        }
        companies[key] = value;
    }

    const stringList = (name: string): string[] => {
        const value = fields.get(name);
        if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
            throw new ReferenceDataError(`"${name}" must be an array of strings`, path);
        }
        return value;
    };

    return {
        companies,
        academicMarkers: stringList('academicMarkers'),
        corporateKeywords: stringList('corporateKeywords'),
        nonCommercialEmailSuffixes: stringList('nonCommercialEmailSuffixes'),
    };
}

/**
 * Read and freeze the reference set. Called once per process.
 */
export function loadCompanyReferenceSet(path: string = DEFAULT_COMPANIES_PATH): CompanyReferenceSet {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new ReferenceDataError(`Cannot read company reference file: ${errorMessage(error)}`, path, {
            cause: error,
        });
    }

    const reference = CompanyReferenceSet.fromData(parseReferenceData(raw, path));
    getLogger().debug({ path, companies: reference.size }, 'Loaded company reference set');
    return reference;
}
