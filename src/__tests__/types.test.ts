import { describe, it, expect } from 'vitest';
import {
    DEFAULT_CONFIG,
    MAX_SEARCH_RESULTS,
    MatchReason,
    PUBMED_RATE_LIMIT,
    PUBMED_RATE_LIMIT_WITH_KEY,
    type ClassificationResult,
} from '../types/index.js';

describe('Types', () => {
    describe('MatchReason', () => {
        it('should have 4 reasons', () => {
            expect(Object.values(MatchReason)).toEqual(['KNOWN_COMPANY', 'KEYWORD', 'EMAIL_DOMAIN', 'NONE']);
        });

        it('non-commercial results are typed with a null company', () => {
            const result: ClassificationResult = {
                is_commercial: false,
                company_name: null,
                matched_reason: MatchReason.NONE,
            };
            if (!result.is_commercial) {
                expect(result.company_name).toBeNull();
            }
        });
    });

    describe('DEFAULT_CONFIG', () => {
        it('should retrieve 100 PMIDs by default', () => {
            expect(DEFAULT_CONFIG.maxResults).toBe(100);
            expect(DEFAULT_CONFIG.maxResults).toBeLessThanOrEqual(MAX_SEARCH_RESULTS);
        });

        it('should fetch in batches of 50', () => {
            expect(DEFAULT_CONFIG.batchSize).toBe(50);
        });

        it('should stay within the anonymous NCBI rate limit', () => {
            expect(DEFAULT_CONFIG.requestsPerSecond).toBe(PUBMED_RATE_LIMIT);
            expect(PUBMED_RATE_LIMIT_WITH_KEY).toBeGreaterThan(PUBMED_RATE_LIMIT);
        });

        it('should log at info level, pretty-printed', () => {
            expect(DEFAULT_CONFIG.logLevel).toBe('info');
            expect(DEFAULT_CONFIG.debug).toBe(false);
            expect(DEFAULT_CONFIG.jsonLogs).toBe(false);
        });

        it('should write to stdout unless a file is given', () => {
            expect(DEFAULT_CONFIG.out).toBeUndefined();
        });
    });
});
