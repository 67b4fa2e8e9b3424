import type { PaperRecord } from './paper.js';

/**
 * Interface for literature database adapters.
 * Each adapter normalizes results into the common PaperRecord interface.
 */
export interface LiteratureSource {
    /** Human-readable source name */
    readonly name: string;

    /** Source identifier used for rate limiting and request counts */
    readonly sourceId: string;

    /**
     * Run a query in the database's own query grammar.
     * Returns record identifiers in relevance order.
     */
    search(query: string, maxResults: number): Promise<string[]>;

    /**
     * Fetch full records for one batch of identifiers.
     * Records the source cannot parse are left out.
     */
    fetchBatch(ids: readonly string[]): Promise<PaperRecord[]>;
}

/**
 * Options for source adapter initialization.
 */
export interface SourceAdapterOptions {
    /** API key (from environment variable) */
    apiKey?: string;

    /** Contact email sent with every request */
    email?: string;

    /** Tool name sent with every request */
    tool?: string;
}
