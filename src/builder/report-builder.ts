import {
    VERSION,
    type IndustryPapersConfig,
    type LiteratureSource,
    type OutputRow,
    type PaperRecord,
} from '../types/index.js';
import { PubMedAdapter } from '../sources/pubmed.js';
import { chunk } from '../sources/utils.js';
import { AffiliationClassifier } from '../classifier/affiliation-classifier.js';
import { loadCompanyReferenceSet } from '../classifier/company-reference.js';
import { normalizeRecords } from '../normalizer/record-normalizer.js';
import { writeReport, type ReportDestination } from '../exporters/report-writer.js';
import { createHttpClient, type HttpClient } from '../utils/http-client.js';
import { RemoteApiError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Collaborators a run can be given instead of the defaults (tests use this).
 */
export interface ReportDependencies {
    source?: LiteratureSource;
    httpClient?: HttpClient;
    classifier?: AffiliationClassifier;
    stdout?: NodeJS.WritableStream;
}

export interface ReportSummary {
    /** PMIDs returned by the search */
    found: number;

    /** Records parsed from the fetched batches */
    fetched: number;

    batches: number;
    requests: number;
    rows: OutputRow[];

    /** File path, or 'stdout' */
    destination: string;
}

/**
 * HTTP client rate-limited as configured.
 */
export function createReportHttpClient(config: IndustryPapersConfig): HttpClient {
    return createHttpClient({
        timeout: config.timeoutMs,
        version: VERSION,
        email: config.email,
        rateLimits: { pubmed: config.requestsPerSecond },
    });
}

/**
 * Main report pipeline, strictly sequential:
 *
 * 1. Search for PMIDs
 * 2. Fetch records one batch at a time
 * 3. Classify authors and keep papers with commercial authors
 * 4. Write the CSV report
 *
 * A failed search or batch aborts the run before anything is written.
 */
export async function buildReport(
    config: IndustryPapersConfig,
    deps: ReportDependencies = {}
): Promise<ReportSummary> {
    const logger = getLogger();
    const classifier = deps.classifier ?? new AffiliationClassifier(loadCompanyReferenceSet(config.companiesFile));
    const httpClient = deps.httpClient ?? createReportHttpClient(config);
    const source = deps.source ?? new PubMedAdapter({
        apiKey: config.apiKey,
        email: config.email,
        tool: config.tool,
        httpClient,
    });

    logger.info({ query: config.query, source: source.name, maxResults: config.maxResults }, 'Searching');

    // ──────────────────────────────────────────────────
    // Step 1: Search
    // ──────────────────────────────────────────────────
    let ids: string[];
    try {
        ids = await source.search(config.query, config.maxResults);
    } catch (error) {
        if (error instanceof RemoteApiError) throw error;
        throw new RemoteApiError(`Search failed for query "${config.query}": ${errorMessage(error)}`, {
            operation: 'search',
            query: config.query,
            cause: error,
        });
    }

    logger.info({ found: ids.length }, 'Search complete');

    // ──────────────────────────────────────────────────
    // Step 2-3: Fetch and classify, batch by batch
    // ──────────────────────────────────────────────────
    const batches = chunk(ids, config.batchSize);
    const rows: OutputRow[] = [];
    let fetched = 0;

    for (const [i, batch] of batches.entries()) {
        const context = { index: i + 1, total: batches.length, ids: batch };
        logger.debug({ batch: context.index, of: context.total, size: batch.length }, 'Fetching batch');

        let records: PaperRecord[];
        try {
            records = await source.fetchBatch(batch);
        } catch (error) {
            const range = `${batch[0] ?? ''}..${batch[batch.length - 1] ?? ''}`;
            throw new RemoteApiError(
                `Failed to fetch batch ${context.index}/${context.total} (PMIDs ${range}): ${errorMessage(error)}`,
                { operation: 'fetch', query: config.query, batch: context, cause: error }
            );
        }

        fetched += records.length;
        rows.push(...normalizeRecords(records, classifier));
    }

    // ──────────────────────────────────────────────────
    // Step 4: Write
    // ──────────────────────────────────────────────────
    const destination: ReportDestination = config.out
        ? { kind: 'file', path: config.out }
        : { kind: 'stream', stream: deps.stdout ?? process.stdout };
    writeReport(rows, destination);

    const summary: ReportSummary = {
        found: ids.length,
        fetched,
        batches: batches.length,
        requests: httpClient.getRequestCount(source.sourceId),
        rows,
        destination: config.out ?? 'stdout',
    };
    logSummary(summary);

    return summary;
}

/**
 * One info line; in debug mode also the companies found and a few sample titles.
 */
export function logSummary(summary: ReportSummary): void {
    const logger = getLogger();

    if (summary.rows.length === 0) {
        logger.info({ found: summary.found, fetched: summary.fetched, requests: summary.requests }, 'No papers with pharmaceutical/biotech company affiliations');
        return;
    }

    logger.info(
        { papers: summary.rows.length, fetched: summary.fetched, requests: summary.requests, destination: summary.destination },
        `Found ${summary.rows.length} papers with pharmaceutical/biotech affiliations`
    );

    const companies = [...new Set(summary.rows.flatMap((r) => r.company_affiliations))].sort();
    const samples = summary.rows.slice(0, 3).map((r) => r.title.slice(0, 80));
    logger.debug({ companies, samples }, 'Report details');
}
