import { XMLParser } from 'fast-xml-parser';
import type { AuthorRecord, LiteratureSource, PaperRecord, PublicationDate, SourceAdapterOptions } from '../types/index.js';
import { HttpClient } from '../utils/http-client.js';
import { RemoteApiError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import {
    asArray,
    cleanText,
    extractEmail,
    isRecord,
    parsePublicationDate,
    stripEmails,
    textOf,
} from './utils.js';

const EUTILS_BASE = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';

/**
 * esearch JSON response (subset of relevant fields).
 */
interface ESearchResponse {
    esearchresult?: {
        count?: string;
        idlist?: string[];
        ERROR?: string;
        errorlist?: {
            phrasesnotfound?: string[];
            fieldsnotfound?: string[];
        };
    };
    error?: string;
}

/** Elements that may repeat and must always parse as arrays */
const ARRAY_TAGS = new Set(['PubmedArticle', 'Author', 'AffiliationInfo', 'ArticleDate']);

/**
 * ArticleTitle and Affiliation may contain inline markup (<i>, <sup>); they are
 * kept as raw text and cleaned afterwards.
 */
const xmlParser = new XMLParser({
    ignoreAttributes: false,
    parseTagValue: false,
    trimValues: true,
    stopNodes: ['*.ArticleTitle', '*.Affiliation'],
    isArray: (name: string) => ARRAY_TAGS.has(name),
});

/**
 * PubMed source adapter over the NCBI E-utilities.
 *
 * @see https://www.ncbi.nlm.nih.gov/books/NBK25499/
 */
export class PubMedAdapter implements LiteratureSource {
    readonly name = 'PubMed';
    readonly sourceId = 'pubmed';
    private readonly httpClient: HttpClient;
    private readonly apiKey?: string;
    private readonly email?: string;
    private readonly tool: string;

    constructor(options?: SourceAdapterOptions & { httpClient?: HttpClient }) {
        this.apiKey = options?.apiKey;
        this.email = options?.email;
        this.tool = options?.tool ?? 'industry-papers';
        this.httpClient = options?.httpClient ?? new HttpClient();
    }

    async search(query: string, maxResults: number): Promise<string[]> {
        const params = new URLSearchParams({
            db: 'pubmed',
            term: query,
            retmax: String(maxResults),
            retmode: 'json',
            sort: 'relevance',
        });
        this.addAuthParams(params);

        const url = `${EUTILS_BASE}/esearch.fcgi?${params.toString()}`;
        getLogger().debug({ url }, 'PubMed esearch');

        const response = await this.httpClient.get<ESearchResponse | string>(url, { source: this.sourceId });
        const data = response.data;

        if (typeof data !== 'object' || data === null) {
            throw new RemoteApiError(`PubMed search returned an unexpected payload for query "${query}"`, {
                operation: 'search',
                query,
                status: response.status,
            });
        }

        const apiError = data.error ?? data.esearchresult?.ERROR;
        if (apiError) {
            throw new RemoteApiError(`PubMed search failed for query "${query}": ${apiError}`, {
                operation: 'search',
                query,
                status: response.status,
            });
        }

        const notFound = data.esearchresult?.errorlist?.phrasesnotfound ?? [];
        if (notFound.length > 0) {
            getLogger().warn({ phrases: notFound }, 'PubMed ignored phrases it could not find');
        }

        const ids = data.esearchresult?.idlist ?? [];
        getLogger().debug({ count: data.esearchresult?.count, returned: ids.length }, 'PubMed esearch done');
        return ids;
    }

    async fetchBatch(ids: readonly string[]): Promise<PaperRecord[]> {
        if (ids.length === 0) return [];

        const params = new URLSearchParams({
            db: 'pubmed',
            id: ids.join(','),
            retmode: 'xml',
            rettype: 'abstract',
        });
        this.addAuthParams(params);

        const url = `${EUTILS_BASE}/efetch.fcgi?${params.toString()}`;
        getLogger().debug({ ids: ids.length }, 'PubMed efetch');

        const response = await this.httpClient.get<string>(url, { source: this.sourceId });
        if (typeof response.data !== 'string') {
            throw new RemoteApiError('PubMed efetch returned a non-XML payload', {
                operation: 'fetch',
                status: response.status,
            });
        }

        return parsePubmedXml(response.data);
    }

    private addAuthParams(params: URLSearchParams): void {
        params.set('tool', this.tool);
        if (this.email) {
            params.set('email', this.email);
        }
        if (this.apiKey) {
            params.set('api_key', this.apiKey);
        }
    }
}

// ─── XML → PaperRecord ──────────────────────────────────

/**
 * Parse an efetch PubmedArticleSet document.
 * Articles without a PMID or title are skipped.
 */
export function parsePubmedXml(xml: string): PaperRecord[] {
    let parsed: unknown;
    try {
        parsed = xmlParser.parse(xml);
    } catch (error) {
        throw new RemoteApiError('PubMed efetch returned malformed XML', { operation: 'fetch', cause: error });
    }

    const articleSet = isRecord(parsed) ? parsed['PubmedArticleSet'] : undefined;
    if (!isRecord(articleSet)) return [];

    const papers: PaperRecord[] = [];
    for (const article of asArray(articleSet['PubmedArticle'])) {
        const paper = parseArticle(article);
        if (paper) {
            papers.push(paper);
        } else {
            getLogger().warn('Skipping PubMed record without PMID or title');
        }
    }
    return papers;
}

function parseArticle(node: unknown): PaperRecord | null {
    const citation = isRecord(node) ? node['MedlineCitation'] : undefined;
    if (!isRecord(citation)) return null;

    const article = citation['Article'];
    if (!isRecord(article)) return null;

    const id = textOf(citation['PMID']).trim();
    const title = cleanText(textOf(article['ArticleTitle']));
    if (!id || !title) return null;

    const authorList = article['AuthorList'];
    const authors = (isRecord(authorList) ? asArray(authorList['Author']) : [])
        .map(parseAuthor)
        .filter((a): a is AuthorRecord => a !== null);

    const corresponding = authors.find((a) => a.is_corresponding && a.email);

    return Object.freeze({
        id,
        title,
        pub_date: parseArticleDate(article),
        authors: Object.freeze(authors),
        corresponding_email: corresponding?.email ?? null,
    });
}

/**
 * Author name, first affiliation, and the first e-mail found in any affiliation.
 * PubMed puts the corresponding author's address in their affiliation text, so
 * an author with an e-mail is flagged corresponding.
 */
function parseAuthor(node: unknown): AuthorRecord | null {
    if (!isRecord(node)) return null;

    const collective = cleanText(textOf(node['CollectiveName']));
    const lastName = cleanText(textOf(node['LastName']));
    const foreName = cleanText(textOf(node['ForeName'])) || cleanText(textOf(node['Initials']));
    const name = collective || [foreName, lastName].filter(Boolean).join(' ');
    if (!name) return null;

    const affiliations = asArray(node['AffiliationInfo'])
        .map((info) => (isRecord(info) ? cleanText(textOf(info['Affiliation'])) : ''))
        .filter(Boolean);

    let email: string | null = null;
    for (const affiliation of affiliations) {
        email = extractEmail(affiliation);
        if (email) break;
    }

    return Object.freeze({
        name,
        affiliation: stripEmails(affiliations[0] ?? ''),
        email,
        is_corresponding: email !== null,
    });
}

/**
 * Electronic publication date first, then the journal issue date.
 */
function parseArticleDate(article: Record<string, unknown>): PublicationDate | null {
    for (const articleDate of asArray(article['ArticleDate'])) {
        if (!isRecord(articleDate)) continue;
        const date = parsePublicationDate({
            year: textOf(articleDate['Year']),
            month: textOf(articleDate['Month']),
            day: textOf(articleDate['Day']),
        });
        if (date) return date;
    }

    const journal = article['Journal'];
    const issue = isRecord(journal) ? journal['JournalIssue'] : undefined;
    const pubDate = isRecord(issue) ? issue['PubDate'] : undefined;
    if (!isRecord(pubDate)) return null;

    return parsePublicationDate({
        year: textOf(pubDate['Year']),
        month: textOf(pubDate['Month']),
        day: textOf(pubDate['Day']),
        medlineDate: textOf(pubDate['MedlineDate']),
    });
}
