import type { OutputRow, PaperRecord } from '../types/index.js';
import type { AffiliationClassifier } from '../classifier/affiliation-classifier.js';
import { formatIsoDate } from '../sources/utils.js';
import { getLogger } from '../utils/logger.js';

/** Written when no author e-mail is known */
export const EMAIL_NOT_AVAILABLE = 'Not available';

/**
 * Append `value` unless an equal one (case-insensitive) is already there.
 */
function pushUnique(list: string[], seen: Set<string>, value: string): void {
    const key = value.toLowerCase();
    if (seen.has(key)) return;
    seen.add(key);
    list.push(value);
}

/**
 * Corresponding-author e-mail: the record's own, then the first flagged author's.
 */
export function resolveCorrespondingEmail(paper: PaperRecord): string {
    if (paper.corresponding_email) return paper.corresponding_email;

    const flagged = paper.authors.find((a) => a.is_corresponding && a.email);
    return flagged?.email ?? EMAIL_NOT_AVAILABLE;
}

/**
 * Project a paper onto its commercial authors.
 * Returns null when no author is commercial.
 */
export function normalizeRecord(paper: PaperRecord, classifier: AffiliationClassifier): OutputRow | null {
    const authors: string[] = [];
    const companies: string[] = [];
    const seenAuthors = new Set<string>();
    const seenCompanies = new Set<string>();

    for (const author of paper.authors) {
        const result = classifier.classify(author.affiliation, author.email);
        if (!result.is_commercial) continue;

        getLogger().debug(
            { pmid: paper.id, author: author.name, reason: result.matched_reason, company: result.company_name },
            'Commercial author'
        );

        pushUnique(authors, seenAuthors, author.name);
        if (result.company_name) {
            pushUnique(companies, seenCompanies, result.company_name);
        }
    }

    if (authors.length === 0) return null;

    return {
        pubmed_id: paper.id,
        title: paper.title,
        publication_date: paper.pub_date ? formatIsoDate(paper.pub_date) : '',
        date_precision: paper.pub_date?.precision ?? 'unknown',
        non_academic_authors: authors,
        company_affiliations: companies,
        corresponding_email: resolveCorrespondingEmail(paper),
    };
}

/**
 * Rows for every paper with at least one commercial author, in input order.
 */
export function normalizeRecords(papers: readonly PaperRecord[], classifier: AffiliationClassifier): OutputRow[] {
    const rows: OutputRow[] = [];
    for (const paper of papers) {
        const row = normalizeRecord(paper, classifier);
        if (row) rows.push(row);
    }
    return rows;
}
