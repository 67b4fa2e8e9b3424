/**
 * Paper records as fetched from the literature database.
 * Normalized from the source payload (PubMed XML) into this common shape.
 */

/**
 * How much of a publication date the source actually provided.
 * Missing parts are filled with 01 when the date is rendered.
 */
export type DatePrecision = 'day' | 'month' | 'year';

export interface PublicationDate {
    year: number;

    /** 1-12; 1 when the source gave only a year */
    month: number;

    /** 1-31; 1 when the source gave no day */
    day: number;

    precision: DatePrecision;
}

/**
 * One author of a paper with their (first) affiliation.
 */
export interface AuthorRecord {
    /** Display name, "ForeName LastName" or a collective name */
    name: string;

    /** Free-text affiliation with any e-mail address removed (may be empty) */
    affiliation: string;

    email: string | null;

    /** True when the source marks this author as the corresponding author */
    is_corresponding: boolean;
}

export interface PaperRecord {
    /** PubMed ID */
    id: string;

    title: string;

    /** null when the record carries no parseable date */
    pub_date: PublicationDate | null;

    /** Authors in source order */
    authors: readonly AuthorRecord[];

    corresponding_email: string | null;
}

/**
 * One report row: a paper projected onto its commercial authors.
 */
export interface OutputRow {
    pubmed_id: string;
    title: string;

    /** ISO 8601 calendar date (YYYY-MM-DD), or '' when unknown */
    publication_date: string;

    /** Precision of the source date behind `publication_date` */
    date_precision: DatePrecision | 'unknown';

    non_academic_authors: string[];
    company_affiliations: string[];
    corresponding_email: string;
}
