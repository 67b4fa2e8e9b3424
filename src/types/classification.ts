/**
 * Why an affiliation was (or was not) classified as commercial.
 *
 *   KNOWN_COMPANY  text names a company from the reference set
 *   KEYWORD        text carries a corporate suffix or industry word
 *   EMAIL_DOMAIN   author e-mail is on a non-academic domain
 *   NONE           academic, or no commercial signal at all
 */
export enum MatchReason {
    KNOWN_COMPANY = 'KNOWN_COMPANY',
    KEYWORD = 'KEYWORD',
    EMAIL_DOMAIN = 'EMAIL_DOMAIN',
    NONE = 'NONE',
}

export type CommercialReason = Exclude<MatchReason, MatchReason.NONE>;

export interface CommercialClassification {
    is_commercial: true;

    /** Canonical name, extracted name, or e-mail domain, depending on the reason */
    company_name: string | null;

    matched_reason: CommercialReason;
}

export interface NonCommercialClassification {
    is_commercial: false;
    company_name: null;
    matched_reason: MatchReason.NONE;
}

export type ClassificationResult = CommercialClassification | NonCommercialClassification;

/**
 * Shape of the company reference file (data/companies.json).
 */
export interface CompanyReferenceData {
    /** lowercase company key → canonical display name */
    companies: Record<string, string>;
    academicMarkers: string[];
    corporateKeywords: string[];

    /** Domain suffixes that are never commercial; `<cc>` stands for any two-letter country code */
    nonCommercialEmailSuffixes: string[];
}
