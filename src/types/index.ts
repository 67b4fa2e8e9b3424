/**
 * Barrel export for all shared types.
 */
export type { AuthorRecord, PaperRecord, PublicationDate, DatePrecision, OutputRow } from './paper.js';
export { MatchReason } from './classification.js';
export type {
    ClassificationResult,
    CommercialClassification,
    NonCommercialClassification,
    CommercialReason,
    CompanyReferenceData,
} from './classification.js';
export { DEFAULT_CONFIG, MAX_BATCH_SIZE, MAX_SEARCH_RESULTS, VERSION, PUBMED_RATE_LIMIT, PUBMED_RATE_LIMIT_WITH_KEY } from './config.js';
export type { IndustryPapersConfig, LogLevel } from './config.js';
export type { LiteratureSource, SourceAdapterOptions } from './source-adapter.js';
