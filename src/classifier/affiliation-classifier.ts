import {
    MatchReason,
    type ClassificationResult,
    type NonCommercialClassification,
} from '../types/index.js';
import { CompanyReferenceSet, loadCompanyReferenceSet } from './company-reference.js';
import { emailDomain, escapeRegExp, normalizeText } from './text.js';

/**
 * What every rule sees: the raw affiliation, its normalized form padded with
 * spaces (so keys can be matched on word boundaries), and the author e-mail.
 */
export interface ClassifierInput {
    affiliation: string;
    normalized: string;
    email: string | null;
}

/**
 * One link of the decision chain. A rule whose reason is NONE ends the chain
 * with a non-commercial verdict; any other reason ends it with a commercial one.
 */
export interface ClassificationRule {
    readonly name: string;
    readonly reason: MatchReason;
    predicate(input: ClassifierInput): boolean;
    extractor(input: ClassifierInput): string | null;
}

const NOT_COMMERCIAL: NonCommercialClassification = Object.freeze({
    is_commercial: false,
    company_name: null,
    matched_reason: MatchReason.NONE,
});

// ─── Rules ───────────────────────────────────────────────

/**
 * Academic and government markers. Matched at the start of a word, so
 * "universit" covers University, Universität and Université.
 */
export function academicExclusionRule(reference: CompanyReferenceSet): ClassificationRule {
    const patterns = reference.academicMarkers.map((m) => new RegExp(`\\b${escapeRegExp(m)}`, 'i'));

    return {
        name: 'academic-exclusion',
        reason: MatchReason.NONE,
        predicate: ({ affiliation }) => patterns.some((p) => p.test(affiliation)),
        extractor: () => null,
    };
}

/**
 * Reference-set lookup on the normalized text. The longest matching key wins;
 * among keys of equal length, the one that appears first.
 */
export function knownCompanyRule(reference: CompanyReferenceSet): ClassificationRule {
    const find = (normalized: string): string | null => {
        let best: { length: number; index: number; canonical: string } | null = null;

        for (const entry of reference.entries) {
            if (best && entry.key.length < best.length) break;

            const index = normalized.indexOf(` ${entry.key} `);
            if (index === -1) continue;

            if (!best || index < best.index) {
                best = { length: entry.key.length, index, canonical: entry.canonical };
            }
        }

        return best?.canonical ?? null;
    };

    return {
        name: 'known-company',
        reason: MatchReason.KNOWN_COMPANY,
        predicate: ({ normalized }) => find(normalized) !== null,
        extractor: ({ normalized }) => find(normalized),
    };
}

const CAPITALIZED_TOKEN = /^[\p{Lu}\p{N}][\p{L}\p{N}&'’-]*$/u;
const LEADING_NOISE = new Set(['the', 'at', 'from']);

/**
 * Longest run of capitalized tokens at the end of `text`.
 * Punctuated tokens ("Oncology,", "Basel.") and lowercase words end the run.
 */
export function capitalizedRunBefore(text: string): string | null {
    const tokens = text.trimEnd().split(/\s+/).filter(Boolean);
    const run: string[] = [];

    for (let i = tokens.length - 1; i >= 0; i--) {
        const token = tokens[i] ?? '';
        if (token !== '&' && !CAPITALIZED_TOKEN.test(token)) break;
        run.unshift(token);
    }

    while (run.length > 0 && (run[0] === '&' || LEADING_NOISE.has((run[0] ?? '').toLowerCase()))) {
        run.shift();
    }
    while (run.length > 0 && run[run.length - 1] === '&') {
        run.pop();
    }

    const name = run.join(' ').replace(/-+$/, '');
    return name || null;
}

/**
 * The comma/semicolon-delimited segment of `text` around `index`.
 */
function segmentAround(text: string, index: number): string | null {
    const before = text.slice(0, index);
    const start = Math.max(before.lastIndexOf(','), before.lastIndexOf(';')) + 1;
    const rest = text.slice(index).search(/[,;]/);
    const end = rest === -1 ? text.length : index + rest;

    const segment = text.slice(start, end).trim().replace(/\.+$/, '');
    return segment || null;
}

/**
 * Corporate suffixes and industry words, matched as whole words.
 * The company name is best-effort: the longest capitalized run right before
 * a matched keyword, or the segment holding the keyword when there is none.
 */
export function corporateKeywordRule(reference: CompanyReferenceSet): ClassificationRule {
    const patterns = reference.corporateKeywords.map((kw) => {
        const base = kw.replace(/\.+$/, '');
        return new RegExp(`\\b${escapeRegExp(base)}\\b\\.?`, 'gi');
    });

    const matchIndexes = (affiliation: string): number[] =>
        patterns
            .flatMap((p) => [...affiliation.matchAll(p)].map((m) => m.index ?? 0))
            .sort((a, b) => a - b);

    return {
        name: 'corporate-keyword',
        reason: MatchReason.KEYWORD,
        predicate: ({ affiliation }) => patterns.some((p) => affiliation.search(p) !== -1),
        extractor: ({ affiliation }) => {
            const indexes = matchIndexes(affiliation);

            let best: string | null = null;
            let bestTokens = 0;
            for (const index of indexes) {
                const run = capitalizedRunBefore(affiliation.slice(0, index));
                const tokens = run ? run.split(' ').length : 0;
                if (run && tokens > bestTokens) {
                    best = run;
                    bestTokens = tokens;
                }
            }

            const first = indexes[0];
            return best ?? (first === undefined ? null : segmentAround(affiliation, first));
        },
    };
}

/**
 * `.ac.<cc>` → /\.ac\.[a-z]{2}$/
 */
function suffixPattern(suffix: string): RegExp {
    const body = suffix
        .split('<cc>')
        .map((part) => escapeRegExp(part))
        .join('[a-z]{2}');
    return new RegExp(`${body}$`);
}

/**
 * Any well-formed e-mail domain outside the non-commercial suffixes counts as
 * commercial. Personal webmail (gmail.com, ...) is therefore a known false positive.
 */
export function emailDomainRule(reference: CompanyReferenceSet): ClassificationRule {
    const nonCommercial = reference.nonCommercialEmailSuffixes.map(suffixPattern);

    const commercialDomain = (email: string | null): string | null => {
        const domain = emailDomain(email);
        if (!domain) return null;
        return nonCommercial.some((p) => p.test(domain)) ? null : domain;
    };

    return {
        name: 'email-domain',
        reason: MatchReason.EMAIL_DOMAIN,
        predicate: ({ email }) => commercialDomain(email) !== null,
        extractor: ({ email }) => commercialDomain(email),
    };
}

/**
 * The decision chain, in precedence order.
 */
export function buildRules(reference: CompanyReferenceSet): readonly ClassificationRule[] {
    return Object.freeze([
        academicExclusionRule(reference),
        knownCompanyRule(reference),
        corporateKeywordRule(reference),
        emailDomainRule(reference),
    ]);
}

// ─── Classifier ─────────────────────────────────────────

/**
 * Decides academic vs. commercial for one affiliation string.
 * Never throws; input that no rule recognizes is non-commercial.
 */
export class AffiliationClassifier {
    readonly rules: readonly ClassificationRule[];

    constructor(readonly reference: CompanyReferenceSet) {
        this.rules = buildRules(reference);
    }

    classify(affiliation: string | null | undefined, email: string | null = null): ClassificationResult {
        const text = affiliation ?? '';
        const input: ClassifierInput = {
            affiliation: text,
            normalized: ` ${normalizeText(text)} `,
            email: email?.trim() || null,
        };

        for (const rule of this.rules) {
            if (!rule.predicate(input)) continue;

            if (rule.reason === MatchReason.NONE) {
                return NOT_COMMERCIAL;
            }
            return {
                is_commercial: true,
                company_name: rule.extractor(input),
                matched_reason: rule.reason,
            };
        }

        return NOT_COMMERCIAL;
    }
}

let defaultClassifier: AffiliationClassifier | null = null;

/**
 * Classifier over the bundled reference set, loaded on first use.
 */
export function getDefaultClassifier(): AffiliationClassifier {
    if (!defaultClassifier) {
        defaultClassifier = new AffiliationClassifier(loadCompanyReferenceSet());
    }
    return defaultClassifier;
}

/**
 * Classify with the bundled reference set.
 */
export function classify(affiliation: string | null | undefined, email: string | null = null): ClassificationResult {
    return getDefaultClassifier().classify(affiliation, email);
}
