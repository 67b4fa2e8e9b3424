/**
 * Shared utilities for source adapters.
 */
import type { PublicationDate } from '../types/index.js';

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const NAMED_ENTITIES: Record<string, string> = {
    amp: '&',
    lt: '<',
    gt: '>',
    quot: '"',
    apos: "'",
    nbsp: ' ',
};

const MAX_CODE_POINT = 0x10ffff;

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;

/**
 * Narrow an unknown parsed value to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Wrap a single parsed node in an array; missing nodes become [].
 */
export function asArray(value: unknown): unknown[] {
    if (Array.isArray(value)) return value;
    if (value === undefined || value === null) return [];
    return [value];
}

/**
 * Text content of a parsed XML node. Elements with attributes carry their
 * text under '#text'.
 */
export function textOf(value: unknown): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    if (isRecord(value)) return textOf(value['#text']);
    return '';
}

/**
 * Decode the XML predefined entities and numeric character references.
 */
export function decodeEntities(text: string): string {
    return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, ref: string) => {
        if (ref[0] === '#') {
            const code = ref[1] === 'x' || ref[1] === 'X'
                ? parseInt(ref.slice(2), 16)
                : parseInt(ref.slice(1), 10);
            return Number.isNaN(code) || code > MAX_CODE_POINT ? whole : String.fromCodePoint(code);
        }
        return NAMED_ENTITIES[ref.toLowerCase()] ?? whole;
    });
}

/**
 * Inline markup (<i>, <sup>, ...) removed, entities decoded, whitespace collapsed.
 */
export function cleanText(raw: string): string {
    return decodeEntities(raw.replace(/<[^>]+>/g, ''))
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * First e-mail address in a string.
 */
export function extractEmail(text: string): string | null {
    return text.match(EMAIL_PATTERN)?.[0] ?? null;
}

/**
 * Remove e-mail addresses and the "Electronic address:" label from an affiliation.
 * "Roche, Basel. Electronic address: jane@roche.com." → "Roche, Basel"
 */
export function stripEmails(affiliation: string): string {
    return affiliation
        .replace(/electronic address:?/gi, ' ')
        .replace(new RegExp(EMAIL_PATTERN.source, 'g'), ' ')
        .replace(/\s+/g, ' ')
        .replace(/\s+([.,;])/g, '$1')
        .replace(/^[\s.,;:]+|[\s.,;:]+$/g, '');
}

/**
 * "Mar", "march", "03" or "3" → 3. Unknown values → null.
 */
export function parseMonth(value: string | undefined): number | null {
    const text = (value ?? '').trim().toLowerCase();
    if (!text) return null;

    if (/^\d{1,2}$/.test(text)) {
        const month = parseInt(text, 10);
        return month >= 1 && month <= 12 ? month : null;
    }

    const index = MONTHS.indexOf(text.slice(0, 3));
    return index === -1 ? null : index + 1;
}

function daysInMonth(year: number, month: number): number {
    return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Build a publication date from the parts a record provides.
 * Missing month and day are filled with 1; `precision` records what was real.
 * A MedlineDate such as "1998 Dec-1999 Jan" contributes its leading year and month.
 */
export function parsePublicationDate(parts: {
    year?: string;
    month?: string;
    day?: string;
    medlineDate?: string;
}): PublicationDate | null {
    let yearText = parts.year?.trim() ?? '';
    let monthText = parts.month;
    let dayText = parts.day;

    if (!/^\d{4}$/.test(yearText) && parts.medlineDate) {
        const medline = parts.medlineDate.trim().match(/^(\d{4})(?:\s+([A-Za-z]{3,}))?/);
        yearText = medline?.[1] ?? '';
        monthText = medline?.[2];
        dayText = undefined;
    }

    if (!/^\d{4}$/.test(yearText)) return null;
    const year = parseInt(yearText, 10);

    const month = parseMonth(monthText);
    if (month === null) {
        return { year, month: 1, day: 1, precision: 'year' };
    }

    const day = /^\d{1,2}$/.test(dayText?.trim() ?? '') ? parseInt(dayText ?? '', 10) : null;
    if (day === null || day < 1 || day > daysInMonth(year, month)) {
        return { year, month, day: 1, precision: 'month' };
    }

    return { year, month, day, precision: 'day' };
}

/**
 * YYYY-MM-DD
 */
export function formatIsoDate(date: PublicationDate): string {
    const pad = (n: number, width: number) => String(n).padStart(width, '0');
    return `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}`;
}

/**
 * Split a list into consecutive chunks of at most `size` items.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
    if (!(size >= 1)) {
        throw new RangeError(`Chunk size must be at least 1, got ${size}`);
    }

    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        chunks.push(items.slice(i, i + size));
    }
    return chunks;
}
