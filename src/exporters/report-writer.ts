import { writeFileSync } from 'node:fs';
import Papa from 'papaparse';
import type { OutputRow } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

/**
 * Where the report goes: a file on disk, or an already-open stream such as stdout.
 */
export type ReportDestination =
    | { kind: 'file'; path: string }
    | { kind: 'stream'; stream: NodeJS.WritableStream };

export const REPORT_COLUMNS = [
    'PubmedID',
    'Title',
    'Publication Date',
    'Non-academic Author(s)',
    'Company Affiliation(s)',
    'Corresponding Author Email',
    'Date Precision',
] as const;

/** Separator inside the author and company columns */
export const LIST_SEPARATOR = '; ';

// ─── Serialization ──────────────────────────────────────

function toRecord(row: OutputRow): string[] {
    return [
        row.pubmed_id,
        row.title,
        row.publication_date,
        row.non_academic_authors.join(LIST_SEPARATOR),
        row.company_affiliations.join(LIST_SEPARATOR),
        row.corresponding_email,
        row.date_precision,
    ];
}

/**
 * CSV text for the rows, header included. Fields holding a comma, a quote or
 * a line break are quoted, with inner quotes doubled.
 */
export function formatReport(rows: readonly OutputRow[]): string {
    const csv = Papa.unparse(
        {
            fields: [...REPORT_COLUMNS],
            data: rows.map(toRecord),
        },
        {
            delimiter: ',',
            newline: '\n',
            quotes: false,
            header: true,
        }
    );
    return `${csv}\n`;
}

/**
 * Write the report. File and stream destinations receive the same text.
 * @returns The CSV text that was written
 */
export function writeReport(rows: readonly OutputRow[], destination: ReportDestination): string {
    const content = formatReport(rows);

    if (destination.kind === 'file') {
        writeFileSync(destination.path, content, 'utf-8');
        getLogger().info({ path: destination.path, rows: rows.length }, 'Report written');
    } else {
        destination.stream.write(content);
    }

    return content;
}

/**
 * Split a list cell back into its values.
 */
export function splitListField(value: string): string[] {
    return value ? value.split(LIST_SEPARATOR) : [];
}
