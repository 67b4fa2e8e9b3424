import { describe, it, expect, beforeAll, afterEach } from 'vitest';
import { Writable } from 'node:stream';
import { CommanderError } from 'commander';
import { createProgram, toCliFlags } from '../cli/program.js';
import { AffiliationClassifier } from '../classifier/affiliation-classifier.js';
import { loadCompanyReferenceSet } from '../classifier/company-reference.js';
import { formatReport } from '../exporters/report-writer.js';
import { initLogger } from '../utils/logger.js';
import { VERSION } from '../types/index.js';
import { FakeSource, fakePaper, pmids } from './fake-source.js';

function collector(): { stream: Writable; text: () => string } {
    const chunks: string[] = [];
    const stream = new Writable({
        write(chunk, _encoding, callback) {
            chunks.push(String(chunk));
            callback();
        },
    });
    return { stream, text: () => chunks.join('') };
}

describe('CLI', () => {
    let classifier: AffiliationClassifier;

    beforeAll(() => {
        initLogger({ level: 'error', jsonLogs: true });
        classifier = new AffiliationClassifier(loadCompanyReferenceSet());
    });

    afterEach(() => {
        process.exitCode = undefined;
    });

    async function run(args: string[], source = new FakeSource(pmids(4))) {
        const stdout = collector();
        const errors: string[] = [];
        const help: string[] = [];
        const program = createProgram({ source, classifier, stdout: stdout.stream })
            .exitOverride()
            .configureOutput({ writeErr: (text) => errors.push(text), writeOut: (text) => help.push(text) });

        const error = await program
            .parseAsync(['node', 'get-papers-list', ...args])
            .then(() => null, (e: unknown) => e);

        return { error, stdout: stdout.text(), stderr: errors.join(''), help: help.join(''), source };
    }

    describe('toCliFlags', () => {
        it('should include only the options that were given', () => {
            expect(toCliFlags(' cancer  therapy ', {})).toEqual({ query: 'cancer therapy' });
            expect(toCliFlags('cancer', { file: 'out.csv', maxResults: '20', debug: true, jsonLogs: true }))
                .toEqual({ query: 'cancer', out: 'out.csv', maxResults: 20, debug: true, jsonLogs: true });
        });
    });

    it('should print the report to stdout', async () => {
        const { error, stdout, source } = await run(['cancer AND pfizer[ad]', '--json-logs', '-m', '3']);

        expect(error).toBeNull();
        expect(process.exitCode).toBeUndefined();
        expect(source.batches).toEqual([['1', '2', '3']]);
        expect(stdout).toBe(formatReport([{
            pubmed_id: '2',
            title: fakePaper('2').title,
            publication_date: '2024-01-01',
            date_precision: 'year',
            non_academic_authors: ['Author 2'],
            company_affiliations: ['Pfizer'],
            corresponding_email: 'Not available',
        }]));
    });

    it('should print the package version', async () => {
        const { error, help, source } = await run(['--version']);

        expect(error).toMatchObject({ code: 'commander.version', exitCode: 0 });
        expect(help).toBe(`${VERSION}\n`);
        expect(source.searchCalls).toBe(0);
    });

    it('should exit with 2 on an invalid query, before any request', async () => {
        const { error, stderr, source } = await run(['a', '--json-logs']);

        expect(error).toBeInstanceOf(CommanderError);
        expect(error).toMatchObject({ exitCode: 2, code: 'industry-papers.invalidInput' });
        expect(stderr).toBe('error: Query must be at least 2 characters long\n');
        expect(source.searchCalls).toBe(0);
    });

    it('should exit with 2 on a non-csv output file', async () => {
        const { error, stdout } = await run(['cancer', '-f', 'results.txt', '--json-logs']);

        expect(error).toMatchObject({ exitCode: 2 });
        expect(stdout).toBe('');
    });

    it('should exit with 2 on an out-of-range --max-results', async () => {
        const { error } = await run(['cancer', '--max-results', '0', '--json-logs']);
        expect(error).toMatchObject({ exitCode: 2 });
    });

    it('should set exit code 1 when the remote search fails', async () => {
        const { error, stdout } = await run(
            ['cancer', '--json-logs'],
            new FakeSource([], { search: new Error('offline') })
        );

        expect(error).toBeNull();
        expect(process.exitCode).toBe(1);
        expect(stdout).toBe('');
    });
});
