import { Command } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import {
    validateMaxResults,
    validateOutputPath,
    validateQuery,
    validateRequestSettings,
} from '../utils/validators.js';
import { InputValidationError, errorMessage, exitCodeFor } from '../utils/errors.js';
import { buildReport, type ReportDependencies } from '../builder/report-builder.js';
import { VERSION, type IndustryPapersConfig } from '../types/index.js';

type CliOptions = {
    file?: string;
    debug?: boolean;
    maxResults?: string;
    email?: string;
    companies?: string;
    jsonLogs?: boolean;
};

type CliFlags = Partial<IndustryPapersConfig> & { query: string };

/**
 * Validate the raw options and keep only the ones that were given, so that
 * unset flags do not override the config file or the environment.
 */
export function toCliFlags(query: string, opts: CliOptions): CliFlags {
    const flags: CliFlags = { query: validateQuery(query) };

    if (opts.file !== undefined) flags.out = validateOutputPath(opts.file);
    if (opts.maxResults !== undefined) flags.maxResults = validateMaxResults(opts.maxResults);
    if (opts.email !== undefined) flags.email = opts.email;
    if (opts.companies !== undefined) flags.companiesFile = opts.companies;
    if (opts.debug) flags.debug = true;
    if (opts.jsonLogs) flags.jsonLogs = true;

    return flags;
}

/**
 * The get-papers-list command. Dependencies are forwarded to the report pipeline.
 */
export function createProgram(deps: ReportDependencies = {}): Command {
    const program = new Command();

    program
        .name('get-papers-list')
        .description('Fetch PubMed papers with at least one author affiliated with a pharmaceutical or biotech company.')
        .version(VERSION)
        .argument('<query>', 'PubMed query (full PubMed syntax)')
        .option('-f, --file <path>', 'Write the CSV report to a file (default: stdout)')
        .option('-d, --debug', 'Print debug information during execution')
        .option('-m, --max-results <n>', 'Maximum number of PMIDs to retrieve (1-10000, default 100)')
        .option('--email <address>', 'Contact e-mail sent to NCBI')
        .option('--companies <path>', 'Alternative company reference file')
        .option('--json-logs', 'Output JSON logs')
        .action(async (query: string) => {
            try {
                const flags = toCliFlags(query, program.opts<CliOptions>());
                const config = await resolveConfig(flags);
                validateMaxResults(config.maxResults);
                validateRequestSettings(config);

                initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
                await buildReport(config, deps);
            } catch (error) {
                if (error instanceof InputValidationError) {
                    program.error(`error: ${error.message}`, {
                        exitCode: exitCodeFor(error),
                        code: 'industry-papers.invalidInput',
                    });
                }

                getLogger().error({ err: error }, errorMessage(error));
                process.exitCode = exitCodeFor(error);
            }
        });

    return program;
}
