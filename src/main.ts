#!/usr/bin/env node
/**
 * Main entry point for the mmd-convert CLI
 * Implements a subcommand-based CLI structure using yargs
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import * as path from 'path';
import logger, { setVerbose } from './lib/logger';
import { formatDocumentTable, printBatchSummary, printMessage } from './lib/ui';
import { listQueryFor } from './lib/documents';
import { errorMessage } from './errors';
import pipelineService from './services/pipeline.service';
import { DEFAULT_LIST_PAGE, DEFAULT_LIST_PER_PAGE, DEFAULT_PROGRESS_STYLE, PROGRESS_STYLES } from './config';

function fail(error: unknown): never {
    logger.error(`Error: ${errorMessage(error)}`);
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
}

// Main CLI definition
yargs(hideBin(process.argv))
    .scriptName('mmd-convert')
    .usage('$0 <cmd> [args]')
    .command(
        'convert <input>',
        'Convert a PDF, or a directory of PDFs, to Mathpix Markdown',
        (y) => y
            .positional('input', {
                describe: 'Path to a PDF file or a directory of PDFs',
                type: 'string',
                demandOption: true,
            })
            .option('out-dir', {
                alias: 'o',
                describe: 'Directory to write .mmd files (default: same as PDF folder)',
                type: 'string',
            })
            .option('verbose', {
                describe: 'Enable verbose logging',
                type: 'boolean',
                default: false,
            })
            .option('skip-status-check', {
                describe: 'Skip the final status check (use when all pages arrive via streaming)',
                type: 'boolean',
                default: false,
            })
            .option('silent', {
                describe: 'Hide progress bars (only show log messages)',
                type: 'boolean',
                default: false,
            })
            .option('progress', {
                describe: 'Progress display style',
                choices: PROGRESS_STYLES,
                default: DEFAULT_PROGRESS_STYLE,
            })
            .option('anonymize', {
                describe: 'Upload under a hashed file name',
                type: 'boolean',
                default: false,
            })
            .option('probe-pages', {
                describe: 'Count pages of every PDF up front for batch progress',
                type: 'boolean',
                default: false,
            })
            .option('localize-images', {
                describe: 'Download linked images next to each output and rewrite the links',
                type: 'boolean',
                default: false,
            })
            .example('$0 convert paper.pdf', 'Convert one PDF next to itself')
            .example('$0 convert ./papers -o ./out', 'Convert every PDF in ./papers into ./out'),
        async (argv) => {
            setVerbose(argv.verbose);
            const controller = new AbortController();
            process.once('SIGINT', () => {
                console.log('\nProcess interrupted by user. Stopping...');
                controller.abort();
            });
            try {
                const summary = await pipelineService.runConvertPipeline({
                    input: argv.input,
                    outDir: argv['out-dir'],
                    skipStatusCheck: argv['skip-status-check'],
                    silent: argv.silent,
                    progress: argv.progress,
                    anonymize: argv.anonymize,
                    probePages: argv['probe-pages'],
                    localizeImages: argv['localize-images'],
                    signal: controller.signal,
                });
                console.log('');
                printBatchSummary(summary);
                const ok = !summary.cancelled && summary.succeeded === summary.jobs;
                process.exit(ok ? 0 : 1);
            } catch (error) {
                fail(error);
            }
        },
    )
    .command(
        'list',
        'List documents previously processed by the service',
        (y) => y
            .option('page', {
                describe: 'Page number',
                type: 'number',
                default: DEFAULT_LIST_PAGE,
            })
            .option('per-page', {
                describe: 'Number of documents per page',
                type: 'number',
                default: DEFAULT_LIST_PER_PAGE,
            })
            .option('from-date', {
                describe: 'Only documents created on or after this day (YYYY-MM-DD)',
                type: 'string',
            })
            .option('to-date', {
                describe: 'Only documents created on or before this day (YYYY-MM-DD)',
                type: 'string',
            })
            .option('verbose', {
                describe: 'Enable verbose logging',
                type: 'boolean',
                default: false,
            }),
        async (argv) => {
            setVerbose(argv.verbose);
            try {
                const query = listQueryFor({
                    page: argv.page,
                    perPage: argv['per-page'],
                    fromDate: argv['from-date'],
                    toDate: argv['to-date'],
                });
                console.log(`\nRetrieving documents (page ${query.page}, ${query.perPage} per page)...`);
                const documents = await pipelineService.runListDocuments(query);
                if (documents.length === 0) {
                    console.log('No documents found.');
                    process.exit(0);
                }
                console.log(`\nFound ${documents.length} document(s):\n`);
                for (const line of formatDocumentTable(documents)) {
                    console.log(line);
                }
                if (documents.length === query.perPage) {
                    console.log(`\nShowing page ${query.page}. For more results, use --page ${query.page + 1}`);
                }
                process.exit(0);
            } catch (error) {
                fail(error);
            }
        },
    )
    .command(
        'images <target>',
        'Download CDN images linked from .md/.mmd files and point the links at local copies',
        (y) => y
            .positional('target', {
                describe: 'A markdown file or a directory to search',
                type: 'string',
                demandOption: true,
            })
            .option('verbose', {
                describe: 'Enable verbose logging',
                type: 'boolean',
                default: false,
            }),
        async (argv) => {
            setVerbose(argv.verbose);
            try {
                const { files, replaced } = await pipelineService.runLocalizeImages(argv.target);
                printMessage(`Updated ${replaced} image link(s) across ${files} file(s) in ${path.resolve(argv.target)}`, 'success');
                process.exit(0);
            } catch (error) {
                fail(error);
            }
        },
    )
    .demandCommand(1, 'You must provide a valid command')
    .strict()
    .help()
    .alias('h', 'help')
    .version()
    .alias('v', 'version')
    .parse();
