import * as path from 'path';
import { DEFAULT_PAGE_COUNT } from '../config';
import { CancelledError, errorMessage } from '../errors';
import { ConversionReporter, silentReporter } from '../lib/reporter';
import { BatchSummary, Job, JobResult } from '../types';
import { JobRunner } from './job-runner.service';
import { PageCountProbe } from './page-probe.service';

export interface BatchOrchestratorOptions {
    runner: JobRunner;
    reporter?: ConversionReporter;
    /** When set, every document is probed for its page count before the main pass. */
    probe?: PageCountProbe;
    defaultPageCount?: number;
}

/**
 * Runs jobs one at a time and aggregates page progress across the batch.
 * A failed job is recorded and the batch moves on; only cancellation stops it early.
 */
export class BatchOrchestrator {
    private readonly runner: JobRunner;
    private readonly reporter: ConversionReporter;
    private readonly probe?: PageCountProbe;
    private readonly defaultPageCount: number;

    constructor(options: BatchOrchestratorOptions) {
        this.runner = options.runner;
        this.reporter = options.reporter ?? silentReporter;
        this.probe = options.probe;
        this.defaultPageCount = options.defaultPageCount ?? DEFAULT_PAGE_COUNT;
    }

    async run(jobs: readonly Job[], signal?: AbortSignal): Promise<BatchSummary> {
        const results: JobResult[] = [];
        let cancelled = false;
        let probedPages: number | undefined;

        try {
            probedPages = this.probe ? await this.countPages(jobs, this.probe, signal) : undefined;
        } catch (error) {
            if (!(error instanceof CancelledError)) throw error;
            cancelled = true;
        }

        let pagesDone = 0;
        let pagesExpected = 0;
        for (let i = 0; i < jobs.length && !cancelled; i++) {
            const job = jobs[i];
            if (signal?.aborted) {
                cancelled = true;
                break;
            }

            this.reporter.jobStarted(path.basename(job.source), i + 1, jobs.length);
            let result: JobResult;
            try {
                result = await this.runner.run(job, signal);
            } catch (error) {
                cancelled = error instanceof CancelledError;
                this.reporter.error(`Error with ${job.source}: ${errorMessage(error)}`);
                result = Object.freeze({
                    source: job.source,
                    outputPath: job.outputPath,
                    remoteId: job.remoteId,
                    pagesReceived: 0,
                    totalPages: 0,
                    success: false,
                    error: cancelled ? 'Cancelled' : errorMessage(error),
                    via: 'none',
                });
            }

            results.push(result);
            this.reporter.jobFinished(result);
            pagesDone += result.pagesReceived;
            pagesExpected += result.totalPages;
            this.reporter.batchProgress(pagesDone, probedPages ?? pagesExpected);
        }

        const summary = summarize(results, probedPages, cancelled);
        this.reporter.info(`Batch processing complete: ${summary.succeeded}/${summary.jobs} PDFs converted successfully`);
        this.reporter.info(`Processed ${summary.pagesReceived}/${summary.pagesExpected} pages`);
        return summary;
    }

    private async countPages(jobs: readonly Job[], probe: PageCountProbe, signal?: AbortSignal): Promise<number> {
        let total = 0;
        for (const job of jobs) {
            const label = path.basename(job.source);
            let pages: number | undefined;
            try {
                pages = await probe.count(job, signal);
            } catch (error) {
                if (error instanceof CancelledError) throw error;
                this.reporter.warn(`Could not determine page count for ${label}: ${errorMessage(error)}`);
            }
            total += pages ?? this.defaultPageCount;
        }
        this.reporter.info(`Found ${total} total pages across ${jobs.length} PDFs`);
        return total;
    }
}

export function summarize(results: readonly JobResult[], probedPages: number | undefined, cancelled: boolean): BatchSummary {
    const succeeded = results.filter((r) => r.success).length;
    return {
        jobs: results.length,
        succeeded,
        failed: results.length - succeeded,
        pagesReceived: results.reduce((sum, r) => sum + r.pagesReceived, 0),
        pagesExpected: results.reduce((sum, r) => sum + r.totalPages, 0),
        probedPages,
        cancelled,
        results,
    };
}
