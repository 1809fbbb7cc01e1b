import * as path from 'path';
import { ACCEPTED_PENDING_STATUSES } from '../config';
import { CancelledError, errorMessage } from '../errors';
import { ConversionReporter, silentReporter } from '../lib/reporter';
import { ConversionTransport, Job, JobResult, RemoteStatus } from '../types';
import { FallbackController, FallbackOutcome } from './fallback.service';

export interface JobRunnerOptions {
    transport: ConversionTransport;
    controller: FallbackController;
    reporter?: ConversionReporter;
    /** Trust the streamed output without asking the service for its final status. */
    skipStatusCheck?: boolean;
}

interface StatusCheck {
    success: boolean;
    status?: RemoteStatus;
    detail?: string;
}

/**
 * Runs one document through submit, stream/fallback and the final status check.
 */
export class JobRunner {
    private readonly transport: ConversionTransport;
    private readonly controller: FallbackController;
    private readonly reporter: ConversionReporter;
    private readonly skipStatusCheck: boolean;

    constructor(options: JobRunnerOptions) {
        this.transport = options.transport;
        this.controller = options.controller;
        this.reporter = options.reporter ?? silentReporter;
        this.skipStatusCheck = options.skipStatusCheck ?? false;
    }

    /**
     * Never rejects for conversion failures; those come back as unsuccessful results.
     *
     * @throws CancelledError when `signal` aborts
     */
    async run(job: Job, signal?: AbortSignal): Promise<JobResult> {
        const label = path.basename(job.source);
        const base = { source: job.source, outputPath: job.outputPath };

        let remoteId: string;
        try {
            this.reporter.info(`[${label}] Submitting PDF...`);
            remoteId = await this.transport.submit(
                { path: job.source, fileName: job.uploadName },
                { ...job.options, streaming: true },
                signal
            );
        } catch (error) {
            if (error instanceof CancelledError) throw error;
            this.reporter.error(`[${label}] Submission failed: ${errorMessage(error)}`);
            return finalize({ ...base, pagesReceived: 0, totalPages: 0, success: false, error: errorMessage(error), via: 'none' });
        }
        this.reporter.info(`[${label}] submitted → pdf_id=${remoteId}`);

        let outcome: FallbackOutcome;
        try {
            outcome = await this.controller.run({ ...job, remoteId }, signal);
        } catch (error) {
            if (error instanceof CancelledError) throw error;
            this.reporter.error(`[${label}] Conversion failed: ${errorMessage(error)}`);
            return finalize({ ...base, remoteId, pagesReceived: 0, totalPages: 0, success: false, error: errorMessage(error), via: 'none' });
        }
        if (outcome.state === 'failed') {
            return finalize({
                ...base,
                remoteId,
                pagesReceived: outcome.pagesReceived,
                totalPages: outcome.totalPages,
                success: false,
                error: outcome.error,
                via: 'none',
            });
        }

        if (outcome.totalPages > 0 && outcome.pagesReceived >= outcome.totalPages) {
            this.reporter.info(`[${label}] Successfully received all pages (${outcome.pagesReceived}/${outcome.totalPages})`);
        } else if (outcome.pagesReceived > 0) {
            this.reporter.warn(`[${label}] Partial content: received ${outcome.pagesReceived}/${outcome.totalPages} pages`);
        }

        const check = await this.checkFinalStatus(remoteId, label, signal);
        return finalize({
            ...base,
            remoteId,
            pagesReceived: outcome.pagesReceived,
            totalPages: outcome.totalPages,
            success: check.success,
            error: check.detail,
            via: outcome.via,
            remoteStatus: check.status,
        });
    }

    /**
     * A failed check marks the job unsuccessful but leaves the written output in place.
     */
    private async checkFinalStatus(remoteId: string, label: string, signal?: AbortSignal): Promise<StatusCheck> {
        if (this.skipStatusCheck) {
            this.reporter.info(`[${label}] Skipping final status check as requested`);
            return { success: true };
        }

        try {
            const { status } = await this.transport.getStatus(remoteId, signal);
            if (status === 'completed') {
                this.reporter.info(`[${label}] Final status check: PDF processing is complete`);
                return { success: true, status };
            }
            if (ACCEPTED_PENDING_STATUSES.includes(status)) {
                this.reporter.info(`[${label}] Backend processing still in progress (status: ${status}); streamed output should be complete`);
                return { success: true, status };
            }
            this.reporter.warn(`[${label}] Unexpected status: ${status}`);
            return { success: false, status, detail: `Unexpected final status: ${status}` };
        } catch (error) {
            if (error instanceof CancelledError) throw error;
            this.reporter.error(`[${label}] Error checking final status: ${errorMessage(error)}`);
            return { success: false, detail: `Final status check failed: ${errorMessage(error)}` };
        }
    }
}

function finalize(result: JobResult): JobResult {
    return Object.freeze(result);
}
