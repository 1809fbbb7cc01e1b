/**
 * Streaming with a poll-then-download fallback.
 *
 * streaming -> polling -> downloading -> done | failed
 */
import * as path from 'path';
import { POLL_CEILING, POLL_INTERVAL } from '../config';
import { CancelledError, StatusError, errorMessage } from '../errors';
import { Clock, systemClock } from '../lib/clock';
import { ConversionReporter, silentReporter } from '../lib/reporter';
import { ConversionTransport, FallbackState, FinalDownload, Job, ResultSource } from '../types';
import { SinkFactory, openFileSink, withSink } from './output-sink';
import { reconstructStream } from './reconstruction.service';

export type FallbackOutcome =
    | {
        state: 'done';
        via: Exclude<ResultSource, 'none'>;
        pagesReceived: number;
        totalPages: number;
        transitions: FallbackState[];
    }
    | {
        state: 'failed';
        error: string;
        pagesReceived: number;
        totalPages: number;
        transitions: FallbackState[];
    };

type PollOutcome =
    | { kind: 'completed' | 'ceiling'; pagesCompleted: number; pagesTotal: number }
    | { kind: 'error'; detail: string };

export interface FallbackControllerOptions {
    transport: ConversionTransport;
    openSink?: SinkFactory;
    reporter?: ConversionReporter;
    clock?: Clock;
    pollIntervalMs?: number;
    pollCeilingMs?: number;
}

export class FallbackController {
    private readonly transport: ConversionTransport;
    private readonly openSink: SinkFactory;
    private readonly reporter: ConversionReporter;
    private readonly clock: Clock;
    private readonly pollIntervalMs: number;
    private readonly pollCeilingMs: number;

    constructor(options: FallbackControllerOptions) {
        this.transport = options.transport;
        this.openSink = options.openSink ?? openFileSink;
        this.reporter = options.reporter ?? silentReporter;
        this.clock = options.clock ?? systemClock;
        this.pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL * 1000;
        this.pollCeilingMs = options.pollCeilingMs ?? POLL_CEILING * 1000;
    }

    /**
     * Drive `job` to a terminal state. Service failures end in `failed`; cancellation and
     * errors opening or closing the output sink escape as exceptions.
     */
    async run(job: Job, signal?: AbortSignal): Promise<FallbackOutcome> {
        const label = path.basename(job.source);
        const transitions: FallbackState[] = ['streaming'];
        const moveTo = (next: FallbackState) => {
            this.reporter.stateChanged(label, transitions[transitions.length - 1], next);
            transitions.push(next);
        };

        const remoteId = job.remoteId;
        if (!remoteId) {
            moveTo('failed');
            return {
                state: 'failed',
                error: `No remote job identifier for ${label}; submission did not succeed`,
                pagesReceived: 0,
                totalPages: 0,
                transitions,
            };
        }

        return withSink<FallbackOutcome>(this.openSink, job.outputPath, async (sink) => {
            let streamedPages = 0;
            let streamedTotal = 0;
            try {
                const handle = await this.transport.openEventStream(remoteId, signal);
                const outcome = await reconstructStream(handle, sink, { label, reporter: this.reporter, signal });
                streamedPages = outcome.pagesReceived;
                streamedTotal = outcome.expectedTotal;
                if (outcome.ending !== 'stream-ended') {
                    moveTo('done');
                    if (outcome.complete) {
                        this.reporter.info(`[${label}] Completed and saved → ${sink.location}`);
                    }
                    return {
                        state: 'done',
                        via: outcome.complete ? 'stream' : 'salvage',
                        pagesReceived: outcome.pagesReceived,
                        totalPages: outcome.expectedTotal,
                        transitions,
                    };
                }
            } catch (error) {
                if (error instanceof CancelledError) throw error;
                this.reporter.error(`[${label}] Streaming failed: ${errorMessage(error)}`);
            }

            this.reporter.info(`[${label}] Attempting fallback to non-streaming method...`);
            moveTo('polling');
            const polled = await this.poll(remoteId, label, signal);
            if (polled.kind === 'error') {
                moveTo('failed');
                return {
                    state: 'failed',
                    error: `Conversion failed for ${label}: ${polled.detail}`,
                    pagesReceived: streamedPages,
                    totalPages: streamedTotal,
                    transitions,
                };
            }

            moveTo('downloading');
            let download: FinalDownload;
            try {
                download = await this.transport.downloadFinal(remoteId, signal);
                if (download.ready && download.text) {
                    await sink.write(download.text);
                }
            } catch (error) {
                if (error instanceof CancelledError) throw error;
                this.reporter.error(`[${label}] Fallback method failed: ${errorMessage(error)}`);
                moveTo('failed');
                return {
                    state: 'failed',
                    error: `Failed to convert ${label} using both streaming and fallback: ${errorMessage(error)}`,
                    pagesReceived: streamedPages,
                    totalPages: streamedTotal,
                    transitions,
                };
            }

            moveTo('done');
            if (!download.ready || !download.text) {
                this.reporter.warn(`[${label}] Final output not available; nothing was retrieved`);
                return { state: 'done', via: 'unavailable', pagesReceived: 0, totalPages: 0, transitions };
            }
            this.reporter.info(`[${label}] Fallback method successful, saved → ${sink.location}`);
            return {
                state: 'done',
                via: 'download',
                pagesReceived: polled.pagesCompleted,
                totalPages: polled.pagesTotal,
                transitions,
            };
        });
    }

    /**
     * Poll until the service reports a final status or the ceiling elapses.
     * Status errors are retried and reaching the ceiling is not a failure.
     * Any other error ends polling as a failure.
     */
    private async poll(remoteId: string, label: string, signal?: AbortSignal): Promise<PollOutcome> {
        const startedAt = this.clock.now();
        let pagesCompleted = 0;
        let pagesTotal = 0;

        for (;;) {
            try {
                const report = await this.transport.getStatus(remoteId, signal);
                pagesCompleted = report.pagesCompleted;
                pagesTotal = report.pagesTotal;
                this.reporter.debug(`[${label}] PDF status: ${report.status}`);
                this.reporter.pageProgress(label, pagesCompleted, pagesTotal);

                if (report.status === 'completed') {
                    return { kind: 'completed', pagesCompleted, pagesTotal };
                }
                if (report.status === 'error') {
                    return { kind: 'error', detail: report.errorDetail ?? 'Unknown error' };
                }
                this.reporter.info(
                    `[${label}] Processing: ${report.percentDone.toFixed(1)}% (${pagesCompleted}/${pagesTotal} pages)`
                );
            } catch (error) {
                if (error instanceof CancelledError) throw error;
                if (!(error instanceof StatusError)) {
                    return { kind: 'error', detail: `Status check failed: ${errorMessage(error)}` };
                }
                this.reporter.warn(`[${label}] Status check failed: ${error.message}`);
            }

            const elapsed = this.clock.now() - startedAt;
            if (elapsed > this.pollCeilingMs) {
                this.reporter.warn(`[${label}] Timeout waiting for PDF processing after ${(elapsed / 1000).toFixed(1)}s`);
                return { kind: 'ceiling', pagesCompleted, pagesTotal };
            }
            await this.clock.sleep(this.pollIntervalMs, signal);
        }
    }
}
