/**
 * Rebuilds a document from a live, unordered page stream.
 */
import { CancelledError, StreamError, StreamErrorKind, errorMessage, throwIfCancelled } from '../errors';
import { ConversionReporter, silentReporter } from '../lib/reporter';
import { EventStreamHandle, PageEvent } from '../types';
import { OutputSink } from './output-sink';

/**
 * Pages received so far for one job. Lives only for the duration of one stream.
 */
export class ReconstructionState {
    private readonly pages = new Map<number, string>();
    private total = 0;
    decodeFailures = 0;

    accept(event: PageEvent): void {
        // Totals only ever grow within a job
        if (event.total > this.total) {
            this.total = event.total;
        }
        this.pages.set(event.index, event.text);
    }

    get pagesReceived(): number {
        return this.pages.size;
    }

    get expectedTotal(): number {
        return this.total;
    }

    get isComplete(): boolean {
        if (this.total <= 0) return false;
        for (let i = 1; i <= this.total; i++) {
            if (!this.pages.has(i)) return false;
        }
        return true;
    }

    /**
     * Pages 1..max received index in order. Missing pages below the max are written as empty text.
     */
    materialize(): string {
        if (this.pages.size === 0) return '';
        const last = Math.max(...this.pages.keys());
        let document = '';
        for (let i = 1; i <= last; i++) {
            document += this.pages.get(i) ?? '';
        }
        return document;
    }
}

export type ReconstructionEnding = 'complete' | 'stream-ended' | 'salvaged';

export interface ReconstructionOutcome {
    ending: ReconstructionEnding;
    complete: boolean;
    pagesReceived: number;
    expectedTotal: number;
    decodeFailures: number;
    /** Set when the stream failed but received pages were kept. */
    salvagedFrom?: StreamErrorKind;
    document: string;
}

export interface ReconstructOptions {
    label: string;
    reporter?: ConversionReporter;
    signal?: AbortSignal;
}

/**
 * Consume `handle` until every page is present, the stream ends, or it fails.
 * Each event is persisted as a full snapshot before the next one is read.
 * The handle is always closed before returning.
 *
 * @throws StreamError when the stream fails before any page arrived, or was rejected outright
 * @throws CancelledError when `signal` aborts
 */
export async function reconstructStream(
    handle: EventStreamHandle,
    sink: OutputSink,
    options: ReconstructOptions
): Promise<ReconstructionOutcome> {
    const { label, reporter = silentReporter, signal } = options;
    const state = new ReconstructionState();
    let ending: ReconstructionEnding = 'stream-ended';
    let salvagedFrom: StreamErrorKind | undefined;

    try {
        for await (const item of handle.events) {
            throwIfCancelled(signal);
            if (item.kind === 'malformed') {
                state.decodeFailures++;
                reporter.warn(`[${label}] Failed to decode line: ${item.error.line.slice(0, 100)}`);
                continue;
            }

            state.accept(item.event);
            reporter.debug(`[${label}] Received page ${item.event.index}/${state.expectedTotal}`);
            reporter.pageProgress(label, state.pagesReceived, state.expectedTotal);
            await sink.write(state.materialize());

            if (state.isComplete) {
                reporter.info(`[${label}] All ${state.expectedTotal} pages received`);
                ending = 'complete';
                break;
            }
        }
    } catch (error) {
        if (signal?.aborted && !(error instanceof CancelledError)) {
            throw new CancelledError();
        }
        if (!(error instanceof StreamError) || !error.salvageable || state.pagesReceived === 0) {
            reporter.error(`[${label}] Error during streaming: ${errorMessage(error)}`);
            throw error;
        }
        reporter.warn(`[${label}] Stream ${error.kind}, but ${state.pagesReceived} pages were received`);
        if (error.kind === 'connection-reset') {
            await sink.write(state.materialize());
        }
        ending = 'salvaged';
        salvagedFrom = error.kind;
    } finally {
        handle.close();
    }

    if (ending === 'stream-ended') {
        reporter.warn(`[${label}] Stream ended with ${state.pagesReceived}/${state.expectedTotal} pages received`);
    }

    return {
        ending,
        complete: ending === 'complete',
        pagesReceived: state.pagesReceived,
        expectedTotal: state.expectedTotal,
        decodeFailures: state.decodeFailures,
        salvagedFrom,
        document: state.materialize(),
    };
}
