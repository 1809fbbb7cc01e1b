/**
 * In-process stand-ins for the transport, sink, clock and reporter.
 */
import { CancelledError, DecodeError } from '../errors';
import { Clock } from '../lib/clock';
import { ConversionReporter } from '../lib/reporter';
import { OutputSink, SinkFactory } from '../services/output-sink';
import {
    ConversionOptions,
    ConversionTransport,
    DocumentUpload,
    EventStreamHandle,
    FallbackState,
    FinalDownload,
    JobResult,
    PageEvent,
    StatusReport,
    StreamItem,
} from '../types';

export function page(index: number, text: string, total: number): PageEvent {
    return { index, text, total };
}

export function status(value: string, pagesCompleted = 0, pagesTotal = 0, errorDetail?: string): StatusReport {
    return {
        status: value,
        pagesCompleted,
        pagesTotal,
        percentDone: pagesTotal > 0 ? (100 * pagesCompleted) / pagesTotal : 0,
        errorDetail,
    };
}

/** A page, an undecodable line, a failure to raise, or a side effect to run mid-stream. */
export type StreamStep = PageEvent | { malformed: string } | Error | (() => void);

export interface DocumentScript {
    id: string;
    submitError?: Error;
    openError?: Error;
    stream?: StreamStep[];
    /** Consumed in order; the last entry repeats. Defaults to a single 'completed'. */
    statuses?: Array<StatusReport | Error>;
    download?: FinalDownload | Error;
}

export class ScriptedStream implements EventStreamHandle {
    consumed = 0;
    readonly events: AsyncIterable<StreamItem>;

    constructor(private readonly steps: StreamStep[], private readonly onClose: () => void = () => { }) {
        this.events = this.replay();
    }

    close(): void {
        this.onClose();
    }

    private async *replay(): AsyncGenerator<StreamItem> {
        for (const step of this.steps) {
            this.consumed++;
            if (step instanceof Error) throw step;
            if (typeof step === 'function') {
                step();
            } else if ('malformed' in step) {
                yield { kind: 'malformed', error: new DecodeError('Invalid JSON', step.malformed) };
            } else {
                yield { kind: 'page', event: step };
            }
        }
    }
}

/**
 * Transport driven by per-document scripts, keyed by the uploaded source path.
 */
export class ScriptedTransport implements ConversionTransport {
    readonly calls: string[] = [];
    readonly submittedOptions: ConversionOptions[] = [];
    streamsOpened = 0;
    streamsClosed = 0;
    private readonly byId = new Map<string, DocumentScript>();
    private readonly statusCursor = new Map<string, number>();

    constructor(private readonly scripts: Record<string, DocumentScript>) {
        for (const script of Object.values(scripts)) {
            this.byId.set(script.id, script);
        }
    }

    async submit(document: DocumentUpload, options: ConversionOptions): Promise<string> {
        this.calls.push(`submit:${document.path}`);
        this.submittedOptions.push(options);
        const script = this.scripts[document.path];
        if (!script) throw new Error(`No script for ${document.path}`);
        if (script.submitError) throw script.submitError;
        return script.id;
    }

    async getStatus(jobId: string): Promise<StatusReport> {
        this.calls.push(`status:${jobId}`);
        const statuses = this.script(jobId).statuses ?? [status('completed')];
        const cursor = this.statusCursor.get(jobId) ?? 0;
        this.statusCursor.set(jobId, cursor + 1);
        const next = statuses[Math.min(cursor, statuses.length - 1)];
        if (next instanceof Error) throw next;
        return next;
    }

    async openEventStream(jobId: string): Promise<EventStreamHandle> {
        this.calls.push(`stream:${jobId}`);
        const script = this.script(jobId);
        if (script.openError) throw script.openError;
        this.streamsOpened++;
        return new ScriptedStream(script.stream ?? [], () => {
            this.streamsClosed++;
        });
    }

    async downloadFinal(jobId: string): Promise<FinalDownload> {
        this.calls.push(`download:${jobId}`);
        const download = this.script(jobId).download ?? { ready: false };
        if (download instanceof Error) throw download;
        return download;
    }

    private script(jobId: string): DocumentScript {
        const script = this.byId.get(jobId);
        if (!script) throw new Error(`Unknown job ${jobId}`);
        return script;
    }
}

export class MemorySink implements OutputSink {
    readonly writes: string[] = [];
    closed = false;

    constructor(readonly location: string) { }

    async write(content: string): Promise<void> {
        this.writes.push(content);
    }

    async close(): Promise<void> {
        this.closed = true;
    }

    get content(): string | undefined {
        return this.writes[this.writes.length - 1];
    }
}

export function memorySinks(): { open: SinkFactory; sinks: Map<string, MemorySink> } {
    const sinks = new Map<string, MemorySink>();
    const open: SinkFactory = async (location) => {
        const sink = new MemorySink(location);
        sinks.set(location, sink);
        return sink;
    };
    return { open, sinks };
}

/**
 * Clock whose sleeps advance time instantly.
 */
export class ManualClock implements Clock {
    readonly sleeps: number[] = [];

    constructor(private time = 0) { }

    now(): number {
        return this.time;
    }

    async sleep(ms: number, signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) throw new CancelledError();
        this.sleeps.push(ms);
        this.time += ms;
    }
}

export interface LogEntry {
    level: 'debug' | 'info' | 'warn' | 'error';
    message: string;
}

export class RecordingReporter implements ConversionReporter {
    readonly logs: LogEntry[] = [];
    readonly started: Array<[string, number, number]> = [];
    readonly progress: Array<[string, number, number]> = [];
    readonly transitions: Array<[FallbackState, FallbackState]> = [];
    readonly finished: JobResult[] = [];
    readonly batch: Array<[number, number]> = [];

    constructor(private readonly onJobFinished?: (result: JobResult) => void) { }

    debug(message: string): void {
        this.logs.push({ level: 'debug', message });
    }

    info(message: string): void {
        this.logs.push({ level: 'info', message });
    }

    warn(message: string): void {
        this.logs.push({ level: 'warn', message });
    }

    error(message: string): void {
        this.logs.push({ level: 'error', message });
    }

    jobStarted(label: string, position: number, count: number): void {
        this.started.push([label, position, count]);
    }

    pageProgress(label: string, received: number, total: number): void {
        this.progress.push([label, received, total]);
    }

    stateChanged(_label: string, from: FallbackState, to: FallbackState): void {
        this.transitions.push([from, to]);
    }

    jobFinished(result: JobResult): void {
        this.finished.push(result);
        this.onJobFinished?.(result);
    }

    batchProgress(pagesDone: number, pagesExpected: number): void {
        this.batch.push([pagesDone, pagesExpected]);
    }

    messages(level: LogEntry['level']): string[] {
        return this.logs.filter((entry) => entry.level === level).map((entry) => entry.message);
    }
}
