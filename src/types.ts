/**
 * Type definitions for the mmd-convert package
 */
import type { DecodeError } from './errors';

// Opaque conversion options, forwarded to the service as options_json
export type ConversionOptions = Record<string, unknown>;

/**
 * One source document in a batch. `remoteId` stays unset until submission succeeds.
 */
export interface Job {
    source: string;
    /** File name sent with the upload; differs from the source name when anonymized. */
    uploadName: string;
    outputPath: string;
    options: ConversionOptions;
    remoteId?: string;
}

export interface DocumentUpload {
    path: string;
    fileName: string;
}

/**
 * One streamed unit of converted output. `total` is 0 while the service has not reported a page count.
 */
export interface PageEvent {
    index: number;
    text: string;
    total: number;
}

export type StreamItem =
    | { kind: 'page'; event: PageEvent }
    | { kind: 'malformed'; error: DecodeError };

/**
 * An open event stream. The connection lives until `close()`; callers release it in a finally block.
 */
export interface EventStreamHandle {
    readonly events: AsyncIterable<StreamItem>;
    close(): void;
}

// Remote statuses seen in practice: received, loaded, split, processing, completed, error
export type RemoteStatus = string;

export interface StatusReport {
    status: RemoteStatus;
    pagesTotal: number;
    pagesCompleted: number;
    percentDone: number;
    errorDetail?: string;
}

export type FinalDownload =
    | { ready: true; text: string }
    | { ready: false };

/**
 * The four remote operations the pipeline depends on.
 */
export interface ConversionTransport {
    submit(document: DocumentUpload, options: ConversionOptions, signal?: AbortSignal): Promise<string>;
    getStatus(jobId: string, signal?: AbortSignal): Promise<StatusReport>;
    openEventStream(jobId: string, signal?: AbortSignal): Promise<EventStreamHandle>;
    downloadFinal(jobId: string, signal?: AbortSignal): Promise<FinalDownload>;
}

export type FallbackState = 'streaming' | 'polling' | 'downloading' | 'done' | 'failed';

// How the output of a job was obtained
export type ResultSource = 'stream' | 'salvage' | 'download' | 'unavailable' | 'none';

export interface JobResult {
    readonly source: string;
    readonly outputPath: string;
    readonly remoteId?: string;
    readonly pagesReceived: number;
    readonly totalPages: number;
    readonly success: boolean;
    readonly error?: string;
    readonly via: ResultSource;
    readonly remoteStatus?: RemoteStatus;
}

export interface BatchSummary {
    jobs: number;
    succeeded: number;
    failed: number;
    pagesReceived: number;
    pagesExpected: number;
    /** Expected page total from the pre-pass probe, when one ran. */
    probedPages?: number;
    cancelled: boolean;
    results: readonly JobResult[];
}

export interface RemoteDocument {
    id: string;
    inputFile: string;
    status: string;
    createdAt: string;
    pagesCompleted: number;
    pagesTotal: number;
}

export interface ListDocumentsQuery {
    page: number;
    perPage: number;
    fromDate?: string;
    toDate?: string;
}

// Progress UI types (used by lib/ui.ts)
export type ProgressStyle = 'simple' | 'bar' | 'spinner' | 'none';

export interface ProgressOptions {
    style: ProgressStyle;
    title?: string;
    total?: number;
    showTimeElapsed?: boolean;
}

export interface ProgressTracker {
    start(options: ProgressOptions): void;
    setTotal(total: number): void;
    update(current: number, message?: string): void;
    finish(message?: string, ok?: boolean): void;
}
