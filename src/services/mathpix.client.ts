/**
 * Mathpix v3 PDF API client.
 * Every call is independent; the client keeps no state between requests beyond its configuration.
 */

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import * as fs from 'fs/promises';
import { Readable } from 'stream';
import { z } from 'zod';
import {
    API_URL,
    DOWNLOAD_TIMEOUT,
    STATUS_TIMEOUT,
    STREAM_IDLE_TIMEOUT,
    SUBMIT_TIMEOUT,
    Credentials,
} from '../config';
import {
    CancelledError,
    ConversionError,
    DecodeError,
    DownloadError,
    StatusError,
    StreamError,
    SubmissionError,
    errorMessage,
    throwIfCancelled,
} from '../errors';
import { readLines } from '../lib/ndjson';
import {
    ConversionOptions,
    ConversionTransport,
    DocumentUpload,
    EventStreamHandle,
    FinalDownload,
    ListDocumentsQuery,
    RemoteDocument,
    StatusReport,
    StreamItem,
} from '../types';

const submitResponseSchema = z.object({
    pdf_id: z.string().optional(),
    error: z.unknown().optional(),
});

const statusResponseSchema = z.object({
    status: z.string(),
    num_pages: z.number().nullish(),
    num_pages_completed: z.number().nullish(),
    percent_done: z.number().nullish(),
    error: z.unknown().optional(),
});

const pageEventSchema = z.object({
    page_idx: z.number().int().positive(),
    text: z.string().nullish(),
    pdf_selected_len: z.number().int().nonnegative().nullish(),
});

const documentListSchema = z.object({
    pdfs: z
        .array(
            z.object({
                id: z.string(),
                input_file: z.string().nullish(),
                status: z.string().nullish(),
                created_at: z.string().nullish(),
                num_pages: z.number().nullish(),
                num_pages_completed: z.number().nullish(),
            })
        )
        .optional(),
});

const RESET_CODES = new Set(['ECONNRESET', 'EPIPE', 'ERR_STREAM_PREMATURE_CLOSE', 'ECONNREFUSED', 'EHOSTUNREACH', 'ENOTFOUND']);
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);

export interface MathpixClientOptions {
    credentials: Credentials;
    baseUrl?: string;
    /** Seconds */
    timeouts?: Partial<Record<'submit' | 'status' | 'download' | 'streamIdle', number>>;
    /** Replaces the HTTP transport; used by tests. */
    adapter?: AxiosAdapter;
}

export class MathpixClient implements ConversionTransport {
    private readonly http: AxiosInstance;
    private readonly timeouts: Record<'submit' | 'status' | 'download' | 'streamIdle', number>;

    constructor(options: MathpixClientOptions) {
        const { credentials, baseUrl = API_URL, adapter } = options;
        this.http = axios.create({
            baseURL: baseUrl.replace(/\/$/, ''),
            headers: { app_id: credentials.appId, app_key: credentials.appKey },
            ...(adapter ? { adapter } : {}),
        });
        this.timeouts = {
            submit: SUBMIT_TIMEOUT,
            status: STATUS_TIMEOUT,
            download: DOWNLOAD_TIMEOUT,
            streamIdle: STREAM_IDLE_TIMEOUT,
            ...options.timeouts,
        };
    }

    /**
     * Upload a PDF as multipart form data and return the assigned pdf_id.
     */
    async submit(document: DocumentUpload, options: ConversionOptions, signal?: AbortSignal): Promise<string> {
        let body: unknown;
        try {
            const bytes = await fs.readFile(document.path);
            const form = new FormData();
            form.append('file', new Blob([bytes], { type: 'application/pdf' }), document.fileName);
            form.append('options_json', JSON.stringify(options));
            const response = await this.http.post('/pdf', form, { timeout: this.timeouts.submit * 1000, signal });
            body = response.data;
        } catch (error) {
            throw this.failure(error, signal, (message) => new SubmissionError(`Submitting ${document.fileName} failed: ${message}`, { cause: error }));
        }

        const parsed = submitResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new SubmissionError(`Submitting ${document.fileName} failed: unexpected response`);
        }
        if (parsed.data.error !== undefined || !parsed.data.pdf_id) {
            throw new SubmissionError(`Submitting ${document.fileName} failed: ${describeRemoteError(parsed.data.error)}`);
        }
        return parsed.data.pdf_id;
    }

    async getStatus(jobId: string, signal?: AbortSignal): Promise<StatusReport> {
        let body: unknown;
        try {
            const response = await this.http.get(`/pdf/${jobId}`, { timeout: this.timeouts.status * 1000, signal });
            body = response.data;
        } catch (error) {
            throw this.failure(error, signal, (message) => new StatusError(`Status check for ${jobId} failed: ${message}`, { cause: error }));
        }

        const parsed = statusResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new StatusError(`Status check for ${jobId} returned an unexpected response`, { cause: parsed.error });
        }
        const data = parsed.data;
        return {
            status: data.status,
            pagesTotal: data.num_pages ?? 0,
            pagesCompleted: data.num_pages_completed ?? 0,
            percentDone: data.percent_done ?? 0,
            errorDetail: data.error === undefined ? undefined : describeRemoteError(data.error),
        };
    }

    /**
     * Open the NDJSON results stream. The returned handle owns the connection;
     * callers must `close()` it on every exit path.
     */
    async openEventStream(jobId: string, signal?: AbortSignal): Promise<EventStreamHandle> {
        throwIfCancelled(signal);
        const connection = new AbortController();
        const onAbort = () => connection.abort();
        signal?.addEventListener('abort', onAbort, { once: true });

        let body: Readable;
        try {
            const response = await this.http.get<Readable>(`/pdf/${jobId}/stream`, {
                responseType: 'stream',
                timeout: this.timeouts.streamIdle * 1000,
                signal: connection.signal,
            });
            body = response.data;
        } catch (error) {
            signal?.removeEventListener('abort', onAbort);
            // A rejected stream request still holds its response body open
            if (axios.isAxiosError(error) && error.response?.data instanceof Readable) {
                error.response.data.destroy();
            }
            connection.abort();
            throw classifyStreamFailure(error, signal);
        }

        let closed = false;
        const close = () => {
            if (closed) return;
            closed = true;
            signal?.removeEventListener('abort', onAbort);
            body.destroy();
            connection.abort();
        };

        return { events: this.readEvents(body, signal), close };
    }

    async downloadFinal(jobId: string, signal?: AbortSignal): Promise<FinalDownload> {
        try {
            const response = await this.http.get<string>(`/pdf/${jobId}.mmd`, {
                responseType: 'text',
                timeout: this.timeouts.download * 1000,
                signal,
            });
            return { ready: true, text: typeof response.data === 'string' ? response.data : String(response.data) };
        } catch (error) {
            if (axios.isAxiosError(error) && error.response?.status === 404) {
                return { ready: false };
            }
            throw this.failure(error, signal, (message) => new DownloadError(`Downloading ${jobId}.mmd failed: ${message}`, { cause: error }));
        }
    }

    /**
     * List documents previously processed under these credentials.
     */
    async listDocuments(query: ListDocumentsQuery, signal?: AbortSignal): Promise<RemoteDocument[]> {
        let body: unknown;
        try {
            const response = await this.http.get('/pdf-results', {
                params: {
                    per_page: query.perPage,
                    page: query.page,
                    ...(query.fromDate ? { from_date: query.fromDate } : {}),
                    ...(query.toDate ? { to_date: query.toDate } : {}),
                },
                timeout: this.timeouts.submit * 1000,
                signal,
            });
            body = response.data;
        } catch (error) {
            throw this.failure(error, signal, (message) => new ConversionError(`Listing documents failed: ${message}`, { cause: error }));
        }

        const parsed = documentListSchema.safeParse(body);
        if (!parsed.success) {
            throw new ConversionError('Listing documents returned an unexpected response', { cause: parsed.error });
        }
        return (parsed.data.pdfs ?? []).map((pdf) => ({
            id: pdf.id,
            inputFile: pdf.input_file ?? 'Unknown',
            status: pdf.status ?? 'Unknown',
            createdAt: pdf.created_at ?? 'Unknown',
            pagesCompleted: pdf.num_pages_completed ?? 0,
            pagesTotal: pdf.num_pages ?? 0,
        }));
    }

    private async *readEvents(body: Readable, signal?: AbortSignal): AsyncGenerator<StreamItem> {
        const idleTimeoutMs = this.timeouts.streamIdle * 1000;
        try {
            for await (const line of readLines(body, {
                idleTimeoutMs,
                idleError: () => new StreamError('read-timeout', `No data received for ${this.timeouts.streamIdle}s`),
            })) {
                if (!line.trim()) continue;
                yield decodePageEvent(line);
            }
        } catch (error) {
            throw classifyStreamFailure(error, signal);
        }
    }

    private failure(error: unknown, signal: AbortSignal | undefined, wrap: (message: string) => Error): Error {
        if (signal?.aborted) return new CancelledError();
        return wrap(describeHttpError(error));
    }
}

/**
 * Decode one NDJSON line into a page event. Malformed lines come back as a `malformed` item.
 */
export function decodePageEvent(line: string): StreamItem {
    let raw: unknown;
    try {
        raw = JSON.parse(line);
    } catch (error) {
        return { kind: 'malformed', error: new DecodeError(`Invalid JSON: ${errorMessage(error)}`, line, { cause: error }) };
    }
    const parsed = pageEventSchema.safeParse(raw);
    if (!parsed.success) {
        return { kind: 'malformed', error: new DecodeError('Line is not a page event', line, { cause: parsed.error }) };
    }
    return {
        kind: 'page',
        event: {
            index: parsed.data.page_idx,
            text: parsed.data.text ?? '',
            total: parsed.data.pdf_selected_len ?? 0,
        },
    };
}

/**
 * Map a failure while opening or reading the stream to a StreamError sub-kind.
 * Anything that is neither a rejected request nor a timeout counts as a dropped connection.
 */
export function classifyStreamFailure(error: unknown, signal?: AbortSignal): Error {
    if (signal?.aborted) return new CancelledError();
    if (error instanceof StreamError || error instanceof CancelledError) return error;

    if (axios.isAxiosError(error) && error.response) {
        const status = error.response.status;
        return new StreamError('http-status', `Stream request rejected with HTTP ${status}`, { cause: error, status });
    }
    const code = errorCode(error);
    if (code && TIMEOUT_CODES.has(code)) {
        return new StreamError('read-timeout', `Stream timed out: ${errorMessage(error)}`, { cause: error });
    }
    if (code && RESET_CODES.has(code)) {
        return new StreamError('connection-reset', `Stream connection dropped (${code})`, { cause: error });
    }
    return new StreamError('connection-reset', `Stream failed: ${errorMessage(error)}`, { cause: error });
}

function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

function describeHttpError(error: unknown): string {
    if (axios.isAxiosError(error) && error.response) {
        const data: unknown = error.response.data;
        const detail = typeof data === 'string' ? data : data && typeof data === 'object' && !(data instanceof Readable) ? JSON.stringify(data) : '';
        return `HTTP ${error.response.status}${detail ? ` - ${detail.slice(0, 200)}` : ''}`;
    }
    return errorMessage(error);
}

function describeRemoteError(error: unknown): string {
    if (error === undefined || error === null) return 'no pdf_id in response';
    if (typeof error === 'string') return error;
    return JSON.stringify(error);
}
