import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { AxiosAdapter, AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import * as fs from 'fs/promises';
import * as http from 'http';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { CancelledError, DownloadError, StatusError, StreamError, SubmissionError } from '../errors';
import { StreamItem } from '../types';
import { MathpixClient, classifyStreamFailure, decodePageEvent } from './mathpix.client';

type Reply = { status: number; data: unknown };

function clientFor(route: (config: InternalAxiosRequestConfig) => Reply, streamIdle = 5) {
    const requests: InternalAxiosRequestConfig[] = [];
    const adapter: AxiosAdapter = async (config) => {
        requests.push(config);
        const { status, data } = route(config);
        const response: AxiosResponse<unknown> = { data, status, statusText: String(status), headers: {}, config, request: {} };
        if (status >= 400) {
            throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, {}, response);
        }
        return response;
    };
    const client = new MathpixClient({
        credentials: { appId: 'test-id', appKey: 'test-secret' },
        baseUrl: 'https://ocr.example.test/v3/',
        timeouts: { streamIdle },
        adapter,
    });
    return { client, requests };
}

async function collect(events: AsyncIterable<StreamItem>): Promise<StreamItem[]> {
    const items: StreamItem[] = [];
    for await (const item of events) {
        items.push(item);
    }
    return items;
}

describe('MathpixClient', () => {
    let dir: string;
    let pdfPath: string;

    beforeAll(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'mmd-client-'));
        pdfPath = path.join(dir, 'a.pdf');
        await fs.writeFile(pdfPath, 'test-pdf-bytes');
    });

    afterAll(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    describe('submit', () => {
        it('uploads the file with its options and returns the pdf_id', async () => {
            const { client, requests } = clientFor(() => ({ status: 200, data: { pdf_id: 'abc123' } }));
            const id = await client.submit({ path: pdfPath, fileName: 'upload.pdf' }, { streaming: true });

            expect(id).toBe('abc123');
            const [request] = requests;
            expect(request.method).toBe('post');
            expect(request.url).toBe('/pdf');
            expect(request.baseURL).toBe('https://ocr.example.test/v3');
            expect(request.headers.get('app_id')).toBe('test-id');
            expect(request.headers.get('app_key')).toBe('test-secret');

            const form = request.data;
            expect(form).toBeInstanceOf(FormData);
            if (!(form instanceof FormData)) return;
            expect(form.get('options_json')).toBe('{"streaming":true}');
            const file = form.get('file');
            if (file === null || typeof file === 'string') throw new Error('file part missing');
            expect(file.name).toBe('upload.pdf');
            expect(file.size).toBe('test-pdf-bytes'.length);
        });

        it('rejects a response carrying an error', async () => {
            const { client } = clientFor(() => ({ status: 200, data: { error: 'Invalid credentials' } }));

            const attempt = client.submit({ path: pdfPath, fileName: 'a.pdf' }, {});
            await expect(attempt).rejects.toBeInstanceOf(SubmissionError);
            await expect(attempt).rejects.toThrow('Submitting a.pdf failed: Invalid credentials');
        });

        it('describes HTTP failures', async () => {
            const { client } = clientFor(() => ({ status: 401, data: { error: 'unauthorized' } }));

            await expect(client.submit({ path: pdfPath, fileName: 'a.pdf' }, {})).rejects.toThrow(
                'Submitting a.pdf failed: HTTP 401 - {"error":"unauthorized"}'
            );
        });

        it('fails before any request when the file is missing', async () => {
            const { client, requests } = clientFor(() => ({ status: 200, data: { pdf_id: 'abc123' } }));

            await expect(client.submit({ path: path.join(dir, 'missing.pdf'), fileName: 'missing.pdf' }, {})).rejects.toBeInstanceOf(
                SubmissionError
            );
            expect(requests).toHaveLength(0);
        });
    });

    describe('getStatus', () => {
        it('maps the status payload', async () => {
            const { client, requests } = clientFor(() => ({
                status: 200,
                data: { status: 'processing', num_pages: 4, num_pages_completed: 1, percent_done: 25 },
            }));

            await expect(client.getStatus('abc123')).resolves.toEqual({
                status: 'processing',
                pagesTotal: 4,
                pagesCompleted: 1,
                percentDone: 25,
                errorDetail: undefined,
            });
            expect(requests[0].url).toBe('/pdf/abc123');
        });

        it('defaults missing counters to zero and describes remote errors', async () => {
            const { client } = clientFor(() => ({ status: 200, data: { status: 'error', error: 'corrupt file' } }));

            await expect(client.getStatus('abc123')).resolves.toEqual({
                status: 'error',
                pagesTotal: 0,
                pagesCompleted: 0,
                percentDone: 0,
                errorDetail: 'corrupt file',
            });
        });

        it('wraps HTTP failures in StatusError', async () => {
            const { client } = clientFor(() => ({ status: 502, data: 'Bad Gateway' }));

            const attempt = client.getStatus('abc123');
            await expect(attempt).rejects.toBeInstanceOf(StatusError);
            await expect(attempt).rejects.toThrow('Status check for abc123 failed: HTTP 502 - Bad Gateway');
        });

        it('rejects a payload without a status', async () => {
            const { client } = clientFor(() => ({ status: 200, data: { num_pages: 3 } }));

            await expect(client.getStatus('abc123')).rejects.toThrow('Status check for abc123 returned an unexpected response');
        });
    });

    describe('openEventStream', () => {
        it('decodes lines split across chunks and skips blank ones', async () => {
            const body = Readable.from([
                '{"page_idx":2,"text":"B","pdf_selected_len":2}\n{"page_idx":1,"te',
                'xt":"A","pdf_selected_len":2}\n\nnot json\n',
            ]);
            const { client, requests } = clientFor(() => ({ status: 200, data: body }));
            const handle = await client.openEventStream('abc123');
            const items = await collect(handle.events);
            handle.close();

            expect(requests[0].url).toBe('/pdf/abc123/stream');
            expect(requests[0].responseType).toBe('stream');
            expect(items.map((item) => (item.kind === 'page' ? item.event : item.error.line))).toEqual([
                { index: 2, text: 'B', total: 2 },
                { index: 1, text: 'A', total: 2 },
                'not json',
            ]);
        });

        it('reports a silent stream as a read timeout', async () => {
            const body = new Readable({ read() { } });
            body.push('{"page_idx":1,"text":"A","pdf_selected_len":2}\n');
            const { client } = clientFor(() => ({ status: 200, data: body }), 0.05);
            const handle = await client.openEventStream('abc123');

            const seen: StreamItem[] = [];
            const reading = (async () => {
                for await (const item of handle.events) seen.push(item);
            })();
            await expect(reading).rejects.toMatchObject({ name: 'StreamError', kind: 'read-timeout' });
            expect(seen).toHaveLength(1);
            handle.close();
        });

        it('reports a dropped socket as a connection reset', async () => {
            const body = new Readable({ read() { } });
            body.push('{"page_idx":1,"text":"A","pdf_selected_len":2}\n');
            setImmediate(() => body.destroy(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' })));
            const { client } = clientFor(() => ({ status: 200, data: body }));
            const handle = await client.openEventStream('abc123');

            await expect(collect(handle.events)).rejects.toMatchObject({
                kind: 'connection-reset',
                message: 'Stream connection dropped (ECONNRESET)',
            });
            handle.close();
        });

        it('rejects a refused stream request with its status', async () => {
            const { client } = clientFor(() => ({ status: 404, data: { error: 'not found' } }));

            await expect(client.openEventStream('abc123')).rejects.toMatchObject({ kind: 'http-status', status: 404 });
        });

        it('destroys the body of a refused stream request', async () => {
            const body = new Readable({ read() { } });
            const { client, requests } = clientFor(() => ({ status: 500, data: body }));

            await expect(client.openEventStream('abc123')).rejects.toMatchObject({ kind: 'http-status', status: 500 });
            expect(body.destroyed).toBe(true);
            expect(requests[0].signal?.aborted).toBe(true);
        });

        it('closes the socket when the server refuses the stream', async () => {
            let socketClosed: Promise<void> = Promise.resolve();
            const server = http.createServer((req, res) => {
                socketClosed = new Promise((resolve) => req.socket.once('close', () => resolve()));
                res.writeHead(500, { 'Content-Type': 'text/plain' });
                res.write('still going');
            });
            await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
            const address = server.address();
            if (address === null || typeof address === 'string') throw new Error('server has no port');

            try {
                const client = new MathpixClient({
                    credentials: { appId: 'test-id', appKey: 'test-secret' },
                    baseUrl: `http://127.0.0.1:${address.port}/v3`,
                });
                await expect(client.openEventStream('abc123')).rejects.toMatchObject({ kind: 'http-status', status: 500 });
                await socketClosed;
            } finally {
                server.closeAllConnections();
                await new Promise<void>((resolve) => server.close(() => resolve()));
            }
        });

        it('releases the connection on close', async () => {
            const body = new Readable({ read() { } });
            const { client } = clientFor(() => ({ status: 200, data: body }));
            const handle = await client.openEventStream('abc123');
            handle.close();
            handle.close();

            expect(body.destroyed).toBe(true);
        });

        it('does not connect once cancelled', async () => {
            const { client, requests } = clientFor(() => ({ status: 200, data: Readable.from([]) }));
            const abort = new AbortController();
            abort.abort();

            await expect(client.openEventStream('abc123', abort.signal)).rejects.toBeInstanceOf(CancelledError);
            expect(requests).toHaveLength(0);
        });
    });

    describe('downloadFinal', () => {
        it('returns the converted text', async () => {
            const { client, requests } = clientFor(() => ({ status: 200, data: '# Title\n\n$x$' }));

            await expect(client.downloadFinal('abc123')).resolves.toEqual({ ready: true, text: '# Title\n\n$x$' });
            expect(requests[0].url).toBe('/pdf/abc123.mmd');
        });

        it('treats 404 as not ready', async () => {
            const { client } = clientFor(() => ({ status: 404, data: '' }));

            await expect(client.downloadFinal('abc123')).resolves.toEqual({ ready: false });
        });

        it('wraps other failures in DownloadError', async () => {
            const { client } = clientFor(() => ({ status: 500, data: '' }));

            await expect(client.downloadFinal('abc123')).rejects.toBeInstanceOf(DownloadError);
        });
    });

    describe('listDocuments', () => {
        it('sends paging and date filters and maps each entry', async () => {
            const { client, requests } = clientFor(() => ({
                status: 200,
                data: {
                    pdfs: [
                        { id: 'abc123', input_file: 'uploads/a.pdf', status: 'completed', created_at: '2024-03-01T10:00:00Z', num_pages: 4, num_pages_completed: 4 },
                        { id: 'def456' },
                    ],
                },
            }));

            const documents = await client.listDocuments({ page: 2, perPage: 10, fromDate: '2024-03-01T00:00:00.000Z' });

            expect(requests[0].url).toBe('/pdf-results');
            expect(requests[0].params).toEqual({ per_page: 10, page: 2, from_date: '2024-03-01T00:00:00.000Z' });
            expect(documents).toEqual([
                { id: 'abc123', inputFile: 'uploads/a.pdf', status: 'completed', createdAt: '2024-03-01T10:00:00Z', pagesCompleted: 4, pagesTotal: 4 },
                { id: 'def456', inputFile: 'Unknown', status: 'Unknown', createdAt: 'Unknown', pagesCompleted: 0, pagesTotal: 0 },
            ]);
        });
    });
});

describe('decodePageEvent', () => {
    it('defaults missing text and total', () => {
        expect(decodePageEvent('{"page_idx":3}')).toEqual({ kind: 'page', event: { index: 3, text: '', total: 0 } });
    });

    it('rejects non-positive page indices', () => {
        const item = decodePageEvent('{"page_idx":0,"text":"A"}');
        expect(item.kind).toBe('malformed');
    });

    it('keeps the offending line on invalid JSON', () => {
        const item = decodePageEvent('{oops');
        expect(item).toMatchObject({ kind: 'malformed', error: { line: '{oops' } });
    });
});

describe('classifyStreamFailure', () => {
    it('prefers cancellation', () => {
        const abort = new AbortController();
        abort.abort();
        expect(classifyStreamFailure(new Error('aborted'), abort.signal)).toBeInstanceOf(CancelledError);
    });

    it('maps timeout codes to read-timeout', () => {
        const error = classifyStreamFailure(Object.assign(new Error('timeout'), { code: 'ETIMEDOUT' }));
        expect(error).toMatchObject({ kind: 'read-timeout' });
    });

    it('passes stream errors through', () => {
        const original = new StreamError('read-timeout', 'idle');
        expect(classifyStreamFailure(original)).toBe(original);
    });

    it('counts unknown failures as a dropped connection', () => {
        expect(classifyStreamFailure(new Error('weird'))).toMatchObject({ kind: 'connection-reset', message: 'Stream failed: weird' });
    });
});
