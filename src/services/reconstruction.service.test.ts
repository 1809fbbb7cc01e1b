import { describe, it, expect } from 'vitest';
import { CancelledError, StreamError } from '../errors';
import { MemorySink, RecordingReporter, ScriptedStream, StreamStep, page } from '../test-utils/fakes';
import { ReconstructionState, reconstructStream } from './reconstruction.service';

function run(steps: StreamStep[], signal?: AbortSignal) {
    let closed = 0;
    const stream = new ScriptedStream(steps, () => {
        closed++;
    });
    const sink = new MemorySink('out/doc.mmd');
    const reporter = new RecordingReporter();
    const result = reconstructStream(stream, sink, { label: 'doc', reporter, signal });
    return { result, stream, sink, reporter, closed: () => closed };
}

describe('ReconstructionState', () => {
    it('is never complete while the total is unknown', () => {
        const state = new ReconstructionState();
        state.accept(page(1, 'A', 0));
        expect(state.isComplete).toBe(false);
        expect(state.materialize()).toBe('A');
    });

    it('keeps the largest total seen', () => {
        const state = new ReconstructionState();
        state.accept(page(1, 'A', 3));
        state.accept(page(2, 'B', 2));
        expect(state.expectedTotal).toBe(3);
        expect(state.isComplete).toBe(false);
    });

    it('materializes nothing before the first page', () => {
        expect(new ReconstructionState().materialize()).toBe('');
    });
});

describe('reconstructStream', () => {
    it('rebuilds out-of-order pages and rewrites the sink after every page', async () => {
        const { result, sink, reporter, closed } = run([page(2, 'B', 3), page(1, 'A', 3), page(3, 'C', 3)]);
        const outcome = await result;

        expect(outcome.ending).toBe('complete');
        expect(outcome.complete).toBe(true);
        expect(outcome.pagesReceived).toBe(3);
        expect(outcome.expectedTotal).toBe(3);
        expect(outcome.document).toBe('ABC');
        expect(sink.writes).toEqual(['B', 'AB', 'ABC']);
        expect(reporter.progress).toEqual([['doc', 1, 3], ['doc', 2, 3], ['doc', 3, 3]]);
        expect(closed()).toBe(1);
    });

    it('completes on the last missing page when pages arrive as 1, 3, 2', async () => {
        const { result, sink, stream } = run([page(1, 'A', 3), page(3, 'C', 3), page(2, 'B', 3)]);
        const outcome = await result;

        expect(outcome.ending).toBe('complete');
        expect(outcome.document).toBe('ABC');
        expect(sink.writes).toEqual(['A', 'AC', 'ABC']);
        expect(stream.consumed).toBe(3);
    });

    it('treats a repeated page as a replacement', async () => {
        const { result, sink } = run([page(1, 'A', 2), page(1, 'A', 2), page(2, 'B', 2)]);
        const outcome = await result;

        expect(outcome.pagesReceived).toBe(2);
        expect(sink.writes).toEqual(['A', 'A', 'AB']);
    });

    it('keeps the latest text when a page is sent twice with different content', async () => {
        const { result } = run([page(1, 'old', 2), page(1, 'new', 2)]);
        const outcome = await result;

        expect(outcome.ending).toBe('stream-ended');
        expect(outcome.document).toBe('new');
        expect(outcome.pagesReceived).toBe(1);
    });

    it('leaves gaps empty in the written snapshot', async () => {
        const { result, sink } = run([page(1, 'A', 3), page(3, 'C', 3)]);
        const outcome = await result;

        expect(sink.writes).toEqual(['A', 'AC']);
        expect(outcome.complete).toBe(false);
    });

    it('reports an incomplete stream end', async () => {
        const { result, reporter } = run([page(1, 'A', 3), page(2, 'B', 2)]);
        const outcome = await result;

        expect(outcome.ending).toBe('stream-ended');
        expect(outcome.expectedTotal).toBe(3);
        expect(reporter.messages('warn')).toContain('[doc] Stream ended with 2/3 pages received');
    });

    it('stops reading once every page is present', async () => {
        const { result, stream } = run([page(1, 'A', 1), page(2, 'B', 2)]);
        const outcome = await result;

        expect(outcome.document).toBe('A');
        expect(stream.consumed).toBe(1);
    });

    it('counts undecodable lines and carries on', async () => {
        const { result, reporter } = run([{ malformed: '{bad' }, page(1, 'A', 1)]);
        const outcome = await result;

        expect(outcome.decodeFailures).toBe(1);
        expect(outcome.complete).toBe(true);
        expect(reporter.messages('warn')).toContain('[doc] Failed to decode line: {bad');
    });

    it('salvages received pages after a read timeout', async () => {
        const { result, sink, closed } = run([page(1, 'A', 2), new StreamError('read-timeout', 'idle')]);
        const outcome = await result;

        expect(outcome.ending).toBe('salvaged');
        expect(outcome.salvagedFrom).toBe('read-timeout');
        expect(outcome.complete).toBe(false);
        expect(outcome.document).toBe('A');
        expect(sink.writes).toEqual(['A']);
        expect(closed()).toBe(1);
    });

    it('salvages a single page of unknown total after a read timeout', async () => {
        const { result, sink } = run([page(1, 'X', 0), new StreamError('read-timeout', 'idle')]);
        const outcome = await result;

        expect(outcome.ending).toBe('salvaged');
        expect(outcome.pagesReceived).toBe(1);
        expect(outcome.expectedTotal).toBe(0);
        expect(outcome.complete).toBe(false);
        expect(outcome.document).toBe('X');
        expect(sink.writes).toEqual(['X']);
    });

    it('writes the salvaged snapshot once more after a connection reset', async () => {
        const { result, sink } = run([page(1, 'A', 2), new StreamError('connection-reset', 'reset')]);
        const outcome = await result;

        expect(outcome.salvagedFrom).toBe('connection-reset');
        expect(sink.writes).toEqual(['A', 'A']);
    });

    it('rethrows a rejected stream even when pages arrived', async () => {
        const { result, closed } = run([page(1, 'A', 2), new StreamError('http-status', 'HTTP 500', { status: 500 })]);

        await expect(result).rejects.toMatchObject({ kind: 'http-status', status: 500 });
        expect(closed()).toBe(1);
    });

    it('rethrows a timeout before any page arrived', async () => {
        const { result } = run([new StreamError('read-timeout', 'idle')]);

        await expect(result).rejects.toBeInstanceOf(StreamError);
    });

    it('rethrows errors that are not stream failures', async () => {
        const { result } = run([page(1, 'A', 2), new Error('disk full')]);

        await expect(result).rejects.toThrow('disk full');
    });

    it('stops with CancelledError when the signal aborts mid-stream', async () => {
        const controller = new AbortController();
        const { result, sink, closed } = run([page(1, 'A', 3), () => controller.abort(), page(2, 'B', 3)], controller.signal);

        await expect(result).rejects.toBeInstanceOf(CancelledError);
        expect(sink.writes).toEqual(['A']);
        expect(closed()).toBe(1);
    });
});
