import { describe, it, expect } from 'vitest';
import { Readable } from 'stream';
import { readLines } from './ndjson';

async function lines(source: Readable, idleTimeoutMs?: number): Promise<string[]> {
    const out: string[] = [];
    for await (const line of readLines(source, { idleTimeoutMs })) {
        out.push(line);
    }
    return out;
}

describe('readLines', () => {
    it('joins lines split across chunks', async () => {
        const source = Readable.from([Buffer.from('alp'), Buffer.from('ha\nbe'), Buffer.from('ta\n')]);
        await expect(lines(source)).resolves.toEqual(['alpha', 'beta']);
    });

    it('yields a final line without a newline', async () => {
        await expect(lines(Readable.from(['one\ntwo']))).resolves.toEqual(['one', 'two']);
    });

    it('strips carriage returns', async () => {
        await expect(lines(Readable.from(['a\r\nb\r\n']))).resolves.toEqual(['a', 'b']);
    });

    it('keeps multi-byte characters split between chunks intact', async () => {
        const bytes = Buffer.from('é\n');
        const source = Readable.from([bytes.subarray(0, 1), bytes.subarray(1)]);
        await expect(lines(source)).resolves.toEqual(['é']);
    });

    it('destroys a source that goes quiet', async () => {
        const source = new Readable({ read() { } });
        source.push('first\n');
        const seen: string[] = [];
        const reading = (async () => {
            for await (const line of readLines(source, { idleTimeoutMs: 20, idleError: () => new Error('idle') })) {
                seen.push(line);
            }
        })();

        await expect(reading).rejects.toThrow('idle');
        expect(seen).toEqual(['first']);
        expect(source.destroyed).toBe(true);
    });
});
