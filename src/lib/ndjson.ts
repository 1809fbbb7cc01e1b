import { Readable } from 'stream';
import { StringDecoder } from 'string_decoder';

export interface ReadLinesOptions {
    /** Destroy the source if no chunk arrives for this long. Time spent by the consumer does not count. */
    idleTimeoutMs?: number;
    /** Error the source is destroyed with when the idle timer fires. */
    idleError?: () => Error;
}

/**
 * Split a byte stream into lines, carrying partial lines across chunk boundaries.
 * A trailing line without a newline is still yielded.
 */
export async function* readLines(source: Readable, options: ReadLinesOptions = {}): AsyncGenerator<string> {
    const { idleTimeoutMs, idleError = () => new Error(`No data received for ${idleTimeoutMs} ms`) } = options;
    const decoder = new StringDecoder('utf8');
    let buffered = '';
    let timer: NodeJS.Timeout | undefined;

    const arm = () => {
        if (!idleTimeoutMs) return;
        clearTimeout(timer);
        timer = setTimeout(() => source.destroy(idleError()), idleTimeoutMs);
    };

    arm();
    try {
        for await (const chunk of source) {
            clearTimeout(timer);
            buffered += typeof chunk === 'string' ? chunk : decoder.write(chunk);
            let newline = buffered.indexOf('\n');
            while (newline !== -1) {
                const line = buffered.slice(0, newline);
                buffered = buffered.slice(newline + 1);
                yield stripCarriageReturn(line);
                newline = buffered.indexOf('\n');
            }
            arm();
        }
        buffered += decoder.end();
        if (buffered.length > 0) {
            yield stripCarriageReturn(buffered);
        }
    } finally {
        clearTimeout(timer);
    }
}

function stripCarriageReturn(line: string): string {
    return line.endsWith('\r') ? line.slice(0, -1) : line;
}
