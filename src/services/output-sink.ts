import * as path from 'path';
import * as fs from 'fs/promises';

/**
 * Destination for one job's output. Every `write` replaces the whole content.
 */
export interface OutputSink {
    readonly location: string;
    write(content: string): Promise<void>;
    close(): Promise<void>;
}

export type SinkFactory = (location: string) => Promise<OutputSink>;

/**
 * File sink with truncate-and-rewrite semantics. Each snapshot is written to a sibling
 * temp file and renamed over the target, so a failed write leaves the previous snapshot intact.
 */
export class FileOutputSink implements OutputSink {
    private readonly tempPath: string;
    private dirReady = false;

    constructor(readonly location: string) {
        this.tempPath = path.join(path.dirname(location), `.${path.basename(location)}.partial`);
    }

    async write(content: string): Promise<void> {
        if (!this.dirReady) {
            await fs.mkdir(path.dirname(this.location), { recursive: true });
            this.dirReady = true;
        }
        await fs.writeFile(this.tempPath, content, 'utf-8');
        await fs.rename(this.tempPath, this.location);
    }

    async close(): Promise<void> {
        // A temp file only survives a write that failed between writeFile and rename
        await fs.rm(this.tempPath, { force: true });
    }
}

export const openFileSink: SinkFactory = async (location) => new FileOutputSink(location);

/**
 * Acquire a sink for the duration of `use`, releasing it on every exit path.
 */
export async function withSink<T>(open: SinkFactory, location: string, use: (sink: OutputSink) => Promise<T>): Promise<T> {
    const sink = await open(location);
    try {
        return await use(sink);
    } finally {
        await sink.close();
    }
}
