import { PROBE_ATTEMPTS, PROBE_DELAY } from '../config';
import { Clock, systemClock } from '../lib/clock';
import { ConversionTransport, Job } from '../types';

/**
 * Best-effort page count for a document before the main pass.
 * `undefined` means the count could not be determined.
 */
export interface PageCountProbe {
    count(job: Job, signal?: AbortSignal): Promise<number | undefined>;
}

/**
 * Asks the service for the page count by submitting the document and reading its status.
 * This costs one extra submission per document.
 */
export class RemotePageCountProbe implements PageCountProbe {
    constructor(
        private readonly transport: ConversionTransport,
        private readonly clock: Clock = systemClock,
        private readonly attempts: number = PROBE_ATTEMPTS,
        private readonly delayMs: number = PROBE_DELAY * 1000
    ) { }

    async count(job: Job, signal?: AbortSignal): Promise<number | undefined> {
        const remoteId = await this.transport.submit({ path: job.source, fileName: job.uploadName }, job.options, signal);
        for (let attempt = 1; attempt <= this.attempts; attempt++) {
            const { pagesTotal } = await this.transport.getStatus(remoteId, signal);
            if (pagesTotal > 0) {
                return pagesTotal;
            }
            if (attempt < this.attempts) {
                await this.clock.sleep(this.delayMs, signal);
            }
        }
        return undefined;
    }
}
