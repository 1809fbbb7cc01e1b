import { setTimeout as setTimeoutPromise } from 'timers/promises';
import { CancelledError } from '../errors';

/**
 * Time source for polling loops. Injected so tests can run the 300 s ceiling instantly.
 */
export interface Clock {
    now(): number;
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    async sleep(ms: number, signal?: AbortSignal): Promise<void> {
        try {
            await setTimeoutPromise(ms, undefined, { signal });
        } catch (error) {
            if (signal?.aborted) {
                throw new CancelledError();
            }
            throw error;
        }
    },
};
