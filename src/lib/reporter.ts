import { FallbackState, JobResult } from '../types';

/**
 * Observer passed explicitly into every pipeline component.
 * Log methods carry free text; the remaining hooks drive progress display.
 */
export interface ConversionReporter {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    jobStarted(label: string, position: number, count: number): void;
    pageProgress(label: string, received: number, total: number): void;
    stateChanged(label: string, from: FallbackState, to: FallbackState): void;
    jobFinished(result: JobResult): void;
    batchProgress(pagesDone: number, pagesExpected: number): void;
}

const noop = () => { };

export const silentReporter: ConversionReporter = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    jobStarted: noop,
    pageProgress: noop,
    stateChanged: noop,
    jobFinished: noop,
    batchProgress: noop,
};
