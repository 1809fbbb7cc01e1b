import * as path from 'path';
import logger from './logger';
import { ConversionReporter } from './reporter';
import { createProgressTracker, printMessage } from './ui';
import { FallbackState, JobResult, ProgressStyle, ProgressTracker } from '../types';

/**
 * Reporter for the CLI: log lines go to winston, page progress to a per-job tracker.
 */
export class ConsoleReporter implements ConversionReporter {
    private tracker: ProgressTracker | null = null;
    private trackedLabel: string | null = null;

    constructor(private readonly style: ProgressStyle) { }

    debug(message: string): void {
        logger.debug(message);
    }

    info(message: string): void {
        logger.info(message);
    }

    warn(message: string): void {
        logger.warn(message);
    }

    error(message: string): void {
        logger.error(message);
    }

    jobStarted(label: string, position: number, count: number): void {
        logger.info(`Processing PDF ${position}/${count}: ${label}`);
        if (count > 1 && this.style !== 'none') {
            console.log(`\nProcessing ${position}/${count}: ${label}`);
        }
    }

    pageProgress(label: string, received: number, total: number): void {
        if (this.trackedLabel !== label || !this.tracker) {
            this.tracker = createProgressTracker();
            this.tracker.start({ style: this.style, title: `Processing ${label}`, total, showTimeElapsed: true });
            this.trackedLabel = label;
        }
        this.tracker.setTotal(total);
        this.tracker.update(received);
    }

    stateChanged(label: string, from: FallbackState, to: FallbackState): void {
        logger.info(`[${label}] ${from} -> ${to}`);
        if (to === 'polling' && this.style !== 'none') {
            printMessage(`${label}: stream incomplete, falling back to polling`, 'warning');
        }
    }

    jobFinished(result: JobResult): void {
        const label = path.basename(result.source);
        const message = result.success
            ? `${label} → ${result.outputPath}${result.via === 'download' ? ' (fallback method)' : ''}`
            : `${label}: ${result.error ?? 'Unknown error'}`;
        if (this.tracker && this.trackedLabel === label) {
            this.tracker.finish(message, result.success);
        } else if (this.style !== 'none') {
            printMessage(message, result.success ? 'success' : 'error');
        }
        this.tracker = null;
        this.trackedLabel = null;
    }

    batchProgress(pagesDone: number, pagesExpected: number): void {
        logger.info(`Overall progress: ${pagesDone}/${pagesExpected} pages`);
    }
}
