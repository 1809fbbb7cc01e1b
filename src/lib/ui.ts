/**
 * UI components for progress tracking and display
 */

import ora from 'ora';
import * as cliProgress from 'cli-progress';
import chalk from 'chalk';
import * as path from 'path';
import { BatchSummary, ProgressOptions, ProgressStyle, ProgressTracker, RemoteDocument } from '../types';
import { PROGRESS_BAR_LENGTH, PROGRESS_REFRESH_RATE, SPINNER_CHARS } from '../config';

/**
 * Check if the terminal is interactive
 */
function isInteractiveTerminal(): boolean {
    return Boolean(process.stdout.isTTY);
}

/**
 * Format seconds as mm:ss
 */
export function formatTime(seconds: number | null): string {
    if (seconds === null) {
        return '??:??';
    }
    const mins = Math.floor(seconds / 60);
    const secs = Math.floor(seconds % 60);
    return `${mins.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
}

/**
 * Page-based progress display. Totals may grow while a job runs.
 */
class ProgressTrackerImpl implements ProgressTracker {
    private style: ProgressStyle;
    private title: string;
    private total: number;
    private current: number;
    private startTime: number;
    private lastUpdateTime: number;
    private interactive: boolean;
    private spinner: ReturnType<typeof ora> | null;
    private progressBar: cliProgress.SingleBar | null;
    private showTimeElapsed: boolean;

    constructor() {
        this.style = 'none';
        this.title = '';
        this.total = 0;
        this.current = 0;
        this.startTime = Date.now();
        this.lastUpdateTime = this.startTime;
        this.interactive = isInteractiveTerminal();
        this.spinner = null;
        this.progressBar = null;
        this.showTimeElapsed = false;
    }

    start(options: ProgressOptions): void {
        this.style = options.style;
        this.title = options.title || 'Processing';
        this.total = options.total || 0;
        this.current = 0;
        this.startTime = Date.now();
        this.lastUpdateTime = this.startTime;
        this.showTimeElapsed = options.showTimeElapsed || false;

        // Don't show progress if not interactive or style is none
        if (!this.interactive || this.style === 'none') {
            return;
        }

        this.cleanup();

        switch (this.style) {
            case 'spinner':
                this.spinner = ora({
                    text: `${this.title}...`,
                    spinner: { frames: SPINNER_CHARS },
                }).start();
                break;
            case 'bar': {
                let barFormat = `${this.title} |${chalk.cyan('{bar}')}| {value}/{total} pages`;
                if (this.showTimeElapsed) {
                    barFormat += ' | {elapsed}';
                }
                barFormat += ' | {note}';
                this.progressBar = new cliProgress.SingleBar({
                    format: barFormat,
                    barCompleteChar: '█',
                    barIncompleteChar: '░',
                    hideCursor: true,
                    clearOnComplete: false,
                    barsize: PROGRESS_BAR_LENGTH,
                });
                this.progressBar.start(Math.max(this.total, 1), 0, { elapsed: '00:00', note: '' });
                break;
            }
            case 'simple':
                process.stdout.write(`${this.title}: 0 pages\n`);
                break;
        }
    }

    setTotal(total: number): void {
        if (total <= 0 || total === this.total) return;
        this.total = total;
        this.progressBar?.setTotal(total);
    }

    update(current: number, message?: string): void {
        this.current = current;
        const now = Date.now();
        const timeDiff = (now - this.lastUpdateTime) / 1000;

        // Only update if enough time has passed or this is the first update
        if (timeDiff < PROGRESS_REFRESH_RATE && this.lastUpdateTime !== this.startTime) {
            return;
        }
        this.lastUpdateTime = now;

        if (!this.interactive || this.style === 'none') {
            return;
        }

        const elapsed = formatTime((now - this.startTime) / 1000);
        const of = this.total > 0 ? `${current}/${this.total}` : `${current}`;

        switch (this.style) {
            case 'spinner':
                if (this.spinner) {
                    let text = `${this.title} | ${of} pages`;
                    if (this.showTimeElapsed) {
                        text += ` | ${elapsed}`;
                    }
                    if (message) {
                        text += ` | ${message}`;
                    }
                    this.spinner.text = text;
                }
                break;
            case 'bar':
                this.progressBar?.update(current, { elapsed, note: message ?? '' });
                break;
            case 'simple': {
                let status = `\r${this.title}: ${of} pages`;
                if (this.showTimeElapsed) {
                    status += ` | Time: ${elapsed}`;
                }
                process.stdout.write(status);
                break;
            }
        }
    }

    finish(message?: string, ok = true): void {
        if (!this.interactive || this.style === 'none') {
            return;
        }

        let finalMessage = message || `${this.title} complete`;
        if (this.showTimeElapsed) {
            finalMessage += ` in ${formatTime((Date.now() - this.startTime) / 1000)}`;
        }

        switch (this.style) {
            case 'spinner':
                if (this.spinner) {
                    if (ok) {
                        this.spinner.succeed(finalMessage);
                    } else {
                        this.spinner.fail(finalMessage);
                    }
                    this.spinner = null;
                }
                break;
            case 'bar':
                if (this.progressBar) {
                    this.progressBar.update(this.current);
                    this.progressBar.stop();
                    process.stdout.write(`${finalMessage}\n`);
                    this.progressBar = null;
                }
                break;
            case 'simple':
                process.stdout.write(`\r${finalMessage}${' '.repeat(20)}\n`);
                break;
        }
    }

    private cleanup(): void {
        if (this.spinner) {
            this.spinner.stop();
            this.spinner = null;
        }
        if (this.progressBar) {
            this.progressBar.stop();
            this.progressBar = null;
        }
    }
}

export function createProgressTracker(): ProgressTracker {
    return new ProgressTrackerImpl();
}

export type MessageStyle = 'info' | 'success' | 'warning' | 'error';

export function styleMessage(message: string, style: MessageStyle): string {
    switch (style) {
        case 'info':
            return chalk.blue(message);
        case 'success':
            return chalk.green(message);
        case 'warning':
            return chalk.yellow(message);
        case 'error':
            return chalk.red(message);
        default:
            return message;
    }
}

export function printMessage(message: string, style: MessageStyle): void {
    console.log(styleMessage(message, style));
}

/**
 * Plain-text lines for the end-of-batch summary. Per-document lines only for multi-document batches.
 */
export function formatBatchSummary(summary: BatchSummary): string[] {
    const lines = [
        `Conversion complete: ${summary.succeeded}/${summary.jobs} PDFs converted successfully`,
        `Processed ${summary.pagesReceived}/${summary.pagesExpected} pages`,
    ];
    if (summary.cancelled) {
        lines.push('Run was interrupted; remaining PDFs were not processed');
    }
    if (summary.results.length > 1) {
        lines.push('', 'Conversion Summary:');
        for (const result of summary.results) {
            const name = path.basename(result.source);
            lines.push(result.success
                ? `OK   ${name}: ${result.pagesReceived}/${result.totalPages} pages`
                : `FAIL ${name}: ${result.error ?? 'Unknown error'}`);
        }
    }
    return lines;
}

export function printBatchSummary(summary: BatchSummary): void {
    for (const line of formatBatchSummary(summary)) {
        if (line.startsWith('OK ')) console.log(chalk.green(line));
        else if (line.startsWith('FAIL ')) console.log(chalk.red(line));
        else console.log(line);
    }
}

/**
 * Fixed-width table of remote documents.
 */
export function formatDocumentTable(documents: readonly RemoteDocument[]): string[] {
    const row = (id: string, file: string, status: string, created: string, pages: string) =>
        `${id.padEnd(36)} ${file.padEnd(30)} ${status.padEnd(12)} ${created.padEnd(24)} ${pages.padEnd(10)}`.trimEnd();
    return [
        row('ID', 'File', 'Status', 'Created', 'Pages'),
        '-'.repeat(110),
        ...documents.map((d) =>
            row(d.id, path.basename(d.inputFile), d.status, d.createdAt, `${d.pagesCompleted}/${d.pagesTotal}`)
        ),
    ];
}
