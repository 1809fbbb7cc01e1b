/**
 * Constants and configuration values for the mmd-convert package.
 */
import * as dotenv from 'dotenv';
import * as path from 'path';
import { ConfigError } from './errors';
import { ConversionOptions, ProgressStyle } from './types';

// Load environment variables
dotenv.config();

// API configuration
export const API_URL = process.env.MATHPIX_API_URL || 'https://api.mathpix.com/v3';
export const SUBMIT_TIMEOUT = 120; // seconds
export const STATUS_TIMEOUT = 30; // seconds
export const DOWNLOAD_TIMEOUT = 60; // seconds
// Longest silence tolerated on an open event stream before it counts as a read timeout
export const STREAM_IDLE_TIMEOUT = Number(process.env.STREAM_IDLE_TIMEOUT || 300); // seconds
export const IMAGE_DOWNLOAD_TIMEOUT = 10; // seconds

// Fallback polling
export const POLL_INTERVAL = 5; // seconds between status checks
export const POLL_CEILING = 300; // seconds before downloading whatever the service has

// Batch page-count probe
export const PROBE_ATTEMPTS = 5;
export const PROBE_DELAY = 1; // seconds
export const DEFAULT_PAGE_COUNT = 5; // assumed when a probe fails

// Statuses accepted by the final consistency check besides 'completed'.
// Streaming often finishes before backend post-processing does.
export const ACCEPTED_PENDING_STATUSES: readonly string[] = ['split', 'processing'];

// Conversion options sent with every document
export const DEFAULT_CONVERSION_OPTIONS: ConversionOptions = {
    math_inline_delimiters: ['$', '$'],
    rm_spaces: true,
    include_equation_tags: true,
};

// Progress display configuration
export const PROGRESS_STYLES = ['simple', 'bar', 'spinner', 'none'] as const;
export const DEFAULT_PROGRESS_STYLE: ProgressStyle = 'bar';
export const SPINNER_CHARS = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
export const PROGRESS_BAR_LENGTH = 40;
export const PROGRESS_REFRESH_RATE = 0.1; // seconds

// Listing
export const DEFAULT_LIST_PAGE = 1;
export const DEFAULT_LIST_PER_PAGE = 50;

// File paths
export const OUTPUT_EXTENSION = '.mmd';
export const LOG_DIR = 'logs';
export const LOG_FILE = path.join(LOG_DIR, 'mmd-convert.log');

export interface Credentials {
    appId: string;
    appKey: string;
}

export function loadCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
    const appId = env.MATHPIX_APP_ID;
    const appKey = env.MATHPIX_APP_KEY;
    if (!appId || !appKey) {
        throw new ConfigError('Set MATHPIX_APP_ID and MATHPIX_APP_KEY in your .env');
    }
    return { appId, appKey };
}
