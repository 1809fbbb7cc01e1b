/**
 * Error taxonomy for the conversion pipeline.
 */

export interface ConversionErrorOptions {
    cause?: unknown;
}

export class ConversionError extends Error {
    constructor(message: string, options: ConversionErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'ConversionError';
    }
}

/** Raised when a document could not be submitted; no remote job exists. */
export class SubmissionError extends ConversionError {
    constructor(message: string, options: ConversionErrorOptions = {}) {
        super(message, options);
        this.name = 'SubmissionError';
    }
}

export type StreamErrorKind = 'http-status' | 'read-timeout' | 'connection-reset';

export class StreamError extends ConversionError {
    readonly kind: StreamErrorKind;
    readonly status?: number;

    constructor(kind: StreamErrorKind, message: string, options: ConversionErrorOptions & { status?: number } = {}) {
        super(message, options);
        this.name = 'StreamError';
        this.kind = kind;
        this.status = options.status;
    }

    /** http-status means the request itself was rejected and nothing can be salvaged. */
    get salvageable(): boolean {
        return this.kind !== 'http-status';
    }
}

export class StatusError extends ConversionError {
    constructor(message: string, options: ConversionErrorOptions = {}) {
        super(message, options);
        this.name = 'StatusError';
    }
}

export class DownloadError extends ConversionError {
    constructor(message: string, options: ConversionErrorOptions = {}) {
        super(message, options);
        this.name = 'DownloadError';
    }
}

/** One undecodable stream line. Never fatal. */
export class DecodeError extends ConversionError {
    readonly line: string;

    constructor(message: string, line: string, options: ConversionErrorOptions = {}) {
        super(message, options);
        this.name = 'DecodeError';
        this.line = line;
    }
}

export class CancelledError extends ConversionError {
    constructor(message = 'Operation cancelled') {
        super(message);
        this.name = 'CancelledError';
    }
}

export class ConfigError extends ConversionError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new CancelledError();
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
