import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import { ConfigError } from '../errors';
import { OUTPUT_EXTENSION } from '../config';
import { ListDocumentsQuery } from '../types';

/**
 * Resolve the batch input: one PDF, or every PDF directly inside a directory (sorted by name).
 */
export async function listPdfs(input: string): Promise<string[]> {
    const stats = await fs.stat(input).catch(() => null);
    if (stats?.isDirectory()) {
        const names = (await fs.readdir(input)).filter((name) => name.toLowerCase().endsWith('.pdf'));
        if (names.length > 0) {
            return names.sort().map((name) => path.join(input, name));
        }
    }
    if (stats?.isFile() && input.toLowerCase().endsWith('.pdf')) {
        return [input];
    }
    throw new ConfigError(`No PDF(s) found at '${input}'`);
}

/**
 * Output location for a source document: `<outDir>/<base>.mmd`.
 */
export function outputPathFor(source: string, outDir: string): string {
    return path.join(outDir, `${path.parse(source).name}${OUTPUT_EXTENSION}`);
}

/**
 * File name sent with the upload. Anonymized names are a stable hash of the original name.
 */
export function uploadNameFor(source: string, anonymize: boolean): string {
    const name = path.basename(source);
    if (!anonymize) return name;
    const digest = createHash('sha256').update(name).digest('hex').slice(0, 16);
    return `${digest}.pdf`;
}

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function dayBound(day: string | undefined, time: string): string | undefined {
    if (day === undefined) return undefined;
    if (!DAY_PATTERN.test(day)) {
        throw new ConfigError(`Expected a date as YYYY-MM-DD, got '${day}'`);
    }
    return `${day}T${time}Z`;
}

/**
 * Listing query from CLI arguments. Dates cover whole UTC days.
 */
export function listQueryFor(args: { page: number; perPage: number; fromDate?: string; toDate?: string }): ListDocumentsQuery {
    return {
        page: args.page,
        perPage: args.perPage,
        fromDate: dayBound(args.fromDate, '00:00:00.000'),
        toDate: dayBound(args.toDate, '23:59:59.999'),
    };
}
