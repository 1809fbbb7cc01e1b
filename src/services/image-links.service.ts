import { promises as fs } from 'fs';
import * as path from 'path';
import { errorMessage } from '../errors';
import { ConversionReporter, silentReporter } from '../lib/reporter';
import { downloadImage } from './image-download.service';

const CDN_IMAGE_PATTERN = /!\[(.*?)\]\((https?:\/\/cdn\.mathpix\.com\/cropped\/.*?)\)/g;
const MARKDOWN_EXTENSIONS = ['.md', '.mmd'];

export type ImageDownloader = (url: string, outDir: string) => Promise<string>;

export interface LocalizeOptions {
    download?: ImageDownloader;
    reporter?: ConversionReporter;
}

/**
 * Download every cropped CDN image linked from `filePath` into a sibling directory named after
 * the file, and point the links at the local copies. Links whose download fails are left as they are.
 * Returns the number of links rewritten.
 */
export async function localizeImageLinks(filePath: string, options: LocalizeOptions = {}): Promise<number> {
    const { download = downloadImage, reporter = silentReporter } = options;
    const content = await fs.readFile(filePath, 'utf-8');
    const baseDir = path.dirname(filePath);
    const imageDir = path.join(baseDir, path.parse(filePath).name);

    const localByUrl = new Map<string, string | null>();
    for (const match of content.matchAll(CDN_IMAGE_PATTERN)) {
        const url = match[2];
        if (localByUrl.has(url)) continue;
        try {
            const local = await download(url, imageDir);
            reporter.info(`Downloaded: ${url} -> ${local}`);
            localByUrl.set(url, path.relative(baseDir, local).split(path.sep).join('/'));
        } catch (error) {
            reporter.error(`Failed to download ${url}: ${errorMessage(error)}`);
            localByUrl.set(url, null);
        }
    }

    let replaced = 0;
    const updated = content.replace(CDN_IMAGE_PATTERN, (whole: string, alt: string, url: string) => {
        const local = localByUrl.get(url);
        if (!local) return whole;
        replaced++;
        return `![${alt}](${local})`;
    });

    await fs.writeFile(filePath, updated, 'utf-8');
    reporter.info(`Updated ${replaced} image links in ${filePath}`);
    return replaced;
}

/**
 * Localize one markdown file, or every .md/.mmd file under a directory.
 */
export async function localizeImagesIn(target: string, options: LocalizeOptions = {}): Promise<{ files: number; replaced: number }> {
    const stats = await fs.stat(target);
    const files = stats.isDirectory() ? await findMarkdownFiles(target) : [target];
    return { files: files.length, replaced: await localizeFiles(files, options) };
}

/**
 * Localize each file in turn. A file that cannot be read or written is reported and skipped.
 */
export async function localizeFiles(files: readonly string[], options: LocalizeOptions = {}): Promise<number> {
    let replaced = 0;
    for (const file of files) {
        try {
            replaced += await localizeImageLinks(file, options);
        } catch (error) {
            (options.reporter ?? silentReporter).error(`Error processing ${file}: ${errorMessage(error)}`);
        }
    }
    return replaced;
}

async function findMarkdownFiles(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    const found: string[] = [];
    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
            found.push(...await findMarkdownFiles(full));
        } else if (MARKDOWN_EXTENSIONS.includes(path.extname(entry.name))) {
            found.push(full);
        }
    }
    return found;
}
