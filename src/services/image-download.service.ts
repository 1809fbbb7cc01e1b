import { promises as fs } from 'fs';
import { join, parse } from 'path';
import { IMAGE_DOWNLOAD_TIMEOUT } from '../config';

/**
 * Local file name for a cropped CDN image. Crop coordinates in the query string
 * become part of the name so crops of the same source image do not collide.
 */
export function localImageName(url: string): string {
    const parsed = new URL(url);
    const filename = parsed.pathname.split('/').pop() || 'image';
    const q = parsed.searchParams;
    const x = q.get('top_left_x');
    const y = q.get('top_left_y');
    const w = q.get('width');
    const h = q.get('height');
    if (x === null || y === null || w === null || h === null) {
        return filename;
    }
    const { name, ext } = parse(filename);
    return `${name}_x${x}_y${y}_w${w}_h${h}${ext}`;
}

export async function downloadImage(url: string, outDir: string): Promise<string> {
    const r = await fetch(url, { signal: AbortSignal.timeout(IMAGE_DOWNLOAD_TIMEOUT * 1000) });
    if (!r.ok) throw new Error(`HTTP ${r.status} for ${url}`);
    const buf = Buffer.from(await r.arrayBuffer());
    await fs.mkdir(outDir, { recursive: true });
    const p = join(outDir, localImageName(url));
    await fs.writeFile(p, buf);
    return p;
}
