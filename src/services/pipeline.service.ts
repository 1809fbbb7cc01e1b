import * as path from 'path';
import * as fs from 'fs/promises';
import logger from '../lib/logger';
import { ConsoleReporter } from '../lib/console-reporter';
import { listPdfs, outputPathFor, uploadNameFor } from '../lib/documents';
import { BatchSummary, ConversionTransport, Job, ListDocumentsQuery, ProgressStyle, RemoteDocument } from '../types';
import { Credentials, DEFAULT_CONVERSION_OPTIONS, DEFAULT_PROGRESS_STYLE, loadCredentials } from '../config';
import { MathpixClient } from './mathpix.client';
import { FallbackController } from './fallback.service';
import { JobRunner } from './job-runner.service';
import { BatchOrchestrator } from './batch.service';
import { RemotePageCountProbe } from './page-probe.service';
import { localizeFiles, localizeImagesIn } from './image-links.service';

export interface ConvertArgs {
    input: string;
    /** Defaults to the directory of the first PDF. */
    outDir?: string;
    skipStatusCheck?: boolean;
    silent?: boolean;
    progress?: ProgressStyle;
    anonymize?: boolean;
    probePages?: boolean;
    localizeImages?: boolean;
    signal?: AbortSignal;
}

export type ServiceClient = ConversionTransport & Pick<MathpixClient, 'listDocuments'>;
export type ClientFactory = (credentials: Credentials) => ServiceClient;

const connectToMathpix: ClientFactory = (credentials) => new MathpixClient({ credentials });

export class PipelineService {
    constructor(private readonly connect: ClientFactory = connectToMathpix) { }

    /**
     * Convert one PDF or a directory of PDFs to .mmd files.
     */
    async runConvertPipeline(args: ConvertArgs): Promise<BatchSummary> {
        const { input, skipStatusCheck = false, silent = false, anonymize = false, probePages = false, localizeImages = false, signal } = args;
        const client = this.connect(loadCredentials());
        const sources = await listPdfs(input);
        const outDir = path.resolve(args.outDir ?? path.dirname(sources[0]));
        await fs.mkdir(outDir, { recursive: true });
        logger.info(`Starting conversion of ${sources.length} PDF(s) into ${outDir}`);

        const jobs: Job[] = sources.map((source) => ({
            source,
            uploadName: uploadNameFor(source, anonymize),
            outputPath: outputPathFor(source, outDir),
            options: { ...DEFAULT_CONVERSION_OPTIONS },
        }));

        const style: ProgressStyle = silent ? 'none' : args.progress ?? DEFAULT_PROGRESS_STYLE;
        const reporter = new ConsoleReporter(style);
        const controller = new FallbackController({ transport: client, reporter });
        const runner = new JobRunner({ transport: client, controller, reporter, skipStatusCheck });
        const orchestrator = new BatchOrchestrator({
            runner,
            reporter,
            probe: probePages ? new RemotePageCountProbe(client) : undefined,
        });

        const summary = await orchestrator.run(jobs, signal);

        if (localizeImages) {
            const outputs = summary.results.filter((result) => result.success).map((result) => result.outputPath);
            await localizeFiles(outputs, { reporter });
        }
        return summary;
    }

    /**
     * One page of previously submitted documents.
     */
    async runListDocuments(query: ListDocumentsQuery): Promise<RemoteDocument[]> {
        const client = this.connect(loadCredentials());
        logger.info(`Listing documents (page ${query.page}, ${query.perPage} per page)`);
        return client.listDocuments(query);
    }

    /**
     * Replace CDN image links in existing markdown with local copies.
     */
    async runLocalizeImages(target: string): Promise<{ files: number; replaced: number }> {
        return localizeImagesIn(target, { reporter: new ConsoleReporter(DEFAULT_PROGRESS_STYLE) });
    }
}

export default new PipelineService();
