export { default as pipelineService } from './services/pipeline.service';
export { MathpixClient, decodePageEvent, classifyStreamFailure } from './services/mathpix.client';
export type { MathpixClientOptions } from './services/mathpix.client';
export { ReconstructionState, reconstructStream } from './services/reconstruction.service';
export type { ReconstructionOutcome } from './services/reconstruction.service';
export { FallbackController } from './services/fallback.service';
export type { FallbackOutcome } from './services/fallback.service';
export { JobRunner } from './services/job-runner.service';
export { BatchOrchestrator } from './services/batch.service';
export { RemotePageCountProbe } from './services/page-probe.service';
export type { PageCountProbe } from './services/page-probe.service';
export { FileOutputSink, openFileSink } from './services/output-sink';
export type { OutputSink, SinkFactory } from './services/output-sink';
export { localizeFiles, localizeImageLinks, localizeImagesIn } from './services/image-links.service';
export { silentReporter } from './lib/reporter';
export type { ConversionReporter } from './lib/reporter';
export * from './errors';
// Re-export common types for consumers
export type {
    Job,
    JobResult,
    BatchSummary,
    PageEvent,
    StreamItem,
    StatusReport,
    FinalDownload,
    ConversionTransport,
    ConversionOptions,
    FallbackState,
    ResultSource,
    RemoteDocument,
    ListDocumentsQuery,
} from './types';
