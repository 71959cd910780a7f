import { config } from "../config";
import { AssemblyPipeline } from "./assemblyPipeline";
import { UndiciHttpClient } from "./httpClient";
import { JobOrchestrator } from "./jobOrchestrator";
import type { JobDefaults } from "./jobOptions";
import { ManifestResolver } from "./manifestResolver";
import { FfmpegMuxer } from "./muxer";
import type { ProgressReporter } from "./progressReporter";
import { FfmpegSegmentValidator } from "./segmentValidator";
import { SegmentFetcher } from "./segmentFetcher";

/** Wires the production collaborators of a job. */
export function createOrchestrator(reporter: ProgressReporter): JobOrchestrator {
  const http = new UndiciHttpClient({ timeoutMs: config.requestTimeoutMs });
  const validator = new FfmpegSegmentValidator();
  const muxer = new FfmpegMuxer();

  return new JobOrchestrator({
    resolver: new ManifestResolver(http, validator, { sceneIndexUrlTemplate: config.sceneIndexUrlTemplate }),
    fetcher: new SegmentFetcher(http, validator, reporter),
    assembler: new AssemblyPipeline(muxer),
    muxer,
    http,
    reporter,
    retries: config.segmentRetries,
    retryBaseDelayMs: config.retryBaseDelayMs,
  });
}

export const jobDefaults: JobDefaults = {
  threads: config.segmentThreads,
  proxy: config.proxy,
  proxyMetadataOnly: config.proxyMetadataOnly,
  outputDir: config.outputDir,
  workDir: config.workDir,
};
