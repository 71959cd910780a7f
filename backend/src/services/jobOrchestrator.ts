import fs from "fs/promises";
import path from "path";
import type { JobError, JobResult, JobStage, StreamType } from "@scenegrab/shared";
import { AppError, ConfigError, ManifestError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import type { AssemblyPipeline } from "./assemblyPipeline";
import { downloadCovers } from "./coverDownloader";
import type { HttpClient } from "./httpClient";
import type { ManifestResolver } from "./manifestResolver";
import type { DownloadJob, ResolvedManifest, SegmentRange, StreamPlan, StreamVariant } from "./models";
import type { Muxer } from "./muxer";
import { buildOutputFileName } from "./outputNaming";
import type { ProgressReporter } from "./progressReporter";
import { selectVariant } from "./resolutionSelector";
import { buildStreamPlan, chaptersForRange, resolveSegmentRange } from "./sceneSegmenter";
import type { SegmentFetcher } from "./segmentFetcher";

export interface OrchestratorDeps {
  resolver: ManifestResolver;
  fetcher: SegmentFetcher;
  assembler: AssemblyPipeline;
  muxer: Pick<Muxer, "isAvailable">;
  http: HttpClient;
  reporter: ProgressReporter;
  retries: number;
  retryBaseDelayMs: number;
}

export function toJobError(stage: JobStage, err: unknown): JobError {
  if (err instanceof AppError) {
    return { stage, code: err.code, message: err.message, userMessage: err.userMessage };
  }
  return {
    stage,
    code: "INTERNAL_ERROR",
    message: errorMessage(err),
    userMessage: "Something went wrong while downloading this title.",
  };
}

export function failureResult(job: DownloadJob, stage: JobStage, err: unknown): JobResult {
  return {
    jobId: job.jobId,
    locator: job.locator,
    scene: job.scene,
    status: "failure",
    outputPath: null,
    error: toJobError(stage, err),
    warnings: [],
  };
}

/** Everything that decides which segment files a job writes goes into its directory name. */
function workDirName(
  manifest: ResolvedManifest,
  range: SegmentRange,
  video: StreamVariant | null,
  targetStream: StreamType | null
): string {
  const parts = [manifest.metadata.titleId, `${range.start}-${range.end}`];
  if (video) parts.push(video.id);
  if (targetStream) parts.push(targetStream);
  return parts.join("_");
}

/**
 * Runs one request through Resolving → Fetching → Assembling. Never throws:
 * every failure becomes a `failure` result carrying the stage it happened in.
 */
export class JobOrchestrator {
  /** Tail of the chain of jobs using each work directory. */
  private readonly workDirQueues = new Map<string, Promise<void>>();

  constructor(private readonly deps: OrchestratorDeps) {}

  async run(job: DownloadJob): Promise<JobResult> {
    let stage: JobStage = "pending";
    const enter = (next: JobStage) => {
      stage = next;
      this.deps.reporter.stageChanged(job.jobId, next);
    };

    let result: JobResult;
    try {
      enter("pending");
      result = await this.execute(job, enter);
    } catch (err) {
      const failedAt: JobStage = stage;
      enter("done");
      result = failureResult(job, failedAt, err);
    }
    this.deps.reporter.jobFinished(result);
    return result;
  }

  private async execute(job: DownloadJob, enter: (stage: JobStage) => void): Promise<JobResult> {
    const { options } = job;
    const { reporter } = this.deps;
    logger.info(`Job ${job.jobId}: ${job.locator}${job.scene !== null ? ` scene ${job.scene}` : ""}`);

    // ========== Resolving ==========
    enter("resolving");
    if (!(await this.deps.muxer.isAvailable())) {
      throw new ConfigError("ffmpeg was not found. Install it or set FFMPEG_PATH.");
    }

    const manifest = await this.deps.resolver.resolve(job.locator, {
      probeAudio: options.targetStream !== "video",
      proxy: options.proxy,
    });
    const video =
      options.targetStream === "audio"
        ? null
        : selectVariant(manifest.ladder, options.targetHeight, options.forceResolution);
    const range = resolveSegmentRange({
      scenes: manifest.scenes,
      scene: options.scene,
      padding: options.scenePadding,
      startSegment: options.startSegment,
      endSegment: options.endSegment,
      segmentDuration: manifest.segmentDuration,
      durationSeconds: manifest.metadata.durationSeconds,
      lastSegmentIndex: manifest.lastSegmentIndex,
    });
    logger.info(`Job ${job.jobId}: segments ${range.start} - ${range.end}`);

    const { metadata } = manifest;
    reporter.titleResolved(job.jobId, {
      title: metadata.title,
      studio: metadata.studio,
      height: video?.height ?? null,
    });

    let performers: readonly string[] | null = null;
    if (options.includePerformerNames) {
      performers =
        options.scene !== null
          ? manifest.scenes.find((s) => s.sceneNumber === options.scene)?.performers ?? null
          : metadata.performers;
    }
    const outputPath = path.join(
      job.outputDir,
      buildOutputFileName({
        studio: metadata.studio,
        title: metadata.title,
        scene: options.scene,
        targetStream: options.targetStream,
        performers,
        height: video?.height ?? null,
      })
    );
    const workDir = path.join(job.workDir, workDirName(manifest, range, video, options.targetStream));
    const release = await this.claimWorkDir(job.jobId, workDir);
    try {
      return await this.download(job, manifest, { video, range, outputPath, workDir }, enter);
    } finally {
      release();
    }
  }

  /** Waits until no other job of this orchestrator is using `workDir`. */
  private async claimWorkDir(jobId: string, workDir: string): Promise<() => void> {
    const previous = this.workDirQueues.get(workDir);
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = (previous ?? Promise.resolve()).then(() => held);
    this.workDirQueues.set(workDir, tail);

    if (previous) {
      logger.info(`Job ${jobId}: waiting for another job using ${workDir}`);
      await previous;
    }
    return () => {
      release();
      if (this.workDirQueues.get(workDir) === tail) this.workDirQueues.delete(workDir);
    };
  }

  private async download(
    job: DownloadJob,
    manifest: ResolvedManifest,
    target: {
      video: StreamVariant | null;
      range: SegmentRange;
      outputPath: string;
      workDir: string;
    },
    enter: (stage: JobStage) => void
  ): Promise<JobResult> {
    const { options } = job;
    const { metadata } = manifest;
    const { video, range, outputPath, workDir } = target;
    await fs.mkdir(workDir, { recursive: true });
    await fs.mkdir(job.outputDir, { recursive: true });

    const warnings: string[] = [];
    if (options.downloadCovers) {
      const baseName = buildOutputFileName({
        studio: metadata.studio,
        title: metadata.title,
        scene: null,
        targetStream: null,
        performers: null,
        height: null,
      }).replace(/\.mp4$/, "");
      warnings.push(...(await downloadCovers(this.deps.http, metadata.covers, job.outputDir, baseName, options.proxy)));
    }

    // ========== Fetching ==========
    enter("fetching");
    const plans: StreamPlan[] = [];
    if (options.targetStream !== "video") {
      if (!manifest.audioVariant) {
        throw new ManifestError("No playable audio track was found.", "Resolver returned no audio rendition");
      }
      plans.push(buildStreamPlan("audio", manifest.audioVariant, range, workDir));
    }
    if (video) {
      plans.push(buildStreamPlan("video", video, range, workDir));
    }

    const reports = await this.deps.fetcher.fetchAll(job.jobId, plans, {
      threads: options.threads,
      overwrite: options.overwrite,
      validate: options.validateSegments,
      proxy: options.proxyMetadataOnly ? null : options.proxy,
      retries: this.deps.retries,
      retryBaseDelayMs: this.deps.retryBaseDelayMs,
      lastSegmentIndex: manifest.lastSegmentIndex,
    });

    // ========== Assembling ==========
    enter("assembling");
    const assembled = await this.deps.assembler.assemble({
      jobId: job.jobId,
      workDir,
      outputPath,
      cleanup: options.cleanup,
      range,
      streams: reports,
      metadata: options.injectMetadata
        ? { title: metadata.title, chapters: chaptersForRange(manifest.scenes, range, manifest.segmentDuration) }
        : null,
    });
    warnings.push(...assembled.warnings);

    enter("done");
    return {
      jobId: job.jobId,
      locator: job.locator,
      scene: job.scene,
      status: warnings.length > 0 ? "partial_failure" : "success",
      outputPath,
      error: null,
      warnings,
    };
  }
}
