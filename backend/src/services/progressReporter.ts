import type { JobResult, JobStage, StreamType } from "@scenegrab/shared";
import { logger } from "../utils/logger";

export type SegmentOutcome = "downloaded" | "reused" | "missing";

export interface ResolvedInfo {
  title: string;
  studio: string | null;
  height: number | null;
}

/** Receives progress from one job and its segment tasks. */
export interface ProgressReporter {
  stageChanged(jobId: string, stage: JobStage): void;
  titleResolved(jobId: string, info: ResolvedInfo): void;
  segmentsPlanned(jobId: string, streamType: StreamType, total: number): void;
  segmentCompleted(jobId: string, streamType: StreamType, index: number, outcome: SegmentOutcome): void;
  jobFinished(result: JobResult): void;
}

export class LoggerReporter implements ProgressReporter {
  stageChanged(jobId: string, stage: JobStage): void {
    logger.debug(`Job ${jobId} stage → ${stage}`);
  }

  titleResolved(jobId: string, info: ResolvedInfo): void {
    const height = info.height ? ` (${info.height}p)` : "";
    logger.info(`Job ${jobId} resolved "${info.title}"${height}`);
  }

  segmentsPlanned(jobId: string, streamType: StreamType, total: number): void {
    logger.info(`Job ${jobId}: ${total} ${streamType} segments to fetch`);
  }

  segmentCompleted(jobId: string, streamType: StreamType, index: number, outcome: SegmentOutcome): void {
    logger.debug(`Job ${jobId}: ${streamType} segment ${index} ${outcome}`);
  }

  jobFinished(result: JobResult): void {
    if (result.status === "failure") {
      logger.error(`Job ${result.jobId} failed: ${result.error?.message ?? "unknown error"}`);
    } else {
      logger.info(`Job ${result.jobId} finished (${result.status}): ${result.outputPath}`);
    }
  }
}

export class CompositeReporter implements ProgressReporter {
  constructor(private readonly reporters: ProgressReporter[]) {}

  stageChanged(jobId: string, stage: JobStage): void {
    this.reporters.forEach((r) => r.stageChanged(jobId, stage));
  }

  titleResolved(jobId: string, info: ResolvedInfo): void {
    this.reporters.forEach((r) => r.titleResolved(jobId, info));
  }

  segmentsPlanned(jobId: string, streamType: StreamType, total: number): void {
    this.reporters.forEach((r) => r.segmentsPlanned(jobId, streamType, total));
  }

  segmentCompleted(jobId: string, streamType: StreamType, index: number, outcome: SegmentOutcome): void {
    this.reporters.forEach((r) => r.segmentCompleted(jobId, streamType, index, outcome));
  }

  jobFinished(result: JobResult): void {
    this.reporters.forEach((r) => r.jobFinished(result));
  }
}
