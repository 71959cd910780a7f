import type { Job, JobResult, JobStage, JobStatus, StreamType } from "@scenegrab/shared";
import { JOB_EXPIRY_MS } from "@scenegrab/shared";
import { logger } from "../utils/logger";
import type { DownloadJob } from "./models";
import type { ProgressReporter, ResolvedInfo, SegmentOutcome } from "./progressReporter";

const jobs = new Map<string, Job>();

export function createJob(download: DownloadJob): Job {
  const job: Job = {
    jobId: download.jobId,
    locator: download.locator,
    scene: download.scene,
    status: "queued",
    stage: "pending",
    segments: { audio: null, video: null },
    metadata: null,
    result: null,
    createdAt: Date.now(),
    completedAt: null,
  };

  jobs.set(job.jobId, job);
  logger.info(`Job created: ${job.jobId}`, { locator: job.locator, scene: job.scene });
  return job;
}

export function getJob(jobId: string): Job | undefined {
  return jobs.get(jobId);
}

export function updateJobStatus(jobId: string, status: JobStatus): void {
  const job = jobs.get(jobId);
  if (!job) return;
  job.status = status;
  if (status === "complete" || status === "error" || status === "cancelled") {
    job.completedAt = Date.now();
  }
  logger.debug(`Job ${jobId} status → ${status}`);
}

export function updateJobStage(jobId: string, stage: JobStage): void {
  const job = jobs.get(jobId);
  if (!job) return;
  job.stage = stage;
  if (stage !== "pending" && job.status === "queued") {
    job.status = "processing";
  }
}

export function setJobMetadata(jobId: string, metadata: NonNullable<Job["metadata"]>): void {
  const job = jobs.get(jobId);
  if (!job) return;
  job.metadata = metadata;
}

export function setJobResult(jobId: string, result: JobResult): void {
  const job = jobs.get(jobId);
  if (!job) return;
  job.result = result;
  updateJobStatus(jobId, result.status === "failure" ? "error" : "complete");
}

export function deleteJob(jobId: string): boolean {
  return jobs.delete(jobId);
}

export function getActiveJobCount(): number {
  return Array.from(jobs.values()).filter((j) => j.status === "processing").length;
}

export function getQueuedJobCount(): number {
  return Array.from(jobs.values()).filter((j) => j.status === "queued").length;
}

export function cleanExpiredJobs(now = Date.now()): number {
  let cleaned = 0;
  for (const [jobId, job] of jobs) {
    if (
      (job.status === "complete" || job.status === "error" || job.status === "cancelled") &&
      now - job.createdAt > JOB_EXPIRY_MS
    ) {
      jobs.delete(jobId);
      cleaned++;
    }
  }
  if (cleaned > 0) {
    logger.info(`Cleaned ${cleaned} expired jobs`);
  }
  return cleaned;
}

/** Mirrors job progress into the store for the status endpoint. */
export class JobStoreReporter implements ProgressReporter {
  stageChanged(jobId: string, stage: JobStage): void {
    updateJobStage(jobId, stage);
  }

  titleResolved(jobId: string, info: ResolvedInfo): void {
    setJobMetadata(jobId, { ...info });
  }

  segmentsPlanned(jobId: string, streamType: StreamType, total: number): void {
    const job = jobs.get(jobId);
    if (!job) return;
    job.segments[streamType] = { done: 0, total };
  }

  segmentCompleted(jobId: string, streamType: StreamType, _index: number, _outcome: SegmentOutcome): void {
    const progress = jobs.get(jobId)?.segments[streamType];
    if (progress) progress.done++;
  }

  jobFinished(result: JobResult): void {
    setJobResult(result.jobId, result);
  }
}
