import type { JobResult } from "@scenegrab/shared";
import { config } from "../config";
import { QueueFullError } from "../utils/errors";
import { logger } from "../utils/logger";
import { BatchScheduler } from "./batchScheduler";
import type { JobRunner } from "./batchScheduler";
import { createJob, getActiveJobCount, getJob, getQueuedJobCount, updateJobStatus } from "./jobStore";
import type { DownloadJob } from "./models";
import { PoolCancelledError } from "./workerPool";

let scheduler: BatchScheduler | null = null;

export function setProcessCallback(runJob: JobRunner, workers = config.maxConcurrentJobs): void {
  scheduler = new BatchScheduler(runJob, workers);
}

function requireScheduler(): BatchScheduler {
  if (!scheduler) {
    throw new Error("Queue used before setProcessCallback()");
  }
  return scheduler;
}

export function canEnqueue(count = 1): boolean {
  return getQueuedJobCount() + getActiveJobCount() + count <= config.maxQueueSize;
}

/** Registers the job and hands it to the scheduler; the returned promise settles when it finishes. */
export function enqueue(job: DownloadJob): Promise<JobResult | null> {
  if (!canEnqueue()) {
    throw new QueueFullError(config.maxQueueSize);
  }
  createJob(job);
  return requireScheduler()
    .submit(job)
    .then(
      (result) => result,
      (err: unknown) => {
        if (err instanceof PoolCancelledError) return null;
        throw err;
      }
    );
}

export function cancelJob(jobId: string): boolean {
  const job = getJob(jobId);
  if (!job || job.status !== "queued") return false;

  if (!requireScheduler().cancel(jobId)) return false;
  updateJobStatus(jobId, "cancelled");
  logger.info(`Job ${jobId} cancelled`);
  return true;
}
