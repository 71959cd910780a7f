import type { JobResult } from "@scenegrab/shared";
import { logger } from "../utils/logger";
import { failureResult } from "./jobOrchestrator";
import type { DownloadJob } from "./models";
import { PoolCancelledError, WorkerPool } from "./workerPool";

export type JobRunner = (job: DownloadJob) => Promise<JobResult>;

export interface BatchReport {
  results: JobResult[];
  /** True when no job ended in failure. */
  succeeded: boolean;
}

/**
 * Runs whole jobs with at most `workers` in flight. A job that fails is
 * reported and the batch carries on with the rest.
 */
export class BatchScheduler {
  private readonly pool: WorkerPool<DownloadJob, JobResult>;

  constructor(runJob: JobRunner, workers: number) {
    this.pool = new WorkerPool<DownloadJob, JobResult>(
      workers,
      (job) =>
        runJob(job).catch((err: unknown) => {
          logger.error(`Job ${job.jobId} threw outside the pipeline`, { error: err });
          return failureResult(job, "pending", err);
        }),
      "batch"
    );
  }

  get activeCount(): number {
    return this.pool.activeCount;
  }

  get queuedCount(): number {
    return this.pool.queuedCount;
  }

  /** Resolves with the job's result; rejects with PoolCancelledError if cancelled while queued. */
  submit(job: DownloadJob): Promise<JobResult> {
    return this.pool.submit(job);
  }

  /** Cancels a job that has not started yet. */
  cancel(jobId: string): boolean {
    return this.pool.remove((job) => job.jobId === jobId, `job ${jobId} cancelled`);
  }

  async runAll(jobs: DownloadJob[]): Promise<BatchReport> {
    logger.info(`Batch of ${jobs.length} jobs`);
    const results = await Promise.all(
      jobs.map((job) =>
        this.submit(job).catch((err: unknown) => {
          if (!(err instanceof PoolCancelledError)) throw err;
          return failureResult(job, "pending", err);
        })
      )
    );
    const failed = results.filter((r) => r.status === "failure").length;
    logger.info(`Batch finished: ${results.length - failed} succeeded, ${failed} failed`);
    return { results, succeeded: failed === 0 };
  }
}
