import fs from "fs/promises";
import path from "path";
import { MIN_SEGMENT_BYTES, RETRY_BACKOFF_FACTOR } from "@scenegrab/shared";
import { SegmentFetchError, ValidationError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { withRetry } from "../utils/retry";
import type { HttpClient } from "./httpClient";
import { TransportError } from "./httpClient";
import type { SegmentDescriptor, StreamPlan } from "./models";
import type { ProgressReporter, SegmentOutcome } from "./progressReporter";
import { fileSize, isValidSegmentFile } from "./segmentValidator";
import type { SegmentValidator } from "./segmentValidator";
import { PoolCancelledError, WorkerPool } from "./workerPool";

export interface FetchOptions {
  threads: number;
  overwrite: boolean;
  /** Decode-check each data segment against its init segment. */
  validate: boolean;
  /** Proxy for segment requests; null fetches directly. */
  proxy: string | null;
  retries: number;
  retryBaseDelayMs: number;
  /** A 404 on this data index ends the stream instead of failing it. */
  lastSegmentIndex: number;
}

export interface StreamFetchReport {
  plan: StreamPlan;
  /** Data segments present on disk, ascending. */
  segments: SegmentDescriptor[];
  /** The final data segment does not exist upstream. */
  missingTail: boolean;
}

interface FetchTask {
  plan: StreamPlan;
  descriptor: SegmentDescriptor;
}

/** Retryable HTTP status (throttling or server side). */
class TransientStatusError extends Error {
  constructor(public readonly status: number, segmentName: string) {
    super(`${segmentName} returned ${status}`);
    this.name = "TransientStatusError";
  }
}

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

function isRetryable(err: unknown): boolean {
  return err instanceof TransportError || err instanceof TransientStatusError;
}

async function writeAtomically(filePath: string, data: Buffer): Promise<void> {
  const partPath = `${filePath}.part`;
  await fs.writeFile(partPath, data);
  await fs.rename(partPath, filePath);
}

export class SegmentFetcher {
  constructor(
    private readonly http: HttpClient,
    private readonly validator: SegmentValidator,
    private readonly reporter: ProgressReporter
  ) {}

  /**
   * Fetches every segment of the given streams with at most `options.threads`
   * requests in flight. The first fatal error aborts the remaining work and is
   * rethrown.
   */
  async fetchAll(jobId: string, plans: StreamPlan[], options: FetchOptions): Promise<StreamFetchReport[]> {
    const dirs = new Set(plans.flatMap((plan) => [plan.init, ...plan.segments].map((d) => path.dirname(d.path))));
    await Promise.all([...dirs].map((dir) => fs.mkdir(dir, { recursive: true })));

    for (const plan of plans) {
      this.reporter.segmentsPlanned(jobId, plan.streamType, plan.segments.length + 1);
    }

    const controller = new AbortController();
    const outcomes = new Map<SegmentDescriptor, SegmentOutcome>();
    const pool = new WorkerPool<FetchTask, SegmentOutcome>(
      options.threads,
      (task) => this.fetchOne(task, options, controller.signal),
      `segments ${jobId}`
    );

    const runAll = async (tasks: FetchTask[]): Promise<void> => {
      const failures: unknown[] = [];
      await Promise.all(
        tasks.map((task) =>
          pool.submit(task).then(
            (outcome) => {
              outcomes.set(task.descriptor, outcome);
              this.reporter.segmentCompleted(jobId, task.descriptor.streamType, task.descriptor.index, outcome);
            },
            (err: unknown) => {
              if (failures.length > 0 || err instanceof PoolCancelledError) return;
              failures.push(err);
              logger.error(`Job ${jobId}: ${task.descriptor.name} failed, cancelling remaining segments`, {
                error: errorMessage(err),
              });
              controller.abort(err);
              pool.cancelQueued(`job ${jobId} aborted`);
            }
          )
        )
      );
      if (failures.length > 0) throw failures[0];
    };

    // Init segments first: data validation reads them
    await runAll(plans.map((plan) => ({ plan, descriptor: plan.init })));
    await runAll(plans.flatMap((plan) => plan.segments.map((descriptor) => ({ plan, descriptor }))));

    return plans.map((plan) => {
      const present = plan.segments.filter((d) => outcomes.get(d) !== "missing");
      return {
        plan,
        segments: present,
        missingTail: present.length < plan.segments.length,
      };
    });
  }

  private async fetchOne(task: FetchTask, options: FetchOptions, signal: AbortSignal): Promise<SegmentOutcome> {
    const { plan, descriptor } = task;
    const isData = descriptor.kind === "data";
    const validator = options.validate && isData ? this.validator : null;
    const initPath = isData ? plan.init.path : null;

    if (!options.overwrite) {
      if (await isValidSegmentFile(descriptor.path, initPath, validator)) {
        logger.debug(`${descriptor.name} found on disk`);
        return "reused";
      }
      if ((await fileSize(descriptor.path)) !== null) {
        logger.info(`${descriptor.name} on disk failed validation, fetching again`);
      }
    }

    const outcome = await this.download(descriptor, options, signal);
    if (outcome === "missing" || !validator) return outcome;

    if (!(await isValidSegmentFile(descriptor.path, initPath, validator))) {
      logger.info(`${descriptor.name} media error, fetching again`);
      await this.download(descriptor, options, signal);
      if (!(await isValidSegmentFile(descriptor.path, initPath, validator))) {
        throw new ValidationError(descriptor.name, `${descriptor.name} failed decoding twice`);
      }
    }
    return outcome;
  }

  private async download(
    descriptor: SegmentDescriptor,
    options: FetchOptions,
    signal: AbortSignal
  ): Promise<"downloaded" | "missing"> {
    const maxAttempts = options.retries + 1;
    try {
      return await withRetry(
        async () => {
          const res = await this.http.get(descriptor.url, { proxy: options.proxy, signal });
          if (res.ok) {
            if (res.body.length < MIN_SEGMENT_BYTES) {
              throw new TransientStatusError(res.status, `${descriptor.name} (empty body)`);
            }
            await writeAtomically(descriptor.path, res.body);
            logger.debug(`${descriptor.name} saved to disk`);
            return "downloaded" as const;
          }
          if (res.status === 404 && descriptor.kind === "data" && descriptor.index === options.lastSegmentIndex) {
            // The segment count is rounded up from the duration, so the last one may not exist
            logger.debug(`${descriptor.name} is past the end of the stream, skipping`);
            return "missing" as const;
          }
          if (isTransientStatus(res.status)) {
            throw new TransientStatusError(res.status, descriptor.name);
          }
          throw new SegmentFetchError(
            descriptor.name,
            `Segment ${descriptor.name} was refused (HTTP ${res.status}).`,
            `${descriptor.url} returned ${res.status}`,
            res.status
          );
        },
        {
          maxAttempts,
          baseDelayMs: options.retryBaseDelayMs,
          backoffFactor: RETRY_BACKOFF_FACTOR,
          isRetryable,
          signal,
        }
      );
    } catch (err) {
      if (!signal.aborted && isRetryable(err)) {
        throw new SegmentFetchError(
          descriptor.name,
          `Segment ${descriptor.name} could not be downloaded after ${maxAttempts} attempts.`,
          errorMessage(err),
          err instanceof TransientStatusError ? err.status : null
        );
      }
      throw err;
    }
  }
}

