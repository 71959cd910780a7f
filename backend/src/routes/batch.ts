import { Router, Request, Response, NextFunction } from "express";
import type { BatchResponse } from "@scenegrab/shared";
import { config } from "../config";
import { processRateLimiter } from "../middleware/rateLimiter";
import { batchRequestSchema, describeIssues } from "../middleware/validators";
import { createDownloadJob } from "../services/jobOptions";
import { getJob } from "../services/jobStore";
import { parseLocator } from "../services/manifestResolver";
import { jobDefaults } from "../services/pipeline";
import { canEnqueue, enqueue } from "../services/queueManager";
import type { BatchRequest } from "../services/requestList";
import { parseRequestList } from "../services/requestList";
import { ConfigError, QueueFullError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";

export const batchRouter = Router();

batchRouter.post(
  "/",
  processRateLimiter,
  (req: Request, res: Response<BatchResponse>, next: NextFunction): void => {
    try {
      const parsed = batchRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ConfigError("This batch request is not valid.", describeIssues(parsed.error));
      }

      const { list, items, options } = parsed.data;
      const requests: BatchRequest[] = [
        ...(list !== undefined ? parseRequestList(list) : []),
        ...(items ?? []).map((item) => ({ locator: item.locator, scene: item.scene ?? null })),
      ];
      if (requests.length === 0) {
        throw new ConfigError("The batch contains no requests.");
      }
      if (!canEnqueue(requests.length)) {
        throw new QueueFullError(config.maxQueueSize);
      }

      // Validate everything before queueing anything
      const jobs = requests.map((request) => {
        parseLocator(request.locator);
        return createDownloadJob(request.locator, request.scene, options ?? {}, jobDefaults);
      });

      logger.info(`Batch of ${jobs.length} downloads requested`);
      for (const job of jobs) {
        enqueue(job).catch((err: unknown) => {
          logger.error(`Unhandled pipeline error for job ${job.jobId}`, { error: errorMessage(err) });
        });
      }

      res.status(200).json({
        jobs: jobs.map((job) => ({ jobId: job.jobId, status: getJob(job.jobId)?.status ?? "queued" })),
      });
    } catch (err) {
      next(err);
    }
  }
);
