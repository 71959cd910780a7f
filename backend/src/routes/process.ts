import { Router, Request, Response, NextFunction } from "express";
import type { ProcessResponse } from "@scenegrab/shared";
import { processRateLimiter } from "../middleware/rateLimiter";
import { describeIssues, processRequestSchema } from "../middleware/validators";
import { createDownloadJob } from "../services/jobOptions";
import { getJob } from "../services/jobStore";
import { parseLocator } from "../services/manifestResolver";
import { jobDefaults } from "../services/pipeline";
import { enqueue } from "../services/queueManager";
import { ConfigError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";

export const processRouter = Router();

processRouter.post(
  "/",
  processRateLimiter,
  (req: Request, res: Response<ProcessResponse>, next: NextFunction): void => {
    try {
      const parsed = processRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ConfigError("This request is not valid. Check the title URL and options.", describeIssues(parsed.error));
      }

      const { locator, scene, options } = parsed.data;
      parseLocator(locator);
      const job = createDownloadJob(locator, scene ?? null, options ?? {}, jobDefaults);

      logger.info(`Download requested: ${job.locator}`, { jobId: job.jobId, scene: job.scene });
      enqueue(job).catch((err: unknown) => {
        logger.error(`Unhandled pipeline error for job ${job.jobId}`, { error: errorMessage(err) });
      });

      res.status(200).json({
        jobId: job.jobId,
        status: getJob(job.jobId)?.status ?? "queued",
      });
    } catch (err) {
      next(err);
    }
  }
);
