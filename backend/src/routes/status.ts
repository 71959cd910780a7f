import { Router, Request, Response, NextFunction } from "express";
import type { JobStatusResponse } from "@scenegrab/shared";
import { statusRateLimiter } from "../middleware/rateLimiter";
import { jobIdSchema } from "../middleware/validators";
import { getJob } from "../services/jobStore";
import { NotFoundError } from "../utils/errors";

export const statusRouter = Router();

statusRouter.get(
  "/:jobId",
  statusRateLimiter,
  (req: Request, res: Response<JobStatusResponse>, next: NextFunction): void => {
    try {
      const parsed = jobIdSchema.safeParse(req.params.jobId);
      if (!parsed.success) {
        throw new NotFoundError("Job not found.");
      }

      const job = getJob(parsed.data);
      if (!job) {
        throw new NotFoundError("Job not found. It may have expired.");
      }

      res.json({
        jobId: job.jobId,
        locator: job.locator,
        scene: job.scene,
        status: job.status,
        stage: job.stage,
        segments: job.segments,
        metadata: job.metadata,
        result: job.result,
      });
    } catch (err) {
      next(err);
    }
  }
);
