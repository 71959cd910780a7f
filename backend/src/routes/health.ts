import { Router } from "express";
import type { HealthResponse } from "@scenegrab/shared";
import { config } from "../config";
import { isFfmpegAvailable } from "../services/ffmpeg";
import { getActiveJobCount, getQueuedJobCount } from "../services/jobStore";

const startTime = Date.now();

export const healthRouter = Router();

healthRouter.get("/", (_req, res) => {
  const body: HealthResponse = {
    status: "ok",
    version: "1.0.0",
    uptime: Math.floor((Date.now() - startTime) / 1000),
    activeJobs: getActiveJobCount(),
    queuedJobs: getQueuedJobCount(),
  };
  res.json(body);
});

healthRouter.get("/diag", (_req, res, next) => {
  isFfmpegAvailable()
    .then((ffmpeg) => {
      res.json({
        ffmpeg: ffmpeg ? "available" : "MISSING",
        ffmpegPath: config.ffmpegPath ?? "from PATH",
        workDir: config.workDir,
        outputDir: config.outputDir,
        proxy: config.proxy ? (config.proxyMetadataOnly ? "metadata only" : "all requests") : "none",
        nodeVersion: process.version,
        platform: process.platform,
      });
    })
    .catch(next);
});
