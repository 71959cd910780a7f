import express from "express";
import { API_ENDPOINTS } from "@scenegrab/shared";
import { errorHandler } from "./middleware/errorHandler";
import { requestLogger } from "./middleware/requestLogger";
import { batchRouter } from "./routes/batch";
import { healthRouter } from "./routes/health";
import { jobRouter } from "./routes/job";
import { processRouter } from "./routes/process";
import { statusRouter } from "./routes/status";

export function createApp(): express.Express {
  const app = express();

  app.use(express.json({ limit: "1mb" }));
  app.use(requestLogger);

  app.use(API_ENDPOINTS.HEALTH, healthRouter);
  app.use(API_ENDPOINTS.PROCESS, processRouter);
  app.use(API_ENDPOINTS.BATCH, batchRouter);
  app.use(API_ENDPOINTS.STATUS, statusRouter);
  app.use(API_ENDPOINTS.JOB, jobRouter);

  // Error handler (must be last)
  app.use(errorHandler);
  return app;
}
