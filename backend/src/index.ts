import { config } from "./config";
import { createApp } from "./app";
import { logger } from "./utils/logger";
import { startCleanupInterval } from "./services/cleanup";
import { JobStoreReporter } from "./services/jobStore";
import { createOrchestrator } from "./services/pipeline";
import { CompositeReporter, LoggerReporter } from "./services/progressReporter";
import { setProcessCallback } from "./services/queueManager";

const orchestrator = createOrchestrator(new CompositeReporter([new LoggerReporter(), new JobStoreReporter()]));

// Connect pipeline to queue
setProcessCallback((job) => orchestrator.run(job));

const cleanupTimer = startCleanupInterval();

const app = createApp();

const server = app.listen(config.port, () => {
  logger.info(`scenegrab backend running on port ${config.port}`);
  logger.info(`Output: ${config.outputDir} | work: ${config.workDir}`);
});

// Graceful shutdown
process.on("SIGTERM", () => {
  logger.info("SIGTERM received, shutting down");
  clearInterval(cleanupTimer);
  server.close(() => process.exit(0));
});
