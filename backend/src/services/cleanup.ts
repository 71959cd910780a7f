import fs from "fs/promises";
import path from "path";
import { JOB_CLEANUP_INTERVAL_MS, JOB_EXPIRY_MS } from "@scenegrab/shared";
import { config } from "../config";
import { errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { cleanExpiredJobs } from "./jobStore";
import { isMissingFile } from "./segmentValidator";

/** Deletes `.part` files under `dir` untouched for longer than the job expiry. */
export async function cleanStalePartFiles(dir: string, now = Date.now()): Promise<number> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir, { recursive: true });
  } catch (err) {
    if (isMissingFile(err)) return 0;
    throw err;
  }

  let cleaned = 0;
  for (const entry of entries) {
    if (!entry.includes(".part")) continue;
    const filePath = path.join(dir, entry);
    try {
      const stat = await fs.stat(filePath);
      if (stat.isFile() && now - stat.mtimeMs > JOB_EXPIRY_MS) {
        await fs.unlink(filePath);
        cleaned++;
      }
    } catch (err) {
      // Another job may have renamed it in the meantime
      if (!isMissingFile(err)) throw err;
    }
  }

  if (cleaned > 0) {
    logger.info(`Cleaned ${cleaned} stale partial files`);
  }
  return cleaned;
}

export function startCleanupInterval(): NodeJS.Timeout {
  return setInterval(() => {
    cleanExpiredJobs();
    cleanStalePartFiles(config.workDir).catch((err: unknown) => {
      logger.warn("Temp cleanup failed", { error: errorMessage(err) });
    });
  }, JOB_CLEANUP_INTERVAL_MS);
}
