import dotenv from "dotenv";
import path from "path";
import {
  DEFAULT_BATCH_WORKERS,
  DEFAULT_SEGMENT_THREADS,
  MAX_QUEUE_SIZE,
  REQUEST_TIMEOUT_MS,
  RETRY_BASE_DELAY_MS,
  SEGMENT_RETRIES,
} from "@scenegrab/shared";
dotenv.config();

function parseFlag(value: string | undefined): boolean {
  return value === "true" || value === "1";
}

export const config = {
  port: parseInt(process.env.PORT || "3001", 10),
  nodeEnv: process.env.NODE_ENV || "development",
  logLevel: process.env.LOG_LEVEL || "",
  workDir: path.resolve(process.env.WORK_DIR || "./tmp"),
  outputDir: path.resolve(process.env.OUTPUT_DIR || "./downloads"),
  maxConcurrentJobs: parseInt(process.env.MAX_CONCURRENT_JOBS || String(DEFAULT_BATCH_WORKERS), 10),
  segmentThreads: parseInt(process.env.SEGMENT_THREADS || String(DEFAULT_SEGMENT_THREADS), 10),
  maxQueueSize: parseInt(process.env.MAX_QUEUE_SIZE || String(MAX_QUEUE_SIZE), 10),
  proxy: process.env.PROXY_URL || null,
  proxyMetadataOnly: parseFlag(process.env.PROXY_METADATA_ONLY),
  requestTimeoutMs: parseInt(process.env.REQUEST_TIMEOUT_MS || String(REQUEST_TIMEOUT_MS), 10),
  segmentRetries: parseInt(process.env.SEGMENT_RETRIES || String(SEGMENT_RETRIES), 10),
  retryBaseDelayMs: parseInt(process.env.RETRY_BASE_DELAY_MS || String(RETRY_BASE_DELAY_MS), 10),
  // {origin}, {contentType} and {titleId} are substituted per title
  sceneIndexUrlTemplate:
    process.env.SCENE_INDEX_URL_TEMPLATE || "{origin}/{contentType}/movies/{titleId}/scenes",
  ffmpegPath: process.env.FFMPEG_PATH || null,
};
