// Concurrency limits
export const DEFAULT_BATCH_WORKERS = 3;
export const DEFAULT_SEGMENT_THREADS = 5;
export const MAX_SEGMENT_THREADS = 32;
export const MAX_QUEUE_SIZE = 50;

// Network
export const REQUEST_TIMEOUT_MS = 30 * 1000; // 30 seconds
export const SEGMENT_RETRIES = 3;
export const RETRY_BASE_DELAY_MS = 1000;
export const RETRY_BACKOFF_FACTOR = 2;
export const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/130.0.0.0 Safari/537.36";

// Job retention
export const JOB_EXPIRY_MS = 60 * 60 * 1000; // 1 hour
export const JOB_CLEANUP_INTERVAL_MS = 5 * 60 * 1000; // 5 minutes

// Segments
export const SEGMENT_REMOTE_EXTENSION = ".mp4d";
export const SEGMENT_LOCAL_EXTENSION = ".mp4";
export const MIN_SEGMENT_BYTES = 1;

// Request lists
export const LIST_COMMENT_PREFIX = "#";
export const LIST_SCENE_SEPARATOR = "|";

// Output naming
export const FILENAME_FORBIDDEN_CHARS = ["#", "?", "!", ":", "<", ">", '"', "/", "\\", "|", "*"] as const;

// Rate limiting
export const PROCESS_RATE_LIMIT = 30; // per hour per IP
export const STATUS_RATE_LIMIT = 120; // per minute per IP

// API endpoints
export const API_ENDPOINTS = {
  PROCESS: "/api/process",
  BATCH: "/api/batch",
  STATUS: "/api/status",
  JOB: "/api/job",
  HEALTH: "/api/health",
} as const;
