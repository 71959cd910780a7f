// === Job Options ===

export type StreamType = "audio" | "video";

export type CleanupPolicy = "standard" | "aggressive" | "keep";

export interface JobOptions {
  /** Pixel height; `null` selects the highest rendition, `0` the lowest. */
  targetHeight: number | null;
  forceResolution: boolean;
  scene: number | null;
  scenePadding: number;
  startSegment: number | null;
  endSegment: number | null;
  threads: number;
  proxy: string | null;
  proxyMetadataOnly: boolean;
  overwrite: boolean;
  cleanup: CleanupPolicy;
  validateSegments: boolean;
  targetStream: StreamType | null;
  injectMetadata: boolean;
  includePerformerNames: boolean;
  downloadCovers: boolean;
}

// === Job Lifecycle ===

export type JobStatus = "queued" | "processing" | "complete" | "error" | "cancelled";

export type JobStage = "pending" | "resolving" | "fetching" | "assembling" | "done";

export type JobOutcome = "success" | "partial_failure" | "failure";

export interface JobError {
  stage: JobStage;
  code: string;
  message: string;
  userMessage: string;
}

export interface JobResult {
  jobId: string;
  locator: string;
  scene: number | null;
  status: JobOutcome;
  outputPath: string | null;
  error: JobError | null;
  warnings: string[];
}

export interface SegmentProgress {
  audio: { done: number; total: number } | null;
  video: { done: number; total: number } | null;
}

export interface Job {
  jobId: string;
  locator: string;
  scene: number | null;
  status: JobStatus;
  stage: JobStage;
  segments: SegmentProgress;
  metadata: {
    title: string;
    studio: string | null;
    height: number | null;
  } | null;
  result: JobResult | null;
  createdAt: number;
  completedAt: number | null;
}

// === API Request/Response ===

export interface ProcessResponse {
  jobId: string;
  status: JobStatus;
}

export interface BatchResponse {
  jobs: ProcessResponse[];
}

export interface JobStatusResponse {
  jobId: string;
  locator: string;
  scene: number | null;
  status: JobStatus;
  stage: JobStage;
  segments: SegmentProgress;
  metadata: Job["metadata"];
  result: JobResult | null;
}

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    userMessage: string;
  };
}

export interface HealthResponse {
  status: string;
  version: string;
  uptime: number;
  activeJobs: number;
  queuedJobs: number;
}
