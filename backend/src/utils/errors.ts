export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    public userMessage: string,
    message?: string
  ) {
    super(message || userMessage);
    this.name = "AppError";
  }
}

// === Pipeline errors ===

export class ManifestError extends AppError {
  constructor(userMessage: string, message?: string) {
    super(502, "MANIFEST_ERROR", userMessage, message);
    this.name = "ManifestError";
  }
}

export class ResolutionUnavailableError extends AppError {
  constructor(public requestedHeight: number, public availableHeights: number[]) {
    super(
      422,
      "RESOLUTION_UNAVAILABLE",
      `Resolution ${requestedHeight}p is not available (available: ${availableHeights.join(", ") || "none"}).`
    );
    this.name = "ResolutionUnavailableError";
  }
}

export class ConfigError extends AppError {
  constructor(userMessage: string, message?: string) {
    super(400, "CONFIG_ERROR", userMessage, message);
    this.name = "ConfigError";
  }
}

export class SegmentFetchError extends AppError {
  constructor(
    public segmentName: string,
    userMessage: string,
    message?: string,
    public httpStatus: number | null = null
  ) {
    super(502, "SEGMENT_FETCH_ERROR", userMessage, message);
    this.name = "SegmentFetchError";
  }
}

export class ValidationError extends AppError {
  constructor(public segmentName: string, message?: string) {
    super(502, "VALIDATION_ERROR", `Segment ${segmentName} failed the integrity check.`, message);
    this.name = "ValidationError";
  }
}

export class AssemblyError extends AppError {
  constructor(userMessage: string, message?: string) {
    super(500, "ASSEMBLY_ERROR", userMessage, message);
    this.name = "AssemblyError";
  }
}

// === HTTP surface errors ===

export class NotFoundError extends AppError {
  constructor(userMessage: string, message?: string) {
    super(404, "NOT_FOUND", userMessage, message);
    this.name = "NotFoundError";
  }
}

export class ConflictError extends AppError {
  constructor(userMessage: string, message?: string) {
    super(409, "CONFLICT", userMessage, message);
    this.name = "ConflictError";
  }
}

export class QueueFullError extends AppError {
  constructor(limit: number) {
    super(
      503,
      "QUEUE_FULL",
      `Queue is full (${limit} jobs max). Wait for some to finish before adding more.`
    );
    this.name = "QueueFullError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
