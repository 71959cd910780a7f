import { describe, expect, it } from "vitest";
import { JOB_EXPIRY_MS } from "@scenegrab/shared";
import { createDownloadJob } from "./jobOptions";
import { JobStoreReporter, cleanExpiredJobs, createJob, getJob, updateJobStatus } from "./jobStore";

const defaults = { threads: 1, proxy: null, proxyMetadataOnly: false, outputDir: "/out", workDir: "/work" };
const download = (scene: number | null = null) =>
  createDownloadJob("https://www.example.com/straight/movies/123/harbor-lights", scene, {}, defaults);

describe("jobStore", () => {
  it("starts jobs queued with empty progress", () => {
    const job = createJob(download(2));

    expect(getJob(job.jobId)).toMatchObject({
      status: "queued",
      stage: "pending",
      scene: 2,
      segments: { audio: null, video: null },
      result: null,
      completedAt: null,
    });
  });

  it("tracks progress reported by a running job", () => {
    const { jobId } = createJob(download());
    const reporter = new JobStoreReporter();

    reporter.stageChanged(jobId, "resolving");
    reporter.titleResolved(jobId, { title: "Harbor Lights", studio: "Northwind Pictures", height: 720 });
    reporter.segmentsPlanned(jobId, "video", 4);
    reporter.segmentCompleted(jobId, "video", -1, "downloaded");
    reporter.segmentCompleted(jobId, "video", 0, "reused");

    expect(getJob(jobId)).toMatchObject({
      status: "processing",
      stage: "resolving",
      metadata: { title: "Harbor Lights", studio: "Northwind Pictures", height: 720 },
      segments: { audio: null, video: { done: 2, total: 4 } },
    });
  });

  it("records the final result", () => {
    const { jobId } = createJob(download());
    const reporter = new JobStoreReporter();
    const result = {
      jobId,
      locator: "https://www.example.com/straight/movies/123/harbor-lights",
      scene: null,
      status: "failure" as const,
      outputPath: null,
      error: { stage: "fetching" as const, code: "SEGMENT_FETCH_ERROR", message: "x", userMessage: "y" },
      warnings: [],
    };

    reporter.jobFinished(result);

    expect(getJob(jobId)?.status).toBe("error");
    expect(getJob(jobId)?.result).toEqual(result);
    expect(getJob(jobId)?.completedAt).not.toBeNull();
  });

  it("expires finished jobs only", () => {
    const finished = createJob(download());
    const waiting = createJob(download());
    updateJobStatus(finished.jobId, "complete");

    const removed = cleanExpiredJobs(Date.now() + JOB_EXPIRY_MS + 1);

    expect(removed).toBeGreaterThanOrEqual(1);
    expect(getJob(finished.jobId)).toBeUndefined();
    expect(getJob(waiting.jobId)).toBeDefined();
  });
});
