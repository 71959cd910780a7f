import { describe, expect, it } from "vitest";
import type { JobResult } from "@scenegrab/shared";
import { createDownloadJob } from "./jobOptions";
import { JobStoreReporter, getJob } from "./jobStore";
import type { DownloadJob } from "./models";
import { cancelJob, enqueue, setProcessCallback } from "./queueManager";

const defaults = { threads: 1, proxy: null, proxyMetadataOnly: false, outputDir: "/out", workDir: "/work" };
const download = () => createDownloadJob("https://www.example.com/straight/movies/123/harbor-lights", null, {}, defaults);

describe("queueManager", () => {
  it("runs queued jobs and lets a waiting one be cancelled", async () => {
    const reporter = new JobStoreReporter();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    setProcessCallback(async (job: DownloadJob): Promise<JobResult> => {
      reporter.stageChanged(job.jobId, "resolving");
      await gate;
      const result: JobResult = {
        jobId: job.jobId,
        locator: job.locator,
        scene: job.scene,
        status: "success",
        outputPath: "/out/a.mp4",
        error: null,
        warnings: [],
      };
      reporter.jobFinished(result);
      return result;
    }, 1);

    const first = download();
    const second = download();
    const firstDone = enqueue(first);
    const secondDone = enqueue(second);

    expect(getJob(first.jobId)?.status).toBe("processing");
    expect(getJob(second.jobId)?.status).toBe("queued");
    expect(cancelJob(first.jobId)).toBe(false);
    expect(cancelJob(second.jobId)).toBe(true);
    expect(getJob(second.jobId)?.status).toBe("cancelled");

    release();
    expect((await firstDone)?.status).toBe("success");
    expect(await secondDone).toBeNull();
    expect(getJob(first.jobId)?.status).toBe("complete");
  });
});
