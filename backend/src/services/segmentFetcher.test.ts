import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SegmentFetchError, ValidationError } from "../utils/errors";
import { FakeHttpClient, FakeValidator, RecordingReporter, fakeVariant, response } from "./__fixtures__/fakes";
import { TransportError } from "./httpClient";
import type { SegmentRange, StreamPlan } from "./models";
import { buildStreamPlan } from "./sceneSegmenter";
import type { FetchOptions } from "./segmentFetcher";
import { SegmentFetcher } from "./segmentFetcher";

const variant = fakeVariant("720p", 11);
const url = (n: number) => variant.urls.video.segments[n];

describe("SegmentFetcher", () => {
  let workDir: string;
  let http: FakeHttpClient;
  let validator: FakeValidator;
  let reporter: RecordingReporter;
  let fetcher: SegmentFetcher;

  const options = (overrides: Partial<FetchOptions> = {}): FetchOptions => ({
    threads: 2,
    overwrite: false,
    validate: false,
    proxy: null,
    retries: 2,
    retryBaseDelayMs: 1,
    lastSegmentIndex: 10,
    ...overrides,
  });

  const plan = (range: SegmentRange): StreamPlan => buildStreamPlan("video", variant, range, workDir);

  /** Serves "init" and "seg-<n>" for every URL of the variant's video stream. */
  function serveAll(): void {
    http.on(variant.urls.video.init, response(200, "init"));
    variant.urls.video.segments.forEach((u, n) => http.on(u, response(200, `seg-${n}`)));
  }

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), "fetcher-"));
    http = new FakeHttpClient();
    validator = new FakeValidator();
    reporter = new RecordingReporter();
    fetcher = new SegmentFetcher(http, validator, reporter);
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it("downloads the init segment and every data segment in range", async () => {
    serveAll();
    const [report] = await fetcher.fetchAll("job-1", [plan({ start: 2, end: 4 })], options());

    expect(report.segments.map((s) => s.index)).toEqual([2, 3, 4]);
    expect(report.missingTail).toBe(false);
    expect(await fs.readFile(path.join(workDir, "vi_720p.mp4"), "utf-8")).toBe("init");
    expect(await fs.readFile(path.join(workDir, "v_720p_3.mp4"), "utf-8")).toBe("seg-3");
    expect(http.requests[0].url).toBe(variant.urls.video.init);
    expect(reporter.events[0]).toEqual({ type: "planned", jobId: "job-1", streamType: "video", total: 4 });
    expect(reporter.events.filter((e) => e.type === "segment")).toHaveLength(4);
  });

  it("reuses valid files already on disk", async () => {
    serveAll();
    await fs.writeFile(path.join(workDir, "v_720p_3.mp4"), "seg-3 from an earlier run");

    await fetcher.fetchAll("job-1", [plan({ start: 2, end: 4 })], options());

    expect(http.countFor(url(3))).toBe(0);
    expect(reporter.events).toContainEqual({
      type: "segment",
      jobId: "job-1",
      streamType: "video",
      index: 3,
      outcome: "reused",
    });
  });

  it("fetches again when overwrite is set", async () => {
    serveAll();
    await fs.writeFile(path.join(workDir, "v_720p_3.mp4"), "stale");

    await fetcher.fetchAll("job-1", [plan({ start: 3, end: 3 })], options({ overwrite: true }));

    expect(http.countFor(url(3))).toBe(1);
    expect(await fs.readFile(path.join(workDir, "v_720p_3.mp4"), "utf-8")).toBe("seg-3");
  });

  it("replaces an existing file that fails validation", async () => {
    serveAll();
    await fs.writeFile(path.join(workDir, "vi_720p.mp4"), "init");
    await fs.writeFile(path.join(workDir, "v_720p_3.mp4"), "bad leftovers");

    await fetcher.fetchAll("job-1", [plan({ start: 3, end: 3 })], options({ validate: true }));

    expect(http.countFor(url(3))).toBe(1);
    expect(await fs.readFile(path.join(workDir, "v_720p_3.mp4"), "utf-8")).toBe("seg-3");
  });

  it("routes segment requests through the given proxy", async () => {
    serveAll();
    await fetcher.fetchAll("job-1", [plan({ start: 0, end: 1 })], options({ proxy: "http://proxy.local:8080" }));
    expect(http.requests.map((r) => r.proxy)).toEqual(Array(3).fill("http://proxy.local:8080"));
  });

  it("retries transient failures", async () => {
    serveAll();
    http.on(url(2), (attempt) => (attempt === 1 ? response(503) : response(200, "seg-2")));
    http.on(url(3), (attempt) => (attempt < 3 ? new TransportError("connect ETIMEDOUT", true) : response(200, "seg-3")));

    const [report] = await fetcher.fetchAll("job-1", [plan({ start: 2, end: 3 })], options());

    expect(report.segments).toHaveLength(2);
    expect(http.countFor(url(2))).toBe(2);
    expect(http.countFor(url(3))).toBe(3);
  });

  it("treats an empty body as transient", async () => {
    serveAll();
    http.on(url(2), (attempt) => (attempt === 1 ? response(200, "") : response(200, "seg-2")));

    await fetcher.fetchAll("job-1", [plan({ start: 2, end: 2 })], options());

    expect(http.countFor(url(2))).toBe(2);
  });

  it("gives up after the retry budget", async () => {
    serveAll();
    http.on(url(2), response(502));

    const err = await fetcher.fetchAll("job-1", [plan({ start: 2, end: 2 })], options()).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SegmentFetchError);
    expect(err).toMatchObject({ segmentName: "v_720p_2", httpStatus: 502 });
    expect(http.countFor(url(2))).toBe(3);
  });

  it("stops the job on a fatal status without retrying", async () => {
    serveAll();
    http.on(url(1), response(403));

    const err = await fetcher
      .fetchAll("job-1", [plan({ start: 0, end: 5 })], options({ threads: 1 }))
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SegmentFetchError);
    expect(err).toMatchObject({ httpStatus: 403 });
    expect(http.countFor(url(1))).toBe(1);
    expect(http.countFor(url(5))).toBe(0);
  });

  it("aborts in-flight requests and never starts queued ones after a fatal error", async () => {
    serveAll();
    [0, 1, 2].forEach((n) => http.hold(url(n)));

    const pending = fetcher
      .fetchAll("job-1", [plan({ start: 0, end: 5 })], options({ threads: 3 }))
      .catch((e: unknown) => e);
    await vi.waitFor(() => expect(http.waitingUrls).toHaveLength(3));
    http.release(url(2), response(403));
    const err = await pending;

    expect(err).toBeInstanceOf(SegmentFetchError);
    expect(err).toMatchObject({ httpStatus: 403 });
    expect([...http.aborted].sort()).toEqual([url(0), url(1)].sort());
    expect([3, 4, 5].map((n) => http.countFor(url(n)))).toEqual([0, 0, 0]);
  });

  it("fails on a 404 before the last segment", async () => {
    serveAll();
    http.on(url(4), response(404));

    await expect(fetcher.fetchAll("job-1", [plan({ start: 3, end: 5 })], options())).rejects.toMatchObject({
      httpStatus: 404,
    });
  });

  it("tolerates a missing final segment", async () => {
    serveAll();
    http.on(url(10), response(404));

    const [report] = await fetcher.fetchAll("job-1", [plan({ start: 8, end: 10 })], options());

    expect(report.segments.map((s) => s.index)).toEqual([8, 9]);
    expect(report.missingTail).toBe(true);
    expect(reporter.events).toContainEqual({
      type: "segment",
      jobId: "job-1",
      streamType: "video",
      index: 10,
      outcome: "missing",
    });
  });

  it("fetches a segment once more when it fails decoding", async () => {
    serveAll();
    http.on(url(2), (attempt) => response(200, attempt === 1 ? "bad-2" : "seg-2"));

    await fetcher.fetchAll("job-1", [plan({ start: 2, end: 2 })], options({ validate: true }));

    expect(http.countFor(url(2))).toBe(2);
    expect(validator.checked).toEqual(["initbad-2", "initseg-2"]);
  });

  it("raises a validation error when the second copy is also broken", async () => {
    serveAll();
    http.on(url(2), response(200, "bad-2"));

    await expect(
      fetcher.fetchAll("job-1", [plan({ start: 2, end: 2 })], options({ validate: true }))
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("fetches several streams in one pool", async () => {
    serveAll();
    http.on(variant.urls.audio.init, response(200, "a-init"));
    variant.urls.audio.segments.forEach((u, n) => http.on(u, response(200, `a-${n}`)));
    const audio = buildStreamPlan("audio", variant, { start: 0, end: 1 }, workDir);

    const reports = await fetcher.fetchAll("job-1", [audio, plan({ start: 0, end: 1 })], options({ threads: 3 }));

    expect(reports.map((r) => r.plan.streamType)).toEqual(["audio", "video"]);
    expect(await fs.readFile(path.join(workDir, "a_720p_1.mp4"), "utf-8")).toBe("a-1");
    const urls = http.requests.map((r) => r.url);
    const inits = [variant.urls.audio.init, variant.urls.video.init];
    expect(urls.slice(0, 2).sort()).toEqual([...inits].sort());
    expect(urls.slice(2).some((u) => inits.includes(u))).toBe(false);
  });
});
