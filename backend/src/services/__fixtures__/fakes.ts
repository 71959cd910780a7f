import type { JobResult, JobStage, StreamType } from "@scenegrab/shared";
import fs from "fs/promises";
import type { HttpClient, HttpResponse, RequestOptions } from "../httpClient";
import type { StreamVariant } from "../models";
import type { MuxRequest, Muxer } from "../muxer";
import type { ProgressReporter, ResolvedInfo, SegmentOutcome } from "../progressReporter";
import type { SegmentValidator } from "../segmentValidator";

export interface RecordedRequest {
  method: "GET" | "POST";
  url: string;
  proxy: string | null;
  form?: Record<string, string>;
}

type Route = HttpResponse | Error | ((attempt: number) => HttpResponse | Error);

export function response(status: number, body: string | Buffer = "", headers: Record<string, string> = {}): HttpResponse {
  return {
    status,
    ok: status >= 200 && status < 300,
    headers,
    body: typeof body === "string" ? Buffer.from(body) : body,
  };
}

interface HeldRequest {
  url: string;
  settle: (result: HttpResponse | Error) => void;
}

/**
 * In-memory HttpClient; unknown URLs answer 404. Requests to a held URL stay
 * in flight until released or until their signal aborts.
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: RecordedRequest[] = [];
  /** Held URLs whose request was aborted while waiting. */
  readonly aborted: string[] = [];
  private readonly routes = new Map<string, Route>();
  private readonly attempts = new Map<string, number>();
  private readonly heldUrls = new Set<string>();
  private readonly waiting: HeldRequest[] = [];

  on(url: string, route: Route): this {
    this.routes.set(url, route);
    return this;
  }

  hold(url: string): this {
    this.heldUrls.add(url);
    return this;
  }

  /** URLs of the requests currently held in flight. */
  get waitingUrls(): string[] {
    return this.waiting.map((w) => w.url);
  }

  /** Answers the waiting requests for `url`; later requests use its route again. */
  release(url: string, result: HttpResponse | Error): void {
    this.heldUrls.delete(url);
    for (const request of this.waiting.filter((w) => w.url === url)) {
      request.settle(result);
    }
  }

  countFor(url: string): number {
    return this.attempts.get(url) ?? 0;
  }

  async get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    this.requests.push({ method: "GET", url, proxy: options.proxy ?? null });
    return this.answer(url, options);
  }

  async postForm(url: string, form: Record<string, string>, options: RequestOptions = {}): Promise<HttpResponse> {
    this.requests.push({ method: "POST", url, proxy: options.proxy ?? null, form });
    return this.answer(url, options);
  }

  private async answer(url: string, options: RequestOptions): Promise<HttpResponse> {
    if (options.signal?.aborted) throw options.signal.reason;
    const attempt = this.countFor(url) + 1;
    this.attempts.set(url, attempt);

    if (this.heldUrls.has(url)) return this.wait(url, options.signal);

    const route = this.routes.get(url);
    const result = typeof route === "function" ? route(attempt) : route ?? response(404);
    if (result instanceof Error) throw result;
    return result;
  }

  private wait(url: string, signal?: AbortSignal): Promise<HttpResponse> {
    return new Promise<HttpResponse>((resolve, reject) => {
      const done = () => {
        this.waiting.splice(this.waiting.indexOf(request), 1);
        signal?.removeEventListener("abort", onAbort);
      };
      const request: HeldRequest = {
        url,
        settle: (result) => {
          done();
          if (result instanceof Error) reject(result);
          else resolve(result);
        },
      };
      const onAbort = () => {
        done();
        this.aborted.push(url);
        reject(signal?.reason);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiting.push(request);
    });
  }
}

/** Treats any sample containing "bad" as undecodable. */
export class FakeValidator implements SegmentValidator {
  readonly checked: string[] = [];

  async isValidMedia(bytes: Buffer): Promise<boolean> {
    const text = bytes.toString("utf-8");
    this.checked.push(text);
    return !text.includes("bad");
  }
}

export const CDN_BASE = "https://cdn.example.com";

export function fakeVariant(id: string, count: number, height = 720): StreamVariant {
  const urls = (prefix: string) => ({
    init: `${CDN_BASE}/${prefix}i_${id}.mp4d`,
    segments: Array.from({ length: count }, (_, i) => `${CDN_BASE}/${prefix}_${id}_${i}.mp4d`),
  });
  return { id, height, bandwidth: null, urls: { video: urls("v"), audio: urls("a") } };
}

export type ReporterEvent =
  | { type: "stage"; jobId: string; stage: JobStage }
  | { type: "resolved"; jobId: string; info: ResolvedInfo }
  | { type: "planned"; jobId: string; streamType: StreamType; total: number }
  | { type: "segment"; jobId: string; streamType: StreamType; index: number; outcome: SegmentOutcome }
  | { type: "finished"; result: JobResult };

export class RecordingReporter implements ProgressReporter {
  readonly events: ReporterEvent[] = [];

  stageChanged(jobId: string, stage: JobStage): void {
    this.events.push({ type: "stage", jobId, stage });
  }

  titleResolved(jobId: string, info: ResolvedInfo): void {
    this.events.push({ type: "resolved", jobId, info });
  }

  segmentsPlanned(jobId: string, streamType: StreamType, total: number): void {
    this.events.push({ type: "planned", jobId, streamType, total });
  }

  segmentCompleted(jobId: string, streamType: StreamType, index: number, outcome: SegmentOutcome): void {
    this.events.push({ type: "segment", jobId, streamType, index, outcome });
  }

  jobFinished(result: JobResult): void {
    this.events.push({ type: "finished", result });
  }

  stages(): JobStage[] {
    return this.events.flatMap((e) => (e.type === "stage" ? [e.stage] : []));
  }
}

/** Writes "video:<bytes>|audio:<bytes>" as the output. */
export class FakeMuxer implements Muxer {
  readonly requests: MuxRequest[] = [];
  available = true;
  failWith: Error | null = null;

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async mux(request: MuxRequest): Promise<void> {
    this.requests.push(request);
    const read = (p: string | null) => (p ? fs.readFile(p, "utf-8") : Promise.resolve("-"));
    const content = `video:${await read(request.videoPath)}|audio:${await read(request.audioPath)}`;
    await fs.writeFile(request.outputPath, content);
    if (this.failWith) throw this.failWith;
  }
}
