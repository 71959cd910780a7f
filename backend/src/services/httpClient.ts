import { fetch, ProxyAgent } from "undici";
import { USER_AGENT } from "@scenegrab/shared";

export interface HttpResponse {
  status: number;
  ok: boolean;
  /** Lower-cased header names. */
  headers: Record<string, string>;
  body: Buffer;
}

export interface RequestOptions {
  /** Proxy URL to route this request through. */
  proxy?: string | null;
  signal?: AbortSignal;
}

export interface HttpClient {
  get(url: string, options?: RequestOptions): Promise<HttpResponse>;
  postForm(url: string, form: Record<string, string>, options?: RequestOptions): Promise<HttpResponse>;
}

/** Network-level failure: no HTTP status was received. */
export class TransportError extends Error {
  constructor(message: string, public readonly timedOut: boolean) {
    super(message);
    this.name = "TransportError";
  }
}

interface UndiciHttpClientOptions {
  timeoutMs: number;
  cookies?: Record<string, string>;
}

export class UndiciHttpClient implements HttpClient {
  private readonly proxyAgents = new Map<string, ProxyAgent>();
  private readonly headers: Record<string, string>;

  constructor(private readonly options: UndiciHttpClientOptions) {
    const cookies = options.cookies ?? { ageGated: "", terms: "" };
    this.headers = {
      "user-agent": USER_AGENT,
      cookie: Object.entries(cookies)
        .map(([name, value]) => `${name}=${value}`)
        .join("; "),
    };
  }

  get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.request(url, "GET", undefined, {}, options);
  }

  postForm(url: string, form: Record<string, string>, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.request(
      url,
      "POST",
      new URLSearchParams(form).toString(),
      { "content-type": "application/x-www-form-urlencoded" },
      options
    );
  }

  private proxyAgent(proxy: string): ProxyAgent {
    let agent = this.proxyAgents.get(proxy);
    if (!agent) {
      agent = new ProxyAgent(proxy);
      this.proxyAgents.set(proxy, agent);
    }
    return agent;
  }

  private async request(
    url: string,
    method: "GET" | "POST",
    body: string | undefined,
    extraHeaders: Record<string, string>,
    options: RequestOptions
  ): Promise<HttpResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);
    const onAbort = () => controller.abort();
    options.signal?.addEventListener("abort", onAbort, { once: true });

    const proxyAgent = options.proxy ? this.proxyAgent(options.proxy) : null;
    try {
      const res = await fetch(url, {
        method,
        body,
        headers: { ...this.headers, ...extraHeaders },
        signal: controller.signal,
        ...(proxyAgent ? { dispatcher: proxyAgent } : {}),
      });
      const headers: Record<string, string> = {};
      res.headers.forEach((value, name) => {
        headers[name.toLowerCase()] = value;
      });
      return {
        status: res.status,
        ok: res.ok,
        headers,
        body: Buffer.from(await res.arrayBuffer()),
      };
    } catch (err) {
      if (options.signal?.aborted) throw options.signal.reason;
      if (timedOut) {
        throw new TransportError(`${method} ${url} timed out after ${this.options.timeoutMs}ms`, true);
      }
      const cause = err instanceof Error && err.cause instanceof Error ? `: ${err.cause.message}` : "";
      throw new TransportError(`${method} ${url} failed${cause}`, false);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }
}
