import { z } from "zod";
import type { StreamType } from "@scenegrab/shared";
import { SEGMENT_REMOTE_EXTENSION } from "@scenegrab/shared";
import { ConfigError, ManifestError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { parseDashManifest } from "./dashManifest";
import type { DashRepresentation } from "./dashManifest";
import type { HttpClient, HttpResponse } from "./httpClient";
import type { ResolvedManifest, SceneBoundary, StreamVariant, TitleLocator, TitleMetadata } from "./models";
import type { SegmentValidator } from "./segmentValidator";
import { parseSceneIndex, parseTitlePage } from "./titlePage";
import type { SceneTiming, TitlePageInfo } from "./titlePage";

const deliveryResponseSchema = z.object({
  url: z.string().url(),
});

export interface ResolveOptions {
  /** Probe audio renditions and pick a decodable one. */
  probeAudio: boolean;
  /** Metadata requests always go through the job's proxy, when it has one. */
  proxy: string | null;
  signal?: AbortSignal;
}

export interface ManifestResolverOptions {
  /** Template with {origin}, {contentType} and {titleId} placeholders. */
  sceneIndexUrlTemplate: string;
}

/** Locators look like https://host/<contentType>/movies/<titleId>/<slug>. */
export function parseLocator(locator: string): TitleLocator {
  let url: URL;
  try {
    url = new URL(locator.trim());
  } catch {
    throw new ConfigError(`"${locator}" is not a valid URL.`);
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new ConfigError(`"${locator}" is not an http(s) URL.`);
  }
  const [contentType, section, titleId] = url.pathname.split("/").filter(Boolean);
  if (!contentType || section !== "movies" || !titleId || !/^\d+$/.test(titleId)) {
    throw new ConfigError(
      "This doesn't look like a title URL.",
      `Expected /<contentType>/movies/<titleId>/..., got ${url.pathname}`
    );
  }
  return { url: url.toString(), origin: url.origin, contentType, titleId };
}

function segmentUrls(baseUrl: string, prefix: string, id: string, lastSegmentIndex: number) {
  const segments: string[] = [];
  for (let index = 0; index <= lastSegmentIndex; index++) {
    segments.push(`${baseUrl}/${prefix}_${id}_${index}${SEGMENT_REMOTE_EXTENSION}`);
  }
  return Object.freeze({
    init: `${baseUrl}/${prefix}i_${id}${SEGMENT_REMOTE_EXTENSION}`,
    segments: Object.freeze(segments),
  });
}

function toVariant(rep: DashRepresentation, baseUrl: string, lastSegmentIndex: number): StreamVariant {
  const urls: Record<StreamType, ReturnType<typeof segmentUrls>> = {
    video: segmentUrls(baseUrl, "v", rep.id, lastSegmentIndex),
    audio: segmentUrls(baseUrl, "a", rep.id, lastSegmentIndex),
  };
  return Object.freeze({
    id: rep.id,
    height: rep.height,
    bandwidth: rep.bandwidth,
    urls: Object.freeze(urls),
  });
}

export class ManifestResolver {
  constructor(
    private readonly http: HttpClient,
    private readonly validator: SegmentValidator,
    private readonly options: ManifestResolverOptions
  ) {}

  async resolve(locatorString: string, options: ResolveOptions): Promise<ResolvedManifest> {
    const locator = parseLocator(locatorString);
    const { proxy, signal } = options;

    const page = parseTitlePage(
      (await this.fetchRequired(locator.url, "title page", proxy, signal)).body.toString("utf-8"),
      locator.url
    );
    const manifestUrl = await this.fetchManifestUrl(locator, proxy, signal);
    const dash = parseDashManifest((await this.fetchRequired(manifestUrl, "stream manifest", proxy, signal)).body);

    const baseUrl = manifestUrl.slice(0, manifestUrl.lastIndexOf("/"));
    const lastSegmentIndex = Math.ceil(page.durationSeconds / dash.segmentDuration);
    const ladder = Object.freeze(
      dash.videoRepresentations
        .map((rep) => toVariant(rep, baseUrl, lastSegmentIndex))
        .sort((a, b) => a.height - b.height || (a.bandwidth ?? 0) - (b.bandwidth ?? 0))
    );
    logger.info(`Available video renditions for ${locator.titleId}: ${ladder.map((v) => v.height).join(" ")}`);

    const scenes = await this.fetchScenes(locator, page, proxy, signal);
    const audioVariant = options.probeAudio ? await this.probeAudio(ladder, lastSegmentIndex, proxy, signal) : null;

    const metadata: TitleMetadata = Object.freeze({
      titleId: locator.titleId,
      studio: page.studio,
      title: page.title,
      durationSeconds: page.durationSeconds,
      performers: Object.freeze([...page.performers]),
      covers: Object.freeze({ ...page.covers }),
    });

    return Object.freeze({
      locator,
      metadata,
      ladder,
      audioVariant,
      scenes,
      segmentDuration: dash.segmentDuration,
      lastSegmentIndex,
    });
  }

  private async fetchRequired(url: string, what: string, proxy: string | null, signal?: AbortSignal): Promise<HttpResponse> {
    let res: HttpResponse;
    try {
      res = await this.http.get(url, { proxy, signal });
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new ManifestError(`Could not reach the ${what}.`, `${url}: ${errorMessage(err)}`);
    }
    if (res.status === 404 || res.status === 410) {
      throw new ManifestError("This title is unavailable.", `${what} ${url} returned ${res.status}`);
    }
    if (!res.ok) {
      throw new ManifestError(`Could not load the ${what}.`, `${what} ${url} returned ${res.status}`);
    }
    return res;
  }

  private async fetchManifestUrl(locator: TitleLocator, proxy: string | null, signal?: AbortSignal): Promise<string> {
    const deliverUrl = `${locator.origin}/${locator.contentType}/deliver`;
    let res: HttpResponse;
    try {
      res = await this.http.postForm(
        deliverUrl,
        { movieId: locator.titleId, isPreview: "true", format: "DASH" },
        { proxy, signal }
      );
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new ManifestError("Could not reach the delivery service.", `${deliverUrl}: ${errorMessage(err)}`);
    }
    if (!res.ok) {
      throw new ManifestError("The delivery service refused this title.", `${deliverUrl} returned ${res.status}`);
    }

    let body: unknown;
    try {
      body = JSON.parse(res.body.toString("utf-8"));
    } catch {
      throw new ManifestError("The delivery service sent an unreadable response.", "Delivery response is not JSON");
    }
    const parsed = deliveryResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ManifestError("The delivery service sent no manifest.", parsed.error.message);
    }
    logger.debug(`Manifest URL for ${locator.titleId}: ${parsed.data.url}`);
    return parsed.data.url;
  }

  private async fetchScenes(
    locator: TitleLocator,
    page: TitlePageInfo,
    proxy: string | null,
    signal?: AbortSignal
  ): Promise<SceneBoundary[]> {
    const url = this.options.sceneIndexUrlTemplate
      .replace("{origin}", locator.origin)
      .replace("{contentType}", locator.contentType)
      .replace("{titleId}", locator.titleId);

    let timings: SceneTiming[];
    try {
      const res = await this.http.get(url, { proxy, signal });
      if (!res.ok) {
        logger.warn(`Scene index ${url} returned ${res.status}; continuing without scenes`);
        return [];
      }
      timings = parseSceneIndex(res.body.toString("utf-8"));
    } catch (err) {
      if (signal?.aborted) throw err;
      logger.warn(`Scene index unavailable for ${locator.titleId}: ${errorMessage(err)}`);
      return [];
    }

    return timings.map((timing) =>
      Object.freeze({
        sceneNumber: timing.sceneNumber,
        startTime: timing.startTime,
        endTime: timing.startTime + timing.duration,
        performers: Object.freeze([...(page.scenePerformers[timing.sceneNumber - 1] ?? [])]),
      })
    );
  }

  /** Some audio renditions are corrupt; take the best one whose sample decodes. */
  private async probeAudio(
    ladder: readonly StreamVariant[],
    lastSegmentIndex: number,
    proxy: string | null,
    signal?: AbortSignal
  ): Promise<StreamVariant> {
    const sampleIndex = Math.floor(lastSegmentIndex / 2);
    for (const variant of [...ladder].reverse()) {
      const urls = variant.urls.audio;
      try {
        const [init, sample] = await Promise.all([
          this.http.get(urls.init, { proxy, signal }),
          this.http.get(urls.segments[sampleIndex], { proxy, signal }),
        ]);
        if (init.ok && sample.ok && (await this.validator.isValidMedia(Buffer.concat([init.body, sample.body])))) {
          return variant;
        }
      } catch (err) {
        if (signal?.aborted) throw err;
        logger.debug(`Audio probe for rendition ${variant.id} failed: ${errorMessage(err)}`);
      }
      logger.debug(`Skipping a bad audio rendition (${variant.id})`);
    }
    throw new ManifestError("No playable audio track was found.", "Every audio rendition failed the probe");
  }
}
