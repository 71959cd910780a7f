import * as cheerio from "cheerio";
import { ManifestError } from "../utils/errors";

export interface TitlePageInfo {
  studio: string | null;
  title: string;
  durationSeconds: number;
  performers: string[];
  /** Performers per scene, in scene order. */
  scenePerformers: string[][];
  covers: { front: string | null; back: string | null };
}

export interface SceneTiming {
  /** 1-based position on the page. */
  sceneNumber: number;
  startTime: number;
  duration: number;
}

const SELECTORS = {
  studio: ".dts-studio-name-wrapper a",
  title: ".dts-section-page-heading-title h1",
  duration: ".section-detail-list-item-duration",
  performers: "section#dtsPanelStarsDetailMovie a[title]",
  scenePerformers: "li.dts-scene-strip-stars",
  coverFront: ".dts-movie-boxcover-front img",
  coverBack: ".dts-movie-boxcover-back img",
  sceneTiming: "div.scroller[data-time-start][data-time-duration]",
} as const;

const DURATION_PATTERN = /^\d+(:\d{1,2}){0,2}$/;

/** Converts "H:MM:SS", "MM:SS" or "SS" to seconds. */
export function durationToSeconds(duration: string): number {
  const trimmed = duration.trim();
  if (!DURATION_PATTERN.test(trimmed)) {
    throw new ManifestError("Title duration is unreadable.", `Bad duration string "${duration}"`);
  }
  return trimmed
    .split(":")
    .map((part) => parseInt(part, 10))
    .reduce((total, part) => total * 60 + part, 0);
}

/** Resolves scheme-relative and root-relative srcs against the page; unusable srcs become null. */
function normalizeCoverUrl(src: string | undefined, pageUrl: string): string | null {
  const trimmed = src?.trim();
  if (!trimmed) return null;
  try {
    const url = new URL(trimmed, pageUrl);
    if (url.protocol !== "https:" && url.protocol !== "http:") return null;
    url.search = "";
    url.hash = "";
    return url.toString();
  } catch {
    return null;
  }
}

export function parseTitlePage(html: string, pageUrl: string): TitlePageInfo {
  const $ = cheerio.load(html);

  const title = $(SELECTORS.title).first().text().trim();
  if (!title) {
    throw new ManifestError("This title is unavailable.", "Title heading missing from title page");
  }

  // The duration list item holds a label and a value; the value is the one shaped like a time
  const durationText = $(SELECTORS.duration)
    .map((_, el) => $(el).text().trim())
    .get()
    .find((text) => DURATION_PATTERN.test(text));
  if (!durationText) {
    throw new ManifestError("Title duration is missing.", "No duration found on title page");
  }

  const studio = $(SELECTORS.studio).first().text().replace(/,/g, "").trim() || null;

  const performers = $(SELECTORS.performers)
    .map((_, el) => ($(el).attr("title") ?? "").trim())
    .get()
    .filter((name) => name.length > 0);

  const scenePerformers = $(SELECTORS.scenePerformers)
    .toArray()
    .map((strip) =>
      $(strip)
        .find("a")
        .map((_, el) => $(el).text().trim())
        .get()
        .filter((name) => name.length > 0)
    );

  return {
    studio,
    title,
    durationSeconds: durationToSeconds(durationText),
    performers,
    scenePerformers,
    covers: {
      front: normalizeCoverUrl($(SELECTORS.coverFront).first().attr("src"), pageUrl),
      back: normalizeCoverUrl($(SELECTORS.coverBack).first().attr("src"), pageUrl),
    },
  };
}

/**
 * Scene timings in page order. An element with unreadable numbers is skipped
 * but still counts toward the numbering of the scenes after it.
 */
export function parseSceneIndex(html: string): SceneTiming[] {
  const $ = cheerio.load(html);
  const timings: SceneTiming[] = [];
  $(SELECTORS.sceneTiming).each((i, el) => {
    const startTime = Number($(el).attr("data-time-start"));
    const duration = Number($(el).attr("data-time-duration"));
    if (Number.isFinite(startTime) && Number.isFinite(duration) && startTime >= 0 && duration >= 0) {
      timings.push({ sceneNumber: i + 1, startTime, duration });
    }
  });
  return timings;
}
