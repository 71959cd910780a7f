import type { JobOptions, StreamType } from "@scenegrab/shared";

export interface TitleLocator {
  url: string;
  origin: string;
  contentType: string;
  titleId: string;
}

export interface SegmentUrls {
  init: string;
  /** Data segment URLs indexed by segment number. */
  segments: readonly string[];
}

/** One rendition of the title; immutable once resolved. */
export interface StreamVariant {
  readonly id: string;
  readonly height: number;
  readonly bandwidth: number | null;
  readonly urls: Readonly<Record<StreamType, SegmentUrls>>;
}

export interface SceneBoundary {
  readonly sceneNumber: number;
  /** Seconds from the start of the title. */
  readonly startTime: number;
  readonly endTime: number;
  readonly performers: readonly string[];
}

export interface TitleMetadata {
  readonly titleId: string;
  readonly studio: string | null;
  readonly title: string;
  readonly durationSeconds: number;
  readonly performers: readonly string[];
  readonly covers: { readonly front: string | null; readonly back: string | null };
}

export interface ResolvedManifest {
  readonly locator: TitleLocator;
  readonly metadata: TitleMetadata;
  /** Sorted by ascending height. */
  readonly ladder: readonly StreamVariant[];
  /** Rendition whose audio track passed the probe; null when audio was not requested. */
  readonly audioVariant: StreamVariant | null;
  readonly scenes: readonly SceneBoundary[];
  /** Seconds per data segment. */
  readonly segmentDuration: number;
  /** Highest data segment index; the final one may not exist upstream. */
  readonly lastSegmentIndex: number;
}

export interface SegmentRange {
  start: number;
  end: number;
}

export type SegmentKind = "init" | "data";

export interface SegmentDescriptor {
  readonly streamType: StreamType;
  readonly kind: SegmentKind;
  /** -1 for init segments. */
  readonly index: number;
  readonly name: string;
  readonly url: string;
  readonly path: string;
}

export interface StreamPlan {
  readonly streamType: StreamType;
  readonly variant: StreamVariant;
  readonly init: SegmentDescriptor;
  readonly segments: readonly SegmentDescriptor[];
  /** Concatenated artifact for this stream. */
  readonly artifactPath: string;
}

export interface DownloadJob {
  readonly jobId: string;
  readonly locator: string;
  readonly scene: number | null;
  readonly outputDir: string;
  readonly workDir: string;
  readonly options: Readonly<JobOptions>;
}
