import path from "path";
import type { StreamType } from "@scenegrab/shared";
import { SEGMENT_LOCAL_EXTENSION } from "@scenegrab/shared";
import { ConfigError } from "../utils/errors";
import type { Chapter } from "./muxer";
import type { SceneBoundary, SegmentDescriptor, SegmentRange, StreamPlan, StreamVariant } from "./models";

export interface RangeRequest {
  scenes: readonly SceneBoundary[];
  scene: number | null;
  /** Seconds added on both sides of the scene. */
  padding: number;
  startSegment: number | null;
  endSegment: number | null;
  segmentDuration: number;
  durationSeconds: number;
  lastSegmentIndex: number;
}

export function sceneRange(
  scenes: readonly SceneBoundary[],
  sceneNumber: number,
  padding: number,
  segmentDuration: number,
  durationSeconds: number
): SegmentRange {
  const scene = scenes.find((s) => s.sceneNumber === sceneNumber);
  if (!scene) {
    throw new ConfigError(
      `Scene ${sceneNumber} not found.`,
      `Scene ${sceneNumber} requested, title has ${scenes.length} scene(s)`
    );
  }
  const startTime = Math.max(0, scene.startTime - padding);
  const endTime = Math.min(durationSeconds, scene.endTime + padding);
  return {
    start: Math.floor(startTime / segmentDuration),
    end: Math.ceil(endTime / segmentDuration),
  };
}

/**
 * Inclusive data segment range for a request. Explicit segment bounds win over
 * the scene-derived ones; the result is clamped to the title.
 */
export function resolveSegmentRange(request: RangeRequest): SegmentRange {
  const fromScene =
    request.scene !== null
      ? sceneRange(request.scenes, request.scene, request.padding, request.segmentDuration, request.durationSeconds)
      : null;

  const clamp = (value: number) => Math.min(Math.max(value, 0), request.lastSegmentIndex);
  const start = clamp(request.startSegment ?? fromScene?.start ?? 0);
  const end = clamp(request.endSegment ?? fromScene?.end ?? request.lastSegmentIndex);

  if (start > end) {
    throw new ConfigError(
      `Start segment ${start} is after end segment ${end}.`,
      `Invalid segment range ${start}-${end}`
    );
  }
  return { start, end };
}

function streamPrefix(streamType: StreamType): string {
  return streamType === "video" ? "v" : "a";
}

function descriptorFor(
  streamType: StreamType,
  variant: StreamVariant,
  index: number,
  workDir: string
): SegmentDescriptor {
  const prefix = streamPrefix(streamType);
  const urls = variant.urls[streamType];
  const name = index < 0 ? `${prefix}i_${variant.id}` : `${prefix}_${variant.id}_${index}`;
  const url = index < 0 ? urls.init : urls.segments[index];
  if (url === undefined) {
    throw new ConfigError(`Segment ${index} is outside the title.`, `No ${streamType} URL for segment ${index}`);
  }
  return Object.freeze({
    streamType,
    kind: index < 0 ? "init" : "data",
    index,
    name,
    url,
    path: path.join(workDir, `${name}${SEGMENT_LOCAL_EXTENSION}`),
  });
}

export function buildStreamPlan(
  streamType: StreamType,
  variant: StreamVariant,
  range: SegmentRange,
  workDir: string
): StreamPlan {
  const segments: SegmentDescriptor[] = [];
  for (let index = range.start; index <= range.end; index++) {
    segments.push(descriptorFor(streamType, variant, index, workDir));
  }
  return Object.freeze({
    streamType,
    variant,
    init: descriptorFor(streamType, variant, -1, workDir),
    segments: Object.freeze(segments),
    artifactPath: path.join(workDir, `${streamPrefix(streamType)}_${variant.id}${SEGMENT_LOCAL_EXTENSION}`),
  });
}

/** One chapter per scene overlapping the range, with times relative to the range start. */
export function chaptersForRange(
  scenes: readonly SceneBoundary[],
  range: SegmentRange,
  segmentDuration: number
): Chapter[] {
  const rangeStart = range.start * segmentDuration;
  const rangeEnd = (range.end + 1) * segmentDuration;
  const chapters: Chapter[] = [];
  for (const scene of scenes) {
    const start = Math.max(scene.startTime, rangeStart);
    const end = Math.min(scene.endTime, rangeEnd);
    if (end <= start) continue;
    const performers = scene.performers.length > 0 ? `: ${scene.performers.join(", ")}` : "";
    chapters.push({
      startMs: Math.round((start - rangeStart) * 1000),
      endMs: Math.round((end - rangeStart) * 1000),
      title: `Scene ${scene.sceneNumber}${performers}`,
    });
  }
  return chapters;
}
