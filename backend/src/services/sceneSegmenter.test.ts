import path from "path";
import { describe, expect, it } from "vitest";
import { ConfigError } from "../utils/errors";
import { fakeVariant as variant } from "./__fixtures__/fakes";
import type { SceneBoundary } from "./models";
import { buildStreamPlan, chaptersForRange, resolveSegmentRange, sceneRange } from "./sceneSegmenter";

const scenes: SceneBoundary[] = [
  { sceneNumber: 1, startTime: 0, endTime: 95, performers: ["Ada Stone"] },
  { sceneNumber: 2, startTime: 95, endTime: 255, performers: [] },
  { sceneNumber: 3, startTime: 255, endTime: 600, performers: ["Ben Reyes", "Cleo Park"] },
];

const base = {
  scenes,
  scene: null,
  padding: 0,
  startSegment: null,
  endSegment: null,
  segmentDuration: 10,
  durationSeconds: 600,
  lastSegmentIndex: 60,
};

describe("sceneRange", () => {
  it("pads the scene and rounds outward to whole segments", () => {
    expect(sceneRange(scenes, 2, 5, 10, 600)).toEqual({ start: 9, end: 26 });
  });

  it("clamps padding to the title", () => {
    expect(sceneRange(scenes, 1, 30, 10, 600)).toEqual({ start: 0, end: 13 });
    expect(sceneRange(scenes, 3, 30, 10, 600)).toEqual({ start: 22, end: 60 });
  });

  it("rejects an unknown scene", () => {
    expect(() => sceneRange(scenes, 4, 0, 10, 600)).toThrow(ConfigError);
  });
});

describe("resolveSegmentRange", () => {
  it("covers the whole title without a scene", () => {
    expect(resolveSegmentRange(base)).toEqual({ start: 0, end: 60 });
  });

  it("uses the scene range", () => {
    expect(resolveSegmentRange({ ...base, scene: 2, padding: 5 })).toEqual({ start: 9, end: 26 });
  });

  it("lets explicit bounds override the scene", () => {
    expect(resolveSegmentRange({ ...base, scene: 2, startSegment: 12 })).toEqual({ start: 12, end: 26 });
    expect(resolveSegmentRange({ ...base, scene: 2, endSegment: 14 })).toEqual({ start: 9, end: 14 });
  });

  it("clamps explicit bounds to the title", () => {
    expect(resolveSegmentRange({ ...base, startSegment: 55, endSegment: 90 })).toEqual({ start: 55, end: 60 });
  });

  it("rejects a start after the end", () => {
    expect(() => resolveSegmentRange({ ...base, startSegment: 30, endSegment: 20 })).toThrow(
      "Invalid segment range 30-20"
    );
    expect(() => resolveSegmentRange({ ...base, scene: 1, startSegment: 40 })).toThrow(ConfigError);
  });
});

describe("buildStreamPlan", () => {
  const workDir = path.join("/work", "123_3-5");

  it("describes the init segment and each data segment in order", () => {
    const plan = buildStreamPlan("video", variant("720p", 11), { start: 3, end: 5 }, workDir);

    expect(plan.init).toEqual({
      streamType: "video",
      kind: "init",
      index: -1,
      name: "vi_720p",
      url: "https://cdn.example.com/vi_720p.mp4d",
      path: path.join(workDir, "vi_720p.mp4"),
    });
    expect(plan.segments.map((s) => [s.index, s.name, s.url])).toEqual([
      [3, "v_720p_3", "https://cdn.example.com/v_720p_3.mp4d"],
      [4, "v_720p_4", "https://cdn.example.com/v_720p_4.mp4d"],
      [5, "v_720p_5", "https://cdn.example.com/v_720p_5.mp4d"],
    ]);
    expect(plan.artifactPath).toBe(path.join(workDir, "v_720p.mp4"));
    expect(Object.isFrozen(plan.segments[0])).toBe(true);
  });

  it("names audio files with the audio prefix", () => {
    const plan = buildStreamPlan("audio", variant("720p", 11), { start: 0, end: 0 }, workDir);
    expect(plan.init.name).toBe("ai_720p");
    expect(plan.segments[0].path).toBe(path.join(workDir, "a_720p_0.mp4"));
  });

  it("rejects indices past the variant's segments", () => {
    expect(() => buildStreamPlan("video", variant("720p", 4), { start: 2, end: 4 }, workDir)).toThrow(ConfigError);
  });
});

describe("chaptersForRange", () => {
  it("labels every scene for the full title", () => {
    expect(chaptersForRange(scenes, { start: 0, end: 59 }, 10)).toEqual([
      { startMs: 0, endMs: 95_000, title: "Scene 1: Ada Stone" },
      { startMs: 95_000, endMs: 255_000, title: "Scene 2" },
      { startMs: 255_000, endMs: 600_000, title: "Scene 3: Ben Reyes, Cleo Park" },
    ]);
  });

  it("shifts and trims chapters to a partial range", () => {
    expect(chaptersForRange(scenes, { start: 9, end: 26 }, 10)).toEqual([
      { startMs: 0, endMs: 5_000, title: "Scene 1: Ada Stone" },
      { startMs: 5_000, endMs: 165_000, title: "Scene 2" },
      { startMs: 165_000, endMs: 180_000, title: "Scene 3: Ben Reyes, Cleo Park" },
    ]);
  });
});
