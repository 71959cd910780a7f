import { describe, expect, it } from "vitest";
import { buildOutputFileName, removeForbiddenChars } from "./outputNaming";

describe("removeForbiddenChars", () => {
  it("strips characters that break file names", () => {
    expect(removeForbiddenChars('What? Now!: "A/B" <C> | *D* #1\\')).toBe("What Now AB C D 1");
  });
});

describe("buildOutputFileName", () => {
  const base = {
    studio: "Northwind Pictures",
    title: "Harbor Lights",
    scene: null,
    targetStream: null,
    performers: null,
    height: null,
  };

  it("names a full title", () => {
    expect(buildOutputFileName({ ...base, height: 1080 })).toBe("Northwind Pictures - Harbor Lights 1080p.mp4");
  });

  it("adds scene, performers and stream filter", () => {
    expect(
      buildOutputFileName({
        ...base,
        scene: 2,
        targetStream: "video",
        performers: ["Ben Reyes", "Cleo Park"],
        height: 720,
      })
    ).toBe("[video] Northwind Pictures - Harbor Lights Scene 2 Ben Reyes, Cleo Park 720p.mp4");
  });

  it("leaves out a missing studio", () => {
    expect(buildOutputFileName({ ...base, studio: null, title: "Night: Ferry?" })).toBe("Night Ferry.mp4");
  });
});
