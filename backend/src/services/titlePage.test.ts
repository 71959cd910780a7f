import fs from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { ManifestError } from "../utils/errors";
import { durationToSeconds, parseSceneIndex, parseTitlePage } from "./titlePage";

const fixture = (name: string) => fs.readFileSync(path.join(__dirname, "__fixtures__", name), "utf-8");

const PAGE = "https://www.example.com/straight/movies/123/harbor-lights";

describe("durationToSeconds", () => {
  it("accepts H:MM:SS, MM:SS and plain seconds", () => {
    expect(durationToSeconds("1:02:03")).toBe(3723);
    expect(durationToSeconds("12:30")).toBe(750);
    expect(durationToSeconds(" 45 ")).toBe(45);
  });

  it("rejects anything else", () => {
    expect(() => durationToSeconds("about an hour")).toThrow(ManifestError);
  });
});

describe("parseTitlePage", () => {
  it("extracts title metadata", () => {
    const page = parseTitlePage(fixture("title-page.html"), PAGE);

    expect(page.title).toBe("Harbor Lights");
    expect(page.studio).toBe("Northwind Pictures");
    expect(page.durationSeconds).toBe(100);
    expect(page.performers).toEqual(["Ada Stone", "Ben Reyes", "Cleo Park"]);
    expect(page.scenePerformers).toEqual([["Ada Stone"], ["Ben Reyes", "Cleo Park"]]);
  });

  it("normalizes cover URLs", () => {
    const { covers } = parseTitlePage(fixture("title-page.html"), PAGE);
    expect(covers).toEqual({
      front: "https://images.example.com/covers/123h.jpg",
      back: "https://images.example.com/covers/123bh.jpg",
    });
  });

  it("resolves root-relative cover srcs against the page", () => {
    const html =
      '<div class="dts-section-page-heading-title"><h1>Bare</h1></div>' +
      '<span class="section-detail-list-item-duration">5:00</span>' +
      '<div class="dts-movie-boxcover-front"><img src="/covers/123h.jpg?w=300"></div>' +
      '<div class="dts-movie-boxcover-back"><img src="javascript:void(0)"></div>';

    expect(parseTitlePage(html, PAGE).covers).toEqual({
      front: "https://www.example.com/covers/123h.jpg",
      back: null,
    });
  });

  it("fails when the title heading is missing", () => {
    expect(() => parseTitlePage("<html><body></body></html>", PAGE)).toThrow(ManifestError);
  });

  it("fails when no duration is listed", () => {
    const html = '<div class="dts-section-page-heading-title"><h1>Untimed</h1></div>';
    expect(() => parseTitlePage(html, PAGE)).toThrow("No duration found on title page");
  });

  it("leaves optional fields empty", () => {
    const html =
      '<div class="dts-section-page-heading-title"><h1>Bare</h1></div>' +
      '<span class="section-detail-list-item-duration">5:00</span>';
    expect(parseTitlePage(html, PAGE)).toEqual({
      studio: null,
      title: "Bare",
      durationSeconds: 300,
      performers: [],
      scenePerformers: [],
      covers: { front: null, back: null },
    });
  });
});

describe("parseSceneIndex", () => {
  it("reads scene timings and skips unreadable ones", () => {
    expect(parseSceneIndex(fixture("scene-index.html"))).toEqual([
      { sceneNumber: 1, startTime: 0, duration: 40 },
      { sceneNumber: 2, startTime: 40, duration: 60 },
    ]);
  });

  it("keeps page positions as scene numbers around an unreadable element", () => {
    const html = [
      '<div class="scroller" data-time-start="0" data-time-duration="30"></div>',
      '<div class="scroller" data-time-start="" data-time-duration="x"></div>',
      '<div class="scroller" data-time-start="60" data-time-duration="40"></div>',
    ].join("");

    expect(parseSceneIndex(html)).toEqual([
      { sceneNumber: 1, startTime: 0, duration: 30 },
      { sceneNumber: 3, startTime: 60, duration: 40 },
    ]);
  });
});
