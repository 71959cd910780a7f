import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FakeHttpClient, response } from "./__fixtures__/fakes";
import { downloadCovers } from "./coverDownloader";

const FRONT = "https://images.example.com/covers/123h.jpg";
const BACK = "https://images.example.com/covers/123bh.png";

describe("downloadCovers", () => {
  let dir: string;
  let http: FakeHttpClient;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "covers-"));
    http = new FakeHttpClient();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("saves both covers with the extension of their URL", async () => {
    http.on(FRONT, response(200, "front-bytes")).on(BACK, response(200, "back-bytes"));

    const warnings = await downloadCovers(http, { front: FRONT, back: BACK }, dir, "Harbor Lights", null);

    expect(warnings).toEqual([]);
    expect(await fs.readFile(path.join(dir, "Harbor Lights front.jpg"), "utf-8")).toBe("front-bytes");
    expect(await fs.readFile(path.join(dir, "Harbor Lights back.png"), "utf-8")).toBe("back-bytes");
  });

  it("leaves an existing cover alone", async () => {
    await fs.writeFile(path.join(dir, "Harbor Lights front.jpg"), "already here");

    await downloadCovers(http, { front: FRONT, back: null }, dir, "Harbor Lights", null);

    expect(http.countFor(FRONT)).toBe(0);
    expect(await fs.readFile(path.join(dir, "Harbor Lights front.jpg"), "utf-8")).toBe("already here");
  });

  it("turns an unusable URL into a warning and still saves the other cover", async () => {
    http.on(BACK, response(200, "back-bytes"));

    const warnings = await downloadCovers(http, { front: "covers/123h.jpg", back: BACK }, dir, "Harbor Lights", null);

    expect(warnings).toEqual(["front cover failed: Invalid URL"]);
    expect(await fs.readFile(path.join(dir, "Harbor Lights back.png"), "utf-8")).toBe("back-bytes");
  });
});
