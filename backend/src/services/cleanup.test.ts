import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { JOB_EXPIRY_MS } from "@scenegrab/shared";
import { cleanStalePartFiles } from "./cleanup";

describe("cleanStalePartFiles", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "cleanup-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("removes old partial files and leaves the rest", async () => {
    const jobDir = path.join(root, "123_0-10");
    await fs.mkdir(jobDir);
    await fs.writeFile(path.join(jobDir, "v_720p_3.mp4.part"), "x");
    await fs.writeFile(path.join(jobDir, "v_720p_2.mp4"), "x");
    const later = Date.now() + JOB_EXPIRY_MS + 60_000;

    expect(await cleanStalePartFiles(root, later)).toBe(1);
    expect(await fs.readdir(jobDir)).toEqual(["v_720p_2.mp4"]);
  });

  it("keeps fresh partial files", async () => {
    await fs.writeFile(path.join(root, "Harbor Lights.part.mp4"), "x");
    expect(await cleanStalePartFiles(root)).toBe(0);
  });

  it("ignores a missing directory", async () => {
    expect(await cleanStalePartFiles(path.join(root, "nope"))).toBe(0);
  });
});
