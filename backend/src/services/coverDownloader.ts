import fs from "fs/promises";
import path from "path";
import { errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import type { HttpClient } from "./httpClient";
import { fileSize } from "./segmentValidator";

export interface CoverUrls {
  front: string | null;
  back: string | null;
}

/**
 * Saves the front and back covers next to the output, keeping the server's
 * Last-Modified time. Existing files are left alone. Returns one warning per
 * cover that could not be saved.
 */
export async function downloadCovers(
  http: HttpClient,
  covers: CoverUrls,
  outputDir: string,
  baseName: string,
  proxy: string | null
): Promise<string[]> {
  const warnings: string[] = [];
  const sides = [
    ["front", covers.front],
    ["back", covers.back],
  ] as const;

  for (const [side, url] of sides) {
    if (!url) {
      logger.debug(`No ${side} cover listed`);
      continue;
    }
    try {
      const target = path.join(outputDir, `${baseName} ${side}${path.extname(new URL(url).pathname)}`);
      if ((await fileSize(target)) !== null) continue;

      const res = await http.get(url, { proxy });
      if (!res.ok) {
        warnings.push(`${side} cover returned ${res.status}`);
        continue;
      }
      await fs.writeFile(target, res.body);
      const lastModified = res.headers["last-modified"];
      const modified = lastModified ? new Date(lastModified) : null;
      if (modified && !Number.isNaN(modified.getTime())) {
        await fs.utimes(target, new Date(), modified);
      }
      logger.info(`Saved cover: ${target}`);
    } catch (err) {
      warnings.push(`${side} cover failed: ${errorMessage(err)}`);
    }
  }
  return warnings;
}
