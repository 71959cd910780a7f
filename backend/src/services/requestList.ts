import { LIST_COMMENT_PREFIX, LIST_SCENE_SEPARATOR } from "@scenegrab/shared";
import { AppError, ConfigError } from "../utils/errors";
import { parseLocator } from "./manifestResolver";

export interface BatchRequest {
  locator: string;
  scene: number | null;
}

/**
 * One request per line: `<url>` or `<url>|<scene>`. Blank lines and lines
 * starting with `#` are skipped. Every URL must be a title URL.
 */
export function parseRequestList(text: string): BatchRequest[] {
  const requests: BatchRequest[] = [];
  text.split(/\r?\n/).forEach((raw, i) => {
    const line = raw.trim();
    if (!line || line.startsWith(LIST_COMMENT_PREFIX)) return;

    const parts = line.split(LIST_SCENE_SEPARATOR).map((p) => p.trim());
    if (parts.length > 2 || !parts[0]) {
      throw new ConfigError(`Line ${i + 1} of the request list is malformed: "${line}"`);
    }
    try {
      parseLocator(parts[0]);
    } catch (err) {
      if (!(err instanceof AppError)) throw err;
      throw new ConfigError(`Line ${i + 1} of the request list is not a title URL: "${parts[0]}"`);
    }
    let scene: number | null = null;
    if (parts.length === 2) {
      if (!/^\d+$/.test(parts[1]) || Number(parts[1]) < 1) {
        throw new ConfigError(`Line ${i + 1} has an invalid scene number: "${parts[1]}"`);
      }
      scene = Number(parts[1]);
    }
    requests.push({ locator: parts[0], scene });
  });
  return requests;
}
