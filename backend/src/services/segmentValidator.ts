import fs from "fs/promises";
import { Readable } from "stream";
import { MIN_SEGMENT_BYTES } from "@scenegrab/shared";
import { ffmpeg } from "./ffmpeg";
import { logger } from "../utils/logger";

export interface SegmentValidator {
  /** Decodes an init segment followed by one data segment. */
  isValidMedia(bytes: Buffer): Promise<boolean>;
}

// ffmpeg reports broken fragments through these lines without failing
const DECODE_ERROR_MARKERS = ["Multiple frames in a packet", "Error"];

export class FfmpegSegmentValidator implements SegmentValidator {
  isValidMedia(bytes: Buffer): Promise<boolean> {
    return new Promise((resolve) => {
      const stderrLines: string[] = [];
      ffmpeg(Readable.from([bytes]))
        .inputFormat("mp4")
        .format("null")
        .on("stderr", (line: string) => {
          stderrLines.push(line);
        })
        .on("end", () => {
          const broken = stderrLines.some((line) => DECODE_ERROR_MARKERS.some((marker) => line.includes(marker)));
          resolve(!broken);
        })
        .on("error", (err: Error) => {
          logger.debug(`ffmpeg rejected media sample: ${err.message}`);
          resolve(false);
        })
        .save("-");
    });
  }
}

export async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() ? stats.size : null;
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Size check always applies; the decode check only when `validator` is given.
 */
export async function isValidSegmentFile(
  segmentPath: string,
  initPath: string | null,
  validator: SegmentValidator | null
): Promise<boolean> {
  const size = await fileSize(segmentPath);
  if (size === null || size < MIN_SEGMENT_BYTES) return false;
  if (!validator || !initPath) return true;
  const [init, data] = await Promise.all([fs.readFile(initPath), fs.readFile(segmentPath)]);
  return validator.isValidMedia(Buffer.concat([init, data]));
}
