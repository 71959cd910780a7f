import fs from "fs/promises";
import path from "path";
import type { CleanupPolicy } from "@scenegrab/shared";
import { MIN_SEGMENT_BYTES } from "@scenegrab/shared";
import { AppError, AssemblyError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import type { SegmentDescriptor, SegmentRange } from "./models";
import type { MuxMetadata, Muxer } from "./muxer";
import type { StreamFetchReport } from "./segmentFetcher";
import { fileSize, isMissingFile } from "./segmentValidator";

export interface AssemblyInput {
  jobId: string;
  workDir: string;
  outputPath: string;
  cleanup: CleanupPolicy;
  range: SegmentRange;
  streams: StreamFetchReport[];
  /** null disables title and chapter injection. */
  metadata: MuxMetadata | null;
}

export interface AssemblyOutcome {
  outputPath: string;
  /** Problems after the output was written, such as temp files that could not be removed. */
  warnings: string[];
}

export function tempOutputPath(outputPath: string): string {
  const parsed = path.parse(outputPath);
  return path.join(parsed.dir, `${parsed.name}.part${parsed.ext}`);
}

/** Data indices must run from range.start without holes; only the final one may be absent. */
export function checkContinuity(report: StreamFetchReport, range: SegmentRange): SegmentDescriptor[] {
  const streamType = report.plan.streamType;
  const sorted = [...report.segments].sort((a, b) => a.index - b.index);
  const expectedEnd = report.missingTail ? range.end - 1 : range.end;

  if (sorted.length === 0) {
    throw new AssemblyError(`No ${streamType} segments were downloaded.`, `Empty ${streamType} segment list`);
  }
  sorted.forEach((segment, offset) => {
    if (segment.index !== range.start + offset) {
      throw new AssemblyError(
        `The ${streamType} stream has a gap.`,
        `Expected ${streamType} segment ${range.start + offset}, found ${segment.index}`
      );
    }
  });
  const last = sorted[sorted.length - 1].index;
  if (last !== expectedEnd) {
    throw new AssemblyError(
      `The ${streamType} stream is incomplete.`,
      `${streamType} segments end at ${last}, expected ${expectedEnd}`
    );
  }
  return sorted;
}

async function removeFiles(paths: string[]): Promise<void> {
  await Promise.all(paths.map((p) => fs.rm(p, { force: true })));
}

async function removeDirIfEmpty(dir: string): Promise<void> {
  try {
    const entries = await fs.readdir(dir);
    if (entries.length === 0) await fs.rmdir(dir);
  } catch (err) {
    if (!isMissingFile(err)) throw err;
  }
}

function segmentPaths(report: StreamFetchReport): string[] {
  return [report.plan.init, ...report.plan.segments].map((d) => d.path);
}

export class AssemblyPipeline {
  constructor(private readonly muxer: Muxer) {}

  async assemble(input: AssemblyInput): Promise<AssemblyOutcome> {
    const ordered = input.streams.map((report) => ({ report, segments: checkContinuity(report, input.range) }));

    for (const { report, segments } of ordered) {
      for (const descriptor of [report.plan.init, ...segments]) {
        const size = await fileSize(descriptor.path);
        if (size === null || size < MIN_SEGMENT_BYTES) {
          throw new AssemblyError("A downloaded segment is missing.", `${descriptor.path} missing or empty`);
        }
      }
    }

    await Promise.all(
      ordered.map(async ({ report, segments }) => {
        await this.concatenate(report.plan.init, segments, report.plan.artifactPath);
        if (input.cleanup === "aggressive") {
          await removeFiles(segmentPaths(report));
          logger.debug(`Job ${input.jobId}: removed ${report.plan.streamType} segments after joining`);
        }
      })
    );

    const artifactOf = (type: "audio" | "video") =>
      input.streams.find((r) => r.plan.streamType === type)?.plan.artifactPath ?? null;
    const artifacts = input.streams.map((r) => r.plan.artifactPath);
    const tempPath = tempOutputPath(input.outputPath);

    try {
      await fs.mkdir(path.dirname(input.outputPath), { recursive: true });
      await this.muxer.mux({
        videoPath: artifactOf("video"),
        audioPath: artifactOf("audio"),
        outputPath: tempPath,
        metadata: input.metadata,
        metadataPath: path.join(input.workDir, "metadata.txt"),
      });
      await fs.rename(tempPath, input.outputPath);
    } catch (err) {
      await fs.rm(tempPath, { force: true });
      if (input.cleanup !== "keep") await removeFiles(artifacts);
      logger.error(`Job ${input.jobId}: muxing failed`, { error: errorMessage(err) });
      throw err instanceof AppError ? err : new AssemblyError("Muxing the streams failed.", errorMessage(err));
    }
    logger.info(`Job ${input.jobId}: wrote ${input.outputPath}`);

    const warnings: string[] = [];
    if (input.cleanup !== "keep") {
      try {
        await removeFiles(artifacts);
        if (input.cleanup === "standard") {
          await removeFiles(input.streams.flatMap(segmentPaths));
        }
        await removeDirIfEmpty(input.workDir);
        logger.info(`Job ${input.jobId}: deleted temp files`);
      } catch (err) {
        logger.warn(`Job ${input.jobId}: could not delete temp files`, { error: errorMessage(err) });
        warnings.push(`Temp files in ${input.workDir} were not deleted: ${errorMessage(err)}`);
      }
    }
    return { outputPath: input.outputPath, warnings };
  }

  private async concatenate(init: SegmentDescriptor, segments: SegmentDescriptor[], artifactPath: string): Promise<void> {
    const handle = await fs.open(artifactPath, "w");
    try {
      for (const descriptor of [init, ...segments]) {
        await handle.write(await fs.readFile(descriptor.path));
      }
    } finally {
      await handle.close();
    }
  }
}
