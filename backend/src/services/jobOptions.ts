import crypto from "crypto";
import path from "path";
import { z } from "zod";
import type { CleanupPolicy, JobOptions } from "@scenegrab/shared";
import { MAX_SEGMENT_THREADS } from "@scenegrab/shared";
import { ConfigError } from "../utils/errors";
import type { DownloadJob } from "./models";

export const jobOptionsInputSchema = z
  .object({
    resolution: z.number().int().min(0).nullable().optional(),
    forceResolution: z.boolean().optional(),
    scene: z.number().int().positive().nullable().optional(),
    scenePadding: z.number().min(0).optional(),
    startSegment: z.number().int().min(0).nullable().optional(),
    endSegment: z.number().int().min(0).nullable().optional(),
    threads: z.number().int().min(1).max(MAX_SEGMENT_THREADS).optional(),
    proxy: z.string().url().nullable().optional(),
    proxyMetadataOnly: z.boolean().optional(),
    overwrite: z.boolean().optional(),
    keepSegments: z.boolean().optional(),
    aggressiveCleanup: z.boolean().optional(),
    validateSegments: z.boolean().optional(),
    targetStream: z.enum(["audio", "video"]).nullable().optional(),
    noMetadata: z.boolean().optional(),
    includePerformerNames: z.boolean().optional(),
    downloadCovers: z.boolean().optional(),
  })
  .strict();

export type JobOptionsInput = z.infer<typeof jobOptionsInputSchema>;

export interface JobDefaults {
  threads: number;
  proxy: string | null;
  proxyMetadataOnly: boolean;
  outputDir: string;
  workDir: string;
}

function cleanupPolicy(input: JobOptionsInput): CleanupPolicy {
  if (input.keepSegments && input.aggressiveCleanup) {
    throw new ConfigError("Keeping segments and aggressive cleanup cannot be combined.");
  }
  if (input.keepSegments) return "keep";
  if (input.aggressiveCleanup) return "aggressive";
  return "standard";
}

export function toJobOptions(input: JobOptionsInput, defaults: JobDefaults): JobOptions {
  const startSegment = input.startSegment ?? null;
  const endSegment = input.endSegment ?? null;
  if (startSegment !== null && endSegment !== null && startSegment > endSegment) {
    throw new ConfigError(`Start segment ${startSegment} is after end segment ${endSegment}.`);
  }
  const proxy = input.proxy === undefined ? defaults.proxy : input.proxy;

  return Object.freeze({
    targetHeight: input.resolution ?? null,
    forceResolution: input.forceResolution ?? false,
    scene: input.scene ?? null,
    scenePadding: input.scenePadding ?? 0,
    startSegment,
    endSegment,
    threads: input.threads ?? defaults.threads,
    proxy,
    proxyMetadataOnly: proxy !== null && (input.proxyMetadataOnly ?? defaults.proxyMetadataOnly),
    overwrite: input.overwrite ?? false,
    cleanup: cleanupPolicy(input),
    validateSegments: input.validateSegments ?? false,
    targetStream: input.targetStream ?? null,
    injectMetadata: !(input.noMetadata ?? false),
    includePerformerNames: input.includePerformerNames ?? false,
    downloadCovers: input.downloadCovers ?? false,
  });
}

export function createDownloadJob(
  locator: string,
  scene: number | null,
  input: JobOptionsInput,
  defaults: JobDefaults
): DownloadJob {
  const options = toJobOptions({ ...input, scene: scene ?? input.scene ?? null }, defaults);
  return Object.freeze({
    jobId: crypto.randomUUID(),
    locator: locator.trim(),
    scene: options.scene,
    outputDir: path.resolve(defaults.outputDir),
    workDir: path.resolve(defaults.workDir),
    options,
  });
}
