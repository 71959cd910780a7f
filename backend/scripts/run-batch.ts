#!/usr/bin/env tsx
/**
 * Downloads one title or every entry of a request list, then exits.
 * Run: npm run batch -- <list.txt | title-url> [--scene 2] [--resolution 720] [--workers 3] ...
 */
import fs from "fs/promises";
import type { JobResult } from "@scenegrab/shared";
import { config } from "../src/config";
import { BatchScheduler } from "../src/services/batchScheduler";
import type { JobOptionsInput } from "../src/services/jobOptions";
import { createDownloadJob, jobOptionsInputSchema } from "../src/services/jobOptions";
import { parseLocator } from "../src/services/manifestResolver";
import { createOrchestrator, jobDefaults } from "../src/services/pipeline";
import { LoggerReporter } from "../src/services/progressReporter";
import type { BatchRequest } from "../src/services/requestList";
import { parseRequestList } from "../src/services/requestList";
import { AppError, ConfigError, errorMessage } from "../src/utils/errors";

const USAGE = `Usage: npm run batch -- <list.txt | title-url> [options]
  --scene <n>            download one scene (single URL only)
  --resolution <px>      target height; 0 = lowest, omitted = highest
  --force                fail unless the exact resolution exists
  --padding <s>          seconds added around the scene
  --start <n> --end <n>  explicit segment range
  --threads <n>          parallel segment downloads per title
  --workers <n>          titles downloaded at once
  --proxy <url>          route requests through a proxy
  --proxy-metadata-only  only metadata requests use the proxy
  --audio-only | --video-only
  --overwrite --validate --keep --aggressive
  --no-metadata --performers --covers`;

const args = process.argv.slice(2);

function value(flag: string): string | undefined {
  const i = args.indexOf(flag);
  return i >= 0 ? args[i + 1] : undefined;
}

function numberValue(flag: string): number | undefined {
  const raw = value(flag);
  return raw === undefined ? undefined : Number(raw);
}

const has = (flag: string) => args.includes(flag);

const target = args[0];
if (!target || target.startsWith("--")) {
  console.error(USAGE);
  process.exit(1);
}

const parsedOptions = jobOptionsInputSchema.safeParse({
  resolution: numberValue("--resolution"),
  forceResolution: has("--force"),
  scenePadding: numberValue("--padding"),
  startSegment: numberValue("--start"),
  endSegment: numberValue("--end"),
  threads: numberValue("--threads"),
  proxy: value("--proxy"),
  proxyMetadataOnly: has("--proxy-metadata-only"),
  overwrite: has("--overwrite"),
  keepSegments: has("--keep"),
  aggressiveCleanup: has("--aggressive"),
  validateSegments: has("--validate"),
  targetStream: has("--audio-only") ? "audio" : has("--video-only") ? "video" : undefined,
  noMetadata: has("--no-metadata"),
  includePerformerNames: has("--performers"),
  downloadCovers: has("--covers"),
});
if (!parsedOptions.success) {
  console.error(`Invalid options: ${parsedOptions.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ")}`);
  process.exit(1);
}
const options: JobOptionsInput = parsedOptions.data;

/** Reads and checks every request before any download starts. */
async function loadRequests(): Promise<BatchRequest[]> {
  const scene = numberValue("--scene");
  if (/^https?:\/\//.test(target)) {
    parseLocator(target);
    if (scene !== undefined && (!Number.isInteger(scene) || scene < 1)) {
      throw new ConfigError(`Invalid scene number: ${value("--scene")}`);
    }
    return [{ locator: target, scene: scene ?? null }];
  }
  if (scene !== undefined) {
    throw new ConfigError("--scene only applies to a single URL; put scene numbers in the list as <url>|<scene>.");
  }
  return parseRequestList(await fs.readFile(target, "utf-8"));
}

function describe(result: JobResult): string {
  const scene = result.scene !== null ? ` scene ${result.scene}` : "";
  if (result.status === "failure") {
    return `✗ ${result.locator}${scene}: [${result.error?.stage}] ${result.error?.userMessage}`;
  }
  const warnings = result.warnings.map((w) => `\n    ! ${w}`).join("");
  return `✓ ${result.locator}${scene} → ${result.outputPath}${warnings}`;
}

async function main(): Promise<number> {
  const requests = await loadRequests();
  if (requests.length === 0) {
    console.error("Nothing to download.");
    return 1;
  }

  const jobs = requests.map((r) => createDownloadJob(r.locator, r.scene, options, jobDefaults));
  const orchestrator = createOrchestrator(new LoggerReporter());
  const scheduler = new BatchScheduler((job) => orchestrator.run(job), numberValue("--workers") ?? config.maxConcurrentJobs);

  const report = await scheduler.runAll(jobs);
  console.log("");
  for (const result of report.results) {
    console.log(describe(result));
  }
  return report.succeeded ? 0 : 1;
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(err instanceof AppError ? err.userMessage : errorMessage(err));
    process.exit(1);
  }
);
