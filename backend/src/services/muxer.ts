import fs from "fs/promises";
import { ffmpeg, isFfmpegAvailable } from "./ffmpeg";
import { AssemblyError } from "../utils/errors";
import { logger } from "../utils/logger";

export interface Chapter {
  startMs: number;
  endMs: number;
  title: string;
}

export interface MuxMetadata {
  title: string;
  chapters: Chapter[];
}

export interface MuxRequest {
  videoPath: string | null;
  audioPath: string | null;
  outputPath: string;
  metadata: MuxMetadata | null;
  /** Where the ffmetadata file is written when metadata is present. */
  metadataPath: string;
}

export interface Muxer {
  isAvailable(): Promise<boolean>;
  mux(request: MuxRequest): Promise<void>;
}

function escapeMetadataValue(value: string): string {
  return value.replace(/[=;#\\\n]/g, (ch) => `\\${ch}`);
}

export function buildFfmetadata(metadata: MuxMetadata): string {
  let content = ";FFMETADATA1\n";
  content += `title=${escapeMetadataValue(metadata.title)}\n`;
  for (const chapter of metadata.chapters) {
    content += "\n[CHAPTER]\nTIMEBASE=1/1000\n";
    content += `START=${chapter.startMs}\nEND=${chapter.endMs}\n`;
    content += `title=${escapeMetadataValue(chapter.title)}\n`;
  }
  return content;
}

export class FfmpegMuxer implements Muxer {
  isAvailable(): Promise<boolean> {
    return isFfmpegAvailable();
  }

  async mux(request: MuxRequest): Promise<void> {
    const inputs = [request.videoPath, request.audioPath].filter((p): p is string => p !== null);
    if (inputs.length === 0) {
      throw new AssemblyError("Nothing to mux.", "mux called without audio or video input");
    }

    const command = ffmpeg();
    const outputOptions: string[] = [];
    inputs.forEach((input, i) => {
      command.input(input);
      outputOptions.push("-map", String(i));
    });

    if (request.metadata) {
      await fs.writeFile(request.metadataPath, buildFfmetadata(request.metadata), "utf-8");
      command.input(request.metadataPath).inputFormat("ffmetadata");
      outputOptions.push("-map_metadata", String(inputs.length));
    }
    outputOptions.push("-c", "copy");

    try {
      await new Promise<void>((resolve, reject) => {
        command
          .outputOptions(outputOptions)
          .format("mp4")
          .on("start", (cmd: string) => {
            logger.debug(`ffmpeg mux command: ${cmd}`);
          })
          .on("end", () => resolve())
          .on("error", (err: Error, _stdout: string | null, stderr: string | null) => {
            reject(new AssemblyError("Muxing the streams failed.", `ffmpeg: ${err.message} ${stderr ?? ""}`.trim()));
          })
          .save(request.outputPath);
      });
    } finally {
      if (request.metadata) {
        await fs.rm(request.metadataPath, { force: true });
      }
    }
  }
}
