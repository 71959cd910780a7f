import type { StreamType } from "@scenegrab/shared";
import { FILENAME_FORBIDDEN_CHARS } from "@scenegrab/shared";

export interface OutputNameParts {
  studio: string | null;
  title: string;
  scene: number | null;
  targetStream: StreamType | null;
  performers: readonly string[] | null;
  height: number | null;
}

export function removeForbiddenChars(text: string): string {
  let cleaned = text;
  for (const ch of FILENAME_FORBIDDEN_CHARS) {
    cleaned = cleaned.split(ch).join("");
  }
  return cleaned.replace(/\s+/g, " ").trim();
}

/** e.g. "[video] Studio - Title Scene 2 Jane Doe 720p.mp4" */
export function buildOutputFileName(parts: OutputNameParts): string {
  const words: string[] = [];
  if (parts.targetStream) words.push(`[${parts.targetStream}]`);
  if (parts.studio) words.push(removeForbiddenChars(parts.studio), "-");
  words.push(removeForbiddenChars(parts.title));
  if (parts.scene !== null) words.push(`Scene ${parts.scene}`);
  if (parts.performers && parts.performers.length > 0) {
    words.push(removeForbiddenChars(parts.performers.join(", ")));
  }
  if (parts.height !== null) words.push(`${parts.height}p`);
  return `${words.filter(Boolean).join(" ")}.mp4`;
}
