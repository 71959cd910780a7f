import { XMLParser } from "fast-xml-parser";
import { ManifestError } from "../utils/errors";

export interface DashRepresentation {
  id: string;
  height: number;
  bandwidth: number | null;
}

export interface DashManifest {
  /** Seconds per data segment. */
  segmentDuration: number;
  videoRepresentations: DashRepresentation[];
}

const ARRAY_ELEMENTS = new Set(["Period", "AdaptationSet", "Representation"]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  removeNSPrefix: true,
  parseAttributeValue: false,
  isArray: (name) => ARRAY_ELEMENTS.has(name),
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nodes(value: unknown): XmlNode[] {
  return Array.isArray(value) ? value.filter(isNode) : isNode(value) ? [value] : [];
}

function attr(node: XmlNode, name: string): string | undefined {
  const value = node[name];
  return typeof value === "string" ? value : typeof value === "number" ? String(value) : undefined;
}

function positiveNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

function isVideoSet(set: XmlNode): boolean {
  const mimeType = attr(set, "mimeType");
  const contentType = attr(set, "contentType");
  return mimeType === "video/mp4" || contentType === "video";
}

export function parseDashManifest(xml: string | Buffer): DashManifest {
  let root: unknown;
  try {
    root = parser.parse(xml);
  } catch (err) {
    throw new ManifestError("The stream manifest is unreadable.", `Manifest XML parse failed: ${String(err)}`);
  }

  const mpd = isNode(root) ? root.MPD : undefined;
  if (!isNode(mpd)) {
    throw new ManifestError("The stream manifest is unreadable.", "Manifest has no MPD root");
  }

  const videoSets = nodes(mpd.Period)
    .flatMap((period) => nodes(period.AdaptationSet))
    .filter(isVideoSet);

  let segmentDuration: number | null = null;
  const videoRepresentations: DashRepresentation[] = [];

  for (const set of videoSets) {
    const setTemplate = nodes(set.SegmentTemplate)[0];
    for (const rep of nodes(set.Representation)) {
      const template = nodes(rep.SegmentTemplate)[0] ?? setTemplate;
      if (segmentDuration === null && template) {
        const timescale = positiveNumber(attr(template, "timescale")) ?? 1;
        const duration = positiveNumber(attr(template, "duration"));
        segmentDuration = duration === null ? null : duration / timescale;
      }

      const id = attr(rep, "id");
      const height = positiveNumber(attr(rep, "height"));
      // Renditions without an id or height cannot be addressed or ranked
      if (!id || height === null) continue;
      videoRepresentations.push({ id, height, bandwidth: positiveNumber(attr(rep, "bandwidth")) });
    }
  }

  if (segmentDuration === null) {
    throw new ManifestError("The stream manifest is incomplete.", "No video SegmentTemplate with a duration");
  }
  if (videoRepresentations.length === 0) {
    throw new ManifestError("No video renditions are available for this title.", "No usable video Representation");
  }

  return { segmentDuration, videoRepresentations };
}
