import { ResolutionUnavailableError } from "../utils/errors";

interface Ranked {
  height: number;
  bandwidth: number | null;
}

function compareVariants(a: Ranked, b: Ranked): number {
  if (a.height !== b.height) return a.height - b.height;
  return (a.bandwidth ?? 0) - (b.bandwidth ?? 0);
}

/**
 * Picks a rendition from the ladder.
 *
 * - `requestedHeight === null`: highest available.
 * - `requestedHeight === 0`: lowest available.
 * - otherwise the tallest rendition not above the request. When every
 *   rendition is taller, the lowest one is used.
 *
 * With `force`, only an exact height match is accepted. Among renditions of
 * equal height the highest bandwidth wins.
 */
export function selectVariant<T extends Ranked>(ladder: readonly T[], requestedHeight: number | null, force: boolean): T {
  const sorted = [...ladder].sort(compareVariants);
  const heights = [...new Set(sorted.map((v) => v.height))];
  const lowestHeight = sorted[0]?.height;
  if (lowestHeight === undefined) {
    throw new ResolutionUnavailableError(requestedHeight ?? 0, []);
  }

  if (requestedHeight === null) return sorted[sorted.length - 1];
  if (requestedHeight === 0) {
    return sorted.filter((v) => v.height === lowestHeight).reduce((best, v) => (compareVariants(v, best) > 0 ? v : best));
  }

  if (force) {
    const exact = sorted.filter((v) => v.height === requestedHeight);
    if (exact.length === 0) {
      throw new ResolutionUnavailableError(requestedHeight, heights);
    }
    return exact[exact.length - 1];
  }

  const atOrBelow = sorted.filter((v) => v.height <= requestedHeight);
  if (atOrBelow.length > 0) return atOrBelow[atOrBelow.length - 1];
  return sorted.filter((v) => v.height === lowestHeight).reduce((best, v) => (compareVariants(v, best) > 0 ? v : best));
}
