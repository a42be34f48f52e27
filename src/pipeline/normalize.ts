import type { RawClipResult } from "./types";
import { extractTimestamps } from "./timestamps";

/**
 * Maps each chunk's local timestamps onto the source timeline using the
 * chunk's recorded start. Output keeps per-chunk order, then chunk order;
 * nothing is sorted or deduplicated here.
 */
export function normalizeTimeline(results: readonly RawClipResult[]): number[] {
  const ordered = [...results].sort((a, b) => a.chunk.index - b.chunk.index);
  const global: number[] = [];
  for (const r of ordered) {
    const offset = r.chunk.start;
    for (const t of extractTimestamps(r.rawText)) {
      global.push(offset + t);
    }
  }
  return global;
}
