import type { MergedInterval, PaddedInterval } from "./types";
import { InvalidConfigurationError } from "./errors";

export interface MergeOptions {
  /** seconds kept before each event (default 10) */
  pre?: number;
  /** seconds kept after each event (default 10) */
  post?: number;
  mediaDuration: number;
}

export const DEFAULT_PRE_PADDING_SEC = 10;
export const DEFAULT_POST_PADDING_SEC = 10;

export function padTimestamps(
  timestamps: readonly number[],
  pre: number,
  post: number
): PaddedInterval[] {
  return timestamps.map((c) => ({ start: c - pre, end: c + post }));
}

/**
 * Sorts, sweeps and clamps already padded windows. Touching windows
 * (`next.start === acc.end`) merge; windows left empty by clamping are dropped.
 */
export function mergePadded(
  intervals: readonly PaddedInterval[],
  mediaDuration: number
): MergedInterval[] {
  // Array#sort is stable, so equal starts keep arrival order
  const sorted = [...intervals].sort((a, b) => a.start - b.start);

  const swept: PaddedInterval[] = [];
  for (const next of sorted) {
    const acc = swept[swept.length - 1];
    if (acc && next.start <= acc.end) {
      acc.end = Math.max(acc.end, next.end);
    } else {
      swept.push({ start: next.start, end: next.end });
    }
  }

  return swept
    .map((iv) => ({
      start: Math.max(0, iv.start),
      end: Math.min(mediaDuration, iv.end),
    }))
    .filter((iv) => iv.start < iv.end);
}

export function mergeIntervals(
  timestamps: readonly number[],
  opts: MergeOptions
): MergedInterval[] {
  const pre = opts.pre ?? DEFAULT_PRE_PADDING_SEC;
  const post = opts.post ?? DEFAULT_POST_PADDING_SEC;
  if (pre < 0) {
    throw new InvalidConfigurationError("prePaddingSec", `Pre padding must be >= 0, got ${pre}`);
  }
  if (post < 0) {
    throw new InvalidConfigurationError("postPaddingSec", `Post padding must be >= 0, got ${post}`);
  }
  if (!timestamps.length) return [];
  return mergePadded(padTimestamps(timestamps, pre, post), opts.mediaDuration);
}
