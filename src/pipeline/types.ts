export type ISO8601 = string;

/** Whole seconds on some timeline. */
export type Seconds = number;

export interface ChunkWindow {
  /** 1-based, in generation order */
  index: number;
  start: Seconds;
  end: Seconds;
}

export type ClipStatus = "ok" | "upload_failed" | "not_ready" | "analyze_failed";

export interface RawClipResult {
  chunk: ChunkWindow;
  /** Model output, or null when the chunk produced nothing usable. */
  rawText: string | null;
  status: ClipStatus;
}

export interface PaddedInterval {
  start: Seconds;
  end: Seconds;
}

export interface MergedInterval {
  start: Seconds;
  end: Seconds;
}

export interface HighlightConfig {
  chunkLengthSec: number;
  prePaddingSec: number;
  postPaddingSec: number;
  retryAttempts: number;
  retryBackoffSec: number;
  pollIntervalSec: number;
  // 0 waits forever
  pollTimeoutSec: number;
}

export interface SourceMeta {
  path: string;
  container: "mp4" | "mov";
  sizeBytes: number;
  durationSec?: Seconds;
}

export type PipelineStatus = "completed" | "no_highlights";

export interface PipelineResult {
  status: PipelineStatus;
  source: SourceMeta;
  startedAt: ISO8601;
  chunks: ChunkWindow[];
  results: RawClipResult[];
  timestamps: Seconds[];
  intervals: MergedInterval[];
  outputPath?: string;
}
