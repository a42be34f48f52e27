import fs from "fs-extra";
import path from "path";
import { ENV } from "./env";
import { ingestInput } from "./ingest";
import { planChunks } from "./chunk";
import { analyzeChunks } from "./analyze";
import { normalizeTimeline } from "./normalize";
import { mergeIntervals } from "./merge";
import { assembleHighlights } from "./assemble";
import type { MediaBackend } from "./media";
import { formatTimestamp } from "./timestamps";
import type { HighlightConfig, PipelineResult, RawClipResult } from "./types";
import { setLogFile, closeLogFile, info, error, errorMessage, startStep } from "./log";
import type { InferenceClient, Sleep } from "../inference";

export interface RunPipelineOptions {
  config: HighlightConfig;
  artifactsRoot?: string;
  /** directory for the highlight reel; defaults to the run directory */
  outputDir?: string;
  outputName?: string;
  runId?: string;
  /** also write a JSON log of this run under the run directory */
  logToFile?: boolean;
}

export interface RunPipelineDeps {
  inference: InferenceClient;
  media: MediaBackend;
  sleep?: Sleep;
  now?: () => number;
}

export async function runHighlightPipeline(
  inputPath: string,
  opts: RunPipelineOptions,
  deps: RunPipelineDeps
): Promise<PipelineResult> {
  const { config } = opts;
  const startedAt = new Date().toISOString();
  const ing = await ingestInput(inputPath, {
    artifactsRoot: opts.artifactsRoot ?? ENV.artifactsRoot,
    runId: opts.runId,
  });
  if (opts.logToFile) {
    setLogFile(path.join(ing.runDir, "run.log"));
  }
  const startTs = Date.now();
  try {
    info("run.start", { runId: ing.runId, input: ing.source.path, config });

    const durationSec = Math.floor(await deps.media.probeDuration(ing.source.path));
    const source = { ...ing.source, durationSec };
    const chunks = planChunks(durationSec, config.chunkLengthSec);
    info("run.plan", { durationSec, chunks: chunks.length });

    let results: RawClipResult[];
    try {
      results = await analyzeChunks(
        ing.source.path,
        chunks,
        { workDir: ing.chunksDir, config },
        deps
      );
    } finally {
      await fs.remove(ing.chunksDir);
    }

    const timestamps = normalizeTimeline(results);
    const mergeTimer = startStep("merge", { timestamps: timestamps.length });
    const intervals = mergeIntervals(timestamps, {
      pre: config.prePaddingSec,
      post: config.postPaddingSec,
      mediaDuration: durationSec,
    });
    mergeTimer.end({ intervals: intervals.length });
    info("run.timestamps", {
      timestamps: timestamps.map(formatTimestamp),
      intervals,
    });

    const base = { source, startedAt, chunks, results, timestamps, intervals };
    if (!intervals.length) {
      info("run.no_highlights", { runId: ing.runId, durationMs: Date.now() - startTs });
      return { status: "no_highlights", ...base };
    }

    const outPath = path.resolve(
      opts.outputDir ?? ing.runDir,
      opts.outputName ?? ENV.outputName
    );
    const outputPath = await assembleHighlights(deps.media, ing.source.path, intervals, outPath, {
      workDir: path.join(ing.runDir, "clips"),
    });
    info("run.complete", { runId: ing.runId, outputPath, durationMs: Date.now() - startTs });
    return { status: "completed", ...base, outputPath };
  } catch (e) {
    error("run.failed", {
      runId: ing.runId,
      error: errorMessage(e),
      name: e instanceof Error ? e.name : undefined,
      durationMs: Date.now() - startTs,
    });
    throw e;
  } finally {
    if (opts.logToFile) closeLogFile();
  }
}
