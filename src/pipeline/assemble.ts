import fs from "fs-extra";
import path from "path";
import type { MergedInterval } from "./types";
import type { MediaBackend } from "./media";
import { PipelineError } from "./errors";
import { info, startStep } from "./log";

export interface AssembleOptions {
  /** where per-interval clips are written; defaults to a sibling of outPath */
  workDir?: string;
}

function partialPath(outPath: string): string {
  const ext = path.extname(outPath);
  return path.join(path.dirname(outPath), `${path.basename(outPath, ext)}.partial${ext}`);
}

/**
 * Cuts every interval out of `inputPath` and stitches them, in ascending start
 * order, into `outPath`. Either the full reel lands at `outPath` or nothing does.
 */
export async function assembleHighlights(
  media: MediaBackend,
  inputPath: string,
  intervals: readonly MergedInterval[],
  outPath: string,
  opts: AssembleOptions = {}
): Promise<string> {
  if (!intervals.length) {
    throw new PipelineError("No highlight intervals to assemble", { outPath });
  }
  const ordered = [...intervals].sort((a, b) => a.start - b.start);
  const workDir = opts.workDir ?? path.join(path.dirname(outPath), ".highlight-clips");
  const tmpOut = partialPath(outPath);
  const clips: string[] = [];

  await fs.ensureDir(workDir);
  await fs.ensureDir(path.dirname(outPath));
  const timer = startStep("assemble", { inputPath, intervals: ordered.length });
  try {
    for (const [i, iv] of ordered.entries()) {
      const clipPath = path.join(workDir, `clip_${String(i).padStart(3, "0")}.mp4`);
      clips.push(await media.extractRange(inputPath, iv.start, iv.end, clipPath));
      timer.eta(i + 1, ordered.length);
    }
    await media.concatenate(clips, tmpOut);
    await fs.move(tmpOut, outPath, { overwrite: true });
  } catch (e) {
    await fs.remove(tmpOut);
    throw e;
  } finally {
    await fs.remove(workDir);
  }
  timer.end({ outPath });
  info("assemble.complete", { outPath, clips: clips.length });
  return outPath;
}
