import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ENV, resolveConfig } from "../pipeline/env";
import { runHighlightPipeline } from "../pipeline/run";
import { FfmpegMediaBackend } from "../pipeline/media";
import { formatTimestamp } from "../pipeline/timestamps";
import { isLogLevel, setLogLevel } from "../pipeline/log";
import { GeminiClient } from "../inference";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("input", { type: "string", demandOption: true, describe: "Match video (.mp4 or .mov)" })
    .option("out", { type: "string", describe: "Directory for the highlight reel (default: run dir)" })
    .option("name", { type: "string", default: ENV.outputName })
    .option("chunk-sec", { type: "number" })
    .option("pre", { type: "number", describe: "Seconds kept before each goal" })
    .option("post", { type: "number", describe: "Seconds kept after each goal" })
    .option("attempts", { type: "number", describe: "Analyze attempts per chunk" })
    .option("backoff-sec", { type: "number" })
    .option("poll-sec", { type: "number" })
    .option("poll-timeout-sec", { type: "number", describe: "0 waits forever" })
    .option("model", { type: "string", default: ENV.geminiModel })
    .parse();

  if (isLogLevel(ENV.logLevel)) setLogLevel(ENV.logLevel);
  if (!ENV.geminiApiKey) {
    throw new Error("GEMINI_API_KEY is required. Set it in your .env.");
  }

  const config = resolveConfig({
    chunkLengthSec: argv["chunk-sec"],
    prePaddingSec: argv.pre,
    postPaddingSec: argv.post,
    retryAttempts: argv.attempts,
    retryBackoffSec: argv["backoff-sec"],
    pollIntervalSec: argv["poll-sec"],
    pollTimeoutSec: argv["poll-timeout-sec"],
  });

  const result = await runHighlightPipeline(
    argv.input,
    {
      config,
      artifactsRoot: ENV.artifactsRoot,
      outputDir: argv.out,
      outputName: argv.name,
      logToFile: true,
    },
    {
      inference: new GeminiClient({
        apiKey: ENV.geminiApiKey,
        baseUrl: ENV.geminiBaseUrl,
        model: argv.model,
        timeout: ENV.geminiTimeoutMs,
      }),
      media: new FfmpegMediaBackend({ ffmpegBin: ENV.ffmpegBin, ffprobeBin: ENV.ffprobeBin }),
    }
  );

  const failed = result.results.filter((r) => r.status !== "ok");
  console.log(`Chunks analyzed: ${result.chunks.length} (${failed.length} without a usable answer)`);
  console.log("Detected goals:", result.timestamps.map(formatTimestamp).join(", ") || "(none)");
  if (result.status === "no_highlights") {
    console.log("No goals detected; no highlight reel written.");
    return;
  }
  console.log("Highlight windows:");
  for (const iv of result.intervals) {
    console.log(` - ${formatTimestamp(iv.start)} → ${formatTimestamp(iv.end)}`);
  }
  console.log("Highlights:", result.outputPath);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
