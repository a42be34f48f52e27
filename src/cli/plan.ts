import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ENV, resolveConfig } from "../pipeline/env";
import { planChunks } from "../pipeline/chunk";
import { FfmpegMediaBackend } from "../pipeline/media";
import { formatTimestamp, parseDuration } from "../pipeline/timestamps";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("input", { type: "string", describe: "Probe this video for its duration" })
    .option("duration", { type: "string", describe: "Duration as seconds or HH:MM:SS (skips probing)" })
    .option("chunk-sec", { type: "number" })
    .check((a) => {
      if (a.input === undefined && a.duration === undefined) {
        throw new Error("Provide --input or --duration");
      }
      if (a.duration !== undefined && parseDuration(a.duration) === null) {
        throw new Error(`--duration must be seconds or HH:MM:SS, got ${a.duration}`);
      }
      return true;
    })
    .parse();

  const config = resolveConfig({ chunkLengthSec: argv["chunk-sec"] });
  const given = argv.duration !== undefined ? parseDuration(argv.duration) : null;
  let durationSec: number;
  if (given !== null) {
    durationSec = Math.floor(given);
  } else {
    const media = new FfmpegMediaBackend({ ffmpegBin: ENV.ffmpegBin, ffprobeBin: ENV.ffprobeBin });
    durationSec = Math.floor(await media.probeDuration(String(argv.input)));
  }

  const chunks = planChunks(durationSec, config.chunkLengthSec);
  console.log(`Duration: ${formatTimestamp(durationSec)} (${durationSec}s), ${chunks.length} chunks of ${config.chunkLengthSec}s`);
  for (const c of chunks) {
    console.log(
      ` - #${String(c.index).padStart(3, "0")} ${formatTimestamp(c.start)} → ${formatTimestamp(c.end)} (${c.end - c.start}s)`
    );
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
