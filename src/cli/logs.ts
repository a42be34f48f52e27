import fs from 'fs';
import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { LEVEL_ORDER, isLogLevel } from '../pipeline/log';

function tailFile(file: string) {
  let size = fs.statSync(file).size;
  setInterval(() => {
    let stat: fs.Stats;
    try {
      stat = fs.statSync(file);
    } catch (e) {
      console.error('Log file disappeared:', file, e instanceof Error ? e.message : e);
      process.exit(1);
    }
    if (stat.size > size) {
      const stream = fs.createReadStream(file, { start: size, end: stat.size - 1 });
      stream.on('data', (buf) => process.stdout.write(buf));
      size = stat.size;
    }
  }, 1500);
}

function latestRunLog(): string | undefined {
  const root = path.resolve(ENV.artifactsRoot);
  if (!fs.existsSync(root)) return undefined;
  const candidates = fs
    .readdirSync(root)
    .map((d) => path.join(root, d, 'run.log'))
    .filter((f) => fs.existsSync(f))
    .sort((a, b) => fs.statSync(b).mtimeMs - fs.statSync(a).mtimeMs);
  return candidates[0];
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('run', { type: 'string', describe: 'Run id (directory under ARTIFACTS_ROOT)' })
    .option('file', { type: 'string', describe: 'Explicit log file path' })
    .option('level', { type: 'string', describe: 'Min level filter (debug|info|warn|error)' })
    .option('follow', { type: 'boolean', default: false, describe: 'Stream appended lines' })
    .parse();

  let file = argv.file;
  if (!file && argv.run) {
    file = path.resolve(ENV.artifactsRoot, argv.run, 'run.log');
  }
  if (!file) {
    file = latestRunLog();
  }
  if (!file) {
    console.error('No run.log found under', path.resolve(ENV.artifactsRoot));
    process.exit(1);
  }
  if (!fs.existsSync(file)) {
    console.error('Log file does not exist:', file);
    process.exit(1);
  }
  const min = argv.level && isLogLevel(argv.level) ? argv.level : 'debug';
  const minOrder = LEVEL_ORDER[min];

  const printLine = (line: string) => {
    line = line.trim();
    if (!line) return;
    let obj: unknown;
    try {
      obj = JSON.parse(line);
    } catch {
      // pass through raw lines
      process.stdout.write(line + '\n');
      return;
    }
    const level =
      typeof obj === 'object' && obj !== null && 'level' in obj && typeof obj.level === 'string'
        ? obj.level
        : 'info';
    const order = isLogLevel(level) ? LEVEL_ORDER[level] : LEVEL_ORDER.info;
    if (order >= minOrder) {
      process.stdout.write(line + '\n');
    }
  };

  fs.readFileSync(file, 'utf8').split(/\r?\n/).forEach(printLine);
  if (argv.follow) {
    tailFile(file);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
