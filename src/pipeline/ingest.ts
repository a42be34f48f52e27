import fs from 'fs-extra';
import path from 'path';
import type { SourceMeta } from './types';
import { InputError } from './errors';

export interface IngestOptions {
    artifactsRoot: string;
    /** Run directory name; defaults to `<input stem>-<epoch ms>` */
    runId?: string;
}

export interface IngestResult {
    runId: string;
    runDir: string;
    chunksDir: string;
    source: SourceMeta;
}

const CONTAINERS: Record<string, SourceMeta['container']> = {
    '.mp4': 'mp4',
    '.mov': 'mov',
};

export function toRunId(inputPath: string, at: number = Date.now()): string {
    const stem = path
        .basename(inputPath, path.extname(inputPath))
        .replace(/[^a-zA-Z0-9_-]+/g, '_');
    return `${stem || 'input'}-${at}`;
}

/**
 * Checks the input file and lays out the run's artifact directory.
 */
export async function ingestInput(
    inputPath: string,
    opts: IngestOptions
): Promise<IngestResult> {
    const absInput = path.resolve(inputPath);
    const container = CONTAINERS[path.extname(absInput).toLowerCase()];
    if (!container) {
        throw new InputError(
            `Unsupported input ${absInput}: expected an .mp4 or .mov file`,
            { path: absInput }
        );
    }
    if (!(await fs.pathExists(absInput))) {
        throw new InputError(`Input video not found: ${absInput}`, { path: absInput });
    }
    const st = await fs.stat(absInput);
    if (!st.isFile() || st.size === 0) {
        throw new InputError(
            `Input video is empty or not a regular file: ${absInput}`,
            { path: absInput, sizeBytes: st.size }
        );
    }

    const runId = opts.runId ?? toRunId(absInput);
    // Absolute run dir so ffmpeg's concat list never depends on cwd
    const runDir = path.resolve(opts.artifactsRoot, runId);
    const chunksDir = path.join(runDir, 'chunks');
    // Chunk media never outlives a run; a leftover directory is from a crashed one
    await fs.remove(chunksDir);
    await fs.ensureDir(chunksDir);

    return {
        runId,
        runDir,
        chunksDir,
        source: { path: absInput, container, sizeBytes: st.size },
    };
}
