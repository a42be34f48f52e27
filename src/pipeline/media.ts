import { execa, ExecaError } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { MediaBackendError } from './errors';
import { debug } from './log';

/**
 * Cut-and-stitch operations on media files. Paths double as clip handles.
 */
export interface MediaBackend {
    /** Container duration in (possibly fractional) seconds */
    probeDuration(inputPath: string): Promise<number>;
    /** Writes `[start, end)` of `inputPath` to `outPath` and returns `outPath` */
    extractRange(inputPath: string, start: number, end: number, outPath: string): Promise<string>;
    /** Joins `clips` in the given order into `outPath` */
    concatenate(clips: readonly string[], outPath: string): Promise<string>;
}

export interface FfmpegOptions {
    ffmpegBin?: string;
    ffprobeBin?: string;
}

function describeFailure(e: unknown): { message: string; stderr?: string } {
    if (e instanceof ExecaError) {
        const rawStderr: unknown = e.stderr;
        const stderr = typeof rawStderr === 'string' ? rawStderr.slice(-800) : undefined;
        return { message: e.shortMessage, stderr };
    }
    return { message: e instanceof Error ? e.message : String(e) };
}

// Concat demuxer list entries are single-quoted; embedded quotes are closed, escaped and reopened
export function concatListLine(filePath: string): string {
    return `file '${path.resolve(filePath).replace(/'/g, "'\\''")}'`;
}

export class FfmpegMediaBackend implements MediaBackend {
    private ffmpegBin: string;
    private ffprobeBin: string;

    constructor(opts: FfmpegOptions = {}) {
        this.ffmpegBin = opts.ffmpegBin || 'ffmpeg';
        this.ffprobeBin = opts.ffprobeBin || 'ffprobe';
    }

    async probeDuration(inputPath: string): Promise<number> {
        let stdout: string;
        try {
            const probe = await execa(this.ffprobeBin, [
                '-v',
                'error',
                '-show_entries',
                'format=duration',
                '-of',
                'default=noprint_wrappers=1:nokey=1',
                inputPath,
            ]);
            stdout = probe.stdout;
        } catch (e) {
            const f = describeFailure(e);
            throw new MediaBackendError('probe', `ffprobe failed for ${inputPath}: ${f.message}`, f.stderr);
        }
        const parsed = parseFloat(stdout);
        if (!Number.isFinite(parsed)) {
            throw new MediaBackendError(
                'probe',
                `ffprobe could not determine duration for ${inputPath}. Raw output: ${stdout}`
            );
        }
        return Math.max(0, parsed);
    }

    async extractRange(inputPath: string, start: number, end: number, outPath: string): Promise<string> {
        const dur = Math.max(0, end - start);
        await fs.ensureDir(path.dirname(outPath));
        debug('media.extract', { inputPath, start, end, outPath });
        try {
            // -ss before -i seeks by keyframe index, then decodes to the exact frame
            await execa(this.ffmpegBin, [
                '-y',
                '-loglevel',
                'error',
                '-hide_banner',
                '-nostdin',
                '-ss',
                String(start),
                '-i',
                inputPath,
                '-t',
                String(dur),
                '-c:v',
                'libx264',
                '-pix_fmt',
                'yuv420p',
                '-c:a',
                'aac',
                '-movflags',
                '+faststart',
                outPath,
            ]);
        } catch (e) {
            const f = describeFailure(e);
            throw new MediaBackendError(
                'extract',
                `ffmpeg failed while extracting start=${start} end=${end} from ${inputPath}: ${f.message}`,
                f.stderr
            );
        }
        const st = await fs.stat(outPath);
        if (st.size === 0) {
            throw new MediaBackendError(
                'extract',
                `Created empty clip at ${outPath}; the source has no samples in [${start}, ${end}).`
            );
        }
        return outPath;
    }

    async concatenate(clips: readonly string[], outPath: string): Promise<string> {
        if (!clips.length) {
            throw new MediaBackendError('concat', 'Nothing to concatenate');
        }
        await fs.ensureDir(path.dirname(outPath));
        const listPath = `${outPath}.list.txt`;
        await fs.writeFile(listPath, clips.map(concatListLine).join('\n') + '\n');
        try {
            await execa(this.ffmpegBin, [
                '-y',
                '-loglevel',
                'error',
                '-hide_banner',
                '-nostdin',
                '-f',
                'concat',
                '-safe',
                '0',
                '-i',
                listPath,
                '-c',
                'copy',
                '-movflags',
                '+faststart',
                outPath,
            ]);
        } catch (e) {
            const f = describeFailure(e);
            throw new MediaBackendError('concat', `ffmpeg concat failed: ${f.message}`, f.stderr);
        } finally {
            await fs.remove(listPath);
        }
        return outPath;
    }
}
