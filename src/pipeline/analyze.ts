import fs from 'fs-extra';
import path from 'path';
import type { ChunkWindow, HighlightConfig, RawClipResult } from './types';
import type { MediaBackend } from './media';
import { chunkFileName } from './chunk';
import { info, warn, debug, startStep, errorMessage } from './log';
import {
    CHUNK_MIME_TYPE,
    GOAL_PROMPT,
    type InferenceClient,
    InferenceError,
    type RemoteFile,
    type Sleep,
    isInferenceFailure,
    sleep as realSleep,
    waitUntilReady,
    withRetry,
} from '../inference';

export interface AnalyzeOptions {
    workDir: string;
    config: HighlightConfig;
    prompt?: string;
}

export interface AnalyzeDeps {
    inference: InferenceClient;
    media: MediaBackend;
    sleep?: Sleep;
    now?: () => number;
}

/**
 * Runs every chunk through cut → upload → wait → analyze, one at a time and
 * in index order. Inference failures degrade that chunk to `rawText: null`;
 * media failures and programming errors propagate.
 */
export async function analyzeChunks(
    inputPath: string,
    chunks: readonly ChunkWindow[],
    opts: AnalyzeOptions,
    deps: AnalyzeDeps
): Promise<RawClipResult[]> {
    const { config } = opts;
    const prompt = opts.prompt ?? GOAL_PROMPT;
    const sleep = deps.sleep ?? realSleep;
    const results: RawClipResult[] = [];
    await fs.ensureDir(opts.workDir);

    const timer = startStep('analyze.chunks', { total: chunks.length });

    async function runOne(chunk: ChunkWindow): Promise<RawClipResult> {
        const chunkPath = path.join(opts.workDir, chunkFileName(chunk));
        await deps.media.extractRange(inputPath, chunk.start, chunk.end, chunkPath);
        try {
            let file: RemoteFile;
            try {
                file = await deps.inference.upload(chunkPath, CHUNK_MIME_TYPE);
                debug('analyze.chunk.uploaded', { idx: chunk.index, file: file.name });
            } catch (e) {
                if (!isInferenceFailure(e)) throw e;
                warn('analyze.chunk.upload.fail', { idx: chunk.index, error: errorMessage(e) });
                return { chunk, rawText: null, status: 'upload_failed' };
            }

            try {
                const ready = await waitUntilReady(deps.inference, file, {
                    pollInterval: config.pollIntervalSec * 1000,
                    timeout: config.pollTimeoutSec * 1000,
                    sleep,
                    now: deps.now,
                });
                if (ready.state === 'failed') {
                    warn('analyze.chunk.not_ready', { idx: chunk.index, file: file.name, polls: ready.polls });
                    return { chunk, rawText: null, status: 'not_ready' };
                }
                file = ready.file;
            } catch (e) {
                if (!isInferenceFailure(e)) throw e;
                warn('analyze.chunk.not_ready', { idx: chunk.index, file: file.name, error: errorMessage(e) });
                return { chunk, rawText: null, status: 'not_ready' };
            }

            const activeFile = file;
            try {
                const rawText = await withRetry(() => deps.inference.analyze(activeFile, prompt), {
                    attempts: config.retryAttempts,
                    backoffMs: config.retryBackoffSec * 1000,
                    sleep,
                    onRetry: (attempt, e) =>
                        warn('analyze.chunk.fail', {
                            idx: chunk.index,
                            attempt,
                            error: errorMessage(e),
                            statusCode: e instanceof InferenceError ? e.statusCode : undefined,
                        }),
                });
                info('analyze.chunk.done', { idx: chunk.index, rawText });
                return { chunk, rawText, status: 'ok' };
            } catch (e) {
                if (!isInferenceFailure(e)) throw e;
                warn('analyze.chunk.giveup', {
                    idx: chunk.index,
                    attempts: config.retryAttempts,
                    // non-retryable failures (bad key, spent quota) give up after one attempt
                    retryable: e instanceof InferenceError && e.retryable,
                    error: errorMessage(e),
                });
                return { chunk, rawText: null, status: 'analyze_failed' };
            }
        } finally {
            await fs.remove(chunkPath);
        }
    }

    for (const chunk of chunks) {
        info('analyze.chunk.start', { idx: chunk.index, start: chunk.start, end: chunk.end });
        results.push(await runOne(chunk));
        timer.eta(results.length, chunks.length);
    }

    timer.end({ failed: results.filter((r) => r.status !== 'ok').length });
    return results;
}
