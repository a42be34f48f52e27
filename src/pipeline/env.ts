import * as dotenv from 'dotenv';
import type { HighlightConfig } from './types';
import { InvalidConfigurationError } from './errors';
dotenv.config();

export const ENV = {
    chunkLengthSec: Number(process.env.CHUNK_LENGTH_SEC || 60),
    prePaddingSec: Number(process.env.PRE_PADDING_SEC || 10),
    postPaddingSec: Number(process.env.POST_PADDING_SEC || 10),
    retryAttempts: Number(process.env.RETRY_ATTEMPTS || 3),
    retryBackoffSec: Number(process.env.RETRY_BACKOFF_SEC || 2),
    pollIntervalSec: Number(process.env.POLL_INTERVAL_SEC || 3),
    // Upper bound on waiting for an uploaded chunk to become ACTIVE. 0 disables.
    pollTimeoutSec: Number(process.env.POLL_TIMEOUT_SEC || 600),
    geminiApiKey: process.env.GEMINI_API_KEY || '',
    geminiModel: process.env.GEMINI_MODEL || 'gemini-2.0-flash',
    geminiBaseUrl: process.env.GEMINI_BASE_URL || 'https://generativelanguage.googleapis.com',
    // Per-request HTTP timeout; uploads of a 60s chunk can be slow
    geminiTimeoutMs: Number(process.env.GEMINI_TIMEOUT_MS || 120000),
    artifactsRoot: process.env.ARTIFACTS_ROOT || 'artifacts',
    outputName: process.env.OUTPUT_NAME || 'final_highlights.mp4',
    // Optional: override ffmpeg/ffprobe binary name/path
    ffmpegBin: process.env.FFMPEG_BIN || 'ffmpeg',
    ffprobeBin: process.env.FFPROBE_BIN || 'ffprobe',
    logLevel: process.env.LOG_LEVEL || 'info',
};

export const DEFAULT_CONFIG: HighlightConfig = {
    chunkLengthSec: 60,
    prePaddingSec: 10,
    postPaddingSec: 10,
    retryAttempts: 3,
    retryBackoffSec: 2,
    pollIntervalSec: 3,
    pollTimeoutSec: 600,
};

const CONFIG_KEYS: ReadonlyArray<keyof HighlightConfig> = [
    'chunkLengthSec',
    'prePaddingSec',
    'postPaddingSec',
    'retryAttempts',
    'retryBackoffSec',
    'pollIntervalSec',
    'pollTimeoutSec',
];

export function configFromEnv(): HighlightConfig {
    return {
        chunkLengthSec: ENV.chunkLengthSec,
        prePaddingSec: ENV.prePaddingSec,
        postPaddingSec: ENV.postPaddingSec,
        retryAttempts: ENV.retryAttempts,
        retryBackoffSec: ENV.retryBackoffSec,
        pollIntervalSec: ENV.pollIntervalSec,
        pollTimeoutSec: ENV.pollTimeoutSec,
    };
}

function requireInteger(
    cfg: HighlightConfig,
    field: keyof HighlightConfig,
    min: number
) {
    const v = cfg[field];
    if (!Number.isInteger(v) || v < min) {
        throw new InvalidConfigurationError(
            field,
            `${field} must be an integer >= ${min}, got ${v}`
        );
    }
}

function requireNumber(
    cfg: HighlightConfig,
    field: keyof HighlightConfig,
    min: number
) {
    const v = cfg[field];
    if (!Number.isFinite(v) || v < min) {
        throw new InvalidConfigurationError(field, `${field} must be >= ${min}, got ${v}`);
    }
}

/**
 * Overlays `overrides` (undefined entries ignored) on `base` and validates the
 * result. Pass the returned value down the pipeline; nothing reads ENV after this.
 */
export function resolveConfig(
    overrides: Partial<HighlightConfig> = {},
    base: HighlightConfig = configFromEnv()
): HighlightConfig {
    const cfg: HighlightConfig = { ...base };
    for (const key of CONFIG_KEYS) {
        const v = overrides[key];
        if (v !== undefined) cfg[key] = v;
    }
    requireInteger(cfg, 'chunkLengthSec', 1);
    requireInteger(cfg, 'prePaddingSec', 0);
    requireInteger(cfg, 'postPaddingSec', 0);
    requireInteger(cfg, 'retryAttempts', 1);
    requireNumber(cfg, 'retryBackoffSec', 0);
    requireNumber(cfg, 'pollIntervalSec', 0);
    requireNumber(cfg, 'pollTimeoutSec', 0);
    return cfg;
}
