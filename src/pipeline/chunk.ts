import type { ChunkWindow } from './types';
import { InvalidConfigurationError } from './errors';
import { debug } from './log';

/**
 * Splits `[0, durationSec)` into contiguous windows of `chunkSec`; the last one
 * is cut short at the duration.
 */
export function planChunks(durationSec: number, chunkSec: number): ChunkWindow[] {
    if (!Number.isInteger(chunkSec) || chunkSec <= 0) {
        throw new InvalidConfigurationError(
            'chunkLengthSec',
            `Chunk length must be a positive integer number of seconds, got ${chunkSec}`
        );
    }
    const chunks: ChunkWindow[] = [];
    if (!(durationSec > 0)) {
        return chunks;
    }

    let index = 1;
    for (let start = 0; start < durationSec; start += chunkSec) {
        chunks.push({
            index,
            start,
            end: Math.min(start + chunkSec, durationSec),
        });
        index += 1;
    }
    debug('chunk.plan', { durationSec, chunkSec, count: chunks.length });
    return chunks;
}

export function chunkFileName(chunk: ChunkWindow): string {
    return `part_${String(chunk.index).padStart(3, '0')}.mp4`;
}
