/**
 * Inference service access: Gemini client, readiness polling, retry
 */

export { GeminiClient, toRemoteFile, DEFAULT_GEMINI_BASE_URL, DEFAULT_GEMINI_MODEL } from './client';
export { waitUntilReady, type TerminalState } from './poll';
export { GOAL_PROMPT, CHUNK_MIME_TYPE } from './prompt';

export * from './types';
export * from './errors';
export * from './retry';
