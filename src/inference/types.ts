/**
 * Type definitions for the inference service
 */

/**
 * Readiness of an uploaded file
 */
export type ReadyState = 'pending' | 'active' | 'failed';

/**
 * An uploaded chunk as the service knows it
 */
export interface RemoteFile {
  /** Service-side resource name, e.g. `files/abc123` */
  name: string;
  /** URI to reference the file from a prompt */
  uri: string;
  mimeType: string;
  state: ReadyState;
}

/**
 * What the pipeline needs from a vision-language service
 */
export interface InferenceClient {
  upload(filePath: string, mimeType: string): Promise<RemoteFile>;
  getFile(name: string): Promise<RemoteFile>;
  /** Raw model text for `prompt` applied to `file` */
  analyze(file: RemoteFile, prompt: string): Promise<string>;
}

export type Sleep = (ms: number) => Promise<void>;

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

/**
 * Gemini client configuration options
 */
export interface GeminiClientOptions {
  apiKey: string;
  /** Base URL of the API */
  baseUrl?: string;
  /** Model id used for generateContent */
  model?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Replaces global fetch (tests) */
  fetch?: FetchLike;
}

/**
 * Wait-until-ready options
 */
export interface WaitOptions {
  /** Delay between polls in milliseconds */
  pollInterval: number;
  /** Maximum wait time in milliseconds; 0 waits forever */
  timeout?: number;
  sleep?: Sleep;
  now?: () => number;
}

// Gemini REST wire shapes

export interface GeminiFile {
  name: string;
  displayName?: string;
  mimeType: string;
  sizeBytes?: string;
  uri: string;
  /** `STATE_UNSPECIFIED` | `PROCESSING` | `ACTIVE` | `FAILED` */
  state: string;
}

export interface GeminiPart {
  text?: string;
  fileData?: { mimeType: string; fileUri: string };
}

export interface GeminiGenerateRequest {
  contents: Array<{ role: 'user'; parts: GeminiPart[] }>;
}

/**
 * API error response
 */
export interface GeminiErrorBody {
  error?: {
    code?: number;
    message?: string;
    status?: string;
    details?: unknown[];
  };
}
