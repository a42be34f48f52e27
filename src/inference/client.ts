/**
 * Gemini inference client (REST, via ky)
 */

import ky, { type KyInstance, type KyResponse, type Options as KyOptions } from 'ky';
import fs from 'fs-extra';
import path from 'path';
import type {
  GeminiClientOptions,
  GeminiErrorBody,
  GeminiFile,
  GeminiGenerateRequest,
  InferenceClient,
  ReadyState,
  RemoteFile,
} from './types';
import {
  EmptyResponseError,
  handleErrorResponse,
  InferenceError,
  InvalidResponseError,
  isRecord,
  NetworkError,
  TimeoutError,
  UploadError,
} from './errors';

export const DEFAULT_GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com';
export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';

function toReadyState(state: string): ReadyState {
  switch (state) {
    case 'ACTIVE':
      return 'active';
    case 'FAILED':
      return 'failed';
    default:
      // STATE_UNSPECIFIED, PROCESSING
      return 'pending';
  }
}

function isGeminiFile(v: unknown): v is GeminiFile {
  return (
    isRecord(v) &&
    typeof v.name === 'string' &&
    typeof v.uri === 'string' &&
    typeof v.mimeType === 'string' &&
    typeof v.state === 'string'
  );
}

/**
 * Validate a File resource and map it to a RemoteFile
 */
export function toRemoteFile(v: unknown, statusCode?: number): RemoteFile {
  if (!isGeminiFile(v)) {
    throw new InvalidResponseError('Response does not describe a file (name, uri, mimeType, state)', statusCode);
  }
  return {
    name: v.name,
    uri: v.uri,
    mimeType: v.mimeType,
    state: toReadyState(v.state),
  };
}

/**
 * Parse a 2xx body; a body that is not JSON is an inference failure, not a crash
 */
async function readJson(response: KyResponse, endpoint: string): Promise<unknown> {
  try {
    return await response.json<unknown>();
  } catch (error) {
    throw new InvalidResponseError(
      `${endpoint} returned a body that is not JSON: ${error instanceof Error ? error.message : String(error)}`,
      response.status
    );
  }
}

async function readErrorBody(response: KyResponse): Promise<GeminiErrorBody | undefined> {
  let body: unknown;
  try {
    body = await response.json<unknown>();
  } catch {
    // Response might not be JSON
    return undefined;
  }
  if (!isRecord(body) || !isRecord(body.error)) return undefined;
  const { code, message, status, details } = body.error;
  return {
    error: {
      code: typeof code === 'number' ? code : undefined,
      message: typeof message === 'string' ? message : undefined,
      status: typeof status === 'string' ? status : undefined,
      details: Array.isArray(details) ? details : undefined,
    },
  };
}

async function readBytes(filePath: string) {
  try {
    return new Uint8Array(await fs.readFile(filePath));
  } catch (error) {
    throw new UploadError(
      `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Convert transport failures to our error types
 */
function toTransportError(error: unknown): unknown {
  if (error instanceof InferenceError) return error;
  if (error instanceof Error) {
    if (error.name === 'TimeoutError') {
      return new TimeoutError(`Request timeout: ${error.message}`);
    }
    if (error.name === 'TypeError' && /fetch/i.test(error.message)) {
      return new NetworkError(`Network error: ${error.message}`);
    }
  }
  return error;
}

export class GeminiClient implements InferenceClient {
  private http: KyInstance;
  private raw: KyInstance;
  private model: string;

  constructor(options: GeminiClientOptions) {
    const {
      apiKey,
      baseUrl = DEFAULT_GEMINI_BASE_URL,
      model = DEFAULT_GEMINI_MODEL,
      timeout = 120000,
    } = options;

    const kyOptions: KyOptions = {
      timeout,
      retry: 0, // retries belong to the analyzer
      throwHttpErrors: false,
      headers: { 'x-goog-api-key': apiKey },
    };
    if (options.fetch) {
      kyOptions.fetch = options.fetch;
    }

    // The resumable upload session URL is absolute, so it gets its own instance
    this.raw = ky.create(kyOptions);
    this.http = this.raw.extend({ prefixUrl: baseUrl });
    this.model = model;
  }

  private async send(
    call: () => Promise<KyResponse>,
    onHttpError: (response: KyResponse, body?: GeminiErrorBody) => never = handleErrorResponse
  ): Promise<KyResponse> {
    let response: KyResponse;
    try {
      response = await call();
    } catch (error) {
      throw toTransportError(error);
    }
    if (!response.ok) {
      onHttpError(response, await readErrorBody(response));
    }
    return response;
  }

  /**
   * Resumable upload: open a session, then send the bytes and finalize
   */
  async upload(filePath: string, mimeType: string): Promise<RemoteFile> {
    const asUploadError = (response: Response, body?: GeminiErrorBody): never => {
      const message = body?.error?.message || response.statusText || `HTTP ${response.status}`;
      throw new UploadError(`Upload failed: ${message}`, response.status, body?.error?.status);
    };

    const bytes = await readBytes(filePath);

    try {
      const start = await this.send(
        () =>
          this.http.post('upload/v1beta/files', {
            headers: {
              'X-Goog-Upload-Protocol': 'resumable',
              'X-Goog-Upload-Command': 'start',
              'X-Goog-Upload-Header-Content-Length': String(bytes.byteLength),
              'X-Goog-Upload-Header-Content-Type': mimeType,
            },
            json: { file: { displayName: path.basename(filePath) } },
          }),
        asUploadError
      );
      const sessionUrl = start.headers.get('x-goog-upload-url');
      if (!sessionUrl) {
        throw new UploadError('Upload session was not opened (no x-goog-upload-url header)');
      }

      const done = await this.send(
        () =>
          this.raw.post(sessionUrl, {
            headers: {
              'X-Goog-Upload-Offset': '0',
              'X-Goog-Upload-Command': 'upload, finalize',
            },
            body: bytes,
          }),
        asUploadError
      );
      const uploaded = await readJson(done, 'upload');
      return toRemoteFile(isRecord(uploaded) ? uploaded.file : undefined, done.status);
    } catch (error) {
      if (error instanceof UploadError) throw error;
      if (error instanceof InferenceError) {
        throw new UploadError(`Upload failed: ${error.message}`, error.statusCode, error.errorCode);
      }
      throw error;
    }
  }

  /**
   * Current state of an uploaded file
   */
  async getFile(name: string): Promise<RemoteFile> {
    const response = await this.send(() => this.http.get(`v1beta/${name}`));
    return toRemoteFile(await readJson(response, 'files.get'), response.status);
  }

  /**
   * Ask the model about an uploaded file; returns its trimmed text
   */
  async analyze(file: RemoteFile, prompt: string): Promise<string> {
    const body: GeminiGenerateRequest = {
      contents: [
        {
          role: 'user',
          parts: [{ fileData: { mimeType: file.mimeType, fileUri: file.uri } }, { text: prompt }],
        },
      ],
    };
    const response = await this.send(() =>
      this.http.post(`v1beta/models/${this.model}:generateContent`, { json: body })
    );
    const data = await readJson(response, 'generateContent');
    if (!isRecord(data)) {
      throw new InvalidResponseError('generateContent returned a body that is not an object', response.status);
    }
    const first: unknown = Array.isArray(data.candidates) ? data.candidates[0] : undefined;
    const candidate: Record<string, unknown> = isRecord(first) ? first : {};
    const content: Record<string, unknown> = isRecord(candidate.content) ? candidate.content : {};
    const parts: unknown[] = Array.isArray(content.parts) ? content.parts : [];
    const text = parts
      .map((p) => (isRecord(p) && typeof p.text === 'string' ? p.text : ''))
      .join('')
      .trim();
    if (!text) {
      const feedback: Record<string, unknown> = isRecord(data.promptFeedback) ? data.promptFeedback : {};
      throw new EmptyResponseError('Model returned no text', {
        blockReason: feedback.blockReason,
        finishReason: candidate.finishReason,
      });
    }
    return text;
  }
}
