import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import fs from 'fs-extra'
import os from 'os'
import path from 'path'
import { analyzeChunks } from '../src/pipeline/analyze'
import { planChunks } from '../src/pipeline/chunk'
import { MediaBackendError } from '../src/pipeline/errors'
import { InvalidAPIKeyError, ServerError, UploadError, RateLimitError } from '../src/inference/errors'
import { GeminiClient } from '../src/inference/client'
import { GOAL_PROMPT } from '../src/inference/prompt'
import type { FetchLike } from '../src/inference/types'
import type { HighlightConfig } from '../src/pipeline/types'
import { fakeInference, fakeMedia, noSleep } from './fakes'

const config: HighlightConfig = {
  chunkLengthSec: 60,
  prePaddingSec: 10,
  postPaddingSec: 10,
  retryAttempts: 3,
  retryBackoffSec: 2,
  pollIntervalSec: 3,
  pollTimeoutSec: 600,
}

const chunks = planChunks(150, 60)

const SESSION_URL = 'https://upload.gemini.test/session/1'
const FILE = { name: 'files/abc', uri: 'https://gemini.test/v1beta/files/abc', mimeType: 'video/mp4', state: 'ACTIVE' }

function json(status: number, body: unknown, headers: Record<string, string> = {}) {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json', ...headers } })
}

// Gemini REST stand-in; `finalize` and `generate` answer the last two calls of a chunk
function geminiOverFetch(finalize: () => Response, generate: () => Response) {
  const fetch: FetchLike = async (input: string | URL | Request) => {
    const url = input instanceof Request ? input.url : String(input)
    if (url.endsWith('/upload/v1beta/files')) return json(200, {}, { 'x-goog-upload-url': SESSION_URL })
    if (url === SESSION_URL) return finalize()
    if (url.endsWith(':generateContent')) return generate()
    return json(200, FILE)
  }
  return new GeminiClient({ apiKey: 'test-key', baseUrl: 'https://gemini.test', fetch })
}

const html = () => new Response('<html>proxy error</html>', { status: 200, headers: { 'content-type': 'text/html' } })
const input = '/videos/match.mp4'

let workDir: string

beforeEach(async () => {
  workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'analyze-'))
})

afterEach(async () => {
  await fs.remove(workDir)
})

describe('analyzeChunks', () => {
  it('returns one ok result per chunk, in chunk order', async () => {
    const { media, cuts } = fakeMedia(150)
    const { client, uploaded } = fakeInference({
      'part_001.mp4': ['[00:00:12]'],
      'part_003.mp4': ['[00:00:05]'],
    })

    const results = await analyzeChunks(input, chunks, { workDir, config }, { inference: client, media, sleep: noSleep })

    expect(results.map((r) => [r.chunk.index, r.status, r.rawText])).toEqual([
      [1, 'ok', '[00:00:12]'],
      [2, 'ok', '[]'],
      [3, 'ok', '[00:00:05]'],
    ])
    expect(cuts.map((c) => [c.start, c.end])).toEqual([
      [0, 60],
      [60, 120],
      [120, 150],
    ])
    expect(uploaded).toEqual(['part_001.mp4', 'part_002.mp4', 'part_003.mp4'])
    expect(client.analyze).toHaveBeenCalledWith(expect.objectContaining({ state: 'active' }), GOAL_PROMPT)
  })

  it('removes chunk media once each chunk is done', async () => {
    const { media } = fakeMedia(150)
    const { client } = fakeInference({})

    await analyzeChunks(input, chunks, { workDir, config }, { inference: client, media, sleep: noSleep })
    expect(await fs.readdir(workDir)).toEqual([])
  })

  it('retries a failed analysis after the backoff', async () => {
    const { media } = fakeMedia(60)
    const { client } = fakeInference({
      'part_001.mp4': [new ServerError('unavailable', 503), '[00:00:30]'],
    })
    const sleep = vi.fn(noSleep)

    const [result] = await analyzeChunks(
      input,
      planChunks(60, 60),
      { workDir, config },
      { inference: client, media, sleep }
    )
    expect(result).toMatchObject({ status: 'ok', rawText: '[00:00:30]' })
    expect(client.analyze).toHaveBeenCalledTimes(2)
    expect(sleep.mock.calls).toEqual([[2000]])
  })

  it('degrades a chunk to no text once retries are spent and keeps going', async () => {
    const { media } = fakeMedia(150)
    const { client, analyzed } = fakeInference({
      'part_002.mp4': [new ServerError('a', 500), new RateLimitError('b', 1, 429), new ServerError('c', 500)],
      'part_003.mp4': ['[00:00:05]'],
    })
    const sleep = vi.fn(noSleep)

    const results = await analyzeChunks(input, chunks, { workDir, config }, { inference: client, media, sleep })

    expect(results[1]).toEqual({ chunk: chunks[1], rawText: null, status: 'analyze_failed' })
    expect(results[2]).toMatchObject({ status: 'ok', rawText: '[00:00:05]' })
    expect(analyzed).toEqual(['part_001.mp4', 'part_002.mp4', 'part_002.mp4', 'part_002.mp4', 'part_003.mp4'])
    expect(sleep.mock.calls).toEqual([[2000], [2000]])
  })

  it('marks a chunk whose upload fails without analyzing it', async () => {
    const { media } = fakeMedia(60)
    const { client } = fakeInference({})
    vi.mocked(client.upload).mockRejectedValueOnce(new UploadError('Upload failed: boom', 500))

    const [result] = await analyzeChunks(
      input,
      planChunks(60, 60),
      { workDir, config },
      { inference: client, media, sleep: noSleep }
    )
    expect(result).toMatchObject({ status: 'upload_failed', rawText: null })
    expect(client.analyze).not.toHaveBeenCalled()
    expect(await fs.readdir(workDir)).toEqual([])
  })

  it('marks a chunk the service failed to process as not ready', async () => {
    const { media } = fakeMedia(150)
    const { client, analyzed } = fakeInference({}, { 'part_002.mp4': 'failed' })

    const results = await analyzeChunks(input, chunks, { workDir, config }, { inference: client, media, sleep: noSleep })

    expect(results.map((r) => r.status)).toEqual(['ok', 'not_ready', 'ok'])
    expect(results[1].rawText).toBeNull()
    expect(analyzed).toEqual(['part_001.mp4', 'part_003.mp4'])
  })

  it('gives up on a chunk that stays pending past the poll timeout', async () => {
    const { media } = fakeMedia(60)
    const { client } = fakeInference({}, { 'part_001.mp4': 'pending' })
    let t = 0
    const sleep = vi.fn(async (ms: number) => {
      t += ms
    })

    const [result] = await analyzeChunks(
      input,
      planChunks(60, 60),
      { workDir, config: { ...config, pollIntervalSec: 3, pollTimeoutSec: 10 } },
      { inference: client, media, sleep, now: () => t }
    )
    expect(result).toMatchObject({ status: 'not_ready', rawText: null })
    expect(client.getFile).toHaveBeenCalledTimes(4)
    expect(client.analyze).not.toHaveBeenCalled()
  })

  it('lets programming errors escape and still removes the chunk', async () => {
    const { media } = fakeMedia(60)
    const bug = new TypeError('undefined is not a function')
    const { client } = fakeInference({ 'part_001.mp4': [bug] })

    await expect(
      analyzeChunks(input, planChunks(60, 60), { workDir, config }, { inference: client, media, sleep: noSleep })
    ).rejects.toBe(bug)
    expect(client.analyze).toHaveBeenCalledTimes(1)
    expect(await fs.readdir(workDir)).toEqual([])
  })

  it('propagates media failures', async () => {
    const { media } = fakeMedia(60)
    vi.mocked(media.extractRange).mockRejectedValueOnce(new MediaBackendError('extract', 'ffmpeg failed'))
    const { client } = fakeInference({})

    await expect(
      analyzeChunks(input, planChunks(60, 60), { workDir, config }, { inference: client, media, sleep: noSleep })
    ).rejects.toBeInstanceOf(MediaBackendError)
    expect(client.upload).not.toHaveBeenCalled()
  })

  it('degrades chunks whose model answer is not JSON instead of aborting', async () => {
    const { media } = fakeMedia(120)
    const client = geminiOverFetch(() => json(200, { file: FILE }), html)
    const sleep = vi.fn(noSleep)

    const results = await analyzeChunks(
      input,
      planChunks(120, 60),
      { workDir, config },
      { inference: client, media, sleep }
    )

    expect(results.map((r) => r.status)).toEqual(['analyze_failed', 'analyze_failed'])
    expect(results.every((r) => r.rawText === null)).toBe(true)
    // a garbled body may be transient, so the full budget is spent on each chunk
    expect(sleep).toHaveBeenCalledTimes(4)
  })

  it('degrades a chunk whose upload reply has no file', async () => {
    const { media } = fakeMedia(60)
    const client = geminiOverFetch(
      () => json(200, {}),
      () => json(200, { candidates: [{ content: { parts: [{ text: '[]' }] } }] })
    )

    const results = await analyzeChunks(
      input,
      planChunks(60, 60),
      { workDir, config },
      { inference: client, media, sleep: noSleep }
    )
    expect(results).toEqual([{ chunk: { index: 1, start: 0, end: 60 }, rawText: null, status: 'upload_failed' }])
  })

  it('does not retry a rejected API key', async () => {
    const { media } = fakeMedia(60)
    const { client } = fakeInference({ 'part_001.mp4': [new InvalidAPIKeyError('API key not valid', 403)] })
    const sleep = vi.fn(noSleep)

    const [result] = await analyzeChunks(
      input,
      planChunks(60, 60),
      { workDir, config },
      { inference: client, media, sleep }
    )
    expect(result).toMatchObject({ status: 'analyze_failed', rawText: null })
    expect(client.analyze).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('does nothing for an empty plan', async () => {
    const { media } = fakeMedia(0)
    const { client } = fakeInference({})
    await expect(
      analyzeChunks(input, [], { workDir, config }, { inference: client, media, sleep: noSleep })
    ).resolves.toEqual([])
    expect(media.extractRange).not.toHaveBeenCalled()
  })
})
