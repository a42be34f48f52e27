import { describe, it, expect, vi } from 'vitest'
import { withRetry, isInferenceFailure, isRetryableFailure } from '../src/inference/retry'
import {
  ServerError,
  NetworkError,
  InferenceError,
  InvalidAPIKeyError,
  QuotaExceededError,
  RateLimitError,
  InvalidResponseError,
} from '../src/inference/errors'

describe('withRetry', () => {
  it('returns the first successful result without sleeping', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined)
    const fn = vi.fn().mockResolvedValue('[00:00:12]')

    await expect(withRetry(fn, { attempts: 3, backoffMs: 2000, sleep })).resolves.toBe('[00:00:12]')
    expect(fn).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('retries declared failures with a fixed backoff', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined)
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new ServerError('unavailable', 503))
      .mockRejectedValueOnce(new NetworkError('reset'))
      .mockResolvedValue('[]')

    await expect(withRetry(fn, { attempts: 3, backoffMs: 2000, sleep })).resolves.toBe('[]')
    expect(fn).toHaveBeenCalledTimes(3)
    expect(fn).toHaveBeenNthCalledWith(3, 3)
    expect(sleep.mock.calls).toEqual([[2000], [2000]])
  })

  it('throws the last failure once the budget is spent, without a trailing sleep', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined)
    const last = new ServerError('still down', 500)
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new ServerError('down', 500))
      .mockRejectedValueOnce(new ServerError('down', 500))
      .mockRejectedValueOnce(last)

    await expect(withRetry(fn, { attempts: 3, backoffMs: 10, sleep })).rejects.toBe(last)
    expect(fn).toHaveBeenCalledTimes(3)
    expect(sleep).toHaveBeenCalledTimes(2)
  })

  it('lets programming errors through on the first attempt', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined)
    const bug = new TypeError('cannot read properties of undefined')
    const fn = vi.fn().mockRejectedValue(bug)

    await expect(withRetry(fn, { attempts: 3, backoffMs: 10, sleep })).rejects.toBe(bug)
    expect(fn).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('reports each retried failure', async () => {
    const onRetry = vi.fn()
    const err = new InferenceError('nope')
    const fn = vi.fn().mockRejectedValueOnce(err).mockResolvedValue('ok')

    await withRetry(fn, { attempts: 2, backoffMs: 0, sleep: async () => {}, onRetry })
    expect(onRetry).toHaveBeenCalledWith(1, err)
  })

  it('treats attempts below 1 as a single attempt', async () => {
    const fn = vi.fn().mockRejectedValue(new InferenceError('x'))
    await expect(withRetry(fn, { attempts: 0, backoffMs: 0, sleep: async () => {} })).rejects.toThrow('x')
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('honours a custom retry predicate', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValue(1)
    await expect(
      withRetry(fn, { attempts: 2, backoffMs: 0, sleep: async () => {}, retryOn: () => true })
    ).resolves.toBe(1)
  })
})

describe('withRetry with server hints', () => {
  it('gives up at once on failures another attempt cannot fix', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined)
    const denied = new InvalidAPIKeyError('API key not valid', 403)
    const fn = vi.fn().mockRejectedValue(denied)

    await expect(withRetry(fn, { attempts: 3, backoffMs: 2000, sleep })).rejects.toBe(denied)
    expect(fn).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('waits as long as Retry-After asks when that is longer than the backoff', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined)
    const fn = vi.fn().mockRejectedValueOnce(new RateLimitError('slow down', 5, 429)).mockResolvedValue('[]')

    await withRetry(fn, { attempts: 2, backoffMs: 2000, sleep })
    expect(sleep.mock.calls).toEqual([[5000]])
  })

  it('caps the server-requested delay', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined)
    const fn = vi.fn().mockRejectedValueOnce(new RateLimitError('slow down', 120, 429)).mockResolvedValue('[]')

    await withRetry(fn, { attempts: 2, backoffMs: 2000, maxDelayMs: 60000, sleep })
    expect(sleep.mock.calls).toEqual([[60000]])
  })
})

describe('isRetryableFailure', () => {
  it('follows the retryable flag of the inference family', () => {
    expect(isRetryableFailure(new ServerError('x', 500))).toBe(true)
    expect(isRetryableFailure(new RateLimitError('x', 1, 429))).toBe(true)
    expect(isRetryableFailure(new InvalidResponseError('x', 200))).toBe(true)
    expect(isRetryableFailure(new InvalidAPIKeyError('x', 401))).toBe(false)
    expect(isRetryableFailure(new QuotaExceededError('x', 429))).toBe(false)
    expect(isRetryableFailure(new Error('x'))).toBe(false)
  })
})

describe('isInferenceFailure', () => {
  it('accepts the inference error family only', () => {
    expect(isInferenceFailure(new ServerError('x', 500))).toBe(true)
    expect(isInferenceFailure(new Error('x'))).toBe(false)
    expect(isInferenceFailure('x')).toBe(false)
  })
})
