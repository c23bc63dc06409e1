import { describe, it, expect, vi } from 'vitest'
import { calculateDelay, isRetryableError, retryWithBackoff } from '../../src/services/utils/retryWithBackoff'
import { SinkWriteError } from '../../src/services/utils/errorUtils'

class HttpError extends Error {
  constructor(message: string, readonly status: number) {
    super(message)
  }
}

class SocketError extends Error {
  constructor(message: string, readonly code: string) {
    super(message)
  }
}

describe('retryWithBackoff', () => {
  it('should succeed on first try without retry', async () => {
    const fn = vi.fn().mockResolvedValue('success')

    const result = await retryWithBackoff(fn)

    expect(result).toBe('success')
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('should retry on retryable error and succeed', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new HttpError('HTTP 503: Unavailable', 503))
      .mockResolvedValue('success')

    const onRetry = vi.fn()
    const result = await retryWithBackoff(fn, {
      maxRetries: 3,
      initialDelay: 10, // Very short delay for tests
      onRetry,
    })

    expect(result).toBe('success')
    expect(fn).toHaveBeenCalledTimes(2)
    expect(onRetry).toHaveBeenCalledTimes(1)
  })

  it('should fail after max retries exhausted', async () => {
    const fn = vi.fn().mockRejectedValue(new HttpError('HTTP 500: Server error', 500))

    await expect(
      retryWithBackoff(fn, {
        maxRetries: 2,
        initialDelay: 10,
      })
    ).rejects.toThrow('HTTP 500: Server error')

    expect(fn).toHaveBeenCalledTimes(3) // 1 initial + 2 retries
  })

  it('should not retry non-retryable errors (400)', async () => {
    const fn = vi.fn().mockRejectedValue(new HttpError('Bad request', 400))

    await expect(retryWithBackoff(fn, { maxRetries: 3 })).rejects.toThrow('Bad request')

    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('should call onRetry callback on each retry', async () => {
    const error = new HttpError('HTTP 502', 502)
    const fn = vi.fn()
      .mockRejectedValueOnce(error)
      .mockRejectedValueOnce(error)
      .mockResolvedValue('success')

    const onRetry = vi.fn()
    await retryWithBackoff(fn, {
      maxRetries: 3,
      initialDelay: 10,
      onRetry,
    })

    expect(onRetry).toHaveBeenCalledTimes(2)
    expect(onRetry).toHaveBeenCalledWith(1, error, expect.any(Number))
    expect(onRetry).toHaveBeenCalledWith(2, error, expect.any(Number))
  })

  it('should apply exponential backoff', async () => {
    const error = new HttpError('HTTP 500', 500)
    const fn = vi.fn()
      .mockRejectedValueOnce(error)
      .mockRejectedValueOnce(error)
      .mockResolvedValue('success')

    const delays: number[] = []
    await retryWithBackoff(fn, {
      maxRetries: 3,
      initialDelay: 10,
      backoffFactor: 2,
      jitter: false, // Disable jitter for predictable test
      onRetry: (_attempt, _error, delay) => {
        delays.push(delay)
      },
    })

    expect(delays).toEqual([10, 20])
  })

  it('should use a custom retryable check when given', async () => {
    const transient = new SinkWriteError('batch rejected', { collection: 'tracks', ids: ['1'], retryable: true })
    const permanent = new SinkWriteError('mapping conflict', { collection: 'tracks', ids: ['1'], retryable: false })
    const isRetryable = (error: unknown) => error instanceof SinkWriteError && error.retryable

    const recovering = vi.fn().mockRejectedValueOnce(transient).mockResolvedValue('done')
    await expect(retryWithBackoff(recovering, { initialDelay: 1, isRetryable })).resolves.toBe('done')

    const failing = vi.fn().mockRejectedValue(permanent)
    await expect(retryWithBackoff(failing, { initialDelay: 1, isRetryable })).rejects.toBe(permanent)
    expect(failing).toHaveBeenCalledTimes(1)
  })

  it('should wrap non-Error rejections', async () => {
    const fn = vi.fn().mockRejectedValue('plain failure')

    await expect(retryWithBackoff(fn, { maxRetries: 0 })).rejects.toThrow('plain failure')
  })
})

describe('isRetryableError', () => {
  it('should retry rate limiting and gateway errors', () => {
    expect(isRetryableError(new HttpError('Too many requests', 429))).toBe(true)
    expect(isRetryableError(new HttpError('Gateway timeout', 504))).toBe(true)
  })

  it('should not retry client errors', () => {
    expect(isRetryableError(new HttpError('Not found', 404))).toBe(false)
  })

  it('should retry connection failures by error code', () => {
    expect(isRetryableError(new SocketError('connect ECONNREFUSED 127.0.0.1:9200', 'ECONNREFUSED'))).toBe(true)
    expect(isRetryableError(new SocketError('timeout of 30000ms exceeded', 'ECONNABORTED'))).toBe(true)
    expect(isRetryableError(new SocketError('no such file', 'ENOENT'))).toBe(false)
  })

  it('should read the status from an axios-style response', () => {
    const error = Object.assign(new Error('Request failed with status code 503'), { response: { status: 503 } })

    expect(isRetryableError(error)).toBe(true)
  })

  it('should fall back to an HTTP status in the message', () => {
    expect(isRetryableError(new Error('HTTP 503 from upstream'))).toBe(true)
    expect(isRetryableError(new Error('HTTP 401 from upstream'))).toBe(false)
  })

  it('should treat aborts as retryable', () => {
    const error = new Error('The operation was aborted')
    error.name = 'AbortError'

    expect(isRetryableError(error)).toBe(true)
  })
})

describe('calculateDelay', () => {
  it('should cap the delay at maxDelay', () => {
    expect(calculateDelay(5, 100, 150, 2, false)).toBe(150)
  })

  it('should add at most 50% jitter', () => {
    const delay = calculateDelay(1, 100, 1000, 2, true)

    expect(delay).toBeGreaterThanOrEqual(200)
    expect(delay).toBeLessThanOrEqual(300)
  })
})
