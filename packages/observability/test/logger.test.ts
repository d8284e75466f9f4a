import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { AppError, ErrorCode, runWithCorrelationId } from '@npu-latency/errors'
import { ObservabilityLogger, createJobSpan, sanitizeLogObject } from '../src'

const logSpy = vi.spyOn(console, 'log')
const errorSpy = vi.spyOn(console, 'error')

function lastJson(spy: typeof logSpy): Record<string, unknown> {
  const call = spy.mock.calls.at(-1)
  return JSON.parse(String(call?.[0]))
}

describe('ObservabilityLogger', () => {
  beforeEach(() => {
    logSpy.mockImplementation(() => undefined)
    errorSpy.mockImplementation(() => undefined)
  })

  afterEach(() => {
    logSpy.mockReset()
    errorSpy.mockReset()
  })

  it('writes JSON lines with service and child context outside local envs', () => {
    const logger = new ObservabilityLogger({ service: 'compile-server', env: 'production' })
    logger.child({ job_id: 'job-1' }).info('Compilation started', { tensor_bits: 8 })

    const entry = lastJson(logSpy)
    expect(entry.service).toBe('compile-server')
    expect(entry.env).toBe('production')
    expect(entry.level).toBe('info')
    expect(entry.message).toBe('Compilation started')
    expect(entry.job_id).toBe('job-1')
    expect(entry.tensor_bits).toBe(8)
  })

  it('writes a readable line in local envs', () => {
    const logger = new ObservabilityLogger({ service: 'device-server', env: 'local' })
    logger.info('Model loaded', { batch_size: 1 })

    const line = String(logSpy.mock.calls.at(-1)?.[0])
    expect(line).toMatch(/^\[.+\] INFO \[device-server\] Model loaded batch_size=1$/)
  })

  it('summarizes binary payloads and redacts secrets', () => {
    const logger = new ObservabilityLogger({ service: 'compile-server', env: 'production' })
    logger.info('Request received', { model: Buffer.alloc(16), api_key: 'test-secret' })

    const entry = lastJson(logSpy)
    expect(entry.model).toBe('[binary 16 bytes]')
    expect(entry.api_key).toBe('[REDACTED]')
  })

  it('picks up the correlation ID of the current request', () => {
    const logger = new ObservabilityLogger({ service: 'compile-server', env: 'production' })
    runWithCorrelationId('corr-42', () => logger.info('inside request'))

    expect(lastJson(logSpy).correlation_id).toBe('corr-42')
  })

  it('normalizes application errors', () => {
    const logger = new ObservabilityLogger({ service: 'compile-server', env: 'production' })
    logger.logError('Job failed', new AppError(ErrorCode.COMPILER_ERROR, 'calibration failed'))

    expect(lastJson(errorSpy).error).toEqual({
      code: 'COMPILER_ERROR',
      message: 'calibration failed',
      type: 'AppError',
    })
  })

  it('drops debug logs outside local envs', () => {
    const logger = new ObservabilityLogger({ service: 'device-server', env: 'production' })
    logger.debug('noisy')

    expect(logSpy).not.toHaveBeenCalled()
  })
})

describe('sanitizeLogObject', () => {
  it('walks nested objects and arrays', () => {
    const result = sanitizeLogObject({
      options: { password: 'test-secret', tensor_bits: 8 },
      feeds: [new Float32Array(4)],
      counter: 10n,
    })

    expect(result).toEqual({
      options: { password: '[REDACTED]', tensor_bits: 8 },
      feeds: ['[binary 16 bytes]'],
      counter: '10',
    })
  })
})

describe('createJobSpan', () => {
  beforeEach(() => {
    logSpy.mockImplementation(() => undefined)
    errorSpy.mockImplementation(() => undefined)
  })

  afterEach(() => {
    logSpy.mockReset()
    errorSpy.mockReset()
  })

  it('returns the result and logs completion', async () => {
    const span = createJobSpan({ service: 'test', jobId: 'job-1', jobType: 'compile' })
    const result = await span.execute(async () => 'done')

    expect(result).toBe('done')
    expect(logSpy).toHaveBeenCalled()
  })

  it('rethrows failures after logging them', async () => {
    await expect(
      createJobSpan({ service: 'test', jobId: 'job-2', jobType: 'compile' }).execute(async () => {
        throw new Error('compiler crashed')
      })
    ).rejects.toThrow('compiler crashed')
    expect(errorSpy).toHaveBeenCalled()
  })
})
