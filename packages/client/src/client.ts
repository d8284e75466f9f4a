/**
 * HTTP client for the compile server and the device server
 */

import { Agent, type Dispatcher } from 'undici'
import { AppError, ErrorCode, createTransportError } from '@npu-latency/errors'
import { NO_RETRY_CONFIG, resilientFetch } from '@npu-latency/fetch'
import {
  ACCURACY_GUARANTEE_HEADER,
  DEFAULT_COMPILE_TIMEOUT_SECONDS,
  toArrayBuffer,
} from '@npu-latency/shared'
import { ErrorBodySchema, LatencyReportSchema } from './schemas'
import type {
  LatencyMeasurer,
  LatencyReport,
  RemoteClientConfig,
  RemoteCompileResult,
} from './types'

const DEFAULT_TIMEOUT_MS = DEFAULT_COMPILE_TIMEOUT_SECONDS * 1000

/**
 * Compilations and measurements answer only when done, so the dispatcher
 * waits on headers and body indefinitely and the request timeout governs.
 */
function createLongRunningDispatcher(): Dispatcher {
  return new Agent({ headersTimeout: 0, bodyTimeout: 0 })
}

/**
 * Prefer the server's error envelope message, fall back to the status text
 */
async function failureReason(response: Response): Promise<string> {
  const contentType = response.headers.get('content-type') ?? ''
  if (contentType.includes('application/json')) {
    const body = ErrorBodySchema.safeParse(await response.json().catch(() => null))
    return body.success ? body.data.message : response.statusText
  }
  const text = (await response.text()).trim()
  return text || response.statusText
}

export class RemoteLatencyClient implements LatencyMeasurer {
  private readonly baseUrl: string
  private readonly dispatcher: Dispatcher

  constructor(private readonly config: RemoteClientConfig) {
    this.baseUrl = `http://${config.host}:${config.port}`
    this.dispatcher = config.dispatcher ?? createLongRunningDispatcher()
  }

  /**
   * POST model or artifact bytes to `/measure`. Sent once, never retried.
   */
  async measure(model: Uint8Array): Promise<LatencyReport> {
    const response = await resilientFetch(`${this.baseUrl}/measure`, {
      method: 'POST',
      headers: { 'content-type': 'application/octet-stream' },
      body: toArrayBuffer(model),
      timeout: this.config.measureTimeoutMs ?? DEFAULT_TIMEOUT_MS,
      retry: NO_RETRY_CONFIG,
      correlationId: this.config.correlationId,
      dispatcher: this.dispatcher,
    })

    if (!response.ok) {
      throw createTransportError(response.status, await failureReason(response))
    }

    const parsed = LatencyReportSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new AppError(
        ErrorCode.TRANSPORT_ERROR,
        `Invalid latency report from ${this.baseUrl}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`
      )
    }
    return parsed.data
  }

  /**
   * POST a model and optional calibration zip to `/compile` and return the
   * compiled artifact archive.
   */
  async compile(model: Uint8Array, calibrationZip?: Uint8Array): Promise<RemoteCompileResult> {
    const form = new FormData()
    form.append('model', new Blob([toArrayBuffer(model)]), 'model.onnx')
    if (calibrationZip) {
      form.append(
        'calibration_data',
        new Blob([toArrayBuffer(calibrationZip)], { type: 'application/zip' }),
        'calibration_data.zip'
      )
    }

    const response = await resilientFetch(`${this.baseUrl}/compile`, {
      method: 'POST',
      body: form,
      timeout: this.config.compileTimeoutMs ?? DEFAULT_TIMEOUT_MS,
      retry: NO_RETRY_CONFIG,
      correlationId: this.config.correlationId,
      dispatcher: this.dispatcher,
    })

    if (!response.ok) {
      throw createTransportError(response.status, await failureReason(response))
    }

    return {
      archive: Buffer.from(await response.arrayBuffer()),
      accuracyGuaranteed: response.headers.get(ACCURACY_GUARANTEE_HEADER) !== 'none',
    }
  }
}
