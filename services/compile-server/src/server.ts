/**
 * Compile server routes
 */

import { Hono } from 'hono'
import { createBadRequestError, formatError } from '@npu-latency/errors'
import {
  correlation,
  errorHandler,
  notFoundHandler,
  requestLogger,
  type ServiceEnv,
} from '@npu-latency/http'
import type { ObservabilityLogger } from '@npu-latency/observability'
import { ACCURACY_GUARANTEE_HEADER, toArrayBuffer } from '@npu-latency/shared'
import type { CompilationOrchestrator } from './lib/orchestrator'

export const SERVICE_NAME = 'compile-server'

export interface CompileServerDeps {
  orchestrator: CompilationOrchestrator
  logger: ObservabilityLogger
  includeErrorStack?: boolean
}

async function readForm(req: Request): Promise<FormData> {
  const contentType = req.headers.get('content-type') ?? ''
  if (!contentType.startsWith('multipart/form-data')) {
    throw createBadRequestError('Expected a multipart/form-data body')
  }
  try {
    return await req.formData()
  } catch (error) {
    throw createBadRequestError(`Malformed multipart body: ${formatError(error)}`)
  }
}

async function fileField(form: FormData, name: string): Promise<Uint8Array | undefined> {
  const values = form.getAll(name)
  if (values.length === 0) {
    return undefined
  }
  const [value] = values
  if (values.length > 1 || typeof value === 'string') {
    throw createBadRequestError(`Form field '${name}' must be a single file`)
  }
  return new Uint8Array(await value.arrayBuffer())
}

export function createCompileServerApp(deps: CompileServerDeps): Hono<ServiceEnv> {
  const { orchestrator, logger } = deps
  const app = new Hono<ServiceEnv>()

  app.use('*', requestLogger(logger))
  app.use('*', correlation())
  app.onError(errorHandler(logger, { includeStack: deps.includeErrorStack }))
  app.notFound(notFoundHandler())

  app.get('/health', (c) =>
    c.json({ status: 'ok', service: SERVICE_NAME, busy: orchestrator.busy })
  )

  app.post('/compile', async (c) => {
    const form = await readForm(c.req.raw)
    const model = await fileField(form, 'model')
    if (!model || model.byteLength === 0) {
      throw createBadRequestError("Form field 'model' must carry the model file")
    }
    const calibration = await fileField(form, 'calibration_data')

    const outcome = await orchestrator.compile(model, calibration)

    c.header('content-type', 'application/zip')
    c.header('content-disposition', 'attachment; filename="artifacts.zip"')
    if (outcome.calibrationSource === 'synthetic') {
      c.header(ACCURACY_GUARANTEE_HEADER, 'none')
    }
    return c.body(toArrayBuffer(outcome.archive))
  })

  app.post('/measure', async (c) => {
    const model = new Uint8Array(await c.req.arrayBuffer())
    if (model.byteLength === 0) {
      throw createBadRequestError('Request body must carry the model file')
    }
    return c.json(await orchestrator.measure(model))
  })

  return app
}
