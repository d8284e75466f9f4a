/**
 * Device server routes
 */

import { Hono } from 'hono'
import { createBadRequestError } from '@npu-latency/errors'
import {
  correlation,
  errorHandler,
  notFoundHandler,
  requestLogger,
  type ServiceEnv,
} from '@npu-latency/http'
import type { ObservabilityLogger } from '@npu-latency/observability'
import type { DeviceMeasurementService } from './lib/measurement'

export const SERVICE_NAME = 'device-server'

export interface DeviceServerDeps {
  measurements: DeviceMeasurementService
  logger: ObservabilityLogger
  includeErrorStack?: boolean
}

export function createDeviceServerApp(deps: DeviceServerDeps): Hono<ServiceEnv> {
  const { measurements, logger } = deps
  const app = new Hono<ServiceEnv>()

  app.use('*', requestLogger(logger))
  app.use('*', correlation())
  app.onError(errorHandler(logger, { includeStack: deps.includeErrorStack }))
  app.notFound(notFoundHandler())

  app.get('/health', (c) =>
    c.json({ status: 'ok', service: SERVICE_NAME, busy: measurements.busy })
  )

  app.post('/measure', async (c) => {
    const bytes = new Uint8Array(await c.req.arrayBuffer())
    if (bytes.byteLength === 0) {
      throw createBadRequestError('Request body must carry a model file or an artifact archive')
    }
    return c.json(await measurements.measure(bytes))
  })

  return app
}
