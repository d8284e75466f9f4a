/**
 * Messages between the compile server and its disposable compile process
 */

import { z } from 'zod'
import { AppError, ErrorCode, formatError } from '@npu-latency/errors'
import {
  CalibrationConfigSchema,
  CompilerSettingsSchema,
  ModelConfigSchema,
  PrecisionConfigSchema,
} from '../lib/compiler-config'

export const CompileJobSchema = z.object({
  modelPath: z.string().min(1),
  outputDir: z.string().min(1),
  calibrationDir: z.string().min(1),
  settings: CompilerSettingsSchema,
  model: ModelConfigSchema,
  precision: PrecisionConfigSchema,
  calibration: CalibrationConfigSchema,
  /** Copy the source model next to the compiled artifacts */
  copyModelToOutput: z.boolean().default(true),
  inferShapes: z.boolean().default(true),
  /** Replace an existing output directory instead of failing */
  forceOverwrite: z.boolean().default(true),
})

export type CompileJob = z.infer<typeof CompileJobSchema>
export type CompileJobInput = z.input<typeof CompileJobSchema>

export const CompileJobResultSchema = z.object({
  calibrationFrames: z.number().int(),
  durationMs: z.number(),
  outputFiles: z.array(z.string()),
})

export type CompileJobResult = z.infer<typeof CompileJobResultSchema>

export const SerializedErrorSchema = z.object({
  code: z.string().optional(),
  message: z.string(),
  details: z.record(z.unknown()).optional(),
})

export type SerializedError = z.infer<typeof SerializedErrorSchema>

export const WorkerRequestSchema = z.object({
  type: z.literal('compile'),
  job: CompileJobSchema,
})

export type WorkerRequest = z.input<typeof WorkerRequestSchema>

export const WorkerResponseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('result'), result: CompileJobResultSchema }),
  z.object({ type: z.literal('error'), error: SerializedErrorSchema }),
])

export type WorkerResponse = z.infer<typeof WorkerResponseSchema>

export function serializeError(error: unknown): SerializedError {
  if (error instanceof AppError) {
    return { code: error.code, message: error.message, details: error.details }
  }
  return { message: formatError(error) }
}

function isErrorCode(value: string): value is ErrorCode {
  return Object.values<string>(ErrorCode).includes(value)
}

/** Rebuild an AppError from a serialized one; codes not known here are dropped */
export function deserializeError(error: SerializedError): AppError | Error {
  if (error.code && isErrorCode(error.code)) {
    return new AppError(error.code, error.message, { details: error.details })
  }
  return new Error(error.message)
}
