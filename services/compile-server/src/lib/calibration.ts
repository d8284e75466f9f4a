/**
 * Calibration data: sample files on disk, synthesized or unpacked from a
 * client archive.
 */

import * as fs from 'fs'
import * as path from 'path'
import { z } from 'zod'
import {
  createInvalidCalibrationDataError,
  createNoCalibrationDataError,
  formatError,
} from '@npu-latency/errors'
import type { ObservabilityLogger } from '@npu-latency/observability'
import {
  CALIBRATION_SAMPLE_SUFFIX,
  DEFAULT_SYNTHETIC_SAMPLE_COUNT,
  createFilledTensor,
  decodeTensor,
  encodeTensorData,
  extractArchive,
  type AcceleratorToolchain,
  type TensorFeed,
  type TensorInfo,
} from '@npu-latency/shared'

export const CalibrationSampleSchema = z.object({
  inputs: z.record(
    z.object({
      type: z.string().min(1),
      shape: z.array(z.number().int().nonnegative()),
      data: z.string(),
    })
  ),
})

export type CalibrationSample = z.infer<typeof CalibrationSampleSchema>

export type CalibrationSource = 'client' | 'synthetic'

export interface CalibrationDataset {
  directory: string
  source: CalibrationSource
  /** Sample file names in processing order */
  samples: string[]
}

export function syntheticSampleName(index: number): string {
  return `synthetic_calibration_${index}${CALIBRATION_SAMPLE_SUFFIX}`
}

export function encodeCalibrationSample(feed: TensorFeed): string {
  const sample: CalibrationSample = { inputs: {} }
  for (const [name, tensor] of Object.entries(feed)) {
    sample.inputs[name] = {
      type: tensor.type,
      shape: tensor.dims,
      data: encodeTensorData(tensor.data),
    }
  }
  return JSON.stringify(sample)
}

export function readCalibrationSample(filePath: string): TensorFeed {
  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'))
  } catch (error) {
    throw createInvalidCalibrationDataError(
      `Calibration sample ${path.basename(filePath)} is not valid JSON: ${formatError(error)}`
    )
  }

  const parsed = CalibrationSampleSchema.safeParse(raw)
  if (!parsed.success) {
    throw createInvalidCalibrationDataError(
      `Calibration sample ${path.basename(filePath)} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`
    )
  }

  const feed: TensorFeed = {}
  for (const [name, entry] of Object.entries(parsed.data.inputs)) {
    feed[name] = decodeTensor(name, entry.type, entry.shape, entry.data)
  }
  return feed
}

/**
 * Sample file names directly inside `directory`, sorted. Nested directories
 * are not searched.
 */
export function listCalibrationSamples(directory: string): string[] {
  if (!fs.existsSync(directory)) {
    return []
  }
  return fs
    .readdirSync(directory, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(CALIBRATION_SAMPLE_SUFFIX))
    .map((entry) => entry.name)
    .sort()
}

/**
 * Write `count` samples; sample i (1-based) fills every input with i.
 */
export function writeSyntheticCalibration(
  inputs: TensorInfo[],
  directory: string,
  count: number = DEFAULT_SYNTHETIC_SAMPLE_COUNT
): string[] {
  fs.mkdirSync(directory, { recursive: true })
  const names: string[] = []

  for (let i = 1; i <= count; i++) {
    const feed: TensorFeed = {}
    for (const input of inputs) {
      feed[input.name] = createFilledTensor(input, i)
    }
    const name = syntheticSampleName(i)
    fs.writeFileSync(path.join(directory, name), encodeCalibrationSample(feed))
    names.push(name)
  }
  return names
}

export interface ResolveCalibrationOptions {
  modelPath: string
  directory: string
  /** Client zip; synthetic samples are written when absent */
  archive?: Uint8Array
  sampleCount?: number
}

export class CalibrationDataProvider {
  constructor(
    private readonly toolchain: AcceleratorToolchain,
    private readonly logger: ObservabilityLogger
  ) {}

  /**
   * Fill `directory` with calibration samples.
   * Throws INVALID_CALIBRATION_DATA for a non-zip archive and
   * NO_CALIBRATION_DATA when the directory ends up without samples.
   */
  async resolve(options: ResolveCalibrationOptions): Promise<CalibrationDataset> {
    const { directory, archive } = options
    let source: CalibrationSource

    if (archive) {
      const extracted = extractArchive(archive, directory)
      this.logger.info('Calibration archive extracted', { entries: extracted.length })
      source = 'client'
    } else {
      const inputs = await this.toolchain.describeInputs(options.modelPath)
      const written = writeSyntheticCalibration(inputs, directory, options.sampleCount)
      this.logger.warn('No calibration data supplied, using synthetic samples; accuracy is not guaranteed', {
        samples: written.length,
      })
      source = 'synthetic'
    }

    const samples = listCalibrationSamples(directory)
    if (samples.length === 0) {
      throw createNoCalibrationDataError(directory)
    }
    return { directory, source, samples }
  }
}
