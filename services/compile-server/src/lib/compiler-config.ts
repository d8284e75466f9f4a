/**
 * Compiler configuration: enumerated settings for the model, precision and
 * calibration, each flattened to the provider option map the compilation
 * provider reads.
 */

import { z } from 'zod'
import { createConfigurationError } from '@npu-latency/errors'
import type { ProviderOptions } from '@npu-latency/shared'

export enum DebugLevel {
  NO_DEBUG = 0,
  DEBUG_1 = 1,
  DEBUG_2 = 2,
  /** Level 1 prints plus fixed point layer traces */
  DEBUG_3 = 3,
  /** Level 1 prints plus fixed and floating point traces */
  DEBUG_4_EXPERIMENTAL = 4,
  DEBUG_5_EXPERIMENTAL = 5,
  DEBUG_6_EXPERIMENTAL = 6,
}

export enum TensorBits {
  TENSOR_8_BITS = 8,
  TENSOR_16_BITS = 16,
  /** Host inference only, not supported on the device */
  TENSOR_32_BITS = 32,
}

export enum AccuracyLevel {
  BASIC = 0,
  /** Advanced bias calibration */
  ADVANCED = 1,
  USER_DEFINED = 9,
}

export enum QuantizationScaleType {
  NON_POWER_OF_2 = 0,
  POWER_OF_2 = 1,
  /** Pre-quantized asymmetric models only */
  TFLITE_ASYMMETRIC = 3,
}

export enum DataConversion {
  DISABLE = 0,
  INPUT_FORMAT_CONVERSION = 1,
  OUTPUT_FORMAT_CONVERSION = 2,
  INPUT_OUTPUT_FORMAT_CONVERSION = 3,
}

const NameListSchema = z.array(z.string().min(1)).optional()

export const ModelConfigSchema = z.object({
  isObjectDetection: z.boolean().default(false),
  denyListLayerTypes: NameListSchema,
  denyListLayerNames: NameListSchema,
  allowListLayerNames: NameListSchema,
})

export const PrecisionConfigSchema = z.object({
  tensorBits: z.nativeEnum(TensorBits),
  outputFeature16BitNames: NameListSchema,
  params16BitNames: NameListSchema,
  mixedPrecisionFactor: z.number().positive().optional(),
})

export const CalibrationConfigSchema = z.object({
  accuracyLevel: z.nativeEnum(AccuracyLevel),
  quantizationScaleType: z
    .nativeEnum(QuantizationScaleType)
    .default(QuantizationScaleType.NON_POWER_OF_2),
  highResolutionOptimization: z.boolean().default(false),
  preBatchnormFold: z.boolean().default(true),
  activationClipping: z.boolean().default(true),
  weightClipping: z.boolean().default(true),
  biasCalibration: z.boolean().default(true),
  calibrationIterations: z.number().int().positive().default(5),
  dataConversion: z
    .nativeEnum(DataConversion)
    .default(DataConversion.INPUT_OUTPUT_FORMAT_CONVERSION),
  channelWiseQuantization: z.boolean().default(false),
})

export type ModelConfig = z.infer<typeof ModelConfigSchema>
export type PrecisionConfig = z.infer<typeof PrecisionConfigSchema>
export type CalibrationConfig = z.infer<typeof CalibrationConfigSchema>

export type ModelConfigInput = z.input<typeof ModelConfigSchema>
export type PrecisionConfigInput = z.input<typeof PrecisionConfigSchema>
export type CalibrationConfigInput = z.input<typeof CalibrationConfigSchema>

export function createModelConfig(input: ModelConfigInput = {}): ModelConfig {
  return ModelConfigSchema.parse(input)
}

export function createPrecisionConfig(input: PrecisionConfigInput): PrecisionConfig {
  return PrecisionConfigSchema.parse(input)
}

export function createCalibrationConfig(input: CalibrationConfigInput): CalibrationConfig {
  return CalibrationConfigSchema.parse(input)
}

// Absent and empty lists both become "", which the provider reads as "no list"
function joinNames(names: string[] | undefined): string {
  return names ? names.join(',') : ''
}

function flag(value: boolean): number {
  return value ? 1 : 0
}

export function modelConfigOptions(config: ModelConfig): ProviderOptions {
  return {
    model_type: config.isObjectDetection ? 'OD' : '',
    'deny_list:layer_type': joinNames(config.denyListLayerTypes),
    'deny_list:layer_name': joinNames(config.denyListLayerNames),
    'allow_list:layer_name': joinNames(config.allowListLayerNames),
  }
}

export function precisionConfigOptions(config: PrecisionConfig): ProviderOptions {
  return {
    tensor_bits: config.tensorBits,
    'advanced_options:output_feature_16bit_names_list': joinNames(config.outputFeature16BitNames),
    'advanced_options:params_16bit_names_list': joinNames(config.params16BitNames),
    'advanced_options:mixed_precision_factor': config.mixedPrecisionFactor ?? -1,
  }
}

export function calibrationConfigOptions(config: CalibrationConfig): ProviderOptions {
  return {
    accuracy_level: config.accuracyLevel,
    'advanced_options:quantization_scale_type': config.quantizationScaleType,
    'advanced_options:high_resolution_optimization': flag(config.highResolutionOptimization),
    'advanced_options:pre_batchnorm_fold': flag(config.preBatchnormFold),
    'advanced_options:activation_clipping': flag(config.activationClipping),
    'advanced_options:weight_clipping': flag(config.weightClipping),
    'advanced_options:bias_calibration': flag(config.biasCalibration),
    'advanced_options:calibration_iterations': config.calibrationIterations,
    'advanced_options:add_data_convert_ops': config.dataConversion,
    'advanced_options:channel_wise_quantization': flag(config.channelWiseQuantization),
  }
}

/**
 * Calibration for a job: synthetic data gets the cheapest tier with a single
 * iteration, client data the advanced tier with every refinement enabled.
 */
export function selectCalibrationConfig(hasClientData: boolean): CalibrationConfig {
  if (!hasClientData) {
    return createCalibrationConfig({
      accuracyLevel: AccuracyLevel.BASIC,
      calibrationIterations: 1,
    })
  }
  return createCalibrationConfig({
    accuracyLevel: AccuracyLevel.ADVANCED,
    calibrationIterations: 10,
    preBatchnormFold: true,
    activationClipping: true,
    weightClipping: true,
    biasCalibration: true,
  })
}

/** Calibration for a named tier when compiling locally */
export function calibrationConfigForTier(accuracyLevel: AccuracyLevel): CalibrationConfig {
  return createCalibrationConfig({
    accuracyLevel,
    calibrationIterations: accuracyLevel === AccuracyLevel.BASIC ? 1 : 5,
  })
}

export const PLATFORM = 'J7'
export const PLATFORM_VERSION = '7.2'
export const MAX_SUBGRAPHS_LIMIT = 16

export interface CompilerSettings {
  toolchainPath: string
  debugLevel: DebugLevel
  maxNumSubgraphs: number
  internalNcFlag: number
}

export const CompilerSettingsSchema = z.object({
  toolchainPath: z.string().min(1),
  debugLevel: z.nativeEnum(DebugLevel).default(DebugLevel.NO_DEBUG),
  maxNumSubgraphs: z.number().int().default(MAX_SUBGRAPHS_LIMIT),
  internalNcFlag: z.number().int().default(0),
})

/**
 * Throws CONFIGURATION_ERROR for an invalid debug level or a subgraph bound
 * outside (0, 16].
 */
export function createCompilerSettings(
  input: z.input<typeof CompilerSettingsSchema>
): CompilerSettings {
  const parsed = CompilerSettingsSchema.safeParse(input)
  if (!parsed.success) {
    throw createConfigurationError(
      `Invalid compiler settings: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`
    )
  }

  const settings = parsed.data
  if (settings.maxNumSubgraphs <= 0 || settings.maxNumSubgraphs > MAX_SUBGRAPHS_LIMIT) {
    throw createConfigurationError(
      `max_num_subgraphs must be in the range (0, ${MAX_SUBGRAPHS_LIMIT}]`,
      { details: { maxNumSubgraphs: settings.maxNumSubgraphs } }
    )
  }
  return settings
}

export interface CompileOptionInputs {
  settings: CompilerSettings
  artifactsFolder: string
  model: ModelConfig
  precision: PrecisionConfig
  calibration: CalibrationConfig
  calibrationFrames: number
}

/**
 * Full option map for the compilation provider
 */
export function buildCompilerOptions(inputs: CompileOptionInputs): ProviderOptions {
  return {
    platform: PLATFORM,
    version: PLATFORM_VERSION,
    debug_level: inputs.settings.debugLevel,
    tidl_tools_path: inputs.settings.toolchainPath,
    artifacts_folder: inputs.artifactsFolder,
    max_num_subgraphs: inputs.settings.maxNumSubgraphs,
    ti_internal_nc_flag: inputs.settings.internalNcFlag,
    ...modelConfigOptions(inputs.model),
    ...precisionConfigOptions(inputs.precision),
    ...calibrationConfigOptions(inputs.calibration),
    'advanced_options:calibration_frames': inputs.calibrationFrames,
  }
}
