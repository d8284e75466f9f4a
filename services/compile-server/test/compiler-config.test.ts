import { describe, it, expect } from 'vitest'
import { AppError, ErrorCode } from '@npu-latency/errors'
import {
  AccuracyLevel,
  DataConversion,
  DebugLevel,
  TensorBits,
  buildCompilerOptions,
  calibrationConfigForTier,
  calibrationConfigOptions,
  createCalibrationConfig,
  createCompilerSettings,
  createModelConfig,
  createPrecisionConfig,
  modelConfigOptions,
  precisionConfigOptions,
  selectCalibrationConfig,
} from '../src'

describe('compiler configuration', () => {
  describe('model config', () => {
    it('flattens defaults to empty lists and no model type', () => {
      expect(modelConfigOptions(createModelConfig())).toEqual({
        model_type: '',
        'deny_list:layer_type': '',
        'deny_list:layer_name': '',
        'allow_list:layer_name': '',
      })
    })

    it('joins layer lists with commas and marks object detection', () => {
      const options = modelConfigOptions(
        createModelConfig({
          isObjectDetection: true,
          denyListLayerTypes: ['MaxPool', 'Softmax'],
          allowListLayerNames: ['conv1'],
        })
      )

      expect(options.model_type).toBe('OD')
      expect(options['deny_list:layer_type']).toBe('MaxPool,Softmax')
      expect(options['allow_list:layer_name']).toBe('conv1')
    })

    it('treats an empty list like an absent one', () => {
      const options = modelConfigOptions(createModelConfig({ denyListLayerNames: [] }))
      expect(options['deny_list:layer_name']).toBe('')
    })
  })

  describe('precision config', () => {
    it('uses -1 when no mixed precision factor is set', () => {
      expect(precisionConfigOptions(createPrecisionConfig({ tensorBits: TensorBits.TENSOR_16_BITS }))).toEqual({
        tensor_bits: 16,
        'advanced_options:output_feature_16bit_names_list': '',
        'advanced_options:params_16bit_names_list': '',
        'advanced_options:mixed_precision_factor': -1,
      })
    })

    it('passes the 16-bit overrides through', () => {
      const options = precisionConfigOptions(
        createPrecisionConfig({
          tensorBits: TensorBits.TENSOR_8_BITS,
          outputFeature16BitNames: ['head', 'neck'],
          params16BitNames: ['stem'],
          mixedPrecisionFactor: 1.2,
        })
      )

      expect(options['advanced_options:output_feature_16bit_names_list']).toBe('head,neck')
      expect(options['advanced_options:params_16bit_names_list']).toBe('stem')
      expect(options['advanced_options:mixed_precision_factor']).toBe(1.2)
    })

    it('rejects unsupported bit widths', () => {
      const tensorBits: number = 12
      expect(() => createPrecisionConfig({ tensorBits })).toThrow()
    })
  })

  describe('calibration config', () => {
    it('serializes booleans as 0/1 with the documented defaults', () => {
      const options = calibrationConfigOptions(
        createCalibrationConfig({ accuracyLevel: AccuracyLevel.BASIC })
      )

      expect(options).toEqual({
        accuracy_level: 0,
        'advanced_options:quantization_scale_type': 0,
        'advanced_options:high_resolution_optimization': 0,
        'advanced_options:pre_batchnorm_fold': 1,
        'advanced_options:activation_clipping': 1,
        'advanced_options:weight_clipping': 1,
        'advanced_options:bias_calibration': 1,
        'advanced_options:calibration_iterations': 5,
        'advanced_options:add_data_convert_ops': DataConversion.INPUT_OUTPUT_FORMAT_CONVERSION,
        'advanced_options:channel_wise_quantization': 0,
      })
    })

    it('selects the basic tier with one iteration for synthetic data', () => {
      const config = selectCalibrationConfig(false)
      expect(config.accuracyLevel).toBe(AccuracyLevel.BASIC)
      expect(config.calibrationIterations).toBe(1)
    })

    it('selects the advanced tier with every refinement for client data', () => {
      const config = selectCalibrationConfig(true)
      expect(config.accuracyLevel).toBe(AccuracyLevel.ADVANCED)
      expect(config.calibrationIterations).toBe(10)
      expect(config.preBatchnormFold).toBe(true)
      expect(config.activationClipping).toBe(true)
      expect(config.weightClipping).toBe(true)
      expect(config.biasCalibration).toBe(true)
    })

    it('uses one iteration for BASIC and five otherwise when compiling locally', () => {
      expect(calibrationConfigForTier(AccuracyLevel.BASIC).calibrationIterations).toBe(1)
      expect(calibrationConfigForTier(AccuracyLevel.ADVANCED).calibrationIterations).toBe(5)
      expect(calibrationConfigForTier(AccuracyLevel.USER_DEFINED).calibrationIterations).toBe(5)
    })
  })

  describe('compiler settings', () => {
    it('defaults to 16 subgraphs, no debug output and a zero nc flag', () => {
      expect(createCompilerSettings({ toolchainPath: '/opt/npu-tools' })).toEqual({
        toolchainPath: '/opt/npu-tools',
        debugLevel: DebugLevel.NO_DEBUG,
        maxNumSubgraphs: 16,
        internalNcFlag: 0,
      })
    })

    it.each([0, -1, 17])('rejects %i subgraphs as a configuration error', (maxNumSubgraphs) => {
      try {
        createCompilerSettings({ toolchainPath: '/opt/npu-tools', maxNumSubgraphs })
        expect.unreachable('settings should be rejected')
      } catch (error) {
        expect(error).toBeInstanceOf(AppError)
        expect(error).toMatchObject({ code: ErrorCode.CONFIGURATION_ERROR })
      }
    })

    it('rejects an unknown debug level', () => {
      const debugLevel: number = 7
      expect(() => createCompilerSettings({ toolchainPath: '/opt/npu-tools', debugLevel })).toThrow(
        /Invalid compiler settings/
      )
    })
  })

  it('builds the full provider option map', () => {
    const options = buildCompilerOptions({
      settings: createCompilerSettings({ toolchainPath: '/opt/npu-tools', debugLevel: DebugLevel.DEBUG_2 }),
      artifactsFolder: '/work/artifacts',
      model: createModelConfig(),
      precision: createPrecisionConfig({ tensorBits: TensorBits.TENSOR_8_BITS }),
      calibration: selectCalibrationConfig(true),
      calibrationFrames: 3,
    })

    expect(options).toMatchObject({
      platform: 'J7',
      version: '7.2',
      debug_level: 2,
      tidl_tools_path: '/opt/npu-tools',
      artifacts_folder: '/work/artifacts',
      max_num_subgraphs: 16,
      ti_internal_nc_flag: 0,
      tensor_bits: 8,
      accuracy_level: 1,
      'advanced_options:calibration_iterations': 10,
      'advanced_options:calibration_frames': 3,
    })
  })
})
