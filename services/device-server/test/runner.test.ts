import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs'
import * as path from 'path'
import { AppError, ErrorCode } from '@npu-latency/errors'
import { createLogger } from '@npu-latency/observability'
import { NPU_EXECUTION_PROVIDER, tensorValues, type TensorInfo } from '@npu-latency/shared'
import {
  FakeToolchain,
  createTempDir,
  removeDir,
  writeFakeModel,
} from '@npu-latency/toolchain-fixtures'
import { DeviceInferenceRunner, batchSizeOf, benchmarkModel, onesFeed } from '../src'

const logger = createLogger('runner-test')

function writeBundle(dir: string, models: string[] = ['model.onnx']): string {
  fs.mkdirSync(dir, { recursive: true })
  for (const name of models) {
    writeFakeModel(dir, name)
  }
  fs.writeFileSync(path.join(dir, 'subgraph_0_net.bin'), 'net-0')
  fs.writeFileSync(path.join(dir, 'subgraph_0_io.bin'), 'io-0')
  return dir
}

describe('batchSizeOf', () => {
  it('uses the leading dimension of the first input', () => {
    expect(batchSizeOf([{ name: 'x', type: 'float', shape: [4, 3, 8, 8] }])).toBe(4)
  })

  it.each([
    { label: 'dynamic', shape: [-1, 3] },
    { label: 'zero', shape: [0, 3] },
    { label: 'missing', shape: [] },
  ])('treats a $label leading dimension as 1', ({ shape }) => {
    expect(batchSizeOf([{ name: 'x', type: 'float', shape }])).toBe(1)
  })

  it('is 1 for a model without inputs', () => {
    expect(batchSizeOf([])).toBe(1)
  })
})

describe('onesFeed', () => {
  it('fills every declared input with ones', () => {
    const inputs: TensorInfo[] = [
      { name: 'images', type: 'tensor(float)', shape: [1, 2] },
      { name: 'ids', type: 'tensor(int32)', shape: [-1, 3] },
    ]
    const feed = onesFeed(inputs)

    expect(tensorValues(feed.images)).toEqual([1, 1])
    expect(feed.ids.dims).toEqual([1, 3])
    expect(tensorValues(feed.ids)).toEqual([1, 1, 1])
  })
})

describe('DeviceInferenceRunner', () => {
  let root: string

  beforeEach(() => {
    root = createTempDir('runner-test')
  })

  afterEach(() => {
    removeDir(root)
  })

  it('runs a bundle directory on the NPU with CPU fallback', async () => {
    const bundle = writeBundle(path.join(root, 'bundle'))
    const toolchain = new FakeToolchain()

    const model = await new DeviceInferenceRunner(toolchain, logger).load(bundle)

    expect(model.kind).toBe('accelerated')
    expect(model.modelPath).toBe(path.join(bundle, 'model.onnx'))
    expect(toolchain.sessions[0]?.providers).toEqual([
      { name: NPU_EXECUTION_PROVIDER, options: { tidl_tools_path: '', artifacts_folder: bundle } },
      { name: 'CPUExecutionProvider', options: {} },
    ])
  })

  it('runs a single model file on the CPU', async () => {
    const modelPath = writeFakeModel(root, 'resnet.onnx')
    const toolchain = new FakeToolchain()

    const model = await new DeviceInferenceRunner(toolchain, logger).load(modelPath)

    expect(model.kind).toBe('baseline')
    expect(toolchain.sessions[0]?.providers).toEqual([{ name: 'CPUExecutionProvider', options: {} }])
    expect(await model.statistics(2.5)).toEqual({ latency: 2.5 })
  })

  it('rejects a bundle with two model files', async () => {
    const bundle = writeBundle(path.join(root, 'bundle'), ['a.onnx', 'b.onnx'])

    const error = await new DeviceInferenceRunner(new FakeToolchain(), logger)
      .load(bundle)
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(AppError)
    expect(error).toMatchObject({
      code: ErrorCode.AMBIGUOUS_ARTIFACT,
      details: { directory: bundle, candidates: ['a.onnx', 'b.onnx'] },
    })
  })

  it('rejects a bundle without a model file', async () => {
    const bundle = writeBundle(path.join(root, 'bundle'), [])

    await expect(new DeviceInferenceRunner(new FakeToolchain(), logger).load(bundle)).rejects.toMatchObject({
      code: ErrorCode.AMBIGUOUS_ARTIFACT,
      message: 'Artifacts directory must contain exactly one model file, found 0',
    })
  })

  it('rejects a path that is neither file nor directory', async () => {
    await expect(
      new DeviceInferenceRunner(new FakeToolchain(), logger).load(path.join(root, 'missing'))
    ).rejects.toMatchObject({ code: ErrorCode.BAD_REQUEST })
  })

  it('releases the session when an input type is unsupported', async () => {
    const toolchain = new FakeToolchain({
      inputs: [{ name: 'tokens', type: 'tensor(string)', shape: [1, 4] }],
    })

    await expect(
      new DeviceInferenceRunner(toolchain, logger).load(writeBundle(path.join(root, 'bundle')))
    ).rejects.toMatchObject({ code: ErrorCode.UNSUPPORTED_TENSOR_TYPE })
    expect(toolchain.sessions).toHaveLength(1)
    expect(toolchain.sessions[0]?.released).toBe(true)
  })

  it('reuses one feed for every run', async () => {
    const toolchain = new FakeToolchain()
    const model = await new DeviceInferenceRunner(toolchain, logger).load(writeBundle(path.join(root, 'bundle')))

    await model.benchmarkRun()
    await model.benchmarkRun()

    const feeds = toolchain.sessions[0]?.feeds ?? []
    expect(feeds).toHaveLength(2)
    expect(feeds[0]).toBe(feeds[1])
  })

  it('breaks an accelerated run down per counter window', async () => {
    const toolchain = new FakeToolchain({ subgraphs: 2 })
    const model = await new DeviceInferenceRunner(toolchain, logger).load(writeBundle(path.join(root, 'bundle')))
    await model.benchmarkRun()

    const report = await model.statistics(3)

    expect(report.total_ms).toBe(3.5)
    expect(report.NPU_execution_ms).toBe(2)
    expect(report.NPU_copy_input_ms).toBe(0.2)
    expect(report.NPU_copy_output_ms).toBe(0.2)
    expect(report.ddr_read_ms).toBe(0.2)
    expect(report.ddr_write_ms).toBe(0.1)
    expect(report.total_execution_ms).toBeCloseTo(3.1, 10)
    expect(report.NPU_execution_ms + report.CPU_execution_ms).toBeCloseTo(report.total_execution_ms, 10)
    expect(report.latency).toBe(3)
    expect(report.ORT_overhead_ms).toBe(-0.5)
  })
})

describe('benchmarkModel', () => {
  let root: string

  beforeEach(() => {
    root = createTempDir('benchmark-test')
  })

  afterEach(() => {
    removeDir(root)
  })

  it('discards warmup runs and averages the measured ones', async () => {
    const toolchain = new FakeToolchain()
    const model = await new DeviceInferenceRunner(toolchain, logger).load(writeBundle(path.join(root, 'bundle')))

    const result = await benchmarkModel(model, { warmup: 3, repeat: 2, number: 5 })

    expect(toolchain.sessions[0]?.feeds).toHaveLength(13)
    expect(result.durations).toHaveLength(10)
    for (const duration of result.durations) {
      expect(duration).toBeGreaterThan(0)
    }
    const mean = result.durations.reduce((sum, value) => sum + value, 0) / 10
    expect(result.latencyMs).toBeCloseTo(mean, 10)
  })

  it('divides the mean by the batch size', async () => {
    const toolchain = new FakeToolchain({
      inputs: [{ name: 'images', type: 'tensor(float)', shape: [4, 3, 2, 2] }],
    })
    const model = await new DeviceInferenceRunner(toolchain, logger).load(writeBundle(path.join(root, 'bundle')))

    const result = await benchmarkModel(model, { warmup: 0, repeat: 1, number: 4 })

    const mean = result.durations.reduce((sum, value) => sum + value, 0) / 4
    expect(model.batchSize).toBe(4)
    expect(result.latencyMs).toBeCloseTo(mean / 4, 10)
  })
})
