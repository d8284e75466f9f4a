import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as path from 'path'
import {
  CompilationOrchestrator,
  IsolatedCompilationWorker,
  TensorBits,
  createCompilerSettings,
  createPrecisionConfig,
  inProcessChannelFactory,
} from '@npu-latency/compile-server'
import { createLogger } from '@npu-latency/observability'
import { extractArchive } from '@npu-latency/shared'
import {
  FakeToolchain,
  createTempDir,
  listArchiveEntries,
  removeDir,
} from '@npu-latency/toolchain-fixtures'
import { DeviceInferenceRunner, DeviceMeasurementService, benchmarkModel } from '../src'

const logger = createLogger('end-to-end-test')

describe('compile then measure', () => {
  let root: string

  beforeEach(() => {
    root = createTempDir('end-to-end-test')
  })

  afterEach(() => {
    removeDir(root)
  })

  function compileServer(toolchain: FakeToolchain, device?: DeviceMeasurementService) {
    return new CompilationOrchestrator({
      workingDir: path.join(root, 'compile'),
      toolchain,
      worker: new IsolatedCompilationWorker(logger, inProcessChannelFactory(toolchain, logger)),
      settings: createCompilerSettings({ toolchainPath: '/opt/npu-tools' }),
      precision: createPrecisionConfig({ tensorBits: TensorBits.TENSOR_8_BITS }),
      device,
      logger,
    })
  }

  it('loads the compiled archive on the device and times ten runs', async () => {
    const toolchain = new FakeToolchain()
    const { archive } = await compileServer(toolchain).compile(Buffer.from('fake-onnx-model'))

    const onnxFiles = listArchiveEntries(archive).filter((name) => name.endsWith('.onnx'))
    expect(onnxFiles).toEqual(['model.onnx'])
    expect(listArchiveEntries(archive).length).toBeGreaterThan(1)

    const bundle = path.join(root, 'device')
    extractArchive(archive, bundle)
    const model = await new DeviceInferenceRunner(toolchain, logger).load(bundle)
    const result = await benchmarkModel(model, { warmup: 0, repeat: 1, number: 10 })

    expect(result.durations).toHaveLength(10)
    for (const duration of result.durations) {
      expect(duration).toBeGreaterThan(0)
    }
    const mean = result.durations.reduce((sum, value) => sum + value, 0) / 10
    expect(result.latencyMs).toBeCloseTo(mean, 10)
    await model.release()
  })

  it('measures through the compile server with the device in process', async () => {
    const toolchain = new FakeToolchain({ subgraphs: 2 })
    const device = new DeviceMeasurementService({
      workingDir: path.join(root, 'device'),
      toolchain,
      logger,
      benchmark: { warmup: 1, repeat: 1, number: 10 },
    })

    const report = await compileServer(toolchain, device).measure(Buffer.from('fake-onnx-model'))

    expect(report.NPU_execution_ms).toBe(2)
    expect(report.total_ms).toBe(3.5)
    expect(report.NPU_execution_ms + report.CPU_execution_ms).toBeCloseTo(report.total_execution_ms, 10)
  })
})
