import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as path from 'path'
import { createLogger } from '@npu-latency/observability'
import {
  ACCURACY_GUARANTEE_HEADER,
  toArrayBuffer,
  type LatencyReport,
} from '@npu-latency/shared'
import {
  FakeToolchain,
  type FakeToolchainOptions,
  createTempDir,
  listArchiveEntries,
  packDirectory,
  removeDir,
} from '@npu-latency/toolchain-fixtures'
import {
  CompilationOrchestrator,
  IsolatedCompilationWorker,
  TensorBits,
  createCompileServerApp,
  createCompilerSettings,
  createPrecisionConfig,
  inProcessChannelFactory,
  writeSyntheticCalibration,
} from '../src'

const logger = createLogger('compile-server-test')
const MODEL_BYTES = Buffer.from('fake-onnx-model')

function modelForm(calibration?: Uint8Array): FormData {
  const form = new FormData()
  form.append('model', new Blob([toArrayBuffer(MODEL_BYTES)]), 'model.onnx')
  if (calibration) {
    form.append('calibration_data', new Blob([toArrayBuffer(calibration)]), 'calibration_data.zip')
  }
  return form
}

describe('compile server routes', () => {
  let root: string

  beforeEach(() => {
    root = createTempDir('compile-server-test')
  })

  afterEach(() => {
    removeDir(root)
  })

  function createApp(options: FakeToolchainOptions = {}) {
    const toolchain = new FakeToolchain(options)
    const orchestrator = new CompilationOrchestrator({
      workingDir: path.join(root, 'work'),
      toolchain,
      worker: new IsolatedCompilationWorker(logger, inProcessChannelFactory(toolchain, logger)),
      settings: createCompilerSettings({ toolchainPath: '/opt/npu-tools' }),
      precision: createPrecisionConfig({ tensorBits: TensorBits.TENSOR_8_BITS }),
      device: {
        measure: async (): Promise<LatencyReport> => ({ latency: 4.25, ORT_overhead_ms: 0.5 }),
      },
      logger,
    })
    return createCompileServerApp({ orchestrator, logger })
  }

  it('reports health', async () => {
    const res = await createApp().request('/health')

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ status: 'ok', service: 'compile-server', busy: false })
  })

  it('returns the artifact archive and flags synthetic calibration', async () => {
    const res = await createApp().request('/compile', { method: 'POST', body: modelForm() })

    expect(res.status).toBe(200)
    expect(res.headers.get('content-type')).toBe('application/zip')
    expect(res.headers.get(ACCURACY_GUARANTEE_HEADER)).toBe('none')

    const entries = listArchiveEntries(new Uint8Array(await res.arrayBuffer()))
    expect(entries).toContain('model.onnx')
    expect(entries).toContain('subgraph_0_net.bin')
  })

  it('does not flag archives calibrated on client data', async () => {
    const samples = path.join(root, 'samples')
    writeSyntheticCalibration([{ name: 'images', type: 'tensor(float)', shape: [1, 3, 8, 8] }], samples, 1)

    const res = await createApp().request('/compile', {
      method: 'POST',
      body: modelForm(packDirectory(samples)),
    })

    expect(res.status).toBe(200)
    expect(res.headers.get(ACCURACY_GUARANTEE_HEADER)).toBeNull()
  })

  it('rejects a form without a model', async () => {
    const form = new FormData()
    form.append('note', 'no model here')

    const res = await createApp().request('/compile', { method: 'POST', body: form })
    const body = await res.json()

    expect(res.status).toBe(400)
    expect(body.code).toBe('BAD_REQUEST')
    expect(body.message).toBe("Form field 'model' must carry the model file")
  })

  it('rejects a body that is not multipart', async () => {
    const res = await createApp().request('/compile', {
      method: 'POST',
      headers: { 'content-type': 'application/octet-stream' },
      body: toArrayBuffer(MODEL_BYTES),
    })

    expect(res.status).toBe(400)
    expect((await res.json()).message).toBe('Expected a multipart/form-data body')
  })

  it('answers 422 for calibration data that is not a zip', async () => {
    const res = await createApp().request('/compile', {
      method: 'POST',
      body: modelForm(Buffer.from('not a zip')),
    })
    const body = await res.json()

    expect(res.status).toBe(422)
    expect(body.code).toBe('INVALID_CALIBRATION_DATA')
    expect(body.message).toBe('Calibration data must be a zip file')
  })

  it('answers 500 with the compiler message when compilation fails', async () => {
    const res = await createApp({ compileFailure: 'Unsupported layer Gather_12' }).request('/compile', {
      method: 'POST',
      body: modelForm(),
    })
    const body = await res.json()

    expect(res.status).toBe(500)
    expect(body.code).toBe('COMPILER_ERROR')
    expect(body.message).toBe('Unsupported layer Gather_12')
  })

  it('measures a model through the device', async () => {
    const res = await createApp().request('/measure', {
      method: 'POST',
      headers: { 'content-type': 'application/octet-stream' },
      body: toArrayBuffer(MODEL_BYTES),
    })

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ latency: 4.25, ORT_overhead_ms: 0.5 })
  })

  it('rejects an empty measurement body', async () => {
    const res = await createApp().request('/measure', { method: 'POST' })

    expect(res.status).toBe(400)
    expect((await res.json()).code).toBe('BAD_REQUEST')
  })
})
