import * as fs from 'fs'
import * as path from 'path'
import {
  COMPILATION_PROVIDER,
  NPU_EXECUTION_PROVIDER,
  type AcceleratorToolchain,
  type ExecutionProviderSpec,
  type InferenceSessionHandle,
  type RawCounters,
  type TensorFeed,
  type TensorInfo,
} from '@npu-latency/shared'

export interface FakeToolchainOptions {
  providers?: string[]
  inputs?: TensorInfo[]
  /** Subgraphs written by compilation and reported by accelerated runs (default: 1) */
  subgraphs?: number
  /** Thrown from the first calibration run of a compile session */
  compileFailure?: string
  /** Thrown from inferShapes */
  shapeInferenceFailure?: string
}

export const DEFAULT_FAKE_INPUTS: TensorInfo[] = [
  { name: 'images', type: 'tensor(float)', shape: [1, 3, 8, 8] },
]

/**
 * Counters for one accelerated run, in nanoseconds: subgraph i copies in for
 * 0.1 ms, computes for 1 ms and copies out for 0.1 ms, starting at 1.5 ms * i.
 */
export function fakeCounters(subgraphs: number): RawCounters {
  const counters: RawCounters = {
    'ts:run_start': 0,
    'ts:run_end': subgraphs * 1_500_000 + 500_000,
    'ddr:read_start': 0,
    'ddr:read_end': 200_000,
    'ddr:write_start': 0,
    'ddr:write_end': 100_000,
  }

  for (let i = 0; i < subgraphs; i++) {
    const base = i * 1_500_000
    const prefix = `ts:subgraph_${i}`
    counters[`${prefix}_copy_in_start`] = base
    counters[`${prefix}_copy_in_end`] = base + 100_000
    counters[`${prefix}_proc_start`] = base + 100_000
    counters[`${prefix}_proc_end`] = base + 1_100_000
    counters[`${prefix}_copy_out_start`] = base + 1_100_000
    counters[`${prefix}_copy_out_end`] = base + 1_200_000
  }
  return counters
}

export interface RecordedSession {
  modelPath: string
  providers: ExecutionProviderSpec[]
  feeds: TensorFeed[]
  released: boolean
}

/**
 * In-process stand-in for the native toolchain.
 *
 * Compile sessions write per-subgraph side files into their `artifacts_folder`
 * on release; NPU sessions refuse artifact folders without them.
 */
export class FakeToolchain implements AcceleratorToolchain {
  readonly sessions: RecordedSession[] = []
  readonly shapeInferenceCalls: string[] = []

  private readonly providers: string[]
  private readonly inputs: TensorInfo[]
  private readonly subgraphs: number

  constructor(private readonly options: FakeToolchainOptions = {}) {
    this.providers = options.providers ?? [
      COMPILATION_PROVIDER,
      NPU_EXECUTION_PROVIDER,
      'CPUExecutionProvider',
    ]
    this.inputs = options.inputs ?? DEFAULT_FAKE_INPUTS
    this.subgraphs = options.subgraphs ?? 1
  }

  async availableProviders(): Promise<string[]> {
    return [...this.providers]
  }

  async describeInputs(modelPath: string): Promise<TensorInfo[]> {
    this.assertModel(modelPath)
    return this.inputs.map((input) => ({ ...input, shape: [...input.shape] }))
  }

  async inferShapes(modelPath: string): Promise<void> {
    this.assertModel(modelPath)
    this.shapeInferenceCalls.push(modelPath)
    if (this.options.shapeInferenceFailure) {
      throw new Error(this.options.shapeInferenceFailure)
    }
  }

  async openSession(
    modelPath: string,
    providers: ExecutionProviderSpec[]
  ): Promise<InferenceSessionHandle> {
    this.assertModel(modelPath)
    const record: RecordedSession = { modelPath, providers, feeds: [], released: false }
    this.sessions.push(record)

    const primary = providers[0]?.name
    const artifactsFolder = String(providers[0]?.options.artifacts_folder ?? '')

    if (primary === NPU_EXECUTION_PROVIDER && !this.hasCompiledArtifacts(artifactsFolder)) {
      throw new Error(`No compiled subgraphs in ${artifactsFolder}`)
    }

    const inputs = await this.describeInputs(modelPath)
    const subgraphs = this.subgraphs
    const compileFailure = this.options.compileFailure
    let lastRun: RawCounters = {}

    return {
      inputs,
      async run(feed: TensorFeed): Promise<void> {
        if (primary === COMPILATION_PROVIDER && compileFailure) {
          throw new Error(compileFailure)
        }
        record.feeds.push(feed)
        lastRun = primary === NPU_EXECUTION_PROVIDER ? fakeCounters(subgraphs) : {}
      },
      async benchmarkData(): Promise<RawCounters> {
        return { ...lastRun }
      },
      async release(): Promise<void> {
        record.released = true
        if (primary === COMPILATION_PROVIDER) {
          writeSideFiles(artifactsFolder, subgraphs)
        }
      },
    }
  }

  compileSessions(): RecordedSession[] {
    return this.sessions.filter((session) => session.providers[0]?.name === COMPILATION_PROVIDER)
  }

  private assertModel(modelPath: string): void {
    if (!fs.existsSync(modelPath)) {
      throw new Error(`Model file not found: ${modelPath}`)
    }
  }

  private hasCompiledArtifacts(folder: string): boolean {
    return (
      folder.length > 0 &&
      fs.existsSync(folder) &&
      fs.readdirSync(folder).some((name) => name.endsWith('_net.bin'))
    )
  }
}

function writeSideFiles(folder: string, subgraphs: number): void {
  fs.mkdirSync(folder, { recursive: true })
  for (let i = 0; i < subgraphs; i++) {
    fs.writeFileSync(path.join(folder, `subgraph_${i}_net.bin`), `net-${i}`)
    fs.writeFileSync(path.join(folder, `subgraph_${i}_io.bin`), `io-${i}`)
  }
  fs.writeFileSync(path.join(folder, 'allowedNode.txt'), `${subgraphs}\n`)
}
