/**
 * Adapter over the native toolchain binding shipped in the toolchain directory.
 *
 * The binding is a Node add-on (`<toolchain>/binding.node`, or a `binding.js`
 * shim) exposing getAvailableProviders, getModelInputs, inferShapes and
 * createSession. Everything it returns is validated before use.
 */

import * as fs from 'fs'
import * as path from 'path'
import { z } from 'zod'
import { createConfigurationError, formatError } from '@npu-latency/errors'
import type {
  AcceleratorToolchain,
  ExecutionProviderSpec,
  InferenceSessionHandle,
  RawCounters,
  TensorFeed,
} from './toolchain'
import type { TensorInfo } from './tensors'

interface NativeSession {
  getInputs(): unknown
  run(feed: TensorFeed): unknown
  getBenchmarkData(): unknown
  release(): unknown
}

interface NativeBinding {
  getAvailableProviders(): unknown
  getModelInputs(modelPath: string): unknown
  inferShapes(modelPath: string, outputPath: string): unknown
  createSession(modelPath: string, providers: ExecutionProviderSpec[]): unknown
}

const BINDING_METHODS = [
  'getAvailableProviders',
  'getModelInputs',
  'inferShapes',
  'createSession',
] as const
const SESSION_METHODS = ['getInputs', 'run', 'getBenchmarkData', 'release'] as const

export const BINDING_MODULE_NAME = 'binding'

const ProvidersSchema = z.array(z.string())

export const TensorInfoSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  shape: z.array(z.number().int()),
})

const TensorInfoListSchema = z.array(TensorInfoSchema)

const RawCountersSchema = z.record(z.union([z.number(), z.bigint()]))

function hasMethods(value: unknown, methods: readonly string[]): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    methods.every((method) => typeof Reflect.get(value, method) === 'function')
  )
}

function isNativeBinding(value: unknown): value is NativeBinding {
  return hasMethods(value, BINDING_METHODS)
}

function isNativeSession(value: unknown): value is NativeSession {
  return hasMethods(value, SESSION_METHODS)
}

class NativeSessionHandle implements InferenceSessionHandle {
  constructor(
    private readonly session: NativeSession,
    readonly inputs: TensorInfo[]
  ) {}

  async run(feed: TensorFeed): Promise<void> {
    await this.session.run(feed)
  }

  async benchmarkData(): Promise<RawCounters> {
    return RawCountersSchema.parse(await this.session.getBenchmarkData())
  }

  async release(): Promise<void> {
    await this.session.release()
  }
}

export class NativeToolchain implements AcceleratorToolchain {
  constructor(private readonly binding: NativeBinding) {}

  async availableProviders(): Promise<string[]> {
    return ProvidersSchema.parse(await this.binding.getAvailableProviders())
  }

  async describeInputs(modelPath: string): Promise<TensorInfo[]> {
    return TensorInfoListSchema.parse(await this.binding.getModelInputs(modelPath))
  }

  async inferShapes(modelPath: string): Promise<void> {
    await this.binding.inferShapes(modelPath, modelPath)
  }

  async openSession(
    modelPath: string,
    providers: ExecutionProviderSpec[]
  ): Promise<InferenceSessionHandle> {
    const session: unknown = await this.binding.createSession(modelPath, providers)
    if (!isNativeSession(session)) {
      throw new TypeError('Toolchain binding returned an invalid inference session')
    }
    const inputs = TensorInfoListSchema.parse(await session.getInputs())
    return new NativeSessionHandle(session, inputs)
  }
}

/**
 * Toolchain directory from an environment variable, resolved to an absolute path.
 * Throws CONFIGURATION_ERROR when unset or missing on disk.
 */
export function resolveToolchainPath(envName: string, explicitPath?: string): string {
  const configured = explicitPath ?? process.env[envName]
  if (!configured) {
    throw createConfigurationError(
      `Toolchain path must be set as an option or through the ${envName} environment variable`,
      { details: { env: envName } }
    )
  }

  const resolved = path.resolve(configured)
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isDirectory()) {
    throw createConfigurationError(`Toolchain directory not found: ${resolved}`, {
      details: { env: envName, path: resolved },
    })
  }
  return resolved
}

/**
 * Load the binding from a toolchain directory
 */
export function loadNativeToolchain(toolchainDir: string): NativeToolchain {
  const bindingPath = path.join(toolchainDir, BINDING_MODULE_NAME)

  let loaded: unknown
  try {
    loaded = require(bindingPath)
  } catch (error) {
    throw createConfigurationError(
      `Cannot load toolchain binding from ${bindingPath}: ${formatError(error)}`,
      { cause: error instanceof Error ? error : undefined }
    )
  }

  if (!isNativeBinding(loaded)) {
    throw createConfigurationError(
      `Toolchain binding at ${bindingPath} must export ${BINDING_METHODS.join(', ')}`
    )
  }
  return new NativeToolchain(loaded)
}

/**
 * Throws CONFIGURATION_ERROR unless every listed provider is available
 */
export async function assertProvidersAvailable(
  toolchain: AcceleratorToolchain,
  required: string[]
): Promise<string[]> {
  const available = await toolchain.availableProviders()
  const missing = required.filter((provider) => !available.includes(provider))
  if (missing.length > 0) {
    throw createConfigurationError(`Execution provider not available: ${missing.join(', ')}`, {
      details: { available, missing },
    })
  }
  return available
}
