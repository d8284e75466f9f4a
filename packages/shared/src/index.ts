/**
 * @npu-latency/shared
 * Constants, the toolchain boundary, tensor encoding, latency statistics,
 * archives and CLI helpers used by both services and the client.
 */

export * from './constants'
export * from './toolchain'
export * from './tensors'
export * from './statistics'
export * from './archive'
export * from './native-toolchain'
export * from './cli-args'
export * from './serial-queue'
export * from './bytes'
export * from './run-cli'
