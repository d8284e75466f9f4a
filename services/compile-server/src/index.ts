/**
 * Compile server: calibration, compiler configuration, isolated compilation
 * and the HTTP surface.
 */

export * from './lib/compiler-config'
export * from './lib/calibration'
export { workingDirLayout, resetWorkingDir } from './lib/working-dir'
export type { WorkingDirLayout } from './lib/working-dir'
export {
  IsolatedCompilationWorker,
  forkWorkerChannel,
  WORKER_ENTRY,
} from './lib/isolated-worker'
export type { ForkChannelOptions, WorkerChannel, WorkerChannelFactory } from './lib/isolated-worker'
export { CompilationOrchestrator } from './lib/orchestrator'
export type { CompileOutcome, OrchestratorOptions } from './lib/orchestrator'
export { compileModelLocally } from './lib/local-compile'
export type { LocalCompileOptions } from './lib/local-compile'
export { runCompileJob } from './worker/compile-job'
export { inProcessChannelFactory } from './worker/in-process-channel'
export * from './worker/protocol'
export { createCompileServerApp, SERVICE_NAME } from './server'
export type { CompileServerDeps } from './server'
