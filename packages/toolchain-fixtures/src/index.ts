/**
 * @npu-latency/toolchain-fixtures
 * In-process toolchain and model fixtures for tests.
 */

export {
  FakeToolchain,
  DEFAULT_FAKE_INPUTS,
  fakeCounters,
  type FakeToolchainOptions,
  type RecordedSession,
} from './fake-toolchain'
export { writeFakeModel, createTempDir, removeDir } from './files'
export { packDirectory, listArchiveEntries, corruptCentralDirectory } from './archives'
