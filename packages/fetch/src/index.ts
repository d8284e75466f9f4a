/**
 * @npu-latency/fetch
 * HTTP client with timeout and retry support.
 */

export { resilientFetch } from './resilient-fetch'
export type { RetryConfig, ResilientFetchOptions } from './types'
export {
  DEFAULT_RETRY_CONFIG,
  NO_RETRY_CONFIG,
  calculateRetryDelay,
  isRetryableStatus,
  isRetryableError,
} from './retry'
