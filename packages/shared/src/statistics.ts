/**
 * Latency breakdown from the accelerator's raw hardware counters
 */

import { createInternalError } from '@npu-latency/errors'
import type { RawCounters } from './toolchain'

/** Category name to milliseconds; always carries `latency` */
export type LatencyReport = Record<string, number>

export const DEFAULT_RUNTIME_LABEL = 'ORT'

const NANOSECONDS_PER_MS = 1e6
const SUBGRAPH_KEY = /^ts:subgraph_(.+)_proc_start$/

function counter(raw: RawCounters, key: string): number | bigint {
  const value = raw[key]
  if (value === undefined) {
    throw createInternalError(`Missing benchmark counter '${key}'`, { details: { key } })
  }
  return value
}

/** bigint pairs are subtracted before conversion so large timestamps keep ns precision */
function windowNs(raw: RawCounters, start: string, end: string): number {
  const from = counter(raw, start)
  const to = counter(raw, end)
  if (typeof from === 'bigint' && typeof to === 'bigint') {
    return Number(to - from)
  }
  return Number(to) - Number(from)
}

/** Subgraph ids in first-seen key order */
export function discoverSubgraphIds(raw: RawCounters): string[] {
  const ids: string[] = []
  for (const key of Object.keys(raw)) {
    const match = SUBGRAPH_KEY.exec(key)
    if (match) {
      ids.push(match[1])
    }
  }
  return ids
}

/**
 * Build the report for one accelerated run.
 *
 * Counter windows are summed across subgraphs and converted from ns to ms.
 * `total_execution_ms` excludes the NPU copy windows and is split into NPU
 * and CPU time; `<label>_overhead_ms` is the wall latency minus the counted
 * total and may be negative.
 */
export function aggregateStatistics(
  raw: RawCounters,
  wallLatencyMs: number,
  runtimeLabel: string = DEFAULT_RUNTIME_LABEL
): LatencyReport {
  const windows = {
    total_ms: windowNs(raw, 'ts:run_start', 'ts:run_end'),
    ddr_read_ms: windowNs(raw, 'ddr:read_start', 'ddr:read_end'),
    ddr_write_ms: windowNs(raw, 'ddr:write_start', 'ddr:write_end'),
    NPU_execution_ms: 0,
    NPU_copy_input_ms: 0,
    NPU_copy_output_ms: 0,
  }

  for (const id of discoverSubgraphIds(raw)) {
    const prefix = `ts:subgraph_${id}`
    windows.NPU_execution_ms += windowNs(raw, `${prefix}_proc_start`, `${prefix}_proc_end`)
    windows.NPU_copy_input_ms += windowNs(raw, `${prefix}_copy_in_start`, `${prefix}_copy_in_end`)
    windows.NPU_copy_output_ms += windowNs(
      raw,
      `${prefix}_copy_out_start`,
      `${prefix}_copy_out_end`
    )
  }

  const report: LatencyReport = {}
  for (const [name, value] of Object.entries(windows)) {
    report[name] = value / NANOSECONDS_PER_MS
  }

  const totalExecutionMs =
    report.total_ms - report.NPU_copy_input_ms - report.NPU_copy_output_ms
  report.total_execution_ms = totalExecutionMs
  report.CPU_execution_ms = totalExecutionMs - report.NPU_execution_ms

  report.latency = wallLatencyMs
  report[`${runtimeLabel}_overhead_ms`] = wallLatencyMs - report.total_ms

  return report
}

/** Report for a CPU-only run, which has no hardware counters */
export function baselineReport(wallLatencyMs: number): LatencyReport {
  return { latency: wallLatencyMs }
}
