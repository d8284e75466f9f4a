import { describe, it, expect } from 'vitest'
import { AppError, ErrorCode } from '@npu-latency/errors'
import { aggregateStatistics, baselineReport, discoverSubgraphIds } from '../src'

// Two subgraphs; every window is a round number of nanoseconds
function twoSubgraphCounters(): Record<string, number> {
  return {
    'ts:run_start': 0,
    'ts:run_end': 10_000_000,
    'ddr:read_start': 1_000_000,
    'ddr:read_end': 3_000_000,
    'ddr:write_start': 4_000_000,
    'ddr:write_end': 5_000_000,
    'ts:subgraph_0_proc_start': 1_000_000,
    'ts:subgraph_0_proc_end': 4_000_000,
    'ts:subgraph_0_copy_in_start': 500_000,
    'ts:subgraph_0_copy_in_end': 1_000_000,
    'ts:subgraph_0_copy_out_start': 4_000_000,
    'ts:subgraph_0_copy_out_end': 4_500_000,
    'ts:subgraph_1_proc_start': 5_000_000,
    'ts:subgraph_1_proc_end': 7_000_000,
    'ts:subgraph_1_copy_in_start': 4_500_000,
    'ts:subgraph_1_copy_in_end': 5_000_000,
    'ts:subgraph_1_copy_out_start': 7_000_000,
    'ts:subgraph_1_copy_out_end': 7_250_000,
  }
}

describe('aggregateStatistics', () => {
  it('discovers subgraph ids from proc_start keys', () => {
    expect(discoverSubgraphIds(twoSubgraphCounters())).toEqual(['0', '1'])
  })

  it('sums windows across subgraphs and converts to milliseconds', () => {
    const report = aggregateStatistics(twoSubgraphCounters(), 12)

    expect(report.total_ms).toBe(10)
    expect(report.ddr_read_ms).toBe(2)
    expect(report.ddr_write_ms).toBe(1)
    expect(report.NPU_execution_ms).toBe(5)
    expect(report.NPU_copy_input_ms).toBe(1)
    expect(report.NPU_copy_output_ms).toBe(0.75)
    expect(report.total_execution_ms).toBeCloseTo(8.25)
    expect(report.CPU_execution_ms).toBeCloseTo(3.25)
    expect(report.latency).toBe(12)
    expect(report.ORT_overhead_ms).toBe(2)
  })

  it('splits execution time exactly into NPU and CPU time', () => {
    const report = aggregateStatistics(twoSubgraphCounters(), 12)

    expect(report.NPU_execution_ms + report.CPU_execution_ms).toBeCloseTo(
      report.total_execution_ms,
      10
    )
  })

  it('keeps a negative overhead when the wall latency is below the counted total', () => {
    const report = aggregateStatistics(twoSubgraphCounters(), 8)

    expect(report.ORT_overhead_ms).toBe(-2)
  })

  it('names the overhead after the runtime label', () => {
    const report = aggregateStatistics(twoSubgraphCounters(), 12, 'TVM')

    expect(report.TVM_overhead_ms).toBe(2)
    expect(report.ORT_overhead_ms).toBeUndefined()
  })

  it('keeps nanosecond precision for 64-bit timestamps beyond 2^53', () => {
    const base = 2n ** 60n
    const counters: Record<string, bigint> = {}
    for (const [key, value] of Object.entries(twoSubgraphCounters())) {
      counters[key] = base + BigInt(value) + 1n
    }
    counters['ts:run_end'] = base + 10_000_001n + 7n

    const report = aggregateStatistics(counters, 12)

    expect(report.total_ms).toBe(10.000007)
    expect(report.NPU_execution_ms).toBe(5)
    expect(report.NPU_copy_output_ms).toBe(0.75)
  })

  it('reports zero NPU time when no subgraph ran', () => {
    const report = aggregateStatistics(
      {
        'ts:run_start': 0,
        'ts:run_end': 4_000_000,
        'ddr:read_start': 0,
        'ddr:read_end': 0,
        'ddr:write_start': 0,
        'ddr:write_end': 0,
      },
      5
    )

    expect(report.NPU_execution_ms).toBe(0)
    expect(report.total_execution_ms).toBe(4)
    expect(report.CPU_execution_ms).toBe(4)
  })

  it('fails with an internal error naming a missing counter', () => {
    const counters = twoSubgraphCounters()
    delete counters['ts:subgraph_1_copy_out_end']

    expect(() => aggregateStatistics(counters, 12)).toThrowError(
      "Missing benchmark counter 'ts:subgraph_1_copy_out_end'"
    )
    try {
      aggregateStatistics(counters, 12)
    } catch (error) {
      expect(error instanceof AppError && error.code).toBe(ErrorCode.INTERNAL_ERROR)
    }
  })
})

describe('baselineReport', () => {
  it('carries the latency only', () => {
    expect(baselineReport(3.5)).toEqual({ latency: 3.5 })
  })
})
