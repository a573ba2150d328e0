import type { Operation } from "../config";
import { BenchmarkError, ErrorCode } from "../errors";

export interface LatencyStats {
  avg: number;
  p50: number;
  p95: number;
  p99: number;
}

export interface OperationResult {
  operation: Operation;
  iterations: number;
  sampleCount: number;
  totalTimeSec: number;
  opsPerSec: number;
  /** Microseconds. */
  latency: LatencyStats;
  decodeFailures: number;
  emptyReads: number;
}

function median(sorted: readonly number[]): number {
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Nearest-rank without interpolation: the value at floor(fraction * n) in
 * ascending order, clamped to the last index.
 */
export function percentile(sorted: readonly number[], fraction: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.min(sorted.length - 1, Math.max(0, Math.floor(sorted.length * fraction)));
  return sorted[idx];
}

export function computeLatencyStats(samples: readonly number[]): LatencyStats {
  if (samples.length === 0) {
    return { avg: 0, p50: 0, p95: 0, p99: 0 };
  }
  const sorted = [...samples].sort((a, b) => a - b);
  return {
    avg: samples.reduce((a, b) => a + b, 0) / samples.length,
    p50: median(sorted),
    p95: percentile(sorted, 0.95),
    p99: percentile(sorted, 0.99),
  };
}

export function throughput(iterations: number, totalTimeSec: number): number {
  return totalTimeSec > 0 ? iterations / totalTimeSec : 0;
}

export function buildOperationResult(run: {
  operation: Operation;
  iterations: number;
  samples: readonly number[];
  totalTimeSec: number;
  decodeFailures: number;
  emptyReads: number;
}): OperationResult {
  // holes in a sparse array are skipped by filter, so only written samples count
  const recorded = run.samples.filter((s) => Number.isFinite(s)).length;
  if (recorded !== run.iterations || run.samples.length !== run.iterations) {
    throw new BenchmarkError(
      ErrorCode.SAMPLE_COUNT_MISMATCH,
      `${run.operation}: recorded ${recorded} latency samples for ${run.iterations} iterations`,
    );
  }
  return Object.freeze({
    operation: run.operation,
    iterations: run.iterations,
    sampleCount: recorded,
    totalTimeSec: run.totalTimeSec,
    opsPerSec: throughput(run.iterations, run.totalTimeSec),
    latency: computeLatencyStats(run.samples),
    decodeFailures: run.decodeFailures,
    emptyReads: run.emptyReads,
  });
}

/** Plain mean of per-operation throughputs, not total ops over total time. */
export function averageThroughput(results: readonly OperationResult[]): number {
  if (results.length === 0) return 0;
  return results.reduce((sum, r) => sum + r.opsPerSec, 0) / results.length;
}
