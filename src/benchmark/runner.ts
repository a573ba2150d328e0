import type { BenchmarkConfig } from "../config";
import { errorMessage } from "../errors";
import { type ReportRenderer, type RunSummary, verdictFor } from "../report/renderer";
import type { OperationDriver } from "./driver";
import { averageThroughput, type OperationResult } from "./stats";

/**
 * Benchmarks each configured operation in order. With `onError: "abort"` the
 * first failure ends the run; with `"continue"` it is recorded and the next
 * operation starts on a fresh connection.
 */
export async function runBenchmarks(
  config: BenchmarkConfig,
  driver: OperationDriver,
  renderer: ReportRenderer,
): Promise<RunSummary> {
  const results: OperationResult[] = [];
  const failures: RunSummary["failures"] = [];

  for (const operation of config.operations) {
    renderer.operationStarted(operation);
    try {
      const result = await driver.run(operation, config.iterations);
      results.push(result);
      renderer.operationFinished(result);
    } catch (error) {
      renderer.operationFailed(errorMessage(error));
      if (config.onError === "abort") throw error;
      console.error(`[Runner] ${operation} failed, continuing:`, errorMessage(error));
      failures.push({ operation, error: errorMessage(error) });
    }
  }

  const averageOpsPerSec = averageThroughput(results);
  return {
    results,
    failures,
    averageOpsPerSec,
    verdict: verdictFor(averageOpsPerSec),
  };
}
