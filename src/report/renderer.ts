import type { BenchmarkConfig, Operation } from "../config";
import type { OperationResult } from "../benchmark/stats";

export const KILL_SWITCH_OPS = 30_000;
export const TARGET_OPS = 50_000;

export type Verdict = "kill-switch" | "pass" | "success";

export function verdictFor(avgOpsPerSec: number): Verdict {
  if (avgOpsPerSec < KILL_SWITCH_OPS) return "kill-switch";
  if (avgOpsPerSec >= TARGET_OPS) return "success";
  return "pass";
}

export interface RunSummary {
  results: OperationResult[];
  failures: { operation: Operation; error: string }[];
  averageOpsPerSec: number;
  verdict: Verdict;
}

export interface OutputSink {
  write(chunk: string): unknown;
}

export function formatOps(n: number): string {
  return n.toLocaleString("en-US", { maximumFractionDigits: 0 });
}

function us(n: number): string {
  return `${n.toFixed(1).padStart(6)} µs`;
}

export function formatResultRow(r: OperationResult): string {
  return (
    `${r.operation.padEnd(10)} │ ${formatOps(r.opsPerSec).padStart(10)} ops/sec │ ` +
    `Avg: ${us(r.latency.avg)} │ P50: ${us(r.latency.p50)} │ ` +
    `P95: ${us(r.latency.p95)} │ P99: ${us(r.latency.p99)}`
  );
}

export function verdictLines(verdict: Verdict): string[] {
  switch (verdict) {
    case "kill-switch":
      return [
        `⚠️  WARNING: Performance below ${KILL_SWITCH_OPS / 1000}k ops/sec kill switch!`,
        "   Recommendation: Ship embedded library only",
      ];
    case "success":
      return [`🎉 SUCCESS: Reached ${TARGET_OPS / 1000}k ops/sec target!`];
    case "pass":
      return [`✓  PASS: Above ${KILL_SWITCH_OPS / 1000}k ops/sec kill switch`];
  }
}

export class ReportRenderer {
  constructor(private readonly out: OutputSink = process.stdout) {}

  private line(text = ""): void {
    this.out.write(`${text}\n`);
  }

  banner(config: BenchmarkConfig, serverInfo: string): void {
    this.line("╔═══════════════════════════════════════════════════════════════╗");
    this.line("║              RESP Server Benchmark                            ║");
    this.line("╚═══════════════════════════════════════════════════════════════╝");
    this.line();
    this.line("Configuration:");
    this.line(`  Host: ${config.host}:${config.port}`);
    this.line(`  Server: ${serverInfo}`);
    this.line(`  Iterations: ${config.iterations}`);
    this.line(`  Operations: ${config.operations.join(", ")}`);
    this.line(`  Clients: ${config.clients}`);
    if (config.timeoutMs > 0) this.line(`  Read timeout: ${config.timeoutMs}ms`);
    this.line();
    this.line("Running benchmarks...");
    this.line();
  }

  operationStarted(operation: Operation): void {
    this.out.write(`Benchmarking ${operation}... `);
  }

  operationFinished(result: OperationResult): void {
    this.line(`✓ ${formatOps(result.opsPerSec)} ops/sec`);
  }

  operationFailed(error: string): void {
    this.line(`✗ ${error}`);
  }

  summary(summary: RunSummary): void {
    const rule = "=".repeat(70);
    this.line();
    this.line(rule);
    this.line("RESULTS");
    this.line(rule);
    this.line();

    for (const result of summary.results) {
      this.line(formatResultRow(result));
    }
    for (const result of summary.results) {
      if (result.emptyReads > 0) {
        this.line(`  ⚠️  ${result.operation}: ${result.emptyReads} empty reads (server closed the connection?)`);
      }
      if (result.decodeFailures > 0) {
        this.line(`  ⚠️  ${result.operation}: ${result.decodeFailures} replies were not valid UTF-8`);
      }
    }
    for (const failure of summary.failures) {
      this.line(`${failure.operation.padEnd(10)} │ FAILED: ${failure.error}`);
    }

    this.line();
    this.line(rule);
    this.line();
    this.line("✅ Benchmark complete!");
    this.line();
    this.line(`📊 Average throughput: ${formatOps(summary.averageOpsPerSec)} ops/sec`);
    this.line();
    for (const text of verdictLines(summary.verdict)) {
      this.line(text);
    }
  }
}
