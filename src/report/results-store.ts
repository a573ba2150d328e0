import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { OPERATIONS, type BenchmarkConfig } from "../config";
import { BenchmarkError, ErrorCode } from "../errors";
import { formatOps, type OutputSink, type RunSummary } from "./renderer";

const LatencySchema = z.object({
  avg: z.number(),
  p50: z.number(),
  p95: z.number(),
  p99: z.number(),
});

const SavedResultSchema = z.object({
  operation: z.enum(OPERATIONS),
  iterations: z.number(),
  sampleCount: z.number(),
  totalTimeSec: z.number(),
  opsPerSec: z.number(),
  latency: LatencySchema,
  decodeFailures: z.number(),
  emptyReads: z.number(),
});

export const SavedRunSchema = z.object({
  label: z.string(),
  timestamp: z.string(),
  serverInfo: z.string(),
  config: z.object({
    host: z.string(),
    port: z.number(),
    iterations: z.number(),
    clients: z.number(),
    operations: z.array(z.enum(OPERATIONS)),
  }),
  results: z.array(SavedResultSchema),
  averageOpsPerSec: z.number(),
  verdict: z.enum(["kill-switch", "pass", "success"]),
});

export type SavedRun = z.infer<typeof SavedRunSchema>;

export function resultsFile(dir: string, label: string): string {
  return path.join(dir, `${label}-resp.json`);
}

/** Writes the run as JSON. Credentials are not part of the file. */
export function saveRun(
  summary: RunSummary,
  config: BenchmarkConfig,
  serverInfo: string,
  timestamp: Date = new Date(),
): string {
  if (!fs.existsSync(config.resultsDir)) {
    fs.mkdirSync(config.resultsDir, { recursive: true });
  }

  const run: SavedRun = {
    label: config.label,
    timestamp: timestamp.toISOString(),
    serverInfo,
    config: {
      host: config.host,
      port: config.port,
      iterations: config.iterations,
      clients: config.clients,
      operations: [...config.operations],
    },
    results: summary.results.map((r) => ({ ...r, latency: { ...r.latency } })),
    averageOpsPerSec: summary.averageOpsPerSec,
    verdict: summary.verdict,
  };

  const filename = resultsFile(config.resultsDir, config.label);
  fs.writeFileSync(filename, JSON.stringify(run, null, 2));
  return filename;
}

export function loadRun(dir: string, label: string): SavedRun {
  const filename = resultsFile(dir, label);
  if (!fs.existsSync(filename)) {
    throw new BenchmarkError(
      ErrorCode.RESULTS_NOT_FOUND,
      `No saved results for "${label}" (${filename}). Run with --save --label ${label} first.`,
    );
  }
  return SavedRunSchema.parse(JSON.parse(fs.readFileSync(filename, "utf-8")));
}

export function percentDifference(base: number, other: number): number {
  return base === 0 ? 0 : ((other - base) / base) * 100;
}

export function compareRuns(a: SavedRun, b: SavedRun, out: OutputSink = process.stdout): void {
  const line = (text = "") => out.write(`${text}\n`);
  const colA = a.label.slice(0, 17);
  const colB = b.label.slice(0, 17);

  line(`${a.label}: ${a.serverInfo} (${a.timestamp})`);
  line(`${b.label}: ${b.serverInfo} (${b.timestamp})`);
  line();
  line(`${"Operation".padEnd(10)} │ ${colA.padStart(17)} │ ${colB.padStart(17)} │ ${"Difference".padStart(12)}`);
  line("─".repeat(66));

  for (const ra of a.results) {
    const rb = b.results.find((r) => r.operation === ra.operation);
    if (!rb) continue;
    const diff = percentDifference(ra.opsPerSec, rb.opsPerSec);
    const diffStr = `${diff >= 0 ? "+" : ""}${diff.toFixed(1)}%`;
    line(
      `${ra.operation.padEnd(10)} │ ${formatOps(ra.opsPerSec).padStart(17)} │ ${formatOps(rb.opsPerSec).padStart(17)} │ ${diffStr.padStart(12)}`,
    );
  }

  line();
  line(`Average: ${formatOps(a.averageOpsPerSec)} (${a.verdict}) vs ${formatOps(b.averageOpsPerSec)} (${b.verdict})`);
}
