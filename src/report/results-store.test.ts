import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveConfig } from "../config";
import { ErrorCode } from "../errors";
import type { RunSummary } from "./renderer";
import { compareRuns, loadRun, percentDifference, resultsFile, saveRun } from "./results-store";

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}

const summary = (opsPerSec: number): RunSummary => ({
  results: [
    {
      operation: "PING",
      iterations: 100,
      sampleCount: 100,
      totalTimeSec: 100 / opsPerSec,
      opsPerSec,
      latency: { avg: 20, p50: 18, p95: 40, p99: 55 },
      decodeFailures: 0,
      emptyReads: 0,
    },
  ],
  failures: [],
  averageOpsPerSec: opsPerSec,
  verdict: opsPerSec >= 50000 ? "success" : opsPerSec >= 30000 ? "pass" : "kill-switch",
});

describe("results store", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "resp-bench-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("saves a run and loads it back", () => {
    const config = resolveConfig({ resultsDir: dir, label: "toon", iterations: 100, password: "test-secret" });

    const filename = saveRun(summary(40000), config, "toonstore_version: 0.1.0", new Date("2026-01-02T03:04:05Z"));

    expect(filename).toBe(path.join(dir, "toon-resp.json"));
    const run = loadRun(dir, "toon");
    expect(run.label).toBe("toon");
    expect(run.timestamp).toBe("2026-01-02T03:04:05.000Z");
    expect(run.config).toEqual({
      host: "127.0.0.1",
      port: 6380,
      iterations: 100,
      clients: 1,
      operations: ["PING", "SET", "GET"],
    });
    expect(run.results[0].opsPerSec).toBe(40000);
    expect(run.verdict).toBe("pass");
    expect(fs.readFileSync(filename, "utf-8")).not.toContain("test-secret");
  });

  it("reports a missing label", () => {
    expect(thrown(() => loadRun(dir, "nope"))).toMatchObject({ code: ErrorCode.RESULTS_NOT_FOUND });
  });

  it("compares two saved runs", () => {
    saveRun(summary(40000), resolveConfig({ resultsDir: dir, label: "redis" }), "redis_version: 7.2.4");
    saveRun(summary(50000), resolveConfig({ resultsDir: dir, label: "toon" }), "unknown");
    const chunks: string[] = [];

    compareRuns(loadRun(dir, "redis"), loadRun(dir, "toon"), { write: (c: string) => chunks.push(c) });

    const lines = chunks.join("").split("\n");
    expect(lines).toContain(
      `${"PING".padEnd(10)} │ ${"40,000".padStart(17)} │ ${"50,000".padStart(17)} │ ${"+25.0%".padStart(12)}`,
    );
    expect(lines).toContain("Average: 40,000 (pass) vs 50,000 (success)");
  });

  it("names result files after the label", () => {
    expect(resultsFile("/tmp/x", "redis")).toBe(path.join("/tmp/x", "redis-resp.json"));
  });

  it("computes the percent difference", () => {
    expect(percentDifference(40000, 30000)).toBe(-25);
    expect(percentDifference(0, 30000)).toBe(0);
  });
});
