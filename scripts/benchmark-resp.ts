#!/usr/bin/env node
/**
 * RESP Server Benchmark
 *
 * Opens a fresh connection per operation and round-trips PING/SET/GET/DEL
 * one request at a time, then reports throughput, latency percentiles and a
 * verdict against the 30k ops/sec kill switch.
 *
 * Usage:
 *   npm run benchmark -- --host 127.0.0.1 --port 6380 --iterations 10000
 *   npm run benchmark -- --operations PING,SET,GET,DEL --clients 4
 *   npm run benchmark -- --save --label redis
 *   npm run benchmark:compare -- redis resp
 */

import { loadConfig, type CliOptions } from "../src/config";
import { createDriver } from "../src/benchmark/driver";
import { runBenchmarks } from "../src/benchmark/runner";
import { BenchmarkError, errorMessage } from "../src/errors";
import { ReportRenderer } from "../src/report/renderer";
import { compareRuns, loadRun, saveRun } from "../src/report/results-store";
import { fetchServerInfo } from "../src/services/server-info";
import { setupShutdownHandler } from "../src/startup";

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = loadConfig();
  } catch (error) {
    console.error(`[Config] ${errorMessage(error)}`);
    return 2;
  }
  const { config, compare } = options;

  if (compare) {
    const [labelA, labelB] = compare;
    compareRuns(loadRun(config.resultsDir, labelA), loadRun(config.resultsDir, labelB));
    return 0;
  }

  setupShutdownHandler();

  const serverInfo = await fetchServerInfo(config);
  const renderer = new ReportRenderer();
  renderer.banner(config, serverInfo);

  const driver = createDriver({
    host: config.host,
    port: config.port,
    timeoutMs: config.timeoutMs,
    username: config.username,
    password: config.password,
    clients: config.clients,
  });

  const summary = await runBenchmarks(config, driver, renderer);
  renderer.summary(summary);

  if (config.save) {
    const filename = saveRun(summary, config, serverInfo);
    console.log(`\n💾 Results saved to ${filename}`);
  }

  if (summary.failures.length > 0) return 1;
  if (config.failOnKillSwitch && summary.verdict === "kill-switch") return 1;
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    const tag = err instanceof BenchmarkError ? ` (${err.code})` : "";
    console.error(`\n[Benchmark] Fatal error${tag}:`, errorMessage(err));
    process.exitCode = 1;
  });
