import type { Operation } from "../config";
import { RespConnection } from "../resp/connection";
import { commandFor } from "./commands";
import { buildOperationResult, type OperationResult } from "./stats";

/** Monotonic time source in microseconds. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => performance.now() * 1000,
};

export interface DriverOptions {
  host: string;
  port: number;
  timeoutMs: number;
  username?: string;
  password?: string;
  clock?: Clock;
}

export interface OperationDriver {
  run(operation: Operation, iterations: number): Promise<OperationResult>;
}

interface Tally {
  /** Round-trip time in µs, tagged with the iteration it belongs to. */
  entries: { index: number; us: number }[];
  decodeFailures: number;
  emptyReads: number;
}

async function openConnection(options: DriverOptions): Promise<RespConnection> {
  const connection = await RespConnection.connect(options);
  if (options.password) {
    try {
      await connection.auth(options.password, options.username);
    } catch (error) {
      connection.close();
      throw error;
    }
  }
  return connection;
}

/**
 * Round-trips the command for every index in [first, iterations) stepping by
 * `step`, one request in flight at a time.
 */
async function runClient(
  connection: RespConnection,
  operation: Operation,
  first: number,
  step: number,
  iterations: number,
  clock: Clock,
  tally: Tally,
): Promise<void> {
  for (let i = first; i < iterations; i += step) {
    const opStart = clock.now();
    const reply = await connection.roundTrip(commandFor(operation, i));
    const opEnd = clock.now();

    tally.entries.push({ index: i, us: opEnd - opStart });
    if (!reply.ok) tally.decodeFailures++;
    if (reply.text === "") tally.emptyReads++;
  }
}

async function measure(
  options: DriverOptions,
  operation: Operation,
  iterations: number,
  clients: number,
): Promise<OperationResult> {
  const clock = options.clock ?? systemClock;
  const connections: RespConnection[] = [];
  try {
    for (let c = 0; c < clients; c++) {
      connections.push(await openConnection(options));
    }

    const tally: Tally = { entries: [], decodeFailures: 0, emptyReads: 0 };
    const start = clock.now();
    await Promise.all(
      connections.map((connection, c) =>
        runClient(connection, operation, c, clients, iterations, clock, tally),
      ),
    );
    const totalUs = clock.now() - start;

    return buildOperationResult({
      operation,
      iterations,
      samples: tally.entries.sort((a, b) => a.index - b.index).map((e) => e.us),
      totalTimeSec: totalUs / 1_000_000,
      decodeFailures: tally.decodeFailures,
      emptyReads: tally.emptyReads,
    });
  } finally {
    for (const connection of connections) connection.close();
  }
}

/** One connection, one outstanding request. Latency is the true round trip. */
export class SequentialDriver implements OperationDriver {
  constructor(private readonly options: DriverOptions) {}

  run(operation: Operation, iterations: number): Promise<OperationResult> {
    return measure(this.options, operation, iterations, 1);
  }
}

/**
 * Several simulated clients, each on its own connection. Client `c` issues
 * the indices where `i % clients === c`; samples are merged in index order.
 */
export class ConcurrentDriver implements OperationDriver {
  constructor(
    private readonly options: DriverOptions,
    private readonly clients: number,
  ) {}

  run(operation: Operation, iterations: number): Promise<OperationResult> {
    return measure(this.options, operation, iterations, Math.max(1, Math.min(this.clients, iterations)));
  }
}

export function createDriver(options: DriverOptions & { clients: number }): OperationDriver {
  return options.clients > 1 ? new ConcurrentDriver(options, options.clients) : new SequentialDriver(options);
}
