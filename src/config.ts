import dotenv from "dotenv";
import path from "path";
import { parseArgs } from "util";
import { z } from "zod";
import { BenchmarkError, ErrorCode } from "./errors";

dotenv.config({ path: path.resolve(__dirname, "../.env") });

export const OPERATIONS = ["PING", "SET", "GET", "DEL"] as const;
export type Operation = (typeof OPERATIONS)[number];

export const DEFAULT_OPERATIONS: Operation[] = ["PING", "SET", "GET"];

const booleanString = z
  .union([z.boolean(), z.enum(["true", "false", "1", "0"])])
  .transform((v) => v === true || v === "true" || v === "1");

const operationList = z
  .union([z.string(), z.array(z.string())])
  .transform((v) => (Array.isArray(v) ? v : v.split(",")))
  .pipe(
    z
      .array(z.string().trim().toUpperCase().pipe(z.enum(OPERATIONS)))
      .min(1, "at least one operation is required"),
  );

export const BenchmarkConfigSchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: z.coerce.number().int().min(1).max(65535).default(6380),
  iterations: z.coerce.number().int().positive().default(10000),
  operations: operationList.default(DEFAULT_OPERATIONS),
  clients: z.coerce.number().int().positive().default(1),
  // 0 disables the read timeout
  timeoutMs: z.coerce.number().int().nonnegative().default(0),
  onError: z.enum(["abort", "continue"]).default("abort"),
  failOnKillSwitch: booleanString.default(false),
  username: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  label: z.string().min(1).default("resp"),
  save: booleanString.default(false),
  resultsDir: z.string().min(1).default(path.resolve(__dirname, "../benchmark-results")),
});

export type BenchmarkConfig = Readonly<z.output<typeof BenchmarkConfigSchema>>;
export type BenchmarkConfigInput = Partial<Record<keyof BenchmarkConfig, unknown>>;

export interface CliOptions {
  config: BenchmarkConfig;
  compare?: [string, string];
}

export function resolveConfig(input: BenchmarkConfigInput = {}): BenchmarkConfig {
  const parsed = BenchmarkConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new BenchmarkError(ErrorCode.INVALID_CONFIG, `Invalid configuration: ${issues}`);
  }
  return Object.freeze(parsed.data);
}

/**
 * Builds the run configuration. Flags win over environment variables,
 * environment variables win over the defaults.
 */
export function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      host: { type: "string" },
      port: { type: "string" },
      iterations: { type: "string" },
      operations: { type: "string" },
      clients: { type: "string" },
      timeout: { type: "string" },
      "on-error": { type: "string" },
      "fail-on-kill-switch": { type: "boolean" },
      save: { type: "boolean" },
      label: { type: "string" },
      compare: { type: "boolean" },
    },
  });

  const config = resolveConfig({
    host: values.host ?? env.RESP_HOST,
    port: values.port ?? env.RESP_PORT,
    iterations: values.iterations ?? env.ITERATIONS,
    operations: values.operations ?? env.OPERATIONS,
    clients: values.clients ?? env.CLIENTS,
    timeoutMs: values.timeout ?? env.TIMEOUT_MS,
    onError: values["on-error"] ?? env.ON_ERROR,
    failOnKillSwitch: values["fail-on-kill-switch"] ?? env.FAIL_ON_KILL_SWITCH,
    username: env.RESP_USERNAME,
    password: env.RESP_PASSWORD,
    label: values.label ?? env.LABEL,
    save: values.save,
    resultsDir: env.RESULTS_DIR,
  });

  if (!values.compare) {
    return { config };
  }
  if (positionals.length !== 2) {
    throw new BenchmarkError(
      ErrorCode.INVALID_CONFIG,
      "--compare expects two labels, e.g. --compare redis resp",
    );
  }
  return { config, compare: [positionals[0], positionals[1]] };
}
