import { GlideClient, InfoOptions } from "@valkey/valkey-glide";
import type { BenchmarkConfig } from "../config";
import { errorMessage } from "../errors";

const DEFAULT_INFO_TIMEOUT_MS = 2000;

/**
 * Picks the version line out of an `INFO server` reply: valkey first, then
 * redis, then any other `<name>_version` field.
 */
export function parseServerVersion(info: string): string {
  const valkeyMatch = info.match(/valkey_version:([^\r\n]+)/);
  if (valkeyMatch) return `valkey_version: ${valkeyMatch[1]}`;
  const redisMatch = info.match(/redis_version:([^\r\n]+)/);
  if (redisMatch) return `redis_version: ${redisMatch[1]}`;
  const otherMatch = info.match(/^(\w+_version):([^\r\n]+)/m);
  return otherMatch ? `${otherMatch[1]}: ${otherMatch[2]}` : "unknown";
}

/** Best-effort; any failure is logged and reported as "unknown". */
export async function fetchServerInfo(
  config: Pick<BenchmarkConfig, "host" | "port" | "timeoutMs" | "username" | "password">,
): Promise<string> {
  let client: GlideClient | null = null;
  try {
    client = await GlideClient.createClient({
      addresses: [{ host: config.host, port: config.port }],
      credentials: config.password
        ? { username: config.username, password: config.password }
        : undefined,
      requestTimeout: config.timeoutMs > 0 ? config.timeoutMs : DEFAULT_INFO_TIMEOUT_MS,
    });
    const info = await client.info([InfoOptions.Server]);
    return parseServerVersion(String(info));
  } catch (error) {
    console.log(`[ServerInfo] Could not read server version: ${errorMessage(error)}`);
    return "unknown";
  } finally {
    client?.close();
  }
}
