import type { Operation } from "../config";
import type { CommandArg } from "../resp/encoder";

/** GET and DEL cycle through this many keys so repeated lookups hit the same entries. */
export const KEY_SPACE = 1000;

export function commandFor(operation: Operation, i: number): CommandArg[] {
  switch (operation) {
    case "PING":
      return ["PING"];
    case "SET":
      return ["SET", `key${i}`, `value${i}`];
    case "GET":
      return ["GET", String(i % KEY_SPACE)];
    case "DEL":
      return ["DEL", String(i % KEY_SPACE)];
  }
}
