export type CommandArg = string | number | Buffer;

const CRLF = "\r\n";

/**
 * Frames a command as a RESP array of bulk strings:
 * `*<argc>\r\n` then `$<len>\r\n<bytes>\r\n` per argument.
 * Lengths are UTF-8 byte counts, not string lengths.
 */
export function encodeCommand(args: readonly CommandArg[]): Buffer {
  const parts: Buffer[] = [Buffer.from(`*${args.length}${CRLF}`)];
  for (const arg of args) {
    const bytes = Buffer.isBuffer(arg) ? arg : Buffer.from(String(arg), "utf8");
    parts.push(Buffer.from(`$${bytes.length}${CRLF}`), bytes, Buffer.from(CRLF));
  }
  return Buffer.concat(parts);
}
