const CR = 0x0d;

function readLine(data: Buffer, from: number): { line: string; next: number } | null {
  const end = data.indexOf("\r\n", from);
  if (end === -1) return null;
  return { line: data.toString("utf8", from, end), next: end + 2 };
}

/**
 * Parses as many complete RESP request arrays as `data` holds. `consumed`
 * is the byte offset after the last complete command.
 */
export function parseCommands(data: Buffer): { commands: string[][]; consumed: number } {
  const commands: string[][] = [];
  let offset = 0;

  outer: while (offset < data.length) {
    const header = readLine(data, offset);
    if (!header) break;
    if (!header.line.startsWith("*")) {
      throw new Error(`Expected array header, got ${JSON.stringify(header.line)}`);
    }
    const argc = Number(header.line.slice(1));
    const args: string[] = [];
    let pos = header.next;

    for (let k = 0; k < argc; k++) {
      const bulk = readLine(data, pos);
      if (!bulk) break outer;
      if (!bulk.line.startsWith("$")) {
        throw new Error(`Expected bulk string header, got ${JSON.stringify(bulk.line)}`);
      }
      const len = Number(bulk.line.slice(1));
      const end = bulk.next + len;
      if (end + 2 > data.length) break outer;
      if (data[end] !== CR || data[end + 1] !== 0x0a) {
        throw new Error(`Bulk string of length ${len} is not followed by CRLF`);
      }
      args.push(data.toString("utf8", bulk.next, end));
      pos = end + 2;
    }

    commands.push(args);
    offset = pos;
  }

  return { commands, consumed: offset };
}
