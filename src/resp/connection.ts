import net from "net";
import { TextDecoder } from "util";
import { BenchmarkError, ErrorCode } from "../errors";
import { encodeCommand, type CommandArg } from "./encoder";

/** Upper bound of a single reply read. */
export const READ_BUFFER_SIZE = 1024;

export type DecodedReply =
  | { ok: true; text: string }
  | { ok: false; text: string };

const strictDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Decodes reply bytes as UTF-8. Invalid sequences do not throw: the result is
 * flagged `ok: false` and carries U+FFFD in their place.
 */
export function decodeReply(bytes: Uint8Array): DecodedReply {
  try {
    return { ok: true, text: strictDecoder.decode(bytes) };
  } catch {
    return { ok: false, text: Buffer.from(bytes).toString("utf8") };
  }
}

export interface ConnectOptions {
  host: string;
  port: number;
  /** Socket idle timeout in ms; 0 waits forever. */
  timeoutMs?: number;
}

interface PendingRead {
  resolve: (bytes: Buffer) => void;
  reject: (error: Error) => void;
}

// --- Open connections ---

const openConnections = new Set<RespConnection>();

export function closeAllConnections(): number {
  const count = openConnections.size;
  for (const connection of openConnections) {
    connection.close();
  }
  return count;
}

// --- Connection ---

export class RespConnection {
  private buffered: Buffer[] = [];
  private pending: PendingRead | null = null;
  private ended = false;
  private failure: BenchmarkError | null = null;

  private constructor(
    private readonly socket: net.Socket,
    private readonly address: string,
    timeoutMs: number,
  ) {
    socket.setNoDelay(true);
    socket.on("data", (chunk: Buffer) => {
      this.buffered.push(chunk);
      this.flush();
    });
    socket.on("end", () => {
      this.ended = true;
      this.flush();
    });
    socket.on("close", () => {
      this.ended = true;
      openConnections.delete(this);
      this.flush();
    });
    socket.on("error", (err) => {
      this.failure = new BenchmarkError(
        ErrorCode.CONNECTION_CLOSED,
        `Connection to ${address} failed: ${err.message}`,
      );
      this.flush();
    });
    if (timeoutMs > 0) {
      socket.setTimeout(timeoutMs);
      socket.on("timeout", () => {
        if (!this.pending) return;
        this.failure = new BenchmarkError(
          ErrorCode.READ_TIMEOUT,
          `No reply from ${address} within ${timeoutMs}ms`,
        );
        this.flush();
        socket.destroy();
      });
    }
    openConnections.add(this);
  }

  static connect({ host, port, timeoutMs = 0 }: ConnectOptions): Promise<RespConnection> {
    const address = `${host}:${port}`;
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port });
      const fail = (reason: string) => {
        socket.destroy();
        reject(
          new BenchmarkError(ErrorCode.CONNECTION_FAILED, `Could not connect to ${address}: ${reason}`),
        );
      };
      const onError = (err: Error) => fail(err.message);
      const onTimeout = () => fail(`timed out after ${timeoutMs}ms`);

      socket.once("error", onError);
      if (timeoutMs > 0) socket.setTimeout(timeoutMs, onTimeout);
      socket.once("connect", () => {
        socket.off("error", onError);
        socket.off("timeout", onTimeout);
        socket.setTimeout(0);
        resolve(new RespConnection(socket, address, timeoutMs));
      });
    });
  }

  get isOpen(): boolean {
    return !this.ended && this.failure === null;
  }

  send(bytes: Uint8Array): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);
    return new Promise((resolve, reject) => {
      this.socket.write(bytes, (err) => {
        if (err) {
          reject(
            new BenchmarkError(
              ErrorCode.CONNECTION_CLOSED,
              `Write to ${this.address} failed: ${err.message}`,
            ),
          );
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * One bounded read: whatever the server has delivered so far, up to
   * READ_BUFFER_SIZE bytes. Bytes past the bound stay queued for the next
   * read. A closed peer yields an empty buffer.
   */
  readReply(): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(new Error("A read is already in progress on this connection"));
    }
    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
      this.flush();
    });
  }

  /** Sends one command and decodes the single read that follows it. */
  async roundTrip(args: readonly CommandArg[]): Promise<DecodedReply> {
    await this.send(encodeCommand(args));
    return decodeReply(await this.readReply());
  }

  async auth(password: string, username?: string): Promise<void> {
    const args = username ? ["AUTH", username, password] : ["AUTH", password];
    const reply = await this.roundTrip(args);
    if (reply.text.startsWith("-")) {
      throw new BenchmarkError(
        ErrorCode.AUTH_FAILED,
        `AUTH rejected by ${this.address}: ${reply.text.slice(1).trim()}`,
      );
    }
  }

  close(): void {
    this.ended = true;
    openConnections.delete(this);
    this.socket.destroy();
  }

  private flush(): void {
    const pending = this.pending;
    if (!pending) return;

    if (this.buffered.length > 0) {
      this.pending = null;
      const data = Buffer.concat(this.buffered);
      this.buffered = data.length > READ_BUFFER_SIZE ? [data.subarray(READ_BUFFER_SIZE)] : [];
      pending.resolve(data.subarray(0, READ_BUFFER_SIZE));
    } else if (this.failure) {
      this.pending = null;
      pending.reject(this.failure);
    } else if (this.ended) {
      this.pending = null;
      pending.resolve(Buffer.alloc(0));
    }
  }
}
