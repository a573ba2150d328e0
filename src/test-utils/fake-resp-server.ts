import net from "net";
import { parseCommands } from "./resp-parser";

/**
 * Reply for one command. `undefined` sends nothing, `null` closes the
 * connection from the server side.
 */
export type Reply = string | Buffer | null | undefined;
export type CommandHandler = (args: string[]) => Reply;

export interface FakeRespServer {
  port: number;
  commands: string[][];
  connectionCount: number;
  close(): Promise<void>;
}

/** In-memory PING/SET/GET/DEL/AUTH responder. */
export function memoryStoreHandler(password?: string): CommandHandler {
  const store = new Map<string, string>();
  return ([name, ...args]) => {
    switch (name.toUpperCase()) {
      case "PING":
        return "+PONG\r\n";
      case "SET":
        store.set(args[0], args[1]);
        return "+OK\r\n";
      case "GET": {
        const value = store.get(args[0]);
        return value === undefined ? "$-1\r\n" : `$${Buffer.byteLength(value)}\r\n${value}\r\n`;
      }
      case "DEL":
        return `:${store.delete(args[0]) ? 1 : 0}\r\n`;
      case "AUTH":
        return args[args.length - 1] === password ? "+OK\r\n" : "-WRONGPASS invalid password\r\n";
      default:
        return `-ERR unknown command '${name}'\r\n`;
    }
  };
}

export function startFakeRespServer(
  handler: CommandHandler = memoryStoreHandler(),
): Promise<FakeRespServer> {
  const sockets = new Set<net.Socket>();
  const state = { commands: [] as string[][], connectionCount: 0 };

  const server = net.createServer((socket) => {
    sockets.add(socket);
    state.connectionCount++;
    let buffered = Buffer.alloc(0);

    socket.on("data", (chunk) => {
      buffered = Buffer.concat([buffered, chunk]);
      const { commands, consumed } = parseCommands(buffered);
      buffered = buffered.subarray(consumed);
      for (const command of commands) {
        state.commands.push(command);
        const reply = handler(command);
        if (reply === null) {
          socket.end();
          return;
        }
        if (reply !== undefined) socket.write(reply);
      }
    });
    socket.on("error", () => socket.destroy());
    socket.on("close", () => sockets.delete(socket));
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("Fake RESP server has no TCP address"));
        return;
      }
      resolve({
        port: address.port,
        get commands() {
          return state.commands;
        },
        get connectionCount() {
          return state.connectionCount;
        },
        close: () =>
          new Promise<void>((done) => {
            for (const socket of sockets) socket.destroy();
            server.close(() => done());
          }),
      });
    });
  });
}

/** A port nothing listens on. */
export async function unusedPort(): Promise<number> {
  const server = await startFakeRespServer();
  const { port } = server;
  await server.close();
  return port;
}
