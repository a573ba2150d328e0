import { afterEach, describe, expect, it } from "vitest";
import { BenchmarkError, ErrorCode } from "../errors";
import {
  memoryStoreHandler,
  startFakeRespServer,
  unusedPort,
  type FakeRespServer,
} from "../test-utils/fake-resp-server";
import { READ_BUFFER_SIZE, RespConnection, closeAllConnections, decodeReply } from "./connection";

describe("decodeReply", () => {
  it("decodes valid UTF-8", () => {
    expect(decodeReply(Buffer.from("+PONG\r\n"))).toEqual({ ok: true, text: "+PONG\r\n" });
  });

  it("substitutes a replacement character for invalid bytes", () => {
    expect(decodeReply(Buffer.from([0x2b, 0xff, 0x0d, 0x0a]))).toEqual({
      ok: false,
      text: "+\uFFFD\r\n",
    });
  });

  it("decodes an empty read as an empty string", () => {
    expect(decodeReply(Buffer.alloc(0))).toEqual({ ok: true, text: "" });
  });
});

describe("RespConnection", () => {
  let server: FakeRespServer | undefined;

  afterEach(async () => {
    closeAllConnections();
    await server?.close();
    server = undefined;
  });

  it("round-trips a PING", async () => {
    server = await startFakeRespServer();
    const connection = await RespConnection.connect({ host: "127.0.0.1", port: server.port });

    await expect(connection.roundTrip(["PING"])).resolves.toEqual({ ok: true, text: "+PONG\r\n" });
    expect(server.commands).toEqual([["PING"]]);
    connection.close();
  });

  it("never returns more than one buffer's worth per read", async () => {
    const payload = "x".repeat(3000);
    server = await startFakeRespServer(() => payload);
    const connection = await RespConnection.connect({ host: "127.0.0.1", port: server.port });

    await connection.send(Buffer.from("*1\r\n$4\r\nPING\r\n"));
    const sizes: number[] = [];
    let total = 0;
    while (total < payload.length) {
      const chunk = await connection.readReply();
      sizes.push(chunk.length);
      total += chunk.length;
    }

    expect(total).toBe(3000);
    expect(sizes.length).toBeGreaterThanOrEqual(3);
    expect(Math.max(...sizes)).toBeLessThanOrEqual(READ_BUFFER_SIZE);
    connection.close();
  });

  it("yields an empty reply after the server closes the connection", async () => {
    server = await startFakeRespServer(() => null);
    const connection = await RespConnection.connect({ host: "127.0.0.1", port: server.port });

    await expect(connection.roundTrip(["PING"])).resolves.toEqual({ ok: true, text: "" });
    connection.close();
  });

  it("fails to connect when nothing listens", async () => {
    const port = await unusedPort();

    const attempt = RespConnection.connect({ host: "127.0.0.1", port });
    await expect(attempt).rejects.toBeInstanceOf(BenchmarkError);
    await expect(attempt).rejects.toMatchObject({ code: ErrorCode.CONNECTION_FAILED });
  });

  it("times out a read the server never answers", async () => {
    server = await startFakeRespServer(() => undefined);
    const connection = await RespConnection.connect({
      host: "127.0.0.1",
      port: server.port,
      timeoutMs: 50,
    });

    await expect(connection.roundTrip(["PING"])).rejects.toMatchObject({
      code: ErrorCode.READ_TIMEOUT,
    });
  });

  it("authenticates with a password", async () => {
    server = await startFakeRespServer(memoryStoreHandler("test-secret"));
    const connection = await RespConnection.connect({ host: "127.0.0.1", port: server.port });

    await connection.auth("test-secret", "admin");
    expect(server.commands).toEqual([["AUTH", "admin", "test-secret"]]);
    connection.close();
  });

  it("rejects a wrong password", async () => {
    server = await startFakeRespServer(memoryStoreHandler("test-secret"));
    const connection = await RespConnection.connect({ host: "127.0.0.1", port: server.port });

    await expect(connection.auth("wrong")).rejects.toMatchObject({
      code: ErrorCode.AUTH_FAILED,
      message: `AUTH rejected by 127.0.0.1:${server.port}: WRONGPASS invalid password`,
    });
    connection.close();
  });

  it("is tracked until closed", async () => {
    server = await startFakeRespServer();
    await RespConnection.connect({ host: "127.0.0.1", port: server.port });
    await RespConnection.connect({ host: "127.0.0.1", port: server.port });

    expect(closeAllConnections()).toBe(2);
    expect(closeAllConnections()).toBe(0);
  });
});
