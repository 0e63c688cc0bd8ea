/**
 * Transport tests
 *
 * Runs the one-shot CDP call against an in-process WebSocket server.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { WebSocketServer, type WebSocket } from "ws";
import type { AddressInfo } from "net";
import { call, notify } from "../cdp/transport";
import { ConnectionError, ProtocolError, ProtocolTimeoutError } from "../errors";

type Handler = (socket: WebSocket, request: { id: number; method: string; params: unknown }) => void;

async function startServer(): Promise<WebSocketServer> {
  const wss = new WebSocketServer({ port: 0, host: "127.0.0.1" });
  await new Promise<void>((resolve) => wss.once("listening", () => resolve()));
  return wss;
}

function wsUrl(wss: WebSocketServer): string {
  const { port } = wss.address() as AddressInfo;
  return `ws://127.0.0.1:${port}/devtools/browser/test`;
}

async function stopServer(wss: WebSocketServer): Promise<void> {
  for (const client of wss.clients) {
    client.terminate();
  }
  await new Promise<void>((resolve) => wss.close(() => resolve()));
}

describe("call", () => {
  let wss: WebSocketServer;
  let handler: Handler;
  let received: Array<{ id: number; method: string; params: unknown }>;

  beforeEach(async () => {
    received = [];
    handler = () => {};
    wss = await startServer();
    wss.on("connection", (socket) => {
      socket.on("message", (data) => {
        const request = JSON.parse(data.toString());
        received.push(request);
        handler(socket, request);
      });
    });
  });

  afterEach(async () => {
    await stopServer(wss);
  });

  it("should send a single request with id 1", async () => {
    handler = (socket) => socket.send(JSON.stringify({ id: 1, result: {} }));

    await call(wsUrl(wss), "Target.createTarget", { url: "https://example.com" }, 1000);

    expect(received).toEqual([
      { id: 1, method: "Target.createTarget", params: { url: "https://example.com" } },
    ]);
  });

  it("should skip events and unrelated messages until the matching reply", async () => {
    handler = (socket) => {
      socket.send(JSON.stringify({ method: "Target.targetCreated", params: { targetInfo: {} } }));
      socket.send(JSON.stringify({ id: 99, result: { targetId: "wrong" } }));
      socket.send("not json");
      socket.send(JSON.stringify({ id: 1, result: { targetId: "T1" } }));
    };

    const result = await call(wsUrl(wss), "Target.createTarget", { url: "about:blank" }, 1000);

    expect(result).toEqual({ targetId: "T1" });
  });

  it("should reject with ProtocolError when the browser returns an error", async () => {
    handler = (socket) =>
      socket.send(JSON.stringify({ id: 1, error: { code: -32601, message: "method not found" } }));

    const err = await call(wsUrl(wss), "Nope.nope", {}, 1000).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProtocolError);
    expect((err as ProtocolError).code).toBe(-32601);
  });

  it("should reject with ProtocolTimeoutError when no reply arrives", async () => {
    const err = await call(wsUrl(wss), "Runtime.evaluate", { expression: "1" }, 100).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProtocolTimeoutError);
    expect((err as ProtocolTimeoutError).method).toBe("Runtime.evaluate");
    expect((err as ProtocolTimeoutError).timeoutMs).toBe(100);
  });

  it("should reject with ConnectionError when the socket closes before replying", async () => {
    handler = (socket) => socket.close();

    await expect(call(wsUrl(wss), "Runtime.evaluate", {}, 1000)).rejects.toBeInstanceOf(ConnectionError);
  });

  it("should close the connection after the reply", async () => {
    const closed = new Promise<void>((resolve) => {
      handler = (socket) => {
        socket.once("close", () => resolve());
        socket.send(JSON.stringify({ id: 1, result: { ok: true } }));
      };
    });

    await call(wsUrl(wss), "Target.closeTarget", { targetId: "T1" }, 1000);

    await expect(closed).resolves.toBeUndefined();
  });

  it("should resolve notify with undefined on timeout", async () => {
    await expect(notify(wsUrl(wss), "Target.closeTarget", { targetId: "T1" }, 100)).resolves.toBeUndefined();
  });

  it("should resolve notify with the result when the browser confirms", async () => {
    handler = (socket) => socket.send(JSON.stringify({ id: 1, result: { success: true } }));

    await expect(notify(wsUrl(wss), "Target.closeTarget", { targetId: "T1" }, 1000)).resolves.toEqual({
      success: true,
    });
  });
});

describe("call against an unreachable endpoint", () => {
  it("should reject with ConnectionError", async () => {
    const wss = await startServer();
    const url = wsUrl(wss);
    await stopServer(wss);

    await expect(call(url, "Target.createTarget", {}, 2000)).rejects.toBeInstanceOf(ConnectionError);
  });

  it("should not swallow connection errors in notify", async () => {
    const wss = await startServer();
    const url = wsUrl(wss);
    await stopServer(wss);

    await expect(notify(url, "Target.closeTarget", {}, 2000)).rejects.toBeInstanceOf(ConnectionError);
  });
});
