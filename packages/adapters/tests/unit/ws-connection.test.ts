/**
 * WsConnection Unit Tests
 *
 * Runs against an in-process WebSocketServer on a loopback port.
 */

import { afterEach, describe, expect, test } from "vitest";
import { WebSocketServer } from "ws";

import { WsConnection } from "../../src/binance/ws-connection";

const startServer = (): Promise<{ server: WebSocketServer; url: string }> =>
  new Promise((resolve, reject) => {
    const server = new WebSocketServer({ host: "127.0.0.1", port: 0 }, () => {
      const address = server.address();
      if (typeof address === "string") {
        reject(new Error(`unexpected address: ${address}`));
        return;
      }
      resolve({ server, url: `ws://127.0.0.1:${address.port}` });
    });
  });

describe("WsConnection", () => {
  let server: WebSocketServer | null = null;

  afterEach(async () => {
    const current = server;
    server = null;
    if (current) {
      for (const client of current.clients) client.terminate();
      await new Promise<void>(resolve => current.close(() => resolve()));
    }
  });

  test("drops a frame that is not JSON and keeps the stream open", async () => {
    const started = await startServer();
    server = started.server;
    started.server.on("connection", socket => {
      socket.send("not json{");
      socket.send(JSON.stringify({ a: 1 }));
      socket.send(JSON.stringify({ a: 2 }));
    });

    const conn = new WsConnection({ url: started.url, label: "test" });
    await conn.connect();

    const received: unknown[] = [];
    for await (const message of conn) {
      received.push(message);
      if (received.length === 2) break;
    }

    expect(received).toEqual([{ a: 1 }, { a: 2 }]);
    expect(conn.isClosed()).toBe(true);
  });

  test("connect rejects when nothing is listening", async () => {
    const started = await startServer();
    const { url } = started;
    await new Promise<void>(resolve => started.server.close(() => resolve()));

    const conn = new WsConnection({ url, label: "test" });

    await expect(conn.connect()).rejects.toThrow();
  });

  test("iteration ends when the server closes the socket", async () => {
    const started = await startServer();
    server = started.server;
    started.server.on("connection", socket => {
      socket.send(JSON.stringify({ a: 1 }));
      socket.close(1000);
    });

    const conn = new WsConnection({ url: started.url, label: "test" });
    await conn.connect();

    const received: unknown[] = [];
    for await (const message of conn) {
      received.push(message);
    }

    expect(received).toEqual([{ a: 1 }]);
  });
});
