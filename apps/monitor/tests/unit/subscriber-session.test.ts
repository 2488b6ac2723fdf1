/**
 * Subscriber Session Unit Tests
 */

import { EventEmitter } from "node:events";
import { HistoryStore } from "@perp-pulse/core";
import { beforeEach, describe, expect, test } from "vitest";
import WebSocket from "ws";

import { BroadcastHub } from "../../src/services/broadcast-hub";
import { SubscriberSession, WsSubscriber, type SubscriberSocket } from "../../src/services/subscriber-session";

class FakeSocket extends EventEmitter implements SubscriberSocket {
  readyState: number = WebSocket.OPEN;
  readonly sent: string[] = [];
  sendError: Error | null = null;
  closeCalls = 0;

  send(data: string, cb: (err?: Error) => void): void {
    if (this.sendError) {
      cb(this.sendError);
      return;
    }
    this.sent.push(data);
    cb();
  }

  close(): void {
    this.closeCalls++;
    this.readyState = WebSocket.CLOSED;
  }
}

describe("SubscriberSession", () => {
  let hub: BroadcastHub;

  beforeEach(() => {
    const store = new HistoryStore(["btcusdt"]);
    hub = new BroadcastHub(() => store.snapshot());
  });

  test("open registers and sends the initial snapshot", async () => {
    const socket = new FakeSocket();
    const session = new SubscriberSession(socket, hub);

    expect(await session.open()).toBe(true);
    expect(hub.size()).toBe(1);
    expect(socket.sent).toHaveLength(1);
    expect(JSON.parse(socket.sent[0] ?? "")).toMatchObject({ type: "initial_data" });
  });

  test("a peer close unregisters exactly once", async () => {
    const socket = new FakeSocket();
    const session = new SubscriberSession(socket, hub);
    await session.open();

    socket.emit("close", 1000, Buffer.from(""));
    socket.emit("close", 1000, Buffer.from(""));

    expect(session.isEnded()).toBe(true);
    expect(hub.size()).toBe(0);
  });

  test("a socket error unregisters", async () => {
    const socket = new FakeSocket();
    const session = new SubscriberSession(socket, hub);
    await session.open();

    socket.emit("error", new Error("ECONNRESET"));

    expect(session.isEnded()).toBe(true);
    expect(hub.has(session.subscriber)).toBe(false);
  });

  test("inbound messages are discarded", async () => {
    const socket = new FakeSocket();
    const session = new SubscriberSession(socket, hub);
    await session.open();

    socket.emit("message", Buffer.from("ping"));

    expect(session.isEnded()).toBe(false);
    expect(hub.size()).toBe(1);
    expect(socket.sent).toHaveLength(1);
  });
});

describe("WsSubscriber", () => {
  test("send rejects when the socket is not open", async () => {
    const socket = new FakeSocket();
    socket.readyState = WebSocket.CLOSING;

    await expect(new WsSubscriber(socket, "s1").send("x")).rejects.toThrow("socket not open (readyState=2)");
  });

  test("send rejects with the transport error", async () => {
    const socket = new FakeSocket();
    socket.sendError = new Error("write EPIPE");

    await expect(new WsSubscriber(socket, "s1").send("x")).rejects.toThrow("write EPIPE");
  });

  test("close only closes an open socket", () => {
    const socket = new FakeSocket();
    const subscriber = new WsSubscriber(socket, "s1");

    subscriber.close();
    subscriber.close();

    expect(socket.closeCalls).toBe(1);
  });

  test("ids default to uuid v4", () => {
    const subscriber = new WsSubscriber(new FakeSocket());
    expect(subscriber.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});
