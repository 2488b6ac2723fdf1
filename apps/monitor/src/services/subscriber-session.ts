/**
 * Subscriber Session
 *
 * Server-side half of one viewer connection. Registers with the hub on open
 * (which sends the initial snapshot), relays hub events, discards anything the
 * viewer sends, and unregisters on the first close or socket error.
 */

import WebSocket from "ws";
import { v4 as uuidv4 } from "uuid";
import { logger } from "@perp-pulse/utils";

import type { Subscriber } from "../types";
import type { BroadcastHub } from "./broadcast-hub";

const log = logger.child("session");

/**
 * The part of a `ws` WebSocket a session touches (test fakes implement it too)
 */
export interface SubscriberSocket {
  readonly readyState: number;
  send(data: string, cb: (err?: Error) => void): void;
  close(): void;
  on(event: "message" | "close" | "error", listener: (...args: unknown[]) => void): unknown;
}

/**
 * Promise-based send over a WebSocket
 */
export class WsSubscriber implements Subscriber {
  readonly id: string;
  private readonly socket: SubscriberSocket;

  constructor(socket: SubscriberSocket, id: string = uuidv4()) {
    this.socket = socket;
    this.id = id;
  }

  send(text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState !== WebSocket.OPEN) {
        reject(new Error(`socket not open (readyState=${this.socket.readyState})`));
        return;
      }
      this.socket.send(text, error => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  close(): void {
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close();
    }
  }
}

export type SessionEndReason = "peer_closed" | "socket_error";

export class SubscriberSession {
  readonly subscriber: WsSubscriber;
  private readonly socket: SubscriberSocket;
  private readonly hub: BroadcastHub;
  private readonly remoteAddress: string | undefined;
  private ended = false;

  constructor(socket: SubscriberSocket, hub: BroadcastHub, remoteAddress?: string) {
    this.socket = socket;
    this.hub = hub;
    this.remoteAddress = remoteAddress;
    this.subscriber = new WsSubscriber(socket);
  }

  /**
   * Attach socket listeners and register with the hub.
   * Resolves with whether the initial snapshot was delivered.
   */
  open(): Promise<boolean> {
    this.socket.on("message", () => {
      // keep-alive only
      log.debug("discarded inbound message", { subscriberId: this.subscriber.id });
    });
    this.socket.on("close", () => this.end("peer_closed"));
    this.socket.on("error", error => {
      log.warn("socket error", { subscriberId: this.subscriber.id, error });
      this.end("socket_error");
    });

    log.info("viewer connected", { subscriberId: this.subscriber.id, remoteAddress: this.remoteAddress ?? "unknown" });
    return this.hub.register(this.subscriber);
  }

  isEnded(): boolean {
    return this.ended;
  }

  private end(reason: SessionEndReason): void {
    if (this.ended) return;
    this.ended = true;

    this.hub.unregister(this.subscriber);
    log.info("viewer disconnected", { subscriberId: this.subscriber.id, reason });
  }
}
