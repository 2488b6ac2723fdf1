/**
 * WsConnection - WebSocket connection wrapper with AsyncIterable support
 *
 * Frames are parsed as JSON before they are queued; frames that fail to parse
 * are logged and dropped without closing the socket.
 *
 * Usage:
 * ```ts
 * const conn = new WsConnection({ url: "wss://fstream.binance.com/ws/btcusdt@aggTrade" });
 * await conn.connect();
 * for await (const message of conn) {
 *   // message is already parsed JSON
 * }
 * ```
 */

import WebSocket from "ws";
import { logger } from "@perp-pulse/utils";

const log = logger.child("ws");

export interface WsConnectionOptions {
  /**
   * Full WebSocket URL (e.g., wss://fstream.binance.com/ws/btcusdt@markPrice)
   */
  url: string;

  /**
   * Label for logging (e.g., "btcusdt@markPrice")
   */
  label?: string;
}

/**
 * Interface for WebSocket connections used by feed consumers.
 * Both WsConnection and test fakes implement this interface.
 */
export interface IWsConnection<T> extends AsyncIterable<T> {
  connect: () => Promise<void>;
  close: () => Promise<void>;
  isClosed: () => boolean;
}

/**
 * Connection factory type for dependency injection in tests
 */
export type WsConnectionFactory<T = unknown> = (url: string, label?: string) => IWsConnection<T>;

const rawToString = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
};

export class WsConnection implements IWsConnection<unknown> {
  private ws: WebSocket | null = null;
  private closed = true;
  private readonly url: string;
  private readonly label: string;

  // Frames received while no consumer is waiting
  private queue: unknown[] = [];
  private pendingResolve: ((result: IteratorResult<unknown>) => void) | null = null;
  private pendingReject: ((error: unknown) => void) | null = null;
  private lastError: Error | null = null;

  constructor(options: WsConnectionOptions) {
    this.url = options.url;
    this.label = options.label ?? options.url;
  }

  async connect(): Promise<void> {
    if (this.ws && !this.closed) {
      return;
    }

    return new Promise((resolve, reject) => {
      let opened = false;
      this.closed = false;
      this.lastError = null;
      this.queue = [];

      const ws = new WebSocket(this.url);
      this.ws = ws;

      ws.on("open", () => {
        opened = true;
        log.debug(`opened: ${this.label}`);
        resolve();
      });

      ws.on("message", (data: WebSocket.RawData) => {
        let parsed: unknown;
        try {
          parsed = JSON.parse(rawToString(data));
        } catch (err) {
          log.warn(`parse error: ${this.label}`, { error: err });
          return;
        }
        this.enqueue(parsed);
      });

      ws.on("close", (code, reason) => {
        log.debug(`closed: ${this.label}`, { code, reason: reason.toString("utf8") });
        if (!opened) {
          reject(this.lastError ?? new Error(`WebSocket closed before open (code ${code})`));
        }
        this.handleClose();
      });

      ws.on("error", err => {
        log.warn(`error: ${this.label}`, { error: err });
        this.lastError = err;

        if (!opened) {
          this.closed = true;
          reject(err);
        } else {
          this.handleClose();
        }
      });
    });
  }

  async close(): Promise<void> {
    if (this.closed && this.ws === null) return;

    this.closed = true;

    if (this.ws) {
      const ws = this.ws;
      this.ws = null;
      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
      } else if (ws.readyState === WebSocket.OPEN) {
        ws.close();
      }
    }

    // Wake up any pending iterator
    if (this.pendingResolve) {
      const resolve = this.pendingResolve;
      this.pendingResolve = null;
      this.pendingReject = null;
      resolve({ value: undefined, done: true });
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  // =========================================================================
  // AsyncIterable Implementation
  // =========================================================================

  [Symbol.asyncIterator](): AsyncIterator<unknown> {
    return {
      next: async (): Promise<IteratorResult<unknown>> => {
        // Drain queued frames first
        if (this.queue.length > 0) {
          return { value: this.queue.shift(), done: false };
        }

        if (this.closed) {
          if (this.lastError) {
            throw this.lastError;
          }
          return { value: undefined, done: true };
        }

        return new Promise<IteratorResult<unknown>>((resolve, reject) => {
          this.pendingResolve = resolve;
          this.pendingReject = reject;
        });
      },

      return: async (): Promise<IteratorResult<unknown>> => {
        await this.close();
        return { value: undefined, done: true };
      },
    };
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private enqueue(message: unknown): void {
    if (this.pendingResolve) {
      const resolve = this.pendingResolve;
      this.pendingResolve = null;
      this.pendingReject = null;
      resolve({ value: message, done: false });
    } else {
      this.queue.push(message);
    }
  }

  private handleClose(): void {
    this.closed = true;

    if (this.pendingResolve) {
      const resolve = this.pendingResolve;
      const reject = this.pendingReject;
      this.pendingResolve = null;
      this.pendingReject = null;

      if (this.lastError && reject) {
        reject(this.lastError);
      } else {
        resolve({ value: undefined, done: true });
      }
    }
  }
}

/**
 * Default connection factory using WsConnection
 */
export const defaultConnectionFactory: WsConnectionFactory = (url, label) => new WsConnection({ url, label });
