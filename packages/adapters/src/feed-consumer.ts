/**
 * Feed Consumer
 *
 * Keeps one upstream stream open for the life of the process:
 * - Opens the connection, retrying forever after the reconnect strategy's delay
 * - Decodes each frame; malformed frames are dropped, the stream stays open
 *   (a frame missing a field is one bad message, not a broken stream)
 * - Hands decoded messages to the handler in arrival order
 * - A handler fault or an upstream close drops the connection and re-enters the retry path
 */

import { logger } from "@perp-pulse/utils";

import type { FeedHandler, FeedState, FeedStatus } from "./ports";
import type { StreamDescriptor } from "./binance/streams";
import { defaultConnectionFactory, type IWsConnection, type WsConnectionFactory } from "./binance/ws-connection";
import { FixedIntervalReconnect, type ReconnectStrategy } from "./reconnect";

const log = logger.child("feed");

export interface FeedConsumerOptions<T> {
  stream: StreamDescriptor<T>;
  handle: FeedHandler<T>;
  /** Defaults to a fixed 5s interval */
  reconnect?: ReconnectStrategy;
  /** Optional factory for creating WebSocket connections (for testing) */
  connectionFactory?: WsConnectionFactory;
}

export class FeedConsumer<T> {
  private readonly stream: StreamDescriptor<T>;
  private readonly handle: FeedHandler<T>;
  private readonly reconnect: ReconnectStrategy;
  private readonly connectionFactory: WsConnectionFactory;

  private readonly status: FeedStatus;
  private statusHandlers: ((status: FeedStatus) => void)[] = [];
  private running = false;
  private connection: IWsConnection<unknown> | null = null;
  private abortController = new AbortController();
  private runPromise: Promise<void> | null = null;

  constructor(options: FeedConsumerOptions<T>) {
    this.stream = options.stream;
    this.handle = options.handle;
    this.reconnect = options.reconnect ?? new FixedIntervalReconnect();
    this.connectionFactory = options.connectionFactory ?? defaultConnectionFactory;
    this.status = {
      label: options.stream.label,
      state: "idle",
      reconnects: 0,
      messages: 0,
      dropped: 0,
      lastMessageAt: null,
    };
  }

  get label(): string {
    return this.stream.label;
  }

  /**
   * Start consuming. Resolves only after stop().
   */
  start(): Promise<void> {
    if (this.runPromise) return this.runPromise;

    this.running = true;
    this.abortController = new AbortController();
    this.runPromise = this.run().finally(() => {
      this.runPromise = null;
    });
    return this.runPromise;
  }

  /**
   * Close the current connection, cancel any pending backoff and wait for the loop to exit
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    this.abortController.abort();

    const connection = this.connection;
    if (connection) {
      await connection.close();
    }
    if (this.runPromise) {
      await this.runPromise;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  getStatus(): FeedStatus {
    return { ...this.status };
  }

  onStatus(handler: (status: FeedStatus) => void): void {
    this.statusHandlers.push(handler);
  }

  // ============================================================================
  // Connection Loop
  // ============================================================================

  private async run(): Promise<void> {
    const { label } = this.stream;

    while (this.running) {
      this.setState("connecting");
      let connection: IWsConnection<unknown> | null = null;

      try {
        connection = this.connectionFactory(this.stream.url, label);
        this.connection = connection;
        await connection.connect();

        if (this.running) {
          this.reconnect.reset();
          this.setState("connected");
          log.info(`connected: ${label}`);

          await this.consume(connection);

          if (this.running) {
            log.warn(`stream ended: ${label}`);
          }
        }
      } catch (error) {
        if (this.running) {
          log.warn(`stream fault: ${label}`, { error });
        }
      } finally {
        this.connection = null;
        if (connection) {
          await connection.close();
        }
      }

      if (!this.running) break;

      const delayMs = this.reconnect.nextDelayMs();
      this.status.reconnects++;
      this.setState("reconnecting");
      log.info(`reconnecting in ${delayMs}ms: ${label}`, {
        strategy: this.reconnect.name,
        attempt: this.status.reconnects,
      });

      await this.wait(delayMs);
    }

    this.setState("stopped");
  }

  private async consume(connection: IWsConnection<unknown>): Promise<void> {
    for await (const raw of connection) {
      if (!this.running) return;

      const decoded = this.stream.decode(raw);
      if (decoded.isErr()) {
        this.status.dropped++;
        log.warn(`dropped malformed message: ${this.stream.label}`, {
          reason: decoded.error.type,
          detail: decoded.error.message,
        });
        continue;
      }

      this.status.messages++;
      this.status.lastMessageAt = new Date();
      await this.handle(decoded.value);
    }
  }

  /**
   * Sleep that resolves early when the consumer is stopped
   */
  private wait(ms: number): Promise<void> {
    const signal = this.abortController.signal;

    return new Promise(resolve => {
      if (signal.aborted) {
        resolve();
        return;
      }

      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal.removeEventListener("abort", onAbort);
        resolve();
      }, ms);

      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  private setState(state: FeedState): void {
    if (this.status.state === state) return;
    this.status.state = state;

    const snapshot = this.getStatus();
    for (const handler of this.statusHandlers) {
      try {
        handler(snapshot);
      } catch (error) {
        log.error("status handler threw an error", { error });
      }
    }
  }
}
