/**
 * Feed Supervisor
 *
 * Owns every upstream consumer: one funding and one trade stream per tracked
 * symbol plus the market-wide liquidation stream. All run concurrently and
 * independently; a stall in one never blocks another.
 */

import {
  ExponentialBackoffReconnect,
  FeedConsumer,
  FixedIntervalReconnect,
  fundingStream,
  liquidationStream,
  tradeStream,
  type FeedStatus,
  type ReconnectStrategy,
  type WsConnectionFactory,
} from "@perp-pulse/adapters";
import { logger } from "@perp-pulse/utils";

import type { AlertPipeline } from "./alert-pipeline";

const log = logger.child("supervisor");

export type ReconnectStrategyName = "fixed" | "exponential";

/**
 * Fresh strategy instance per consumer (strategies carry attempt state)
 */
export function createReconnectStrategy(name: ReconnectStrategyName, fixedDelayMs: number): ReconnectStrategy {
  switch (name) {
    case "exponential":
      return new ExponentialBackoffReconnect();
    case "fixed":
      return new FixedIntervalReconnect(fixedDelayMs);
  }
}

export interface FeedSupervisorOptions {
  baseUrl: string;
  symbols: readonly string[];
  pipeline: AlertPipeline;
  createReconnect: () => ReconnectStrategy;
  connectionFactory?: WsConnectionFactory;
}

/**
 * Public surface of a consumer, independent of its message type
 */
interface ManagedFeed {
  readonly label: string;
  start(): Promise<void>;
  stop(): Promise<void>;
  getStatus(): FeedStatus;
}

export class FeedSupervisor {
  private readonly feeds: ManagedFeed[] = [];
  private started = false;

  constructor(options: FeedSupervisorOptions) {
    const { baseUrl, symbols, pipeline, createReconnect, connectionFactory } = options;

    for (const symbol of symbols) {
      this.feeds.push(
        new FeedConsumer({
          stream: fundingStream(baseUrl, symbol),
          handle: tick => pipeline.onFunding(symbol, tick),
          reconnect: createReconnect(),
          connectionFactory,
        }),
      );
    }

    this.feeds.push(
      new FeedConsumer({
        stream: liquidationStream(baseUrl),
        handle: tick => pipeline.onLiquidation(tick),
        reconnect: createReconnect(),
        connectionFactory,
      }),
    );

    for (const symbol of symbols) {
      this.feeds.push(
        new FeedConsumer({
          stream: tradeStream(baseUrl, symbol),
          handle: tick => pipeline.onTrade(tick),
          reconnect: createReconnect(),
          connectionFactory,
        }),
      );
    }
  }

  start(): void {
    if (this.started) return;
    this.started = true;

    for (const feed of this.feeds) {
      feed.start().catch((error: unknown) => {
        log.error(`feed loop exited with an error: ${feed.label}`, { error });
      });
    }

    log.info("feeds started", { count: this.feeds.length, labels: this.feeds.map(f => f.label) });
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;

    await Promise.allSettled(this.feeds.map(feed => feed.stop()));
    log.info("feeds stopped");
  }

  statuses(): FeedStatus[] {
    return this.feeds.map(feed => feed.getStatus());
  }
}
