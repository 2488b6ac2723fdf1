/**
 * packages/adapters - Upstream Feed Adapters
 *
 * - Port interfaces for venue-agnostic stream consumption
 * - Binance futures stream implementation
 * - Reconnect strategies and the self-healing feed consumer
 */

// Port interfaces
export * from "./ports";

// Binance adapter
export * from "./binance";

// Consumption
export {
  DEFAULT_RECONNECT_DELAY_MS,
  DEFAULT_EXPONENTIAL_BACKOFF,
  FixedIntervalReconnect,
  ExponentialBackoffReconnect,
  type ReconnectStrategy,
  type ExponentialBackoffConfig,
} from "./reconnect";
export { FeedConsumer, type FeedConsumerOptions } from "./feed-consumer";
