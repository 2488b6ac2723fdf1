/**
 * Reconnect strategies
 *
 * A consumer asks its strategy how long to wait before every reconnect attempt
 * and resets it once a connection opens.
 */

export interface ReconnectStrategy {
  readonly name: string;
  /** Delay before the next attempt; advances internal attempt state */
  nextDelayMs(): number;
  /** Called after a successful open */
  reset(): void;
}

export const DEFAULT_RECONNECT_DELAY_MS = 5000;

/**
 * Same delay before every attempt, forever
 */
export class FixedIntervalReconnect implements ReconnectStrategy {
  readonly name = "fixed";
  private readonly delayMs: number;

  constructor(delayMs: number = DEFAULT_RECONNECT_DELAY_MS) {
    this.delayMs = delayMs;
  }

  nextDelayMs(): number {
    return this.delayMs;
  }

  reset(): void {
    // stateless
  }
}

export interface ExponentialBackoffConfig {
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export const DEFAULT_EXPONENTIAL_BACKOFF: ExponentialBackoffConfig = {
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  multiplier: 2,
};

/**
 * initialDelayMs × multiplier^attempt, capped at maxDelayMs
 */
export class ExponentialBackoffReconnect implements ReconnectStrategy {
  readonly name = "exponential";
  private readonly config: ExponentialBackoffConfig;
  private attempt = 0;

  constructor(config: ExponentialBackoffConfig = DEFAULT_EXPONENTIAL_BACKOFF) {
    this.config = config;
  }

  nextDelayMs(): number {
    const delay = Math.min(
      this.config.initialDelayMs * Math.pow(this.config.multiplier, this.attempt),
      this.config.maxDelayMs,
    );
    this.attempt++;
    return delay;
  }

  reset(): void {
    this.attempt = 0;
  }
}
