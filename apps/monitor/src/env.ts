/**
 * Monitor Environment Configuration
 *
 * Reads upstream feeds from Binance futures and serves the live dashboard
 * over HTTP / WebSocket.
 *
 * Do not read `process.env` directly; import `env` from this module.
 */

import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

const DEFAULT_SYMBOLS = "btcusdt,ethusdt,solusdt,bnbusdt,dogeusdt,wifusdt";

export const env = createEnv({
  server: {
    // =========================================================================
    // Server
    // =========================================================================

    /**
     * Interface the HTTP / WebSocket server binds to
     */
    HOST: z.string().default("0.0.0.0"),

    PORT: z.coerce.number().int().min(1).max(65535).default(8000),

    // =========================================================================
    // Logging
    // =========================================================================

    /**
     * ERROR | WARN | LOG | INFO | DEBUG
     */
    LOG_LEVEL: z.enum(["ERROR", "WARN", "LOG", "INFO", "DEBUG"]).default("INFO"),

    // =========================================================================
    // Upstream Feeds
    // =========================================================================

    /**
     * Comma-separated stream symbols, e.g. "btcusdt,ethusdt"
     */
    SYMBOLS: z
      .string()
      .default(DEFAULT_SYMBOLS)
      .transform(value =>
        value
          .split(",")
          .map(s => s.trim().toLowerCase())
          .filter(s => s.length > 0),
      )
      .pipe(z.array(z.string()).min(1)),

    /**
     * Base URL for raw streams; the stream name is appended as a path segment
     */
    BINANCE_STREAM_URL: z.url().default("wss://fstream.binance.com/ws"),

    /**
     * fixed: RECONNECT_DELAY_MS before every attempt
     * exponential: 1s doubling up to 30s, reset once connected
     */
    RECONNECT_STRATEGY: z.enum(["fixed", "exponential"]).default("fixed"),

    RECONNECT_DELAY_MS: z.coerce.number().int().nonnegative().default(5000),

    // =========================================================================
    // Alerts
    // =========================================================================

    /**
     * Funding settlements per day (3 = every 8 hours)
     */
    FUNDING_PERIODS_PER_DAY: z.coerce.number().int().positive().default(3),

    MIN_LIQUIDATION_USD: z.coerce.number().nonnegative().default(5000),

    MIN_TRADE_USD: z.coerce.number().nonnegative().default(15000),

    MIN_WHALE_USD: z.coerce.number().nonnegative().default(100000),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});

export type Env = typeof env;
