/**
 * Monitor Main Entry Point
 *
 * - Consume funding, trade and liquidation streams for the configured symbols
 * - Classify, keep bounded histories, and fan alerts out to dashboard viewers
 */

import { DEFAULT_ALERT_THRESHOLDS, HistoryStore } from "@perp-pulse/core";
import { logger } from "@perp-pulse/utils";

import { env } from "./env";
import { MonitorServer } from "./server";
import { AlertPipeline, BroadcastHub, FeedSupervisor, createReconnectStrategy } from "./services";

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  logger.info("Starting monitor", {
    symbols: env.SYMBOLS,
    streamUrl: env.BINANCE_STREAM_URL,
    reconnect: env.RECONNECT_STRATEGY,
  });

  const store = new HistoryStore(env.SYMBOLS);
  const hub = new BroadcastHub(() => store.snapshot());
  const pipeline = new AlertPipeline(store, hub, {
    thresholds: {
      ...DEFAULT_ALERT_THRESHOLDS,
      minLiquidationUsd: env.MIN_LIQUIDATION_USD,
      minTradeUsd: env.MIN_TRADE_USD,
      minWhaleUsd: env.MIN_WHALE_USD,
    },
    fundingPeriodsPerDay: env.FUNDING_PERIODS_PER_DAY,
  });

  const supervisor = new FeedSupervisor({
    baseUrl: env.BINANCE_STREAM_URL,
    symbols: env.SYMBOLS,
    pipeline,
    createReconnect: () => createReconnectStrategy(env.RECONNECT_STRATEGY, env.RECONNECT_DELAY_MS),
  });

  const server = new MonitorServer({ hub, feedStatuses: () => supervisor.statuses() });

  // ============================================================================
  // Start Services
  // ============================================================================

  await server.listen(env.PORT, env.HOST);
  supervisor.start();

  // ============================================================================
  // Graceful Shutdown
  // ============================================================================

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down...");

    try {
      await supervisor.stop();
      hub.closeAll();
      await server.close();
    } catch (error) {
      logger.error("Shutdown failed", { error });
      process.exit(1);
    }

    logger.info("Shutdown complete", pipeline.getCounters());
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown();
  });
  process.on("SIGTERM", () => {
    void shutdown();
  });

  logger.info("Monitor running", { url: `http://${env.HOST}:${env.PORT}` });
}

main().catch(error => {
  logger.error("Fatal error", error);
  process.exit(1);
});
