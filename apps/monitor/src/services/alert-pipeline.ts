/**
 * Alert Pipeline
 *
 * Applies thresholds and classification to decoded upstream ticks, updates the
 * history store, and publishes the full contents of every container it touched.
 *
 * Publishing is fire-and-forget: a slow viewer never holds up a feed.
 */

import {
  DEFAULT_ALERT_THRESHOLDS,
  FUNDING_PERIODS_PER_DAY,
  toFundingSnapshot,
  toLiquidationEvent,
  toTradeAlert,
  type AlertThresholds,
  type FundingTick,
  type HistoryStore,
  type LiquidationTick,
  type MonitorEvent,
  type TradeTick,
} from "@perp-pulse/core";
import { logger } from "@perp-pulse/utils";

import type { EventPublisher } from "../types";

const log = logger.child("pipeline");

export interface AlertPipelineOptions {
  thresholds?: AlertThresholds;
  fundingPeriodsPerDay?: number;
}

export interface PipelineCounters {
  funding: number;
  liquidations: number;
  liquidationsFiltered: number;
  trades: number;
  tradesFiltered: number;
  whales: number;
}

export class AlertPipeline {
  private readonly store: HistoryStore;
  private readonly publisher: EventPublisher;
  private readonly thresholds: AlertThresholds;
  private readonly fundingPeriodsPerDay: number;
  private readonly counters: PipelineCounters = {
    funding: 0,
    liquidations: 0,
    liquidationsFiltered: 0,
    trades: 0,
    tradesFiltered: 0,
    whales: 0,
  };

  constructor(store: HistoryStore, publisher: EventPublisher, options: AlertPipelineOptions = {}) {
    this.store = store;
    this.publisher = publisher;
    this.thresholds = options.thresholds ?? DEFAULT_ALERT_THRESHOLDS;
    this.fundingPeriodsPerDay = options.fundingPeriodsPerDay ?? FUNDING_PERIODS_PER_DAY;
  }

  /**
   * @param streamSymbol - Tracked symbol the funding stream was opened for
   */
  onFunding(streamSymbol: string, tick: FundingTick): void {
    const snapshot = toFundingSnapshot(tick, this.fundingPeriodsPerDay);

    if (!this.store.setFunding(streamSymbol, snapshot)) {
      log.warn("funding tick for untracked symbol", { streamSymbol, symbol: tick.symbol });
      return;
    }

    this.counters.funding++;
    this.emit({ type: "funding_update", data: this.store.fundingTable() });
  }

  onLiquidation(tick: LiquidationTick): void {
    const event = toLiquidationEvent(tick, this.thresholds);
    if (!event) {
      this.counters.liquidationsFiltered++;
      return;
    }

    this.store.recordLiquidation(event);
    this.counters.liquidations++;
    this.emit({ type: "liquidation_update", data: this.store.liquidationHistory() });
  }

  onTrade(tick: TradeTick): void {
    const alert = toTradeAlert(tick, this.thresholds);
    if (!alert) {
      this.counters.tradesFiltered++;
      return;
    }

    this.store.recordTrade(alert.trade);
    this.counters.trades++;
    this.emit({ type: "trade_update", data: this.store.tradeHistory() });

    if (alert.whale) {
      this.store.recordWhale(alert.whale);
      this.counters.whales++;
      log.debug("whale trade", {
        symbol: alert.whale.symbol,
        direction: alert.whale.direction,
        size: alert.whale.sizeLabel,
        tier: alert.whale.tier,
      });
      this.emit({ type: "whale_alert_update", data: this.store.whaleHistory() });
    }
  }

  getCounters(): PipelineCounters {
    return { ...this.counters };
  }

  private emit(event: MonitorEvent): void {
    void this.publisher.publish(event);
  }
}
