/**
 * History Store
 *
 * Owns the four alert containers: the funding table (one slot per tracked
 * symbol) and the liquidation, trade and whale histories.
 *
 * Every mutator is synchronous, so on a single event loop writers from
 * different feeds never interleave inside an insertion, and readers always see
 * a consistent copy.
 */

import { BoundedHistory } from "./bounded-history";
import type {
  FundingSnapshot,
  FundingTable,
  LiquidationEvent,
  MonitorSnapshot,
  TradeEvent,
  WhaleAlertEvent,
} from "./types";

export interface HistoryCapacities {
  liquidations: number;
  trades: number;
  whaleAlerts: number;
}

export const DEFAULT_HISTORY_CAPACITIES: HistoryCapacities = {
  liquidations: 25,
  trades: 30,
  whaleAlerts: 15,
};

export class HistoryStore {
  private readonly funding = new Map<string, FundingSnapshot | null>();
  private readonly liquidations: BoundedHistory<LiquidationEvent>;
  private readonly trades: BoundedHistory<TradeEvent>;
  private readonly whaleAlerts: BoundedHistory<WhaleAlertEvent>;

  /**
   * @param symbols - Stream symbols tracked for funding (e.g. "btcusdt")
   */
  constructor(symbols: readonly string[], capacities: HistoryCapacities = DEFAULT_HISTORY_CAPACITIES) {
    for (const symbol of symbols) {
      this.funding.set(symbol, null);
    }
    this.liquidations = new BoundedHistory(capacities.liquidations);
    this.trades = new BoundedHistory(capacities.trades);
    this.whaleAlerts = new BoundedHistory(capacities.whaleAlerts);
  }

  /**
   * Replace the funding snapshot of a tracked symbol.
   * Returns false (and changes nothing) for a symbol outside the tracked set.
   */
  setFunding(symbol: string, snapshot: FundingSnapshot): boolean {
    if (!this.funding.has(symbol)) return false;
    this.funding.set(symbol, snapshot);
    return true;
  }

  recordLiquidation(event: LiquidationEvent): void {
    this.liquidations.push(event);
  }

  recordTrade(event: TradeEvent): void {
    this.trades.push(event);
  }

  recordWhale(event: WhaleAlertEvent): void {
    this.whaleAlerts.push(event);
  }

  trackedSymbols(): string[] {
    return Array.from(this.funding.keys());
  }

  fundingTable(): FundingTable {
    return Object.fromEntries(this.funding);
  }

  liquidationHistory(): LiquidationEvent[] {
    return this.liquidations.toArray();
  }

  tradeHistory(): TradeEvent[] {
    return this.trades.toArray();
  }

  whaleHistory(): WhaleAlertEvent[] {
    return this.whaleAlerts.toArray();
  }

  snapshot(): MonitorSnapshot {
    return {
      funding: this.fundingTable(),
      liquidations: this.liquidationHistory(),
      trades: this.tradeHistory(),
      whaleAlerts: this.whaleHistory(),
    };
  }
}
