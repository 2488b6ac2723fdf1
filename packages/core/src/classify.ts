/**
 * Alert Classification
 *
 * Turns normalized upstream ticks into display-ready alert payloads.
 * Ticks below their notional threshold yield null.
 */

import { formatAmount, formatClockTime, displaySymbol, shortSymbol } from "./format";
import type {
  AlertThresholds,
  FundingSeverity,
  FundingSnapshot,
  FundingTick,
  LiquidationEvent,
  LiquidationTick,
  TradeEvent,
  TradeTick,
  WhaleAlertEvent,
  WhaleTier,
} from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** 8-hour settlement */
export const FUNDING_PERIODS_PER_DAY = 3;

export const DEFAULT_ALERT_THRESHOLDS: AlertThresholds = {
  minLiquidationUsd: 5_000,
  minTradeUsd: 15_000,
  minWhaleUsd: 100_000,
  hugeWhaleUsd: 500_000,
  megaWhaleUsd: 1_000_000,
};

// ─────────────────────────────────────────────────────────────────────────────
// Funding
// ─────────────────────────────────────────────────────────────────────────────

export function annualizeFundingRate(ratePct: number, periodsPerDay: number = FUNDING_PERIODS_PER_DAY): number {
  return ratePct * periodsPerDay * 365;
}

/**
 * Severity tier of an annualized funding rate (percent)
 *
 * - > 50: extreme
 * - > 30: high
 * - > 5: positive
 * - < -10: negative
 * - otherwise: normal
 */
export function classifyFundingSeverity(annualizedPct: number): FundingSeverity {
  if (annualizedPct > 50) return "extreme";
  if (annualizedPct > 30) return "high";
  if (annualizedPct > 5) return "positive";
  if (annualizedPct < -10) return "negative";
  return "normal";
}

export function toFundingSnapshot(
  tick: FundingTick,
  periodsPerDay: number = FUNDING_PERIODS_PER_DAY,
): FundingSnapshot {
  const ratePct = tick.rate * 100;
  const annualizedPct = annualizeFundingRate(ratePct, periodsPerDay);

  return {
    symbol: displaySymbol(tick.symbol),
    ratePct,
    annualizedPct,
    severity: classifyFundingSeverity(annualizedPct),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Liquidations
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Build a liquidation row, or null when the filled notional is below the threshold.
 * A SELL-side forced order closes a long.
 */
export function toLiquidationEvent(
  tick: LiquidationTick,
  thresholds: AlertThresholds = DEFAULT_ALERT_THRESHOLDS,
): LiquidationEvent | null {
  const usdSize = tick.filledQuantity * tick.price;
  if (usdSize < thresholds.minLiquidationUsd) return null;

  const isLong = tick.side === "SELL";

  return {
    symbol: shortSymbol(tick.symbol),
    side: tick.side,
    label: isLong ? "LONG LIQ" : "SHORT LIQ",
    sizeLabel: formatAmount(usdSize),
    time: formatClockTime(tick.ts),
    colorClass: isLong ? "liquidation-long" : "liquidation-short",
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Trades / Whales
// ─────────────────────────────────────────────────────────────────────────────

export function classifyWhaleTier(usdValue: number, thresholds: AlertThresholds = DEFAULT_ALERT_THRESHOLDS): WhaleTier {
  if (usdValue >= thresholds.megaWhaleUsd) return "mega";
  if (usdValue >= thresholds.hugeWhaleUsd) return "huge";
  return "big";
}

const TIER_LABELS = {
  mega: "MEGA",
  huge: "HUGE",
  big: "BIG",
} as const satisfies Record<WhaleTier, WhaleAlertEvent["tierLabel"]>;

export interface TradeAlert {
  trade: TradeEvent;
  /** Set when the notional reaches the whale threshold */
  whale: WhaleAlertEvent | null;
}

/**
 * Build the trade row (and whale alert) for a trade, or null when the notional
 * is below the trade threshold. The buyer being the maker means the aggressor sold.
 */
export function toTradeAlert(tick: TradeTick, thresholds: AlertThresholds = DEFAULT_ALERT_THRESHOLDS): TradeAlert | null {
  const usdSize = tick.price * tick.quantity;
  if (usdSize < thresholds.minTradeUsd) return null;

  const direction = tick.isBuyerMaker ? "SELL" : "BUY";
  const trade: TradeEvent = {
    symbol: shortSymbol(tick.symbol),
    direction,
    sizeLabel: formatAmount(usdSize),
    price: tick.price,
    time: formatClockTime(tick.ts),
    colorClass: direction === "BUY" ? "trade-buy" : "trade-sell",
  };

  if (usdSize < thresholds.minWhaleUsd) {
    return { trade, whale: null };
  }

  const tier = classifyWhaleTier(usdSize, thresholds);

  return {
    trade,
    whale: {
      ...trade,
      usdValue: usdSize,
      tier,
      tierLabel: TIER_LABELS[tier],
      tierClass: `whale-${tier}`,
    },
  };
}
