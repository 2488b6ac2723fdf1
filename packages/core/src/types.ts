/**
 * Core Domain Types
 *
 * Alert payloads as they are retained in history and sent to viewers.
 * No I/O dependencies, no side effects.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Value Objects
// ─────────────────────────────────────────────────────────────────────────────

/** Milliseconds since epoch */
export type Ms = number;

/** Order side as reported by the exchange */
export type Side = "BUY" | "SELL";

/** Aggressor direction of a trade */
export type TradeDirection = "BUY" | "SELL";

// ─────────────────────────────────────────────────────────────────────────────
// Funding
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Funding severity tiers, derived from the annualized rate
 */
export type FundingSeverity = "extreme" | "high" | "positive" | "negative" | "normal";

export interface FundingSnapshot {
  /** Display symbol, e.g. "BTC" */
  symbol: string;
  /** Instantaneous funding rate in percent */
  ratePct: number;
  /** ratePct × settlements per day × 365 */
  annualizedPct: number;
  severity: FundingSeverity;
}

/**
 * Latest funding snapshot per tracked stream symbol (null until first message)
 */
export type FundingTable = Record<string, FundingSnapshot | null>;

// ─────────────────────────────────────────────────────────────────────────────
// Liquidations
// ─────────────────────────────────────────────────────────────────────────────

export type LiquidationLabel = "LONG LIQ" | "SHORT LIQ";

export interface LiquidationEvent {
  readonly symbol: string;
  readonly side: Side;
  readonly label: LiquidationLabel;
  readonly sizeLabel: string;
  /** HH:MM:SS, US Eastern */
  readonly time: string;
  readonly colorClass: "liquidation-long" | "liquidation-short";
}

// ─────────────────────────────────────────────────────────────────────────────
// Trades / Whales
// ─────────────────────────────────────────────────────────────────────────────

export interface TradeEvent {
  readonly symbol: string;
  readonly direction: TradeDirection;
  readonly sizeLabel: string;
  readonly price: number;
  /** HH:MM:SS, US Eastern */
  readonly time: string;
  readonly colorClass: "trade-buy" | "trade-sell";
}

export type WhaleTier = "mega" | "huge" | "big";

export interface WhaleAlertEvent extends TradeEvent {
  readonly usdValue: number;
  readonly tier: WhaleTier;
  readonly tierLabel: "MEGA" | "HUGE" | "BIG";
  readonly tierClass: `whale-${WhaleTier}`;
}

// ─────────────────────────────────────────────────────────────────────────────
// Viewer Events
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Full contents of every history container
 */
export interface MonitorSnapshot {
  funding: FundingTable;
  liquidations: LiquidationEvent[];
  trades: TradeEvent[];
  whaleAlerts: WhaleAlertEvent[];
}

/**
 * Events pushed to viewers. Every payload replaces the viewer's copy of the
 * container; nothing is a delta.
 */
export type MonitorEvent =
  | { type: "initial_data"; data: MonitorSnapshot }
  | { type: "funding_update"; data: FundingTable }
  | { type: "liquidation_update"; data: LiquidationEvent[] }
  | { type: "trade_update"; data: TradeEvent[] }
  | { type: "whale_alert_update"; data: WhaleAlertEvent[] };

export type MonitorEventType = MonitorEvent["type"];

// ─────────────────────────────────────────────────────────────────────────────
// Normalized Upstream Messages
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Mark price / funding tick for one symbol
 */
export interface FundingTick {
  symbol: string;
  /** Funding rate as a fraction (0.0001 = 0.01%) */
  rate: number;
}

export interface TradeTick {
  symbol: string;
  price: number;
  quantity: number;
  ts: Ms;
  isBuyerMaker: boolean;
}

export interface LiquidationTick {
  symbol: string;
  side: Side;
  ts: Ms;
  filledQuantity: number;
  price: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Thresholds
// ─────────────────────────────────────────────────────────────────────────────

/**
 * USD notional boundaries (inclusive lower bounds)
 */
export interface AlertThresholds {
  minLiquidationUsd: number;
  minTradeUsd: number;
  minWhaleUsd: number;
  hugeWhaleUsd: number;
  megaWhaleUsd: number;
}
