/**
 * packages/core - Alert Domain Logic
 *
 * Formatting, classification and bounded history for the monitor.
 * NO I/O dependencies (HTTP, WS, FS).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export type {
  Ms,
  Side,
  TradeDirection,
  FundingSeverity,
  FundingSnapshot,
  FundingTable,
  LiquidationLabel,
  LiquidationEvent,
  TradeEvent,
  WhaleTier,
  WhaleAlertEvent,
  MonitorSnapshot,
  MonitorEvent,
  MonitorEventType,
  FundingTick,
  TradeTick,
  LiquidationTick,
  AlertThresholds,
} from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Formatting
// ─────────────────────────────────────────────────────────────────────────────
export {
  DISPLAY_TIME_ZONE,
  SYMBOL_DISPLAY_WIDTH,
  formatAmount,
  formatClockTime,
  displaySymbol,
  shortSymbol,
} from "./format";

// ─────────────────────────────────────────────────────────────────────────────
// Classification
// ─────────────────────────────────────────────────────────────────────────────
export {
  FUNDING_PERIODS_PER_DAY,
  DEFAULT_ALERT_THRESHOLDS,
  annualizeFundingRate,
  classifyFundingSeverity,
  toFundingSnapshot,
  toLiquidationEvent,
  classifyWhaleTier,
  toTradeAlert,
  type TradeAlert,
} from "./classify";

// ─────────────────────────────────────────────────────────────────────────────
// History
// ─────────────────────────────────────────────────────────────────────────────
export { BoundedHistory } from "./bounded-history";
export { HistoryStore, DEFAULT_HISTORY_CAPACITIES, type HistoryCapacities } from "./history-store";
