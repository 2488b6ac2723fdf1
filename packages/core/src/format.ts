/**
 * Display formatting for alert payloads
 */

import type { Ms } from "./types";

/** Civil timezone used for every rendered timestamp */
export const DISPLAY_TIME_ZONE = "America/New_York";

/** Width symbols are cut to in liquidation / trade rows */
export const SYMBOL_DISPLAY_WIDTH = 4;

const clockFormatter = new Intl.DateTimeFormat("en-US", {
  timeZone: DISPLAY_TIME_ZONE,
  hourCycle: "h23",
  hour: "2-digit",
  minute: "2-digit",
  second: "2-digit",
});

/**
 * Format a USD amount with an M / K suffix.
 *
 * @example formatAmount(1_234_567) // "$1.23M"
 * @example formatAmount(15_000) // "$15.0K"
 * @example formatAmount(999.6) // "$1000"
 */
export function formatAmount(amount: number): string {
  if (amount >= 1_000_000) {
    return `$${(amount / 1_000_000).toFixed(2)}M`;
  }
  if (amount >= 1_000) {
    return `$${(amount / 1_000).toFixed(1)}K`;
  }
  return `$${amount.toFixed(0)}`;
}

/**
 * Render an epoch timestamp as HH:MM:SS in US Eastern time
 */
export function formatClockTime(ts: Ms): string {
  const parts = clockFormatter.formatToParts(new Date(ts));
  const pick = (type: "hour" | "minute" | "second"): string => parts.find(p => p.type === type)?.value ?? "00";
  return `${pick("hour")}:${pick("minute")}:${pick("second")}`;
}

/**
 * "btcusdt" / "BTCUSDT" -> "BTC"
 */
export function displaySymbol(raw: string): string {
  return raw.toUpperCase().replace(/USDT/g, "");
}

/**
 * Display symbol cut to the fixed row width ("1000PEPEUSDT" -> "1000")
 */
export function shortSymbol(raw: string): string {
  return displaySymbol(raw).slice(0, SYMBOL_DISPLAY_WIDTH);
}
