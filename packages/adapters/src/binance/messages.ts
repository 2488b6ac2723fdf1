/**
 * Binance USDⓈ-M futures stream messages
 *
 * Only the fields the monitor reads are validated; everything else in the
 * payload is ignored. Numeric fields arrive as decimal strings.
 *
 * @see https://developers.binance.com/docs/derivatives/usds-margined-futures/websocket-market-streams
 */

import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { FundingTick, LiquidationTick, TradeTick } from "@perp-pulse/core";

import type { FeedDecodeError } from "../ports";

const decimal = z.coerce.number();

/**
 * <symbol>@markPrice
 * { e: "markPriceUpdate", E, s, p, i, P, r, T }
 */
export const MarkPriceMessageSchema = z.object({
  s: z.string().min(1),
  r: decimal,
});

/**
 * <symbol>@aggTrade
 * { e: "aggTrade", E, s, a, p, q, f, l, T, m }
 */
export const AggTradeMessageSchema = z.object({
  s: z.string().min(1),
  p: decimal,
  q: decimal,
  T: z.number().int(),
  m: z.boolean(),
});

/**
 * !forceOrder@arr
 * { e: "forceOrder", E, o: { s, S, o, f, q, p, ap, X, l, z, T } }
 */
export const ForceOrderMessageSchema = z.object({
  o: z.object({
    s: z.string().min(1),
    S: z.enum(["BUY", "SELL"]),
    T: z.number().int(),
    z: decimal,
    p: decimal,
  }),
});

export type MarkPriceMessage = z.infer<typeof MarkPriceMessageSchema>;
export type AggTradeMessage = z.infer<typeof AggTradeMessageSchema>;
export type ForceOrderMessage = z.infer<typeof ForceOrderMessageSchema>;

type Issue = { path: PropertyKey[]; message: string };

const formatIssues = (issues: readonly Issue[]): string =>
  issues
    .map(issue => {
      const path = issue.path.length > 0 ? issue.path.map(String).join(".") : "<root>";
      return `${path}: ${issue.message}`;
    })
    .join("; ");

const parseWith = <S extends z.ZodType, T>(
  schema: S,
  raw: unknown,
  map: (message: z.infer<S>) => T,
): Result<T, FeedDecodeError> => {
  const result = schema.safeParse(raw);
  if (!result.success) {
    return err({ type: "invalid_message", message: formatIssues(result.error.issues) });
  }
  return ok(map(result.data));
};

// ============================================================================
// Decoders (Binance wire -> domain ticks)
// ============================================================================

export function decodeMarkPrice(raw: unknown): Result<FundingTick, FeedDecodeError> {
  return parseWith(MarkPriceMessageSchema, raw, message => ({
    symbol: message.s,
    rate: message.r,
  }));
}

export function decodeAggTrade(raw: unknown): Result<TradeTick, FeedDecodeError> {
  return parseWith(AggTradeMessageSchema, raw, message => ({
    symbol: message.s,
    price: message.p,
    quantity: message.q,
    ts: message.T,
    isBuyerMaker: message.m,
  }));
}

export function decodeForceOrder(raw: unknown): Result<LiquidationTick, FeedDecodeError> {
  return parseWith(ForceOrderMessageSchema, raw, message => ({
    symbol: message.o.s,
    side: message.o.S,
    ts: message.o.T,
    filledQuantity: message.o.z,
    price: message.o.p,
  }));
}
