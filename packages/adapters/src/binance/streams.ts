/**
 * Binance futures stream endpoints
 *
 * Raw streams are addressed as `<base>/<streamName>`; symbol streams use the
 * lower-case symbol.
 */

import type { FundingTick, LiquidationTick, TradeTick } from "@perp-pulse/core";

import type { FeedDecoder } from "../ports";
import { decodeAggTrade, decodeForceOrder, decodeMarkPrice } from "./messages";

export const BINANCE_FUTURES_STREAM_URL = "wss://fstream.binance.com/ws";

export const BinanceStreamPaths = {
  markPrice: (symbol: string) => `${symbol.toLowerCase()}@markPrice`,
  aggTrade: (symbol: string) => `${symbol.toLowerCase()}@aggTrade`,
  forceOrders: () => "!forceOrder@arr",
} as const;

/**
 * Everything a consumer needs to follow one stream
 */
export interface StreamDescriptor<T> {
  label: string;
  url: string;
  decode: FeedDecoder<T>;
}

const joinUrl = (baseUrl: string, streamName: string): string => `${baseUrl.replace(/\/+$/, "")}/${streamName}`;

export function fundingStream(baseUrl: string, symbol: string): StreamDescriptor<FundingTick> {
  const name = BinanceStreamPaths.markPrice(symbol);
  return { label: name, url: joinUrl(baseUrl, name), decode: decodeMarkPrice };
}

export function tradeStream(baseUrl: string, symbol: string): StreamDescriptor<TradeTick> {
  const name = BinanceStreamPaths.aggTrade(symbol);
  return { label: name, url: joinUrl(baseUrl, name), decode: decodeAggTrade };
}

export function liquidationStream(baseUrl: string): StreamDescriptor<LiquidationTick> {
  const name = BinanceStreamPaths.forceOrders();
  return { label: name, url: joinUrl(baseUrl, name), decode: decodeForceOrder };
}
