/**
 * Binance futures adapter
 *
 * Stream endpoints, wire decoding and the WebSocket wrapper.
 */

export {
  BINANCE_FUTURES_STREAM_URL,
  BinanceStreamPaths,
  fundingStream,
  tradeStream,
  liquidationStream,
  type StreamDescriptor,
} from "./streams";
export {
  MarkPriceMessageSchema,
  AggTradeMessageSchema,
  ForceOrderMessageSchema,
  decodeMarkPrice,
  decodeAggTrade,
  decodeForceOrder,
  type MarkPriceMessage,
  type AggTradeMessage,
  type ForceOrderMessage,
} from "./messages";
export {
  WsConnection,
  defaultConnectionFactory,
  type IWsConnection,
  type WsConnectionOptions,
  type WsConnectionFactory,
} from "./ws-connection";
