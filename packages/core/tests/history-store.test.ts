/**
 * History Store Tests
 */

import { describe, expect, test } from "vitest";

import { toFundingSnapshot, toTradeAlert } from "../src/classify";
import { HistoryStore } from "../src/history-store";

describe("HistoryStore", () => {
  test("funding table starts with an empty slot per tracked symbol", () => {
    const store = new HistoryStore(["btcusdt", "ethusdt"]);

    expect(store.fundingTable()).toEqual({ btcusdt: null, ethusdt: null });
    expect(store.trackedSymbols()).toEqual(["btcusdt", "ethusdt"]);
  });

  test("setFunding replaces tracked slots and rejects others", () => {
    const store = new HistoryStore(["btcusdt"]);
    const snap = toFundingSnapshot({ symbol: "BTCUSDT", rate: 0.0001 });

    expect(store.setFunding("btcusdt", snap)).toBe(true);
    expect(store.setFunding("xrpusdt", snap)).toBe(false);
    expect(store.fundingTable()).toEqual({ btcusdt: snap });
  });

  test("histories respect their capacities", () => {
    const store = new HistoryStore([], { liquidations: 2, trades: 2, whaleAlerts: 1 });

    for (const price of [20_000, 30_000, 40_000]) {
      const alert = toTradeAlert({ symbol: "BTCUSDT", price, quantity: 5, ts: 0, isBuyerMaker: false });
      if (!alert) throw new Error("expected a trade alert");
      store.recordTrade(alert.trade);
      if (alert.whale) store.recordWhale(alert.whale);
    }

    expect(store.tradeHistory().map(t => t.price)).toEqual([40_000, 30_000]);
    expect(store.whaleHistory().map(w => w.price)).toEqual([40_000]);
  });

  test("snapshot is detached from later writes", () => {
    const store = new HistoryStore(["btcusdt"]);
    const before = store.snapshot();

    const alert = toTradeAlert({ symbol: "BTCUSDT", price: 50_000, quantity: 1, ts: 0, isBuyerMaker: false });
    if (!alert) throw new Error("expected a trade alert");
    store.recordTrade(alert.trade);
    store.setFunding("btcusdt", toFundingSnapshot({ symbol: "BTCUSDT", rate: 0.001 }));

    expect(before).toEqual({ funding: { btcusdt: null }, liquidations: [], trades: [], whaleAlerts: [] });
    expect(store.snapshot().trades).toHaveLength(1);
  });
});
