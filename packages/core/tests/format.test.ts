/**
 * Formatting Tests
 *
 * - USD amounts with M / K suffixes
 * - HH:MM:SS in US Eastern time (standard and daylight time)
 * - Symbol display forms
 */

import { describe, expect, test } from "vitest";

import { displaySymbol, formatAmount, formatClockTime, shortSymbol } from "../src/format";

describe("formatAmount", () => {
  test("millions use two decimals", () => {
    expect(formatAmount(1_234_567)).toBe("$1.23M");
    expect(formatAmount(1_000_000)).toBe("$1.00M");
  });

  test("thousands use one decimal", () => {
    expect(formatAmount(15_000)).toBe("$15.0K");
    expect(formatAmount(150_000)).toBe("$150.0K");
    expect(formatAmount(999_949)).toBe("$999.9K");
  });

  test("smaller amounts are rounded to whole dollars", () => {
    expect(formatAmount(999)).toBe("$999");
    expect(formatAmount(42.4)).toBe("$42");
  });
});

describe("formatClockTime", () => {
  test("renders winter timestamps in EST (UTC-5)", () => {
    // 2024-01-01T00:00:00Z
    expect(formatClockTime(1_704_067_200_000)).toBe("19:00:00");
  });

  test("renders summer timestamps in EDT (UTC-4)", () => {
    // 2024-07-01T12:00:00Z
    expect(formatClockTime(1_719_835_200_000)).toBe("08:00:00");
  });

  test("keeps seconds and pads to two digits", () => {
    // 2024-01-01T05:03:09Z
    expect(formatClockTime(1_704_085_389_000)).toBe("00:03:09");
  });
});

describe("symbols", () => {
  test("displaySymbol upper-cases and strips the quote asset", () => {
    expect(displaySymbol("btcusdt")).toBe("BTC");
    expect(displaySymbol("DOGEUSDT")).toBe("DOGE");
  });

  test("shortSymbol cuts to four characters", () => {
    expect(shortSymbol("1000PEPEUSDT")).toBe("1000");
    expect(shortSymbol("ETHUSDT")).toBe("ETH");
  });
});
