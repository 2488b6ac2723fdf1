import { describe, expect, test } from "vitest";

import { ExponentialBackoffReconnect, FixedIntervalReconnect } from "../../src/reconnect";

describe("FixedIntervalReconnect", () => {
  test("returns the same delay for every attempt", () => {
    const strategy = new FixedIntervalReconnect();

    expect([strategy.nextDelayMs(), strategy.nextDelayMs(), strategy.nextDelayMs()]).toEqual([5000, 5000, 5000]);
  });

  test("accepts a custom interval", () => {
    expect(new FixedIntervalReconnect(250).nextDelayMs()).toBe(250);
  });
});

describe("ExponentialBackoffReconnect", () => {
  test("doubles up to the cap", () => {
    const strategy = new ExponentialBackoffReconnect({ initialDelayMs: 1000, maxDelayMs: 5000, multiplier: 2 });

    const delays = Array.from({ length: 5 }, () => strategy.nextDelayMs());

    expect(delays).toEqual([1000, 2000, 4000, 5000, 5000]);
  });

  test("starts over after reset", () => {
    const strategy = new ExponentialBackoffReconnect();
    strategy.nextDelayMs();
    strategy.nextDelayMs();

    strategy.reset();

    expect(strategy.nextDelayMs()).toBe(1000);
  });
});
