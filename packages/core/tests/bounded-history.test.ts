import { describe, expect, test } from "vitest";

import { BoundedHistory } from "../src/bounded-history";

describe("BoundedHistory", () => {
  test("keeps the newest entries first", () => {
    const history = new BoundedHistory<number>(3);
    history.push(1);
    history.push(2);

    expect(history.toArray()).toEqual([2, 1]);
    expect(history.size).toBe(2);
  });

  test("evicts the oldest entry when full", () => {
    const history = new BoundedHistory<number>(3);
    for (let i = 1; i <= 5; i++) history.push(i);

    expect(history.toArray()).toEqual([5, 4, 3]);
    expect(history.size).toBe(3);
    expect(history.maxSize).toBe(3);
  });

  test("toArray returns a copy", () => {
    const history = new BoundedHistory<number>(2);
    history.push(1);

    const copy = history.toArray();
    copy.push(99);

    expect(history.toArray()).toEqual([1]);
  });

  test("capacity is at least one", () => {
    const history = new BoundedHistory<string>(0);
    history.push("a");
    history.push("b");

    expect(history.toArray()).toEqual(["b"]);
  });

  test("clear empties the buffer", () => {
    const history = new BoundedHistory<number>(2);
    history.push(1);
    history.clear();

    expect(history.size).toBe(0);
  });
});
