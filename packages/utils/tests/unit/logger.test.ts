import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { LogLevel, logger, type LogRecord } from "../../src/logger";

describe("logger", () => {
  const records: LogRecord[] = [];
  const originalLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    records.length = 0;
    logger.setSink({ write: r => records.push(r) });
  });

  afterEach(() => {
    logger.clearSink();
    vi.restoreAllMocks();
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  describe("sink routing", () => {
    test("routes records to the sink instead of the console", () => {
      process.env.LOG_LEVEL = "INFO";
      const info = vi.spyOn(console, "info").mockImplementation(() => undefined);

      logger.info("hello", { a: 1, b: "two" });

      expect(info).not.toHaveBeenCalled();
      expect(records).toHaveLength(1);
      expect(records[0]?.level).toBe(LogLevel.INFO);
      expect(records[0]?.message).toBe("hello");
      expect(records[0]?.fields).toEqual({ a: "1", b: "two" });
    });

    test("child loggers carry their scope", () => {
      process.env.LOG_LEVEL = "DEBUG";

      logger.child("hub").warn("send failed", { subscriberId: "s-1" });

      expect(records[0]?.scope).toBe("hub");
      expect(records[0]?.level).toBe(LogLevel.WARN);
      expect(records[0]?.fields).toEqual({ subscriberId: "s-1" });
    });

    test("error fields are rendered as their message", () => {
      process.env.LOG_LEVEL = "DEBUG";

      logger.error("feed fault", { error: new Error("socket hang up") });

      expect(records[0]?.fields).toEqual({ error: "socket hang up" });
    });
  });

  describe("level filtering", () => {
    test("drops records below the configured level", () => {
      process.env.LOG_LEVEL = "WARN";

      logger.debug("noise");
      logger.info("chatter");
      logger.warn("kept");
      logger.error("kept too");

      expect(records.map(r => r.message)).toEqual(["kept", "kept too"]);
    });

    test("falls back to INFO for an unknown level", () => {
      process.env.LOG_LEVEL = "verbose";

      expect(logger.getCurrentLevel()).toBe(LogLevel.INFO);
    });
  });
});
