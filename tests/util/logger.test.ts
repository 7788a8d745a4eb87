import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  createLogger,
  formatEntry,
  getLogLevel,
  parseLogLevel,
  setLogLevel,
  type LogLevel,
} from "../../src/util/logger.js";

let previousLevel: LogLevel;

beforeEach(() => {
  previousLevel = getLogLevel();
});

afterEach(() => {
  setLogLevel(previousLevel);
  vi.restoreAllMocks();
});

describe("logger", () => {
  it("formats entries with level and component", () => {
    const at = new Date("2026-01-02T03:04:05.000Z");

    expect(formatEntry("debug", "load", "Loaded 2 rules", undefined, at)).toBe(
      "[2026-01-02T03:04:05.000Z] [DEBUG] [load] Loaded 2 rules",
    );
    expect(formatEntry("warn", "load", "Slow", { files: 2 }, at)).toBe(
      '[2026-01-02T03:04:05.000Z] [WARN] [load] Slow {"files":2}',
    );
  });

  it("drops entries below the configured level", () => {
    const write = vi
      .spyOn(process.stderr, "write")
      .mockImplementation(() => true);
    const logger = createLogger("load");

    setLogLevel("warn");
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0]?.[0])).toMatch(
      /\[WARN\] \[load\] shown\n$/,
    );
  });

  it("parses log levels from config values", () => {
    expect(parseLogLevel(" DEBUG ")).toBe("debug");
    expect(parseLogLevel("error")).toBe("error");
    expect(() => parseLogLevel("loud")).toThrow("Unsupported log level: loud");
  });
});
