import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, formatLine, parseLogLevel } from "../src/logger";

describe("formatLine", () => {
  it("prefixes the timestamp, level and scope", () => {
    expect(formatLine("warn", "sorter", "careful", "2024-01-01T00:00:00.000Z")).toBe(
      "[2024-01-01T00:00:00.000Z] WARN [sorter] careful"
    );
    expect(formatLine("info", null, "hello", "2024-01-01T00:00:00.000Z")).toBe("[2024-01-01T00:00:00.000Z] INFO hello");
  });
});

describe("parseLogLevel", () => {
  it("falls back to info for unknown values", () => {
    expect(parseLogLevel(" DEBUG ")).toBe("debug");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops lines below the minimum level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = createLogger("test", "warn");

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^\[.+\] WARN \[test\] shown$/);
  });
});
