import { describe, it, expect } from "vitest";
import { Logger, formatLogEntry, type LogLevel } from "./logs.js";

function capture(debug = false) {
  const lines: Array<[LogLevel, string]> = [];
  const logger = new Logger((level, line) => {
    lines.push([level, line]);
  }, debug);
  return { lines, logger };
}

describe("formatLogEntry", () => {
  it("should format all parts", () => {
    expect(
      formatLogEntry({
        timestamp: "2024-01-02T03:04:05.000Z",
        level: "warn",
        event: "feed.create_ignored",
        type: "article",
        field: "views",
        documentId: "id:shop:article::a1",
        message: "ignored",
        details: { code: "E_X" },
      })
    ).toBe(
      '[2024-01-02T03:04:05.000Z] [WARN] [feed.create_ignored] article/views id:shop:article::a1 ignored {"code":"E_X"}'
    );
  });

  it("should omit missing parts", () => {
    expect(formatLogEntry({ timestamp: "t", level: "info", event: "e" })).toBe("[t] [INFO] [e]");
    expect(formatLogEntry({ timestamp: "t", level: "error", event: "e", field: "f" })).toBe("[t] [ERROR] [e] /f");
  });
});

describe("Logger", () => {
  it("should pass the level to the sink", () => {
    const { lines, logger } = capture();
    logger.info("a");
    logger.warn("b");
    logger.error("c");
    expect(lines.map(([level]) => level)).toEqual(["info", "warn", "error"]);
    expect(lines[2]?.[1]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+Z\] \[ERROR\] \[c\]$/);
  });

  it("should drop debug entries unless enabled", () => {
    const { lines, logger } = capture();
    logger.debug("hidden");
    logger.setDebug(true);
    logger.debug("shown", { message: "m" });
    expect(lines).toHaveLength(1);
    expect(lines[0]?.[1]).toMatch(/\[DEBUG\] \[shown\] m$/);
  });

  it("should drop everything when disabled", () => {
    const { lines, logger } = capture(true);
    logger.setEnabled(false);
    logger.error("x");
    logger.debug("y");
    expect(lines).toEqual([]);
  });
});
