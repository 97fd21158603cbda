import { describe, it, expect, vi, test } from "vitest";
import {
  parseLogLevel,
  DefaultLogger,
  createLogger,
  formatLine,
  withFields,
  type Logger,
} from "./logger";

function mockLogger() {
  return {
    debug: vi.fn<Logger["debug"]>(),
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
  };
}

test("parseLogLevel", () => {
  expect(parseLogLevel("debug")).toBe("debug");
  expect(parseLogLevel("DEBUG")).toBe("debug");
  expect(parseLogLevel("warning")).toBe("warn");
  expect(parseLogLevel("WARNING")).toBe("warn");

  expect(parseLogLevel("")).toBe("warn");

  expect(() => parseLogLevel("invalid")).toThrow(
    'Invalid log level value: "invalid" (must be debug, info, warn, or error)',
  );
});

describe("formatLine", () => {
  const at = new Date("2026-01-01T00:00:00.000Z");

  it("renders key/value pairs", () => {
    expect(
      formatLine(
        "INFO",
        "Fetched credential",
        ["accessKeyId", "id-1", "expires_in", "3600s", "attempt", 2],
        at,
      ),
    ).toBe(
      'time=2026-01-01T00:00:00.000Z level=INFO msg="Fetched credential" accessKeyId=id-1 expires_in=3600s attempt=2',
    );
  });

  it("quotes errors and strings with spaces", () => {
    expect(
      formatLine(
        "WARN",
        "Scheduled credential refresh failed",
        ["error", new Error("sts unavailable"), "operation", "get project"],
        at,
      ),
    ).toBe(
      'time=2026-01-01T00:00:00.000Z level=WARN msg="Scheduled credential refresh failed" error="sts unavailable" operation="get project"',
    );
  });

  it("redacts secrets", () => {
    expect(
      formatLine(
        "DEBUG",
        "Pushed credential",
        ["accessKeySecret", "test-secret", "securityToken", "test-token"],
        at,
      ),
    ).toBe(
      'time=2026-01-01T00:00:00.000Z level=DEBUG msg="Pushed credential" accessKeySecret=[REDACTED] securityToken=[REDACTED]',
    );
  });

  it("drops a trailing key without a value", () => {
    expect(formatLine("INFO", "done", ["dangling"], at)).toBe(
      'time=2026-01-01T00:00:00.000Z level=INFO msg="done"',
    );
  });
});

describe("createLogger", () => {
  it("should return DefaultLogger when no custom logger provided", () => {
    const logger = createLogger(undefined, "debug");
    expect(logger).toBeInstanceOf(DefaultLogger);
  });

  it("should apply level filtering to custom logger", () => {
    const custom = mockLogger();
    const logger = createLogger(custom, "warn");

    logger.debug("test");
    logger.info("test");
    logger.warn("test");
    logger.error("test");

    expect(custom.debug).not.toHaveBeenCalled();
    expect(custom.info).not.toHaveBeenCalled();
    expect(custom.warn).toHaveBeenCalledWith("test");
    expect(custom.error).toHaveBeenCalledWith("test");
  });

  it("should pass arguments to custom logger", () => {
    const custom = mockLogger();
    const logger = createLogger(custom, "debug");

    logger.debug("message", "key1", "value1", "key2", 123);

    expect(custom.debug).toHaveBeenCalledWith(
      "message",
      "key1",
      "value1",
      "key2",
      123,
    );
  });
});

test("withFields prepends bound fields", () => {
  const custom = mockLogger();
  const logger = withFields(custom, "component", "scheduler");

  logger.info("Next credential refresh", "delay", "30000ms");

  expect(custom.info).toHaveBeenCalledWith(
    "Next credential refresh",
    "component",
    "scheduler",
    "delay",
    "30000ms",
  );
});
