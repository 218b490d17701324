import { describe, it, expect, vi } from "vitest";
import { ConsoleLogger, NoopLogger, createLogger } from "../src/observability/logger.js";
import { LogLevel } from "../src/observability/types.js";

describe("ConsoleLogger", () => {
  it("should drop messages below its level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: LogLevel.Warn });

    logger.debug("hidden");
    logger.warn("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("should prefix text lines with level and name", () => {
    const info = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ name: "feed" });

    logger.info("resolved", { intervalMs: 60000 });

    const [line, context] = info.mock.calls[0] ?? [];
    expect(String(line)).toMatch(/^\d{4}-\d{2}-\d{2}T.* INFO\[feed\] resolved$/);
    expect(context).toEqual({ intervalMs: 60000 });
  });

  it("should emit JSON lines", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ name: "feed", json: true });

    logger.error("failed", { aggregation: "buckets" });

    const parsed: unknown = JSON.parse(String(error.mock.calls[0]?.[0]));
    expect(parsed).toMatchObject({
      level: LogLevel.Error,
      message: "failed",
      component: "feed",
      context: { aggregation: "buckets" },
    });
  });

  it("should change level at runtime", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const logger = new ConsoleLogger();

    logger.debug("hidden");
    logger.setLevel(LogLevel.Debug);
    logger.debug("shown");

    expect(debug).toHaveBeenCalledTimes(1);
  });
});

describe("createLogger", () => {
  it("should create a noop logger when disabled", () => {
    expect(createLogger({ enabled: false })).toBeInstanceOf(NoopLogger);
  });

  it("should create a console logger by default", () => {
    expect(createLogger()).toBeInstanceOf(ConsoleLogger);
  });
});
