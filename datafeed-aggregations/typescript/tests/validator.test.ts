import { describe, it, expect, vi } from "vitest";
import { AggregationValidator } from "../src/validator.js";
import { ConfigurationError, Messages } from "../src/errors/index.js";
import type { Logger } from "../src/observability/types.js";
import { composite, dateHistogram, dateSource, other } from "./fixtures.js";

function recordingLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    setLevel: vi.fn(),
  } satisfies Logger;
}

describe("AggregationValidator", () => {
  it("should validate aggregations submitted as JSON", () => {
    const validator = new AggregationValidator({ logger: recordingLogger() });

    const interval = validator.validateAggregations({
      buckets: {
        date_histogram: { field: "timestamp", fixed_interval: "5m" },
        aggs: { timestamp: { max: { field: "timestamp" } } },
      },
    });

    expect(interval).toBe(300_000);
  });

  it("should resolve a numeric deprecated interval from JSON", () => {
    const validator = new AggregationValidator({ logger: recordingLogger() });

    const interval = validator.validateAggregations({
      buckets: { date_histogram: { field: "timestamp", interval: 3_600_000 } },
    });

    expect(interval).toBe(3_600_000);
  });

  it("should reject JSON with a month calendar interval", () => {
    const validator = new AggregationValidator({ logger: recordingLogger() });

    expect(() =>
      validator.validateAggregations({
        buckets: { date_histogram: { field: "timestamp", calendar_interval: "month" } },
      })
    ).toThrow(Messages.CALENDAR_INTERVAL_TOO_LONG);
  });

  it("should log the resolved interval at debug", () => {
    const logger = recordingLogger();
    const validator = new AggregationValidator({ logger });

    validator.histogramIntervalMillis([dateHistogram("buckets", { calendarInterval: "hour" })]);

    expect(logger.debug).toHaveBeenCalledWith("resolved bucketing interval", {
      aggregation: "buckets",
      type: "date_histogram",
      intervalMs: 3_600_000,
    });
  });

  it("should warn and use the first of several composite date sources", () => {
    const logger = recordingLogger();
    const validator = new AggregationValidator({ logger });
    const tree = [
      composite("buckets", [
        dateSource("minutely", { fixedInterval: "1m" }),
        dateSource("hourly", { fixedInterval: "1h" }),
      ]),
    ];

    expect(validator.histogramIntervalMillis(tree)).toBe(60_000);
    expect(logger.warn).toHaveBeenCalledWith(
      "composite aggregation has several date_histogram sources; using the first",
      { aggregation: "buckets", sources: ["minutely", "hourly"] }
    );
  });

  it("should reject several composite date sources in strict mode", () => {
    const logger = recordingLogger();
    const validator = new AggregationValidator({
      config: { strictCompositeSources: true },
      logger,
    });
    const tree = [
      composite("buckets", [
        dateSource("minutely", { fixedInterval: "1m" }),
        dateSource("hourly", { fixedInterval: "1h" }),
      ]),
    ];

    expect(() => validator.histogramIntervalMillis(tree)).toThrow(ConfigurationError);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("should surface the sibling error", () => {
    const validator = new AggregationValidator({ logger: recordingLogger() });

    expect(() =>
      validator.locateDateBucketAggregation([
        dateHistogram("a", { fixedInterval: "1m" }),
        other("b", "max"),
      ])
    ).toThrow(Messages.NO_SIBLINGS);
  });

  it("should wrap queries without checking the window by default", () => {
    const validator = new AggregationValidator({ logger: recordingLogger() });

    const query = validator.wrapInTimeRangeQuery({ match_all: {} }, "ts", 2000, 1000);

    expect(query.bool.filter[1]).toEqual({
      range: { ts: { gte: 2000, lt: 1000, format: "epoch_millis" } },
    });
  });

  it("should check the window when configured", () => {
    const validator = new AggregationValidator({
      config: { validateTimeRange: true },
      logger: recordingLogger(),
    });

    expect(() => validator.wrapInTimeRangeQuery({ match_all: {} }, "ts", 2000, 1000)).toThrow(
      Messages.TIME_RANGE_START_AFTER_END
    );
  });

  it("should build its logger from the configuration", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const validator = new AggregationValidator({ config: { logLevel: "debug" } });

    validator.intervalMillis(dateHistogram("buckets", { fixedInterval: "1s" }));

    expect(validator.config.logLevel).toBe("debug");
    expect(debug).toHaveBeenCalledTimes(1);
  });

  it("should stay quiet at the default level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const validator = new AggregationValidator();

    validator.intervalMillis(dateHistogram("buckets", { fixedInterval: "1s" }));

    expect(validator.config).toEqual({
      strictCompositeSources: false,
      validateTimeRange: false,
      logLevel: "info",
      logJson: false,
    });
    expect(debug).not.toHaveBeenCalled();
  });
});
