import { describe, it, expect } from "vitest";
import {
  EPOCH_MILLIS_FORMAT,
  assertTimeRange,
  timeRangeQuery,
  wrapInTimeRangeQuery,
} from "../src/query/range.js";
import { Messages } from "../src/errors/index.js";
import type { QueryDSL } from "../src/types/index.js";

describe("wrapInTimeRangeQuery", () => {
  const userQuery: QueryDSL = { term: { host: "web-1" } };

  it("should AND the user query with a half-open time range", () => {
    const query = wrapInTimeRangeQuery(userQuery, "ts", 1000, 2000);

    const [first, range] = query.bool.filter;
    expect(first).toBe(userQuery);
    expect(range.range).toEqual({
      ts: { gte: 1000, lt: 2000, format: EPOCH_MILLIS_FORMAT },
    });
    expect(Object.keys(query.bool)).toEqual(["filter"]);
  });

  it("should not validate the order of the bounds", () => {
    const query = wrapInTimeRangeQuery({ match_all: {} }, "ts", 5000, 1000);

    expect(query.bool.filter[1]).toEqual(timeRangeQuery("ts", 5000, 1000));
  });
});

describe("timeRangeQuery", () => {
  it("should build an epoch millis range", () => {
    expect(timeRangeQuery("@timestamp", 0, 60_000)).toEqual({
      range: { "@timestamp": { gte: 0, lt: 60_000, format: "epoch_millis" } },
    });
  });
});

describe("assertTimeRange", () => {
  it("should accept empty and forward windows", () => {
    expect(() => assertTimeRange(1000, 1000)).not.toThrow();
    expect(() => assertTimeRange(1000, 2000)).not.toThrow();
  });

  it("should reject a window starting after its end", () => {
    expect(() => assertTimeRange(2000, 1000)).toThrow(Messages.TIME_RANGE_START_AFTER_END);
  });
});
