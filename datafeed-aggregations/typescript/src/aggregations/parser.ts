/**
 * Parsing of the `aggregations` JSON a datafeed is submitted with.
 * @module aggregations/parser
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/categories.js';
import { Messages } from '../errors/messages.js';
import { isCalendarUnit } from '../time/calendar.js';
import { isKnownTimeZone } from '../time/zone.js';
import type {
  AggregationNode,
  CompositeValueSource,
  DateBucketSpec,
} from '../types/aggregation.js';

// ============================================================================
// Schemas
// ============================================================================

const SUB_AGGREGATION_KEYS = ['aggs', 'aggregations'] as const;
const RESERVED_KEYS: ReadonlySet<string> = new Set([...SUB_AGGREGATION_KEYS, 'meta']);

const jsonObjectSchema = z.record(z.string(), z.unknown());

/**
 * An aggregation entry: one type key, optional sub-aggregations and meta.
 */
export const aggregationNodeSchema = jsonObjectSchema.superRefine((entry, ctx) => {
  const typeKeys = Object.keys(entry).filter((key) => !RESERVED_KEYS.has(key));
  if (typeKeys.length !== 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected exactly one aggregation type, found ${typeKeys.length}`,
    });
  }
  if (entry.aggs !== undefined && entry.aggregations !== undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'found both [aggs] and [aggregations]',
    });
  }
});

const timeZoneSchema = z
  .string()
  .refine(isKnownTimeZone, { message: 'unknown time zone' });

const dateIntervalFieldsSchema = z
  .object({
    field: z.string().min(1).optional(),
    fixed_interval: z.string().min(1).optional(),
    calendar_interval: z.string().min(1).optional(),
    interval: z.union([z.string().min(1), z.number().int().positive()]).optional(),
    time_zone: timeZoneSchema.optional(),
  })
  .passthrough()
  .superRefine((body, ctx) => {
    const set = (['fixed_interval', 'calendar_interval', 'interval'] as const).filter(
      (key) => body[key] !== undefined
    );
    if (set.length > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `cannot combine [${set.join('], [')}]`,
      });
    }
  });

const histogramSchema = z
  .object({
    field: z.string().min(1).optional(),
    interval: z.number().positive(),
  })
  .passthrough();

const compositeSchema = z
  .object({
    sources: z.array(jsonObjectSchema).min(1),
    size: z.number().int().positive().optional(),
  })
  .passthrough();

const termsSourceSchema = z.object({ field: z.string().min(1).optional() }).passthrough();

const geoTileGridSourceSchema = z
  .object({
    field: z.string().min(1).optional(),
    precision: z.number().int().min(0).max(29).optional(),
  })
  .passthrough();

type DateIntervalFields = z.infer<typeof dateIntervalFieldsSchema>;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Converts an `aggregations` object into aggregation nodes, preserving
 * declaration order.
 *
 * @param json - The value of a datafeed's `aggregations` (or `aggs`) key
 * @throws {ConfigurationError} If the definition is malformed
 */
export function parseAggregations(json: unknown): AggregationNode[] {
  return parseLevel(json, []);
}

function parseLevel(json: unknown, path: readonly string[]): AggregationNode[] {
  const level = validate(jsonObjectSchema, json, path);
  return Object.entries(level).map(([name, entry]) => parseNode(name, entry, [...path, name]));
}

function parseNode(name: string, json: unknown, path: readonly string[]): AggregationNode {
  const entry = validate(aggregationNodeSchema, json, path);
  const kind = Object.keys(entry).find((key) => !RESERVED_KEYS.has(key)) ?? '';
  const body = entry[kind];
  const children = entry.aggs ?? entry.aggregations;
  const subAggregations = children === undefined ? [] : parseLevel(children, path);
  const bodyPath = [...path, kind];

  switch (kind) {
    case 'histogram': {
      const histogram = validate(histogramSchema, body, bodyPath);
      return {
        type: 'histogram',
        name,
        field: histogram.field,
        interval: histogram.interval,
        subAggregations,
      };
    }
    case 'date_histogram': {
      const dateHistogram = validate(dateIntervalFieldsSchema, body, bodyPath);
      return {
        type: 'date_histogram',
        name,
        field: dateHistogram.field,
        ...toDateBucketSpec(dateHistogram),
        subAggregations,
      };
    }
    case 'composite': {
      const composite = validate(compositeSchema, body, bodyPath);
      return {
        type: 'composite',
        name,
        sources: composite.sources.map((source, index) =>
          parseValueSource(source, [...bodyPath, 'sources', String(index)])
        ),
        size: composite.size,
        subAggregations,
      };
    }
    default:
      return {
        type: 'other',
        name,
        kind,
        body: validate(jsonObjectSchema, body, bodyPath),
        subAggregations,
      };
  }
}

function parseValueSource(
  json: Record<string, unknown>,
  path: readonly string[]
): CompositeValueSource {
  const [entry, ...rest] = Object.entries(json);
  if (entry === undefined || rest.length > 0) {
    throw invalid(path, 'a composite value source must have exactly one name');
  }
  const [name, definition] = entry;
  const sourceDefinition = validate(jsonObjectSchema, definition, [...path, name]);
  const [typed, ...extra] = Object.entries(sourceDefinition);
  if (typed === undefined || extra.length > 0) {
    throw invalid([...path, name], 'a composite value source must have exactly one type');
  }

  const [type, body] = typed;
  const bodyPath = [...path, name, type];
  switch (type) {
    case 'date_histogram': {
      const dateHistogram = validate(dateIntervalFieldsSchema, body, bodyPath);
      return {
        type: 'date_histogram',
        name,
        field: dateHistogram.field,
        ...toDateBucketSpec(dateHistogram),
      };
    }
    case 'terms':
      return { type: 'terms', name, field: validate(termsSourceSchema, body, bodyPath).field };
    case 'histogram': {
      const histogram = validate(histogramSchema, body, bodyPath);
      return { type: 'histogram', name, field: histogram.field, interval: histogram.interval };
    }
    case 'geotile_grid': {
      const grid = validate(geoTileGridSourceSchema, body, bodyPath);
      return { type: 'geotile_grid', name, field: grid.field, precision: grid.precision };
    }
    default:
      throw invalid(bodyPath, `unsupported composite value source type [${type}]`);
  }
}

/**
 * The deprecated `interval` is read as a calendar interval when it names a
 * calendar unit and as a fixed interval otherwise. A bare number is a count
 * of milliseconds.
 */
function toDateBucketSpec(fields: DateIntervalFields): DateBucketSpec {
  let calendarInterval = fields.calendar_interval;
  let fixedInterval = fields.fixed_interval;
  if (fields.interval !== undefined) {
    const interval =
      typeof fields.interval === 'number' ? `${fields.interval}ms` : fields.interval;
    if (isCalendarUnit(interval)) {
      calendarInterval = interval;
    } else {
      fixedInterval = interval;
    }
  }
  return { timeZone: fields.time_zone, calendarInterval, fixedInterval };
}

function validate<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  path: readonly string[]
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(Messages.INVALID_AGGREGATION, {
      path: path.join('.'),
      issues: result.error.issues.map((issue) => ({
        path: [...path, ...issue.path.map(String)].join('.'),
        message: issue.message,
      })),
    });
  }
  return result.data;
}

function invalid(path: readonly string[], message: string): ConfigurationError {
  return new ConfigurationError(Messages.INVALID_AGGREGATION, {
    path: path.join('.'),
    issues: [{ path: path.join('.'), message }],
  });
}
