/**
 * Search query DSL types.
 * These types give structure to query objects while leaving room for
 * query types the datafeed passes through untouched.
 */

export interface MatchAllQuery {
  match_all: Record<string, never> | { boost?: number };
}

export interface MatchQuery {
  match: Record<string, string | { query: string; operator?: 'and' | 'or' }>;
}

export interface TermQuery {
  term: Record<string, string | number | boolean>;
}

export interface TermsQuery {
  terms: Record<string, Array<string | number | boolean>>;
}

export interface ExistsQuery {
  exists: { field: string };
}

/**
 * Bounds of a range predicate on a single field.
 */
export interface RangeBounds {
  gte?: string | number;
  gt?: string | number;
  lte?: string | number;
  lt?: string | number;
  format?: string;
}

export interface RangeQuery {
  range: Record<string, RangeBounds>;
}

export interface BoolQuery {
  bool: {
    must?: QueryDSL | QueryDSL[];
    filter?: QueryDSL | QueryDSL[];
    should?: QueryDSL | QueryDSL[];
    must_not?: QueryDSL | QueryDSL[];
    minimum_should_match?: number | string;
  };
}

export type QueryDSL =
  | MatchAllQuery
  | MatchQuery
  | TermQuery
  | TermsQuery
  | ExistsQuery
  | RangeQuery
  | BoolQuery
  | { [key: string]: unknown };

/**
 * The query a datafeed search runs: the user query and the time window,
 * both as filter clauses.
 */
export interface TimeRangeFilterQuery extends BoolQuery {
  bool: {
    filter: [QueryDSL, RangeQuery];
  };
}
