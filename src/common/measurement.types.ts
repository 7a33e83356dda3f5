/**
 * Core measurement types shared by the registry, ingestion and query paths.
 */

/** Kind token as supplied on the command line or in a request, e.g. `power`. */
export type MeasurementKindName = string;

/**
 * One validated data point, prior to persistence.
 */
export interface Reading {
  kind: MeasurementKindName;
  value: number;
  /** Point in time of the reading (UTC). Defaults to ingestion time. */
  timestamp: Date;
  /** Originating device or sensor, if the client named one */
  source: string | null;
}

/**
 * A persisted Reading. Immutable once written.
 */
export interface StoredRecord extends Reading {
  /** System-assigned identity (bigint, kept as a string) */
  id: string;
  createdAt: Date;
}

/**
 * Inclusive time window. An absent bound is open.
 */
export interface TimeRange {
  from?: Date;
  to?: Date;
}

export const AGGREGATIONS = ['count', 'avg', 'min', 'max'] as const;

export type Aggregation = (typeof AGGREGATIONS)[number];

export interface AggregateResult {
  aggregation: Aggregation;
  /** Aggregated value; null for avg/min/max over an empty window */
  value: number | null;
  /** Number of records in the window */
  count: number;
}
