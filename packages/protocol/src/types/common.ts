// Common types used across the protocol

/**
 * ISO 8601 timestamp string, normalized to UTC when produced by the store
 */
export type Timestamp = string;

/**
 * Integer identifier assigned to a segment on creation
 */
export type SegmentId = number;

/**
 * Integer identifier assigned to an observation in insertion order
 */
export type ObservationId = number;

/**
 * Time range filter. Both bounds are inclusive and optional.
 */
export type TimeRange = {
  start?: Timestamp;
  end?: Timestamp;
};

/**
 * Pagination options shared by list queries
 */
export type Page = {
  limit?: number;
  offset?: number;
};
