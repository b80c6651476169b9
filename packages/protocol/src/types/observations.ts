// Speed observation types - the append-only log

import type { ObservationId, SegmentId, TimeRange, Timestamp } from './common.js';

/**
 * Provider recorded when an observation does not name one
 */
export const DEFAULT_PROVIDER = 'google_routes';

/**
 * A single timestamped measurement for a segment from a given provider.
 * Observations are immutable once stored.
 */
export type SpeedObservation = {
  obsId: ObservationId;
  segmentId: SegmentId;

  /**
   * Measurement time (not insertion time)
   */
  observedAt: Timestamp;

  speedKmh: number | null;
  durationS: number | null;
  distanceM: number | null;

  /**
   * Origin system that produced the measurement
   */
  provider: string;

  /**
   * Provider response kept for audit, never parsed
   */
  raw: unknown;
};

/**
 * Filter for querying the observation log.
 * Results are ordered by observedAt ascending, then obsId ascending.
 */
export type SpeedObservationFilter = {
  segmentId?: SegmentId;
  timeRange?: TimeRange;
  limit?: number;
  offset?: number;
};
