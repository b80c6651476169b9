// Latest-speed view types - derived data, safe to drop and rebuild

import type { SegmentId, Timestamp } from './common.js';
import type { SpeedObservation } from './observations.js';

/**
 * Lifecycle of the materialized view.
 * "refreshing" holds while any refresh is in flight.
 */
export type MaterializerState = 'empty' | 'refreshing' | 'ready';

/**
 * An immutable, versioned copy of the latest observation per segment.
 * Each successful refresh publishes a new snapshot; readers never see a partial one.
 */
export type LatestSpeedSnapshot = {
  version: number;
  refreshedAt: Timestamp;
  entries: ReadonlyMap<SegmentId, SpeedObservation>;
};

/**
 * Dashboard figures computed over a snapshot
 */
export type LatestSpeedSummary = {
  segmentsWithData: number;
  averageSpeedKmh: number | null;
  below15Kmh: number;
  below10Kmh: number;
};
