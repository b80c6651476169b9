// Segment types - the road network being observed

import type { Page, SegmentId } from './common.js';

/**
 * Maximum length of a segment's source tag (e.g. "OSM")
 */
export const SEGMENT_SOURCE_MAX_LENGTH = 64;

/**
 * A named stretch of road with static metadata.
 * segmentId is assigned by the store and never changes.
 */
export type Segment = {
  segmentId: SegmentId;

  /**
   * Display label
   */
  name: string | null;

  /**
   * Provenance tag, e.g. the map provider the segment was imported from
   */
  source: string | null;

  /**
   * External correlation identifier
   */
  refCode: string | null;

  /**
   * Length in meters, null when unknown
   */
  lengthM: number | null;

  /**
   * Serialized geographic shape (GeoJSON in practice).
   * Opaque to this system: stored and passed through, never interpreted.
   */
  geometry: unknown;
};

export type SegmentFilter = Page;
