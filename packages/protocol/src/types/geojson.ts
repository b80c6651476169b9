// GeoJSON export shapes. Geometry is carried through as-is.

import type { SegmentId, Timestamp } from './common.js';

export type LatestSpeedFeatureProperties = {
  segmentId: SegmentId;
  name: string | null;
  speedKmh: number | null;
  distanceM: number | null;
  durationS: number | null;
  provider: string;
  updatedAt: Timestamp;
  color: string;
};

export type LatestSpeedFeature = {
  type: 'Feature';
  geometry: unknown;
  properties: LatestSpeedFeatureProperties;
};

export type LatestSpeedFeatureCollection = {
  type: 'FeatureCollection';
  features: LatestSpeedFeature[];
};
