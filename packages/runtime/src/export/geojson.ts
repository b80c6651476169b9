// GeoJSON export of the latest-speed view, coloured by congestion band

import { gradeSpeed } from '@roadspeed/protocol';
import type {
  LatestSpeedFeature,
  LatestSpeedFeatureCollection,
  Segment,
  SegmentId,
  SpeedObservation,
} from '@roadspeed/protocol';

/**
 * Build a FeatureCollection with one feature per segment that has a latest entry,
 * in the order the segments are given. Geometry is passed through as stored.
 */
export function latestToFeatureCollection(
  segments: Iterable<Segment>,
  latest: ReadonlyMap<SegmentId, SpeedObservation>
): LatestSpeedFeatureCollection {
  const features: LatestSpeedFeature[] = [];

  for (const segment of segments) {
    const obs = latest.get(segment.segmentId);
    if (!obs) continue;

    features.push({
      type: 'Feature',
      geometry: segment.geometry ?? null,
      properties: {
        segmentId: segment.segmentId,
        name: segment.name,
        speedKmh: obs.speedKmh,
        distanceM: obs.distanceM,
        durationS: obs.durationS,
        provider: obs.provider,
        updatedAt: obs.observedAt,
        color: gradeSpeed(obs.speedKmh).color,
      },
    });
  }

  return { type: 'FeatureCollection', features };
}
