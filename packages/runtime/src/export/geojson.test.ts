import { describe, it, expect } from 'vitest';
import type { Segment, SpeedObservation } from '@roadspeed/protocol';
import { latestToFeatureCollection } from './geojson.js';

const line = { type: 'LineString', coordinates: [[-74.04, 4.92], [-74.03, 4.93]] };

function segment(segmentId: number, geometry: unknown = null): Segment {
  return { segmentId, name: `Segment ${segmentId}`, source: null, refCode: null, lengthM: null, geometry };
}

function latest(segmentId: number, speedKmh: number | null): SpeedObservation {
  return {
    obsId: segmentId * 10,
    segmentId,
    observedAt: '2026-01-01T10:00:00.000Z',
    speedKmh,
    durationS: 36,
    distanceM: 350,
    provider: 'google_routes',
    raw: null,
  };
}

describe('latestToFeatureCollection', () => {
  it('builds one coloured feature per segment with data', () => {
    const collection = latestToFeatureCollection(
      [segment(1, line), segment(2), segment(3)],
      new Map([
        [1, latest(1, 50)],
        [3, latest(3, null)],
      ])
    );

    expect(collection.type).toBe('FeatureCollection');
    expect(collection.features).toEqual([
      {
        type: 'Feature',
        geometry: line,
        properties: {
          segmentId: 1,
          name: 'Segment 1',
          speedKmh: 50,
          distanceM: 350,
          durationS: 36,
          provider: 'google_routes',
          updatedAt: '2026-01-01T10:00:00.000Z',
          color: '#2E7D32',
        },
      },
      {
        type: 'Feature',
        geometry: null,
        properties: {
          segmentId: 3,
          name: 'Segment 3',
          speedKmh: null,
          distanceM: 350,
          durationS: 36,
          provider: 'google_routes',
          updatedAt: '2026-01-01T10:00:00.000Z',
          color: '#888888',
        },
      },
    ]);
  });

  it('colours by congestion band', () => {
    const segments = [segment(1), segment(2), segment(3)];
    const collection = latestToFeatureCollection(
      segments,
      new Map([
        [1, latest(1, 30)],
        [2, latest(2, 15)],
        [3, latest(3, 14.9)],
      ])
    );

    expect(collection.features.map((f) => f.properties.color)).toEqual([
      '#F9A825',
      '#EF6C00',
      '#C62828',
    ]);
  });

  it('is empty when nothing has been observed', () => {
    expect(latestToFeatureCollection([segment(1)], new Map()).features).toEqual([]);
  });
});
