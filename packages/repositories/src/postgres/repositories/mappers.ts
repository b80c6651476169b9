// Row <-> domain conversion for the Postgres repositories.
// NUMERIC columns round-trip as strings through postgres.js.

import type { Segment, SpeedObservation } from '@roadspeed/protocol';
import type { segments, speedObservations } from '../schema/index.js';

export type SegmentRow = typeof segments.$inferSelect;
export type SpeedObservationRow = typeof speedObservations.$inferSelect;

export function toNumeric(value: number | null | undefined): string | null {
  return value === null || value === undefined ? null : String(value);
}

export function fromNumeric(value: string | null): number | null {
  return value === null ? null : Number(value);
}

export function rowToSegment(row: SegmentRow): Segment {
  return {
    segmentId: row.segmentId,
    name: row.name,
    source: row.source,
    refCode: row.refCode,
    lengthM: fromNumeric(row.lengthM),
    geometry: row.geometry ?? null,
  };
}

export function rowToObservation(row: SpeedObservationRow): SpeedObservation {
  return {
    obsId: row.obsId,
    segmentId: row.segmentId,
    observedAt: row.observedAt.toISOString(),
    speedKmh: fromNumeric(row.speedKmh),
    durationS: fromNumeric(row.durationS),
    distanceM: fromNumeric(row.distanceM),
    provider: row.provider,
    raw: row.raw ?? null,
  };
}
