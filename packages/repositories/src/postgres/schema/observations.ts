import { pgTable, bigserial, integer, text, timestamp, numeric, jsonb, index } from 'drizzle-orm/pg-core';
import { segments } from './segments.js';

/**
 * Speed observations table - immutable append-only log.
 *
 * Design notes:
 * - Append-only: no updates or deletes in normal operation
 * - obs_id follows insertion order and breaks ties on observed_at
 * - Segments referenced here cannot be deleted (ON DELETE RESTRICT)
 * - raw keeps the provider response for audit
 */
export const speedObservations = pgTable(
  'speed_observations',
  {
    obsId: bigserial('obs_id', { mode: 'number' }).primaryKey(),
    segmentId: integer('segment_id')
      .notNull()
      .references(() => segments.segmentId, { onDelete: 'restrict' }),
    observedAt: timestamp('observed_at', { withTimezone: true }).notNull(),
    speedKmh: numeric('speed_kmh'),
    durationS: numeric('duration_s'),
    distanceM: numeric('distance_m'),
    provider: text('provider').notNull().default('google_routes'),
    raw: jsonb('raw').$type<unknown>(),
  },
  (table) => [
    index('speed_observations_segment_time_idx').on(
      table.segmentId,
      table.observedAt,
      table.obsId
    ),
    index('speed_observations_observed_at_idx').on(table.observedAt),
  ]
);
