import { pgTable, serial, text, varchar, numeric, jsonb } from 'drizzle-orm/pg-core';

/**
 * Segments table - road stretches being observed.
 * Geometry is stored as GeoJSON and never interpreted here.
 */
export const segments = pgTable('segments', {
  segmentId: serial('segment_id').primaryKey(),
  name: text('name'),
  source: varchar('source', { length: 64 }), // e.g., "OSM"
  refCode: text('ref_code'),
  lengthM: numeric('length_m'),
  geometry: jsonb('geom_geojson').$type<unknown>(),
});
