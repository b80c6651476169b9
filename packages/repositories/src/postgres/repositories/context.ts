import type { Database } from '../db.js';
import type { RepositoryContext } from '../../interfaces/index.js';
import { PgSegmentRepository } from './segment-repository.js';
import { PgSpeedObservationRepository } from './observation-repository.js';

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createPgRepositoryContext(db);
 *
 * // Now use repos.segments, repos.observations
 * const segment = await repos.segments.create({ name: 'Main St' });
 * ```
 */
export function createPgRepositoryContext(db: Database): RepositoryContext {
  return {
    segments: new PgSegmentRepository(db),
    observations: new PgSpeedObservationRepository(db),
  };
}
