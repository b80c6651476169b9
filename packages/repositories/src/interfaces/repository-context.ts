import type { SegmentRepository } from './segment-repository.js';
import type { SpeedObservationRepository } from './observation-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * This is the primary dependency injection point for the runtime.
 * Pass a RepositoryContext to any code that needs data access,
 * and you can swap implementations (Postgres, in-memory)
 * without changing the consuming code.
 *
 * Example usage:
 * ```typescript
 * const repos = createPgRepositoryContext(db);
 * await recordObservation(repos, observation);
 * ```
 */
export interface RepositoryContext {
  readonly segments: SegmentRepository;
  readonly observations: SpeedObservationRepository;
}
