// Root router - combines all domain routers
//
// This is the main entry point for the tRPC API.

import { router } from '../trpc.js';
import { segmentsRouter } from './segments.js';
import { observationsRouter } from './observations.js';
import { latestRouter } from './latest.js';
import { healthRouter } from './health.js';

/**
 * The root router that combines all domain routers.
 *
 * Usage from client:
 * ```ts
 * const segment = await trpc.segments.create.mutate({ name: 'Main St', lengthM: 350 });
 * await trpc.observations.record.mutate({
 *   segmentId: segment.segmentId,
 *   observedAt: '2026-01-01T10:05:00Z',
 *   speedKmh: 35,
 * });
 * await trpc.latest.refresh.mutate();
 * const latest = await trpc.latest.get.query({ segmentId: segment.segmentId });
 * ```
 */
export const appRouter = router({
  segments: segmentsRouter,
  observations: observationsRouter,
  latest: latestRouter,
  health: healthRouter,
});

/**
 * Export the router type for client-side type inference.
 */
export type AppRouter = typeof appRouter;
