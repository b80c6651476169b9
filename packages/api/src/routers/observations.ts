// Observations router - ingestion and query

import { z } from 'zod';
import type { SpeedObservation } from '@roadspeed/protocol';
import {
  countObservations,
  ingestRouteMatrix,
  listObservations,
  recordObservation,
  recordObservations,
  type RecordObservationInput,
  type RecordObservationOptions,
} from '@roadspeed/runtime';
import { router, publicProcedure } from '../trpc.js';
import type { Context } from '../context.js';

// Observation query limits
const MAX_OBSERVATIONS = 1000;
const DEFAULT_LIMIT = 100;
const MAX_BATCH = 1000;

const MeasurementSchema = z.number().nullable().optional();

// Shape only; the runtime owns the semantic checks (timezone, negative values)
const ObservationInputSchema = z.object({
  segmentId: z.number().int(),
  observedAt: z.string(),
  speedKmh: MeasurementSchema,
  durationS: MeasurementSchema,
  distanceM: MeasurementSchema,
  provider: z.string().optional(),
  raw: z.unknown().optional(),
}) satisfies z.ZodType<RecordObservationInput>;

function ingestionOptions(ctx: Context): RecordObservationOptions {
  return {
    defaultProvider: ctx.config.defaultProvider,
    onRecorded: () => ctx.scheduler.notifyWrite(),
  };
}

export const observationsRouter = router({
  /**
   * Record a single observation.
   */
  record: publicProcedure
    .input(ObservationInputSchema)
    .mutation(async ({ ctx, input }): Promise<SpeedObservation> => {
      return recordObservation(ctx.repos, input, ingestionOptions(ctx));
    }),

  /**
   * Record a batch. Each item succeeds or fails on its own.
   */
  recordBatch: publicProcedure
    .input(z.object({ observations: z.array(ObservationInputSchema).min(1).max(MAX_BATCH) }))
    .mutation(async ({ ctx, input }) => {
      const result = await recordObservations(ctx.repos, input.observations, ingestionOptions(ctx));
      ctx.logger.info('Observation batch recorded', {
        accepted: result.accepted,
        rejected: result.rejected,
      });
      return result;
    }),

  /**
   * Record one observation per segment from a route matrix response body.
   */
  ingestRouteMatrix: publicProcedure
    .input(
      z.object({
        body: z.string(),
        segmentIds: z.array(z.number().int()).min(1).max(MAX_BATCH),
        observedAt: z.string(),
        provider: z.string().optional(),
      })
    )
    .mutation(async ({ ctx, input }) => {
      const result = await ingestRouteMatrix(ctx.repos, input, ingestionOptions(ctx));
      ctx.logger.info('Route matrix ingested', {
        accepted: result.accepted,
        rejected: result.rejected,
      });
      return result;
    }),

  /**
   * Query a segment's observations in time order. Both bounds are inclusive.
   */
  query: publicProcedure
    .input(
      z.object({
        segmentId: z.number().int(),
        since: z.string().optional(),
        until: z.string().optional(),
        limit: z.number().int().min(1).max(MAX_OBSERVATIONS).default(DEFAULT_LIMIT),
        offset: z.number().int().min(0).default(0),
      })
    )
    .query(async ({ ctx, input }) => {
      const timeRange =
        input.since || input.until ? { start: input.since, end: input.until } : undefined;

      return listObservations(ctx.repos, {
        segmentId: input.segmentId,
        timeRange,
        limit: input.limit,
        offset: input.offset,
      });
    }),

  count: publicProcedure
    .input(z.object({ segmentId: z.number().int().optional() }).optional())
    .query(async ({ ctx, input }) => {
      return countObservations(ctx.repos, { segmentId: input?.segmentId });
    }),
});
