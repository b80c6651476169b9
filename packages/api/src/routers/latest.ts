// Latest router - reads from the materialized latest-speed view
//
// Reads never touch the observation store; they see the snapshot published by
// the last successful refresh.

import { z } from 'zod';
import {
  latestToFeatureCollection,
  listSegments,
  summarizeLatest,
} from '@roadspeed/runtime';
import { router, publicProcedure } from '../trpc.js';

export const latestRouter = router({
  /**
   * Latest observation for a segment, or null if the view has none.
   */
  get: publicProcedure
    .input(z.object({ segmentId: z.number().int() }))
    .query(({ ctx, input }) => {
      return ctx.materializer.getLatest(input.segmentId);
    }),

  /**
   * Every entry of the current snapshot, ordered by segment ID.
   */
  all: publicProcedure.query(({ ctx }) => {
    return Array.from(ctx.materializer.getAllLatest().values()).sort(
      (a, b) => a.segmentId - b.segmentId
    );
  }),

  /**
   * View state and the metadata of the published snapshot.
   */
  status: publicProcedure.query(({ ctx }) => {
    const snapshot = ctx.materializer.getSnapshot();
    return {
      state: ctx.materializer.getState(),
      version: snapshot?.version ?? null,
      refreshedAt: snapshot?.refreshedAt ?? null,
      segments: snapshot?.entries.size ?? 0,
      policy: ctx.scheduler.policy,
    };
  }),

  /**
   * Recompute the view now.
   */
  refresh: publicProcedure.mutation(async ({ ctx, signal }) => {
    const snapshot = await ctx.materializer.refresh({ signal });
    return {
      version: snapshot.version,
      refreshedAt: snapshot.refreshedAt,
      segments: snapshot.entries.size,
    };
  }),

  summary: publicProcedure.query(({ ctx }) => {
    return summarizeLatest(ctx.materializer.getAllLatest().values());
  }),

  /**
   * GeoJSON FeatureCollection of the view, coloured by congestion band.
   */
  geojson: publicProcedure.query(async ({ ctx }) => {
    const segments = await listSegments(ctx.repos);
    return latestToFeatureCollection(segments, ctx.materializer.getAllLatest());
  }),
});
