// Segments router - the registry of road segments

import { z } from 'zod';
import { SEGMENT_SOURCE_MAX_LENGTH } from '@roadspeed/protocol';
import {
  createSegment,
  deleteSegment,
  getSegment,
  listSegments,
  updateSegment,
} from '@roadspeed/runtime';
import { router, publicProcedure } from '../trpc.js';

const MAX_SEGMENTS = 1000;
const DEFAULT_LIMIT = 100;

const SegmentIdSchema = z.number().int().positive();

const SegmentFieldsSchema = z.object({
  name: z.string().nullable().optional(),
  source: z.string().max(SEGMENT_SOURCE_MAX_LENGTH).nullable().optional(),
  refCode: z.string().nullable().optional(),
  lengthM: z.number().nonnegative().nullable().optional(),
  geometry: z.unknown().optional(),
});

export const segmentsRouter = router({
  /**
   * Get a segment by ID, or null if there is none (like latest.get).
   */
  get: publicProcedure
    .input(z.object({ segmentId: SegmentIdSchema }))
    .query(async ({ ctx, input }) => {
      return getSegment(ctx.repos, input.segmentId);
    }),

  /**
   * List segments ordered by ID.
   */
  list: publicProcedure
    .input(
      z
        .object({
          limit: z.number().int().min(1).max(MAX_SEGMENTS).default(DEFAULT_LIMIT),
          offset: z.number().int().min(0).default(0),
        })
        .optional()
    )
    .query(async ({ ctx, input }) => {
      return listSegments(ctx.repos, {
        limit: input?.limit ?? DEFAULT_LIMIT,
        offset: input?.offset ?? 0,
      });
    }),

  create: publicProcedure.input(SegmentFieldsSchema).mutation(async ({ ctx, input }) => {
    const segment = await createSegment(ctx.repos, input);
    ctx.logger.info('Segment created', { segmentId: segment.segmentId });
    return segment;
  }),

  /**
   * Update a segment's metadata. Returns null if there is no such segment.
   */
  update: publicProcedure
    .input(z.object({ segmentId: SegmentIdSchema, changes: SegmentFieldsSchema }))
    .mutation(async ({ ctx, input }) => {
      return updateSegment(ctx.repos, input.segmentId, input.changes);
    }),

  /**
   * Delete a segment. `deleted` is false if there was no such segment.
   * Fails with CONFLICT while observations reference it.
   */
  delete: publicProcedure
    .input(z.object({ segmentId: SegmentIdSchema }))
    .mutation(async ({ ctx, input }) => {
      const deleted = await deleteSegment(ctx.repos, input.segmentId);
      return { segmentId: input.segmentId, deleted };
    }),
});
