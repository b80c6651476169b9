import type { Segment, SegmentFilter, SegmentId } from '@roadspeed/protocol';

/**
 * Input for creating a new Segment. The store assigns segmentId.
 */
export type CreateSegmentInput = {
  name?: string | null;
  source?: string | null;
  refCode?: string | null;
  lengthM?: number | null;
  geometry?: unknown;
};

/**
 * Input for updating a Segment's metadata.
 * Omitted fields are left unchanged; null clears a field.
 */
export type UpdateSegmentInput = {
  name?: string | null;
  source?: string | null;
  refCode?: string | null;
  lengthM?: number | null;
  geometry?: unknown;
};

/**
 * Repository interface for Segment operations.
 *
 * Segments are created by an import process and only their metadata changes afterwards.
 * A segment referenced by any observation cannot be deleted.
 */
export interface SegmentRepository {
  /**
   * Create a new Segment with a freshly assigned id
   */
  create(input: CreateSegmentInput): Promise<Segment>;

  /**
   * Get a Segment by ID
   * @returns Segment or null if not found
   */
  get(segmentId: SegmentId): Promise<Segment | null>;

  /**
   * Check whether a Segment exists without loading it
   */
  exists(segmentId: SegmentId): Promise<boolean>;

  /**
   * List Segments ordered by segmentId ascending
   */
  list(filter?: SegmentFilter): Promise<Segment[]>;

  /**
   * Update a Segment's metadata
   * @returns Updated Segment or null if not found
   */
  update(segmentId: SegmentId, input: UpdateSegmentInput): Promise<Segment | null>;

  /**
   * Delete an unreferenced Segment
   * @returns true if removed, false if not found
   * @throws ForeignKeyViolationError if observations reference the segment
   */
  delete(segmentId: SegmentId): Promise<boolean>;
}
