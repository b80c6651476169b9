// Segment registry - create and look up the road segments observations refer to

import { SEGMENT_SOURCE_MAX_LENGTH } from '@roadspeed/protocol';
import type { Segment, SegmentFilter, SegmentId } from '@roadspeed/protocol';
import type {
  RepositoryContext,
  CreateSegmentInput,
  UpdateSegmentInput,
} from '@roadspeed/repositories';
import { ValidationError, SegmentInUseError } from '../errors.js';
import { guardStore } from '../store.js';

export type { CreateSegmentInput, UpdateSegmentInput };

function validateLength(lengthM: unknown): void {
  if (lengthM === undefined || lengthM === null) return;

  if (typeof lengthM !== 'number' || !Number.isFinite(lengthM)) {
    throw new ValidationError('lengthM must be a finite number if provided', {
      field: 'lengthM',
      details: { value: lengthM },
    });
  }

  if (lengthM < 0) {
    throw new ValidationError('lengthM cannot be negative', {
      field: 'lengthM',
      details: { value: lengthM },
    });
  }
}

function validateOptionalString(value: unknown, field: string, maxLength?: number): void {
  if (value === undefined || value === null) return;

  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string if provided`, { field });
  }

  if (maxLength !== undefined && value.length > maxLength) {
    throw new ValidationError(`${field} cannot exceed ${maxLength} characters`, {
      field,
      details: { length: value.length, maxLength },
    });
  }
}

function validateSegmentInput(input: CreateSegmentInput | UpdateSegmentInput): void {
  validateOptionalString(input.name, 'name');
  validateOptionalString(input.source, 'source', SEGMENT_SOURCE_MAX_LENGTH);
  validateOptionalString(input.refCode, 'refCode');
  validateLength(input.lengthM);
}

/**
 * Create a segment with a freshly assigned id.
 *
 * @throws ValidationError if lengthM is negative or not finite, or source is too long
 */
export async function createSegment(
  repos: RepositoryContext,
  input: CreateSegmentInput
): Promise<Segment> {
  validateSegmentInput(input);
  return guardStore('createSegment', () => repos.segments.create(input));
}

/**
 * Look up a segment.
 * @returns Segment or null if not found
 */
export async function getSegment(
  repos: RepositoryContext,
  segmentId: SegmentId
): Promise<Segment | null> {
  return guardStore('getSegment', () => repos.segments.get(segmentId));
}

/**
 * List segments ordered by segmentId ascending.
 */
export async function listSegments(
  repos: RepositoryContext,
  filter?: SegmentFilter
): Promise<Segment[]> {
  return guardStore('listSegments', () => repos.segments.list(filter));
}

/**
 * Update a segment's metadata. The id never changes.
 * @returns Updated Segment or null if not found
 */
export async function updateSegment(
  repos: RepositoryContext,
  segmentId: SegmentId,
  input: UpdateSegmentInput
): Promise<Segment | null> {
  validateSegmentInput(input);
  return guardStore('updateSegment', () => repos.segments.update(segmentId, input));
}

/**
 * Delete a segment that no observation references.
 * @returns true if removed, false if not found
 * @throws SegmentInUseError if observations reference the segment
 */
export async function deleteSegment(
  repos: RepositoryContext,
  segmentId: SegmentId
): Promise<boolean> {
  return guardStore('deleteSegment', () => repos.segments.delete(segmentId), {
    onForeignKeyViolation: () => new SegmentInUseError(segmentId),
  });
}
