// Route-matrix adapter - turns a computeRouteMatrix response into observations
//
// Each segment i is requested as origin i / destination i, so its travel time
// is the diagonal cell. Off-diagonal cells are ignored.

import { z } from 'zod';
import { estimateSpeedKmh, parseDurationSeconds, roundTo } from '@roadspeed/protocol';
import type { SegmentId, Timestamp } from '@roadspeed/protocol';
import type { RepositoryContext } from '@roadspeed/repositories';
import { ValidationError } from '../errors.js';
import { guardStore } from '../store.js';
import {
  recordObservations,
  type RecordObservationInput,
  type RecordObservationOptions,
  type RecordObservationsResult,
} from '../ingestion/index.js';

// google.rpc.Status; an empty object means success
const rpcStatusSchema = z
  .object({
    code: z.number().int().optional(),
    message: z.string().optional(),
  })
  .passthrough();

export const routeMatrixCellSchema = z
  .object({
    // proto3 JSON omits zero values, so index 0 arrives as an absent field
    originIndex: z.number().int().min(0).optional(),
    destinationIndex: z.number().int().min(0).optional(),
    status: z.union([z.string(), rpcStatusSchema]).optional(),
    condition: z.string().optional(),
    distanceMeters: z.number().min(0).optional(),
    duration: z.string().optional(),
    staticDuration: z.string().optional(),
  })
  .passthrough();

export type RouteMatrixCell = z.infer<typeof routeMatrixCellSchema>;

/**
 * A segment requested in the matrix, in request order.
 */
export type RouteMatrixSegment = {
  segmentId: SegmentId;

  /** Stored length, used as the distance when the cell has none */
  lengthM?: number | null;
};

export type RouteMatrixObservationOptions = {
  observedAt: Timestamp;
  provider?: string;
};

function parseLine(line: string, lineNumber: number): RouteMatrixCell {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (error) {
    throw new ValidationError(`Malformed route matrix line ${lineNumber}: invalid JSON`, {
      field: 'body',
      details: { line: lineNumber, reason: error instanceof Error ? error.message : String(error) },
    });
  }

  const parsed = routeMatrixCellSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`Malformed route matrix line ${lineNumber}: unexpected cell shape`, {
      field: 'body',
      details: { line: lineNumber, issues: parsed.error.issues.map((i) => i.message) },
    });
  }
  return parsed.data;
}

/**
 * Parse a route matrix response body. Accepts the streamed form (one JSON
 * cell per line, blank lines ignored) and a plain JSON array of cells.
 *
 * @throws ValidationError naming the first malformed line
 */
export function parseRouteMatrixResponse(text: string): RouteMatrixCell[] {
  const trimmed = text.trim();

  if (trimmed.startsWith('[')) {
    let value: unknown;
    try {
      value = JSON.parse(trimmed);
    } catch {
      throw new ValidationError('Malformed route matrix body: invalid JSON array', {
        field: 'body',
      });
    }
    const parsed = z.array(routeMatrixCellSchema).safeParse(value);
    if (!parsed.success) {
      throw new ValidationError('Malformed route matrix body: unexpected cell shape', {
        field: 'body',
        details: { issues: parsed.error.issues.map((i) => i.message) },
      });
    }
    return parsed.data;
  }

  const cells: RouteMatrixCell[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    if (lines[i].trim() === '') continue;
    cells.push(parseLine(lines[i], i + 1));
  }
  return cells;
}

/**
 * Whether a cell carries a usable route.
 */
export function isRouteMatrixCellOk(cell: RouteMatrixCell): boolean {
  if (cell.condition === 'ROUTE_NOT_FOUND') return false;

  const { status } = cell;
  if (status === undefined) return true;
  if (typeof status === 'string') return status === 'OK';
  return status.code === undefined || status.code === 0;
}

function findDiagonalCell(cells: readonly RouteMatrixCell[], index: number): RouteMatrixCell | undefined {
  return cells.find(
    (c) => (c.originIndex ?? 0) === index && (c.destinationIndex ?? 0) === index
  );
}

/**
 * Build one observation input per segment from the matrix cells.
 *
 * A missing or failed cell still produces an observation, with no speed or
 * duration, so the gap is recorded against the segment.
 */
export function observationsFromRouteMatrix(
  cells: readonly RouteMatrixCell[],
  segments: readonly RouteMatrixSegment[],
  options: RouteMatrixObservationOptions
): RecordObservationInput[] {
  return segments.map((segment, index) => {
    const cell = findDiagonalCell(cells, index);
    const fallbackDistance = segment.lengthM ?? null;

    if (!cell || !isRouteMatrixCellOk(cell)) {
      return {
        segmentId: segment.segmentId,
        observedAt: options.observedAt,
        speedKmh: null,
        durationS: null,
        distanceM: fallbackDistance,
        provider: options.provider,
        raw: cell ?? null,
      };
    }

    const distanceM = cell.distanceMeters ?? fallbackDistance;
    const speed = estimateSpeedKmh(distanceM, cell.duration);

    return {
      segmentId: segment.segmentId,
      observedAt: options.observedAt,
      speedKmh: speed === null ? null : roundTo(speed, 1),
      durationS: parseDurationSeconds(cell.duration),
      distanceM,
      provider: options.provider,
      raw: cell,
    };
  });
}

export type IngestRouteMatrixInput = {
  /** Response body as returned by the provider */
  body: string;

  /** Segments in the order they were requested */
  segmentIds: SegmentId[];

  observedAt: Timestamp;
  provider?: string;
};

/**
 * Parse a route matrix response and record one observation per requested segment.
 * Stored segment lengths fill in for cells without a distance; unknown segments
 * are rejected per item like any other batch.
 */
export async function ingestRouteMatrix(
  repos: RepositoryContext,
  input: IngestRouteMatrixInput,
  options: RecordObservationOptions = {}
): Promise<RecordObservationsResult> {
  const cells = parseRouteMatrixResponse(input.body);

  const segments: RouteMatrixSegment[] = [];
  for (const segmentId of input.segmentIds) {
    const segment = await guardStore('ingestRouteMatrix', () => repos.segments.get(segmentId));
    segments.push({ segmentId, lengthM: segment?.lengthM ?? null });
  }

  const inputs = observationsFromRouteMatrix(cells, segments, {
    observedAt: input.observedAt,
    provider: input.provider,
  });
  return recordObservations(repos, inputs, options);
}
