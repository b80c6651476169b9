// Observation ingestion - the entry point for speed measurements into the store

import { DEFAULT_PROVIDER } from '@roadspeed/protocol';
import type {
  SegmentId,
  SpeedObservation,
  SpeedObservationFilter,
  TimeRange,
} from '@roadspeed/protocol';
import type {
  RepositoryContext,
  AppendSpeedObservationInput,
  ObservationCountFilter,
} from '@roadspeed/repositories';
import { ValidationError, UnknownSegmentError } from '../errors.js';
import { guardStore } from '../store.js';

/**
 * Input for recording an observation, as received from a provider.
 */
export type RecordObservationInput = {
  /** Segment the measurement belongs to */
  segmentId: SegmentId;

  /** Measurement time: ISO 8601 with a timezone designator (Z or ±hh:mm) */
  observedAt: string;

  speedKmh?: number | null;
  durationS?: number | null;
  distanceM?: number | null;

  /** Origin system; the configured default when omitted */
  provider?: string;

  /** Provider response kept for audit, never parsed */
  raw?: unknown;
};

/**
 * Options for observation ingestion.
 */
export type RecordObservationOptions = {
  /**
   * Provider used when the input names none.
   * Defaults to DEFAULT_PROVIDER.
   */
  defaultProvider?: string;

  /**
   * Called after each observation is appended.
   * Used to drive an on-write refresh policy.
   */
  onRecorded?: (observation: SpeedObservation) => void;
};

/**
 * Per-item outcome of a batch ingestion.
 */
export type RecordObservationOutcome =
  | { ok: true; index: number; observation: SpeedObservation }
  | { ok: false; index: number; error: { code: string; message: string; field?: string } };

export type RecordObservationsResult = {
  results: RecordObservationOutcome[];
  accepted: number;
  rejected: number;
};

// Calendar date, optional time of day, optional Z or numeric offset.
// Dates outside this shape are never handed to the lenient Date.parse fallback.
const ISO_TIMESTAMP_PATTERN =
  /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(?::\d{2}(?:\.(\d+))?)?)?(Z|[+-]\d{2}:\d{2})?$/;
// Stored values are millisecond ISO strings
const MAX_FRACTION_DIGITS = 3;
const NUMERIC_FIELDS = ['speedKmh', 'durationS', 'distanceM'] as const;

/**
 * Why a timestamp cannot be stored, or null if it is an ISO 8601
 * date-time with a timezone and at most millisecond precision.
 */
function timestampProblem(value: string): string | null {
  const match = ISO_TIMESTAMP_PATTERN.exec(value);
  if (!match || Number.isNaN(Date.parse(value))) {
    return 'must be a valid ISO 8601 date string';
  }

  const [, time, fraction, zone] = match;
  if (time === undefined || zone === undefined) {
    return 'must include a time and a timezone (e.g. "Z" or "-05:00")';
  }

  if (fraction !== undefined && fraction.length > MAX_FRACTION_DIGITS) {
    return 'cannot be more precise than milliseconds';
  }

  return null;
}

function validateTimestamp(value: unknown, field: string): asserts value is string {
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be an ISO 8601 string`, {
      field,
      details: { value },
    });
  }

  const problem = timestampProblem(value);
  if (problem) {
    throw new ValidationError(`${field} ${problem}`, {
      field,
      details: { value },
    });
  }
}

function validateObservedAt(value: unknown): asserts value is string {
  if (value === undefined || value === null || value === '') {
    throw new ValidationError('observedAt is required', { field: 'observedAt' });
  }

  validateTimestamp(value, 'observedAt');
}

function validateMeasurement(value: unknown, field: string): void {
  if (value === undefined || value === null) return;

  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a finite number if provided`, {
      field,
      details: { value },
    });
  }

  if (value < 0) {
    throw new ValidationError(`${field} cannot be negative`, {
      field,
      details: { value },
    });
  }
}

/**
 * Validate observation input fields.
 */
function validateObservationInput(input: unknown): asserts input is RecordObservationInput {
  if (!input || typeof input !== 'object') {
    throw new ValidationError('observation input is required');
  }

  const obs = input as Record<string, unknown>;

  if (typeof obs.segmentId !== 'number' || !Number.isInteger(obs.segmentId)) {
    throw new ValidationError('segmentId is required and must be an integer', {
      field: 'segmentId',
    });
  }

  validateObservedAt(obs.observedAt);

  for (const field of NUMERIC_FIELDS) {
    validateMeasurement(obs[field], field);
  }

  if (obs.provider !== undefined) {
    if (typeof obs.provider !== 'string' || obs.provider.trim() === '') {
      throw new ValidationError('provider must be a non-empty string if provided', {
        field: 'provider',
      });
    }
  }
}

/**
 * Record a speed observation.
 *
 * Validates the input, checks the segment exists, then appends to the log.
 * The observation is readable by the next query once this resolves.
 *
 * @throws ValidationError if the observation is malformed
 * @throws UnknownSegmentError if the segment does not exist (nothing is appended)
 * @throws StoreUnavailableError if the store cannot be reached
 *
 * @example
 * ```typescript
 * const observation = await recordObservation(repos, {
 *   segmentId: 1,
 *   observedAt: '2026-01-01T10:05:00-05:00',
 *   speedKmh: 35,
 *   distanceM: 350,
 *   durationS: 36,
 *   provider: 'google_routes',
 *   raw: providerCell,
 * });
 * console.log(observation.obsId);
 * ```
 */
export async function recordObservation(
  repos: RepositoryContext,
  input: RecordObservationInput,
  options: RecordObservationOptions = {}
): Promise<SpeedObservation> {
  validateObservationInput(input);

  const exists = await guardStore('recordObservation', () =>
    repos.segments.exists(input.segmentId)
  );
  if (!exists) {
    throw new UnknownSegmentError(input.segmentId);
  }

  const appendInput: AppendSpeedObservationInput = {
    segmentId: input.segmentId,
    observedAt: new Date(input.observedAt).toISOString(),
    speedKmh: input.speedKmh ?? null,
    durationS: input.durationS ?? null,
    distanceM: input.distanceM ?? null,
    provider: input.provider ?? options.defaultProvider ?? DEFAULT_PROVIDER,
    raw: input.raw ?? null,
  };

  // The segment may be removed between the check and the append; the store's
  // foreign key has the final word.
  const observation = await guardStore(
    'recordObservation',
    () => repos.observations.append(appendInput),
    { onForeignKeyViolation: () => new UnknownSegmentError(input.segmentId) }
  );

  options.onRecorded?.(observation);
  return observation;
}

/**
 * Record a batch of observations.
 * Each item is validated and appended on its own: a rejected item never
 * undoes the ones accepted before or after it.
 *
 * Store outages are not per-item outcomes; StoreUnavailableError aborts the
 * remainder of the batch, keeping everything already appended.
 *
 * @returns One outcome per input, in input order
 */
export async function recordObservations(
  repos: RepositoryContext,
  inputs: RecordObservationInput[],
  options: RecordObservationOptions = {}
): Promise<RecordObservationsResult> {
  const results: RecordObservationOutcome[] = [];

  for (let index = 0; index < inputs.length; index++) {
    try {
      const observation = await recordObservation(repos, inputs[index], options);
      results.push({ ok: true, index, observation });
    } catch (error) {
      if (error instanceof ValidationError || error instanceof UnknownSegmentError) {
        results.push({
          ok: false,
          index,
          error: {
            code: error.code,
            message: error.message,
            field: error instanceof ValidationError ? error.field : 'segmentId',
          },
        });
        continue;
      }
      throw error;
    }
  }

  const accepted = results.filter((r) => r.ok).length;
  return { results, accepted, rejected: results.length - accepted };
}

function validateTimeRange(range: TimeRange | undefined): void {
  if (!range) return;

  for (const bound of ['start', 'end'] as const) {
    const value = range[bound];
    if (value !== undefined) {
      validateTimestamp(value, `timeRange.${bound}`);
    }
  }
}

/**
 * Lazily read a segment's observations, ordered by observedAt ascending
 * (obsId ascending among equal timestamps). Both range bounds are inclusive.
 *
 * Iterating again re-reads the store, so the same stored state yields the same sequence.
 */
export function queryObservations(
  repos: RepositoryContext,
  segmentId: SegmentId,
  timeRange?: TimeRange
): AsyncIterable<SpeedObservation> {
  validateTimeRange(timeRange);

  return {
    async *[Symbol.asyncIterator]() {
      const iterator = repos.observations.stream({ segmentId, timeRange })[Symbol.asyncIterator]();
      try {
        while (true) {
          const next = await guardStore('queryObservations', () => iterator.next());
          if (next.done) return;
          yield next.value;
        }
      } finally {
        await iterator.return?.();
      }
    },
  };
}

/**
 * Read one page of observations in query order.
 */
export async function listObservations(
  repos: RepositoryContext,
  filter: SpeedObservationFilter
): Promise<SpeedObservation[]> {
  validateTimeRange(filter.timeRange);
  return guardStore('listObservations', () => repos.observations.query(filter));
}

/**
 * Count stored observations, optionally for a single segment.
 */
export async function countObservations(
  repos: RepositoryContext,
  filter?: ObservationCountFilter
): Promise<number> {
  return guardStore('countObservations', () => repos.observations.count(filter));
}
