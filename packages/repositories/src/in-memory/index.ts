// In-memory repository implementations for development and testing
//
// This module provides a complete in-memory implementation of all repositories,
// useful for:
// - Local development without a database
// - Fast unit testing
//
// Data does not persist between restarts. Referential integrity is enforced
// the same way the Postgres schema enforces it.

import type { Segment, SpeedObservation, TimeRange } from '@roadspeed/protocol';
import type {
  RepositoryContext,
  SegmentRepository,
  SpeedObservationRepository,
} from '../interfaces/index.js';
import { ForeignKeyViolationError } from '../errors.js';

const OBSERVATION_SEGMENT_FK = 'speed_observations_segment_id_segments_segment_id_fk';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  segments: Map<number, Segment>;
  observations: Map<number, SpeedObservation>;
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends RepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data and reset id sequences */
  clear(): void;
}

/**
 * Order by observedAt ascending, then obsId ascending.
 */
export function compareObservations(a: SpeedObservation, b: SpeedObservation): number {
  const byTime = Date.parse(a.observedAt) - Date.parse(b.observedAt);
  return byTime !== 0 ? byTime : a.obsId - b.obsId;
}

function inTimeRange(observation: SpeedObservation, range: TimeRange | undefined): boolean {
  if (!range) return true;
  const t = Date.parse(observation.observedAt);
  if (range.start !== undefined && t < Date.parse(range.start)) return false;
  if (range.end !== undefined && t > Date.parse(range.end)) return false;
  return true;
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 *
 * const segment = await repos.segments.create({ name: 'Main St', source: 'OSM' });
 * await repos.observations.append({
 *   segmentId: segment.segmentId,
 *   observedAt: '2026-01-01T10:00:00.000Z',
 *   speedKmh: 40,
 *   provider: 'google_routes',
 * });
 *
 * console.log(repos._data.observations.size); // 1
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  const segments = new Map<number, Segment>();
  const observations = new Map<number, SpeedObservation>();
  let nextSegmentId = 1;
  let nextObsId = 1;

  const isReferenced = (segmentId: number): boolean => {
    for (const obs of observations.values()) {
      if (obs.segmentId === segmentId) return true;
    }
    return false;
  };

  // Segment repository
  const segmentRepo: SegmentRepository = {
    async create(input) {
      const segment: Segment = {
        segmentId: nextSegmentId++,
        name: input.name ?? null,
        source: input.source ?? null,
        refCode: input.refCode ?? null,
        lengthM: input.lengthM ?? null,
        geometry: input.geometry ?? null,
      };
      segments.set(segment.segmentId, segment);
      return segment;
    },
    async get(segmentId) {
      return segments.get(segmentId) ?? null;
    },
    async exists(segmentId) {
      return segments.has(segmentId);
    },
    async list(filter) {
      const result = Array.from(segments.values()).sort((a, b) => a.segmentId - b.segmentId);
      const offset = filter?.offset ?? 0;
      const end = filter?.limit !== undefined ? offset + filter.limit : undefined;
      return result.slice(offset, end);
    },
    async update(segmentId, input) {
      const segment = segments.get(segmentId);
      if (!segment) return null;

      const updated: Segment = {
        ...segment,
        name: input.name !== undefined ? input.name : segment.name,
        source: input.source !== undefined ? input.source : segment.source,
        refCode: input.refCode !== undefined ? input.refCode : segment.refCode,
        lengthM: input.lengthM !== undefined ? input.lengthM : segment.lengthM,
        geometry: input.geometry !== undefined ? input.geometry : segment.geometry,
      };
      segments.set(segmentId, updated);
      return updated;
    },
    async delete(segmentId) {
      if (!segments.has(segmentId)) return false;
      if (isReferenced(segmentId)) {
        throw new ForeignKeyViolationError(
          OBSERVATION_SEGMENT_FK,
          `segment ${segmentId} is still referenced by speed_observations`
        );
      }
      return segments.delete(segmentId);
    },
  };

  // Observation repository
  const observationRepo: SpeedObservationRepository = {
    async append(input) {
      if (!segments.has(input.segmentId)) {
        throw new ForeignKeyViolationError(
          OBSERVATION_SEGMENT_FK,
          `segment ${input.segmentId} is not present in segments`
        );
      }

      const observation: SpeedObservation = Object.freeze({
        obsId: nextObsId++,
        segmentId: input.segmentId,
        observedAt: new Date(input.observedAt).toISOString(),
        speedKmh: input.speedKmh ?? null,
        durationS: input.durationS ?? null,
        distanceM: input.distanceM ?? null,
        provider: input.provider,
        raw: input.raw ?? null,
      });
      observations.set(observation.obsId, observation);
      return observation;
    },
    async get(obsId) {
      return observations.get(obsId) ?? null;
    },
    async query(filter) {
      const result = Array.from(observations.values())
        .filter((o) => filter.segmentId === undefined || o.segmentId === filter.segmentId)
        .filter((o) => inTimeRange(o, filter.timeRange))
        .sort(compareObservations);
      const offset = filter.offset ?? 0;
      const end = filter.limit !== undefined ? offset + filter.limit : undefined;
      return result.slice(offset, end);
    },
    async count(filter) {
      if (filter?.segmentId === undefined) return observations.size;
      let n = 0;
      for (const obs of observations.values()) {
        if (obs.segmentId === filter.segmentId) n++;
      }
      return n;
    },
    async *stream(filter) {
      const result = await observationRepo.query(filter);
      for (const obs of result) {
        yield obs;
      }
    },
    async latestPerSegment() {
      const latest = new Map<number, SpeedObservation>();
      for (const obs of observations.values()) {
        const current = latest.get(obs.segmentId);
        if (!current || compareObservations(obs, current) > 0) {
          latest.set(obs.segmentId, obs);
        }
      }
      return Array.from(latest.values()).sort((a, b) => a.segmentId - b.segmentId);
    },
  };

  return {
    segments: segmentRepo,
    observations: observationRepo,
    _data: {
      segments,
      observations,
    },
    clear() {
      segments.clear();
      observations.clear();
      nextSegmentId = 1;
      nextObsId = 1;
    },
  };
}
