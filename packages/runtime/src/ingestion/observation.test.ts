// Tests for observation ingestion

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { memory } from '@roadspeed/repositories';
import type { RepositoryContext } from '@roadspeed/repositories';
import type { SpeedObservation } from '@roadspeed/protocol';
import {
  recordObservation,
  recordObservations,
  queryObservations,
  listObservations,
  countObservations,
  type RecordObservationInput,
} from './observation.js';
import { ValidationError, UnknownSegmentError, StoreUnavailableError } from '../errors.js';

async function collect(iterable: AsyncIterable<SpeedObservation>): Promise<SpeedObservation[]> {
  const result: SpeedObservation[] = [];
  for await (const obs of iterable) {
    result.push(obs);
  }
  return result;
}

describe('recordObservation', () => {
  let repos: memory.InMemoryRepositoryContext;
  let segmentId: number;

  beforeEach(async () => {
    repos = memory.createInMemoryRepositoryContext();
    segmentId = (await repos.segments.create({ name: 'Test Segment' })).segmentId;
  });

  describe('valid observations', () => {
    it('should record a valid observation', async () => {
      const observation = await recordObservation(repos, {
        segmentId,
        observedAt: '2026-01-01T10:00:00Z',
        speedKmh: 40,
        durationS: 31.5,
        distanceM: 350,
        provider: 'google_routes',
        raw: { status: 'OK' },
      });

      expect(observation).toEqual({
        obsId: 1,
        segmentId,
        observedAt: '2026-01-01T10:00:00.000Z',
        speedKmh: 40,
        durationS: 31.5,
        distanceM: 350,
        provider: 'google_routes',
        raw: { status: 'OK' },
      });
    });

    it('should default the provider', async () => {
      const observation = await recordObservation(repos, {
        segmentId,
        observedAt: '2026-01-01T10:00:00Z',
      });

      expect(observation.provider).toBe('google_routes');
    });

    it('should use the configured default provider', async () => {
      const observation = await recordObservation(
        repos,
        { segmentId, observedAt: '2026-01-01T10:00:00Z' },
        { defaultProvider: 'manual_entry' }
      );

      expect(observation.provider).toBe('manual_entry');
    });

    it('should store absent measurements as null', async () => {
      const observation = await recordObservation(repos, {
        segmentId,
        observedAt: '2026-01-01T10:00:00Z',
      });

      expect(observation.speedKmh).toBeNull();
      expect(observation.durationS).toBeNull();
      expect(observation.distanceM).toBeNull();
      expect(observation.raw).toBeNull();
    });

    it('should accept zero measurements', async () => {
      const observation = await recordObservation(repos, {
        segmentId,
        observedAt: '2026-01-01T10:00:00Z',
        speedKmh: 0,
      });

      expect(observation.speedKmh).toBe(0);
    });

    it('should normalize offsets to UTC', async () => {
      const observation = await recordObservation(repos, {
        segmentId,
        observedAt: '2026-01-01T05:00:00-05:00',
      });

      expect(observation.observedAt).toBe('2026-01-01T10:00:00.000Z');
    });

    it('should assign strictly increasing ids', async () => {
      const first = await recordObservation(repos, { segmentId, observedAt: '2026-01-01T10:05:00Z' });
      const second = await recordObservation(repos, { segmentId, observedAt: '2026-01-01T10:00:00Z' });
      const third = await recordObservation(repos, { segmentId, observedAt: '2026-01-01T10:05:00Z' });

      expect(second.obsId).toBeGreaterThan(first.obsId);
      expect(third.obsId).toBeGreaterThan(second.obsId);
    });

    it('should store duplicate timestamps from different providers separately', async () => {
      await recordObservation(repos, { segmentId, observedAt: '2026-01-01T10:00:00Z', provider: 'A' });
      await recordObservation(repos, { segmentId, observedAt: '2026-01-01T10:00:00Z', provider: 'B' });

      expect(await countObservations(repos, { segmentId })).toBe(2);
    });

    it('should notify onRecorded after appending', async () => {
      const onRecorded = vi.fn();

      const observation = await recordObservation(
        repos,
        { segmentId, observedAt: '2026-01-01T10:00:00Z' },
        { onRecorded }
      );

      expect(onRecorded).toHaveBeenCalledWith(observation);
    });
  });

  describe('validation', () => {
    it('should reject a missing observedAt', async () => {
      const attempt = recordObservation(repos, {
        segmentId,
        observedAt: '',
      });

      await expect(attempt).rejects.toThrow(ValidationError);
      await expect(attempt).rejects.toMatchObject({ field: 'observedAt' });
    });

    it('should reject an unparsable observedAt', async () => {
      await expect(
        recordObservation(repos, { segmentId, observedAt: 'yesterday at ten' })
      ).rejects.toMatchObject({ field: 'observedAt' });
    });

    it('should reject an observedAt without a timezone', async () => {
      await expect(
        recordObservation(repos, { segmentId, observedAt: '2026-01-01T10:00:00' })
      ).rejects.toThrow('observedAt must include a time and a timezone');
      await expect(
        recordObservation(repos, { segmentId, observedAt: '2026-01-01' })
      ).rejects.toThrow('observedAt must include a time and a timezone');
    });

    it.each([
      'Thu Jan 01 2026 10:00:00 GMT+0500',
      '01/01/2026 10:00:00Z',
      '2026-01-01 10:00:00Z',
      ' 2026-01-01T10:00:00Z',
    ])('should reject %j as not ISO 8601', async (observedAt) => {
      await expect(recordObservation(repos, { segmentId, observedAt })).rejects.toThrow(
        'observedAt must be a valid ISO 8601 date string'
      );
      expect(await repos.observations.count()).toBe(0);
    });

    it('should reject sub-millisecond precision', async () => {
      await expect(
        recordObservation(repos, { segmentId, observedAt: '2026-01-01T10:00:00.0009Z' })
      ).rejects.toMatchObject({
        field: 'observedAt',
        message: 'observedAt cannot be more precise than milliseconds',
      });
    });

    it('should keep millisecond precision so close measurements stay ordered', async () => {
      await recordObservation(repos, { segmentId, observedAt: '2026-01-01T10:00:00.009Z', speedKmh: 40 });
      await recordObservation(repos, { segmentId, observedAt: '2026-01-01T10:00:00.001Z', speedKmh: 35 });

      const [latest] = await repos.observations.latestPerSegment();

      expect(latest.observedAt).toBe('2026-01-01T10:00:00.009Z');
      expect(latest.speedKmh).toBe(40);
    });

    it.each(['speedKmh', 'durationS', 'distanceM'] as const)(
      'should reject a negative %s',
      async (field) => {
        const input: RecordObservationInput = { segmentId, observedAt: '2026-01-01T10:00:00Z' };
        input[field] = -1;

        const attempt = recordObservation(repos, input);

        await expect(attempt).rejects.toMatchObject({ code: 'VALIDATION_ERROR', field });
      }
    );

    it('should reject NaN measurements', async () => {
      await expect(
        recordObservation(repos, {
          segmentId,
          observedAt: '2026-01-01T10:00:00Z',
          speedKmh: Number.NaN,
        })
      ).rejects.toMatchObject({ field: 'speedKmh' });
    });

    it('should reject an empty provider', async () => {
      await expect(
        recordObservation(repos, { segmentId, observedAt: '2026-01-01T10:00:00Z', provider: '  ' })
      ).rejects.toMatchObject({ field: 'provider' });
    });

    it('should reject a non-integer segmentId', async () => {
      await expect(
        recordObservation(repos, { segmentId: 1.5, observedAt: '2026-01-01T10:00:00Z' })
      ).rejects.toMatchObject({ field: 'segmentId' });
    });

    it('should not append anything when validation fails', async () => {
      await expect(
        recordObservation(repos, { segmentId, observedAt: '2026-01-01T10:00:00Z', distanceM: -3 })
      ).rejects.toThrow(ValidationError);

      expect(repos._data.observations.size).toBe(0);
    });
  });

  describe('referential integrity', () => {
    it('should reject an unknown segment without mutating the store', async () => {
      await recordObservation(repos, { segmentId, observedAt: '2026-01-01T10:00:00Z' });
      const before = await countObservations(repos);

      const attempt = recordObservation(repos, {
        segmentId: 999,
        observedAt: '2026-01-01T10:00:00Z',
        speedKmh: 30,
      });

      await expect(attempt).rejects.toThrow(UnknownSegmentError);
      await expect(attempt).rejects.toMatchObject({ segmentId: 999 });
      expect(await countObservations(repos)).toBe(before);
    });

    it('should map a foreign key violation at append time to UnknownSegmentError', async () => {
      // Segment vanishes between the existence check and the append
      const racing: RepositoryContext = {
        ...repos,
        segments: { ...repos.segments, exists: async () => true },
      };

      await expect(
        recordObservation(racing, { segmentId: 77, observedAt: '2026-01-01T10:00:00Z' })
      ).rejects.toThrow(UnknownSegmentError);
    });
  });

  describe('store failures', () => {
    it('should surface an unreachable store without retrying', async () => {
      const append = vi.fn(async () => {
        throw Object.assign(new Error('write CONNECTION_ENDED'), { code: 'CONNECTION_ENDED' });
      });
      const offline: RepositoryContext = {
        ...repos,
        observations: { ...repos.observations, append },
      };

      await expect(
        recordObservation(offline, { segmentId, observedAt: '2026-01-01T10:00:00Z' })
      ).rejects.toThrow(StoreUnavailableError);
      expect(append).toHaveBeenCalledTimes(1);
    });

    it('should let other store errors through unchanged', async () => {
      const failure = Object.assign(new Error('numeric field overflow'), { code: '22003' });
      const broken: RepositoryContext = {
        ...repos,
        observations: {
          ...repos.observations,
          append: async () => {
            throw failure;
          },
        },
      };

      await expect(
        recordObservation(broken, { segmentId, observedAt: '2026-01-01T10:00:00Z' })
      ).rejects.toBe(failure);
    });
  });
});

describe('recordObservations', () => {
  let repos: memory.InMemoryRepositoryContext;
  let segmentId: number;

  beforeEach(async () => {
    repos = memory.createInMemoryRepositoryContext();
    segmentId = (await repos.segments.create({ name: 'Batch Segment' })).segmentId;
  });

  it('should keep accepted items when others fail', async () => {
    const result = await recordObservations(repos, [
      { segmentId, observedAt: '2026-01-01T10:00:00Z', speedKmh: 40 },
      { segmentId: 999, observedAt: '2026-01-01T10:00:00Z', speedKmh: 40 },
      { segmentId, observedAt: '2026-01-01T10:05:00Z', speedKmh: -2 },
      { segmentId, observedAt: '2026-01-01T10:10:00Z', speedKmh: 35 },
    ]);

    expect(result.accepted).toBe(2);
    expect(result.rejected).toBe(2);
    expect(result.results.map((r) => r.ok)).toEqual([true, false, false, true]);
    expect(result.results[1]).toEqual({
      ok: false,
      index: 1,
      error: { code: 'UNKNOWN_SEGMENT', message: 'Segment not found: 999', field: 'segmentId' },
    });
    expect(result.results[2]).toEqual({
      ok: false,
      index: 2,
      error: { code: 'VALIDATION_ERROR', message: 'speedKmh cannot be negative', field: 'speedKmh' },
    });
    expect(repos._data.observations.size).toBe(2);
  });

  it('should return an empty result for an empty batch', async () => {
    expect(await recordObservations(repos, [])).toEqual({ results: [], accepted: 0, rejected: 0 });
  });

  it('should abort on store outage but keep earlier appends', async () => {
    let calls = 0;
    const flaky: RepositoryContext = {
      ...repos,
      observations: {
        ...repos.observations,
        append: async (input) => {
          calls++;
          if (calls > 1) {
            throw Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
          }
          return repos.observations.append(input);
        },
      },
    };

    await expect(
      recordObservations(flaky, [
        { segmentId, observedAt: '2026-01-01T10:00:00Z' },
        { segmentId, observedAt: '2026-01-01T10:05:00Z' },
      ])
    ).rejects.toThrow(StoreUnavailableError);

    expect(repos._data.observations.size).toBe(1);
  });
});

describe('queryObservations', () => {
  let repos: memory.InMemoryRepositoryContext;
  let segmentId: number;

  beforeEach(async () => {
    repos = memory.createInMemoryRepositoryContext();
    segmentId = (await repos.segments.create({ name: 'Query Segment' })).segmentId;
  });

  it('should include a recorded observation exactly once', async () => {
    const recorded = await recordObservation(repos, {
      segmentId,
      observedAt: '2026-01-01T10:00:00Z',
      speedKmh: 40,
    });

    const result = await collect(
      queryObservations(repos, segmentId, {
        start: '2026-01-01T09:00:00Z',
        end: '2026-01-01T11:00:00Z',
      })
    );

    expect(result.filter((o) => o.obsId === recorded.obsId)).toHaveLength(1);
  });

  it('should order by observedAt ascending', async () => {
    await recordObservation(repos, { segmentId, observedAt: '2026-01-01T10:05:00Z', speedKmh: 35 });
    await recordObservation(repos, { segmentId, observedAt: '2026-01-01T10:00:00Z', speedKmh: 40 });

    const result = await collect(queryObservations(repos, segmentId));

    expect(result.map((o) => o.speedKmh)).toEqual([40, 35]);
  });

  it('should only return the requested segment', async () => {
    const other = (await repos.segments.create({ name: 'Other' })).segmentId;
    await recordObservation(repos, { segmentId, observedAt: '2026-01-01T10:00:00Z' });
    await recordObservation(repos, { segmentId: other, observedAt: '2026-01-01T10:00:00Z' });

    const result = await collect(queryObservations(repos, other));

    expect(result.map((o) => o.segmentId)).toEqual([other]);
  });

  it('should be restartable', async () => {
    await recordObservation(repos, { segmentId, observedAt: '2026-01-01T10:00:00Z' });
    await recordObservation(repos, { segmentId, observedAt: '2026-01-01T10:01:00Z' });

    const iterable = queryObservations(repos, segmentId);

    const first = await collect(iterable);
    const second = await collect(iterable);

    expect(second).toEqual(first);
    expect(first).toHaveLength(2);
  });

  it('should not touch the store until iterated', async () => {
    const stream = vi.spyOn(repos.observations, 'stream');

    const iterable = queryObservations(repos, segmentId);
    expect(stream).not.toHaveBeenCalled();

    await collect(iterable);
    expect(stream).toHaveBeenCalledTimes(1);
  });

  it('should reject an invalid time range', () => {
    expect(() => queryObservations(repos, segmentId, { start: 'not a date' })).toThrow(
      ValidationError
    );
  });

  it('should reject time range bounds without a timezone', async () => {
    expect(() =>
      queryObservations(repos, segmentId, { start: '2026-01-01T09:00:00Z', end: '2026-01-01T11:00:00' })
    ).toThrow('timeRange.end must include a time and a timezone');
    await expect(
      listObservations(repos, { segmentId, timeRange: { start: '2026-01-01' } })
    ).rejects.toMatchObject({ field: 'timeRange.start' });
  });
});

describe('listObservations', () => {
  it('should page through observations in query order', async () => {
    const repos = memory.createInMemoryRepositoryContext();
    const segmentId = (await repos.segments.create({})).segmentId;
    for (const minute of ['00', '01', '02']) {
      await recordObservation(repos, { segmentId, observedAt: `2026-01-01T10:${minute}:00Z` });
    }

    const page = await listObservations(repos, { segmentId, limit: 2, offset: 1 });

    expect(page.map((o) => o.observedAt)).toEqual([
      '2026-01-01T10:01:00.000Z',
      '2026-01-01T10:02:00.000Z',
    ]);
  });
});
