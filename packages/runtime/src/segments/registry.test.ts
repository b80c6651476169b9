// Tests for the segment registry

import { describe, it, expect, beforeEach } from 'vitest';
import { memory } from '@roadspeed/repositories';
import type { RepositoryContext } from '@roadspeed/repositories';
import {
  createSegment,
  getSegment,
  listSegments,
  updateSegment,
  deleteSegment,
} from './registry.js';
import { ValidationError, SegmentInUseError, StoreUnavailableError } from '../errors.js';

describe('segment registry', () => {
  let repos: memory.InMemoryRepositoryContext;

  beforeEach(() => {
    repos = memory.createInMemoryRepositoryContext();
  });

  describe('createSegment', () => {
    it('creates a segment with all metadata', async () => {
      const geometry = { type: 'LineString', coordinates: [[-74.033, 4.9145], [-74.0305, 4.917]] };

      const segment = await createSegment(repos, {
        name: 'Segmento 1',
        source: 'OSM',
        refCode: 'way/42',
        lengthM: 350,
        geometry,
      });

      expect(segment).toEqual({
        segmentId: 1,
        name: 'Segmento 1',
        source: 'OSM',
        refCode: 'way/42',
        lengthM: 350,
        geometry,
      });
    });

    it('allows an unknown length', async () => {
      const segment = await createSegment(repos, { name: 'no length' });
      expect(segment.lengthM).toBeNull();
    });

    it('accepts a zero length', async () => {
      const segment = await createSegment(repos, { lengthM: 0 });
      expect(segment.lengthM).toBe(0);
    });

    it('rejects a negative length', async () => {
      await expect(createSegment(repos, { lengthM: -1 })).rejects.toThrow(ValidationError);
      expect(repos._data.segments.size).toBe(0);
    });

    it('rejects a non-finite length', async () => {
      await expect(
        createSegment(repos, { lengthM: Number.POSITIVE_INFINITY })
      ).rejects.toMatchObject({ field: 'lengthM' });
    });

    it('rejects an oversized source tag', async () => {
      await expect(createSegment(repos, { source: 'x'.repeat(65) })).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
        field: 'source',
      });
    });

    it('assigns distinct ids', async () => {
      const a = await createSegment(repos, {});
      const b = await createSegment(repos, {});
      expect(a.segmentId).not.toBe(b.segmentId);
    });
  });

  describe('getSegment', () => {
    it('returns null for a missing segment', async () => {
      expect(await getSegment(repos, 404)).toBeNull();
    });

    it('returns a created segment', async () => {
      const created = await createSegment(repos, { name: 'found' });
      expect(await getSegment(repos, created.segmentId)).toEqual(created);
    });
  });

  describe('listSegments', () => {
    it('lists in id order', async () => {
      await createSegment(repos, { name: 'first' });
      await createSegment(repos, { name: 'second' });

      const segments = await listSegments(repos);
      expect(segments.map((s) => s.segmentId)).toEqual([1, 2]);
    });
  });

  describe('updateSegment', () => {
    it('keeps the id and changes metadata', async () => {
      const created = await createSegment(repos, { name: 'before', lengthM: 10 });

      const updated = await updateSegment(repos, created.segmentId, { name: 'after' });

      expect(updated).toMatchObject({ segmentId: created.segmentId, name: 'after', lengthM: 10 });
    });

    it('validates the patch', async () => {
      const created = await createSegment(repos, {});
      await expect(updateSegment(repos, created.segmentId, { lengthM: -5 })).rejects.toThrow(
        ValidationError
      );
    });
  });

  describe('deleteSegment', () => {
    it('refuses while observations reference the segment', async () => {
      const created = await createSegment(repos, {});
      await repos.observations.append({
        segmentId: created.segmentId,
        observedAt: '2026-01-01T10:00:00Z',
        provider: 'test',
      });

      const attempt = deleteSegment(repos, created.segmentId);

      await expect(attempt).rejects.toBeInstanceOf(SegmentInUseError);
      expect(await getSegment(repos, created.segmentId)).not.toBeNull();
    });

    it('removes an unreferenced segment', async () => {
      const created = await createSegment(repos, {});
      expect(await deleteSegment(repos, created.segmentId)).toBe(true);
      expect(await deleteSegment(repos, created.segmentId)).toBe(false);
    });
  });

  describe('store failures', () => {
    it('reports an unreachable store as StoreUnavailableError', async () => {
      const offline: RepositoryContext = {
        ...repos,
        segments: {
          ...repos.segments,
          async get() {
            throw Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), {
              code: 'ECONNREFUSED',
            });
          },
        },
      };

      await expect(getSegment(offline, 1)).rejects.toMatchObject({
        name: 'StoreUnavailableError',
        operation: 'getSegment',
      });
      await expect(getSegment(offline, 1)).rejects.toBeInstanceOf(StoreUnavailableError);
    });
  });
});
