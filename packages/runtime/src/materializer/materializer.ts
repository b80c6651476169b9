// Latest-speed materializer - the most recent observation per segment
//
// Operational contract: the view is NOT kept live. It reflects the store as of
// the last successful refresh(); staleness is bounded only by how often
// refresh() runs (see scheduler.ts). A refresh that starts before an insert
// commits may or may not include it.

import type {
  LatestSpeedSnapshot,
  MaterializerState,
  SegmentId,
  SpeedObservation,
} from '@roadspeed/protocol';
import type { RepositoryContext } from '@roadspeed/repositories';
import { RefreshCancelledError } from '../errors.js';
import { silentLogger, type Logger } from '../logging.js';
import { guardStore } from '../store.js';

export type LatestSpeedMaterializerOptions = {
  /** Logger for refresh lifecycle events (defaults to silent) */
  logger?: Logger;

  /** Clock used to stamp snapshots */
  now?: () => Date;
};

export type RefreshOptions = {
  /**
   * Aborting before the new snapshot is published leaves the previous one in place.
   * The store read itself always runs to completion; its result is discarded.
   */
  signal?: AbortSignal;
};

/**
 * Read-only view over a staged mapping. Has no set/delete/clear, so a
 * published snapshot cannot be changed through the map callers receive.
 */
class SnapshotEntries implements ReadonlyMap<SegmentId, SpeedObservation> {
  constructor(private readonly entriesBySegment: Map<SegmentId, SpeedObservation>) {}

  get size(): number {
    return this.entriesBySegment.size;
  }

  get(segmentId: SegmentId): SpeedObservation | undefined {
    return this.entriesBySegment.get(segmentId);
  }

  has(segmentId: SegmentId): boolean {
    return this.entriesBySegment.has(segmentId);
  }

  forEach(
    callback: (
      value: SpeedObservation,
      key: SegmentId,
      map: ReadonlyMap<SegmentId, SpeedObservation>
    ) => void,
    thisArg?: unknown
  ): void {
    this.entriesBySegment.forEach((value, key) => callback.call(thisArg, value, key, this));
  }

  keys() {
    return this.entriesBySegment.keys();
  }

  values() {
    return this.entriesBySegment.values();
  }

  entries() {
    return this.entriesBySegment.entries();
  }

  [Symbol.iterator]() {
    return this.entriesBySegment[Symbol.iterator]();
  }
}

const EMPTY_ENTRIES: ReadonlyMap<SegmentId, SpeedObservation> = new SnapshotEntries(new Map());

/**
 * Serves the latest observation per segment from an immutable, versioned snapshot.
 *
 * Each refresh stages a complete new mapping off to the side and then replaces
 * the published snapshot in one assignment, so readers see either the old or
 * the new snapshot, never a mix.
 *
 * Overlapping refreshes are allowed. The most recently *started* refresh wins:
 * a refresh finishing after a later-started one has published is discarded.
 *
 * @example
 * ```typescript
 * const view = new LatestSpeedMaterializer(repos, { logger: consoleLogger });
 * await recordObservation(repos, { segmentId: 1, observedAt: '2026-01-01T10:05:00Z', speedKmh: 35 });
 * await view.refresh();
 * view.getLatest(1)?.speedKmh; // 35
 * ```
 */
export class LatestSpeedMaterializer {
  private readonly logger: Logger;
  private readonly now: () => Date;

  private snapshot: LatestSpeedSnapshot | null = null;
  private inFlight = 0;
  private startedGeneration = 0;
  private publishedGeneration = 0;

  constructor(
    private readonly repos: RepositoryContext,
    options: LatestSpeedMaterializerOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * empty → refreshing → ready. Stays "refreshing" while any refresh is in flight.
   */
  getState(): MaterializerState {
    if (this.inFlight > 0) return 'refreshing';
    return this.snapshot ? 'ready' : 'empty';
  }

  /**
   * The currently published snapshot, or null before the first successful refresh.
   */
  getSnapshot(): LatestSpeedSnapshot | null {
    return this.snapshot;
  }

  /**
   * Latest observation for a segment as of the last successful refresh.
   * @returns SpeedObservation or null if the segment has no entry
   */
  getLatest(segmentId: SegmentId): SpeedObservation | null {
    return this.snapshot?.entries.get(segmentId) ?? null;
  }

  getAllLatest(): ReadonlyMap<SegmentId, SpeedObservation> {
    return this.snapshot?.entries ?? EMPTY_ENTRIES;
  }

  /**
   * Recompute the latest-per-segment mapping from the observation store
   * and publish it as a new snapshot.
   *
   * @returns The snapshot published after this call (this refresh's, or a newer one if superseded)
   * @throws RefreshCancelledError if the signal aborts before publishing
   * @throws StoreUnavailableError if the store cannot be reached
   */
  async refresh(options: RefreshOptions = {}): Promise<LatestSpeedSnapshot> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new RefreshCancelledError();
    }

    const generation = ++this.startedGeneration;
    const startedAt = Date.now();
    this.inFlight++;
    this.logger.debug('Refreshing latest speed view', { generation });

    try {
      const rows = await guardStore('refresh', () => this.repos.observations.latestPerSegment());

      if (signal?.aborted) {
        this.logger.info('Latest speed refresh cancelled', { generation });
        throw new RefreshCancelledError();
      }

      if (this.snapshot && generation < this.publishedGeneration) {
        this.logger.info('Latest speed refresh superseded', {
          generation,
          publishedGeneration: this.publishedGeneration,
        });
        return this.snapshot;
      }

      // Stage the full mapping before publishing
      const entries = new Map<SegmentId, SpeedObservation>();
      for (const row of rows) {
        entries.set(row.segmentId, row);
      }

      const snapshot: LatestSpeedSnapshot = Object.freeze({
        version: (this.snapshot?.version ?? 0) + 1,
        refreshedAt: this.now().toISOString(),
        entries: new SnapshotEntries(entries),
      });

      this.snapshot = snapshot;
      this.publishedGeneration = generation;

      this.logger.info('Latest speed view refreshed', {
        version: snapshot.version,
        segments: entries.size,
        durationMs: Date.now() - startedAt,
      });

      return snapshot;
    } catch (error) {
      if (!(error instanceof RefreshCancelledError)) {
        this.logger.error('Latest speed refresh failed', {
          generation,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      throw error;
    } finally {
      this.inFlight--;
    }
  }
}

/**
 * Create a materializer over a repository context.
 */
export function createLatestSpeedMaterializer(
  repos: RepositoryContext,
  options?: LatestSpeedMaterializerOptions
): LatestSpeedMaterializer {
  return new LatestSpeedMaterializer(repos, options);
}

