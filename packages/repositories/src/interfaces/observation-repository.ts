import type {
  SegmentId,
  SpeedObservation,
  SpeedObservationFilter,
  ObservationId,
  Timestamp,
} from '@roadspeed/protocol';

/**
 * Input for appending a new SpeedObservation.
 * observedAt must already be validated; the store assigns obsId.
 */
export type AppendSpeedObservationInput = {
  segmentId: SegmentId;
  observedAt: Timestamp;
  speedKmh?: number | null;
  durationS?: number | null;
  distanceM?: number | null;
  provider: string;
  raw?: unknown;
};

/**
 * Filter for counting observations
 */
export type ObservationCountFilter = {
  segmentId?: SegmentId;
};

/**
 * Repository interface for SpeedObservation operations.
 *
 * The observation log is the source of truth: append-only, immutable rows,
 * each append atomic. Derived views are rebuilt from it.
 */
export interface SpeedObservationRepository {
  /**
   * Append a new observation to the log.
   * @throws ForeignKeyViolationError if the segment does not exist
   */
  append(input: AppendSpeedObservationInput): Promise<SpeedObservation>;

  /**
   * Get an observation by ID
   * @returns SpeedObservation or null if not found
   */
  get(obsId: ObservationId): Promise<SpeedObservation | null>;

  /**
   * Query observations ordered by observedAt ascending, then obsId ascending.
   */
  query(filter: SpeedObservationFilter): Promise<SpeedObservation[]>;

  /**
   * Count observations, optionally for one segment
   */
  count(filter?: ObservationCountFilter): Promise<number>;

  /**
   * Stream observations in query order without loading the whole result.
   * Each call starts from the beginning, so iteration is restartable.
   */
  stream(filter: Omit<SpeedObservationFilter, 'limit' | 'offset'>): AsyncIterable<SpeedObservation>;

  /**
   * One row per segment: the observation with the greatest observedAt,
   * ties broken by the greatest obsId. Computed from a single consistent read.
   */
  latestPerSegment(): Promise<SpeedObservation[]>;
}
