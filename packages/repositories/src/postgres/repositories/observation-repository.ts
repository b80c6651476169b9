import { and, asc, desc, eq, gt, gte, lte, or, sql, type SQL } from 'drizzle-orm';
import type { Database } from '../db.js';
import { speedObservations } from '../schema/index.js';
import type {
  SpeedObservationRepository,
  AppendSpeedObservationInput,
  ObservationCountFilter,
} from '../../interfaces/index.js';
import type {
  ObservationId,
  SpeedObservation,
  SpeedObservationFilter,
} from '@roadspeed/protocol';
import { rowToObservation, toNumeric } from './mappers.js';

const STREAM_BATCH_SIZE = 1000;

function filterConditions(filter: SpeedObservationFilter): SQL[] {
  const conditions: SQL[] = [];

  if (filter.segmentId !== undefined) {
    conditions.push(eq(speedObservations.segmentId, filter.segmentId));
  }

  if (filter.timeRange?.start) {
    conditions.push(gte(speedObservations.observedAt, new Date(filter.timeRange.start)));
  }

  if (filter.timeRange?.end) {
    conditions.push(lte(speedObservations.observedAt, new Date(filter.timeRange.end)));
  }

  return conditions;
}

export class PgSpeedObservationRepository implements SpeedObservationRepository {
  constructor(private db: Database) {}

  async append(input: AppendSpeedObservationInput): Promise<SpeedObservation> {
    const [row] = await this.db
      .insert(speedObservations)
      .values({
        segmentId: input.segmentId,
        observedAt: new Date(input.observedAt),
        speedKmh: toNumeric(input.speedKmh),
        durationS: toNumeric(input.durationS),
        distanceM: toNumeric(input.distanceM),
        provider: input.provider,
        raw: input.raw ?? null,
      })
      .returning();

    return rowToObservation(row);
  }

  async get(obsId: ObservationId): Promise<SpeedObservation | null> {
    const [row] = await this.db
      .select()
      .from(speedObservations)
      .where(eq(speedObservations.obsId, obsId));

    return row ? rowToObservation(row) : null;
  }

  async query(filter: SpeedObservationFilter): Promise<SpeedObservation[]> {
    let query = this.db
      .select()
      .from(speedObservations)
      .where(and(...filterConditions(filter)))
      .orderBy(asc(speedObservations.observedAt), asc(speedObservations.obsId))
      .$dynamic();

    if (filter.limit !== undefined) {
      query = query.limit(filter.limit);
    }

    if (filter.offset) {
      query = query.offset(filter.offset);
    }

    const rows = await query;
    return rows.map(rowToObservation);
  }

  async count(filter?: ObservationCountFilter): Promise<number> {
    const [result] = await this.db
      .select({ count: sql<number>`count(*)` })
      .from(speedObservations)
      .where(
        filter?.segmentId !== undefined
          ? eq(speedObservations.segmentId, filter.segmentId)
          : undefined
      );

    return Number(result?.count ?? 0);
  }

  async *stream(
    filter: Omit<SpeedObservationFilter, 'limit' | 'offset'>
  ): AsyncGenerator<SpeedObservation> {
    // Keyset pagination on (observed_at, obs_id) so concurrent appends never shift pages
    let cursor: { observedAt: Date; obsId: number } | null = null;

    while (true) {
      const conditions = filterConditions(filter);
      if (cursor) {
        const after = or(
          gt(speedObservations.observedAt, cursor.observedAt),
          and(
            eq(speedObservations.observedAt, cursor.observedAt),
            gt(speedObservations.obsId, cursor.obsId)
          )
        );
        if (after) conditions.push(after);
      }

      const rows = await this.db
        .select()
        .from(speedObservations)
        .where(and(...conditions))
        .orderBy(asc(speedObservations.observedAt), asc(speedObservations.obsId))
        .limit(STREAM_BATCH_SIZE);

      for (const row of rows) {
        yield rowToObservation(row);
      }

      const last = rows.at(-1);
      if (!last || rows.length < STREAM_BATCH_SIZE) break;
      cursor = { observedAt: last.observedAt, obsId: last.obsId };
    }
  }

  async latestPerSegment(): Promise<SpeedObservation[]> {
    // One statement, one snapshot: DISTINCT ON keeps the first row per segment
    const rows = await this.db
      .selectDistinctOn([speedObservations.segmentId])
      .from(speedObservations)
      .orderBy(
        asc(speedObservations.segmentId),
        desc(speedObservations.observedAt),
        desc(speedObservations.obsId)
      );

    return rows.map(rowToObservation);
  }
}
