import { asc, eq } from 'drizzle-orm';
import type { Database } from '../db.js';
import { segments } from '../schema/index.js';
import type {
  SegmentRepository,
  CreateSegmentInput,
  UpdateSegmentInput,
} from '../../interfaces/index.js';
import type { Segment, SegmentFilter, SegmentId } from '@roadspeed/protocol';
import { rowToSegment, toNumeric } from './mappers.js';

export class PgSegmentRepository implements SegmentRepository {
  constructor(private db: Database) {}

  async create(input: CreateSegmentInput): Promise<Segment> {
    const [row] = await this.db
      .insert(segments)
      .values({
        name: input.name ?? null,
        source: input.source ?? null,
        refCode: input.refCode ?? null,
        lengthM: toNumeric(input.lengthM),
        geometry: input.geometry ?? null,
      })
      .returning();

    return rowToSegment(row);
  }

  async get(segmentId: SegmentId): Promise<Segment | null> {
    const [row] = await this.db
      .select()
      .from(segments)
      .where(eq(segments.segmentId, segmentId));

    return row ? rowToSegment(row) : null;
  }

  async exists(segmentId: SegmentId): Promise<boolean> {
    const rows = await this.db
      .select({ segmentId: segments.segmentId })
      .from(segments)
      .where(eq(segments.segmentId, segmentId))
      .limit(1);

    return rows.length > 0;
  }

  async list(filter?: SegmentFilter): Promise<Segment[]> {
    let query = this.db.select().from(segments).orderBy(asc(segments.segmentId)).$dynamic();

    if (filter?.limit !== undefined) {
      query = query.limit(filter.limit);
    }

    if (filter?.offset) {
      query = query.offset(filter.offset);
    }

    const rows = await query;
    return rows.map(rowToSegment);
  }

  async update(segmentId: SegmentId, input: UpdateSegmentInput): Promise<Segment | null> {
    const values: Partial<typeof segments.$inferInsert> = {};
    if (input.name !== undefined) values.name = input.name;
    if (input.source !== undefined) values.source = input.source;
    if (input.refCode !== undefined) values.refCode = input.refCode;
    if (input.lengthM !== undefined) values.lengthM = toNumeric(input.lengthM);
    if (input.geometry !== undefined) values.geometry = input.geometry;

    // Nothing to change; an empty SET clause is invalid SQL
    if (Object.keys(values).length === 0) {
      return this.get(segmentId);
    }

    const [row] = await this.db
      .update(segments)
      .set(values)
      .where(eq(segments.segmentId, segmentId))
      .returning();

    return row ? rowToSegment(row) : null;
  }

  async delete(segmentId: SegmentId): Promise<boolean> {
    // ON DELETE RESTRICT raises 23503 when observations still reference the row
    const rows = await this.db
      .delete(segments)
      .where(eq(segments.segmentId, segmentId))
      .returning({ segmentId: segments.segmentId });

    return rows.length > 0;
  }
}
