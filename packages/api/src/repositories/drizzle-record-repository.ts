import {
  and,
  asc,
  count,
  desc,
  eq,
  gt,
  gte,
  ilike,
  isNotNull,
  lt,
  lte,
  notInArray,
  or,
  sql,
  type SQL,
} from "drizzle-orm";
import {
  REFERENCE_PREFIXES,
  formatReferenceNumber,
  hasSlaDueAt,
  type CaseRecord,
  type RecordAttachment,
  type RecordComment,
  type RecordFeedback,
  type RecordType,
  type Revision,
  type SlaTrackedRecord,
  type TransitionHistoryEntry,
} from "@caseflow/shared";
import type { Database } from "../db/index.js";
import { attachments, comments, feedback, recordCounters, records } from "../db/schema.js";
import { revisions, transitionHistory } from "../db/schema-audit.js";
import { compact } from "../lib/compact.js";
import { pageOffset, type Page } from "../lib/pagination.js";
import type {
  RecordMutation,
  RecordQuery,
  RecordRepository,
  RevisionQuery,
  SlaCandidateQuery,
} from "./types.js";

export class DrizzleRecordRepository implements RecordRepository {
  constructor(private readonly db: Database) {}

  async nextReferenceNumber(recordType: RecordType): Promise<string> {
    const [row] = await this.db
      .insert(recordCounters)
      .values({ recordType, lastValue: 1 })
      .onConflictDoUpdate({
        target: recordCounters.recordType,
        set: { lastValue: sql`${recordCounters.lastValue} + 1` },
      })
      .returning({ lastValue: recordCounters.lastValue });
    if (!row) throw new Error(`Could not allocate a reference number for ${recordType}`);
    return formatReferenceNumber(REFERENCE_PREFIXES[recordType], row.lastValue);
  }

  async insert(record: CaseRecord, revision: Revision): Promise<CaseRecord> {
    return this.db.transaction(async (tx) => {
      const [created] = await tx.insert(records).values(record).returning();
      await tx.insert(revisions).values(revision);
      return created ?? record;
    });
  }

  async findById(id: string): Promise<CaseRecord | null> {
    const [row] = await this.db.select().from(records).where(eq(records.id, id));
    return row ?? null;
  }

  async list(query: RecordQuery): Promise<Page<CaseRecord>> {
    const conditions: SQL[] = [];
    if (query.recordType !== undefined) conditions.push(eq(records.recordType, query.recordType));
    if (query.workflowId !== undefined) conditions.push(eq(records.workflowId, query.workflowId));
    if (query.currentStateId !== undefined) conditions.push(eq(records.currentStateId, query.currentStateId));
    if (query.assigneeId !== undefined) conditions.push(eq(records.assigneeId, query.assigneeId));
    if (query.reporterId !== undefined) conditions.push(eq(records.reporterId, query.reporterId));
    if (query.slaBreached !== undefined) conditions.push(eq(records.slaBreached, query.slaBreached));
    if (query.search !== undefined) {
      const pattern = `%${query.search}%`;
      const searchCondition = or(ilike(records.title, pattern), ilike(records.referenceNumber, pattern));
      if (searchCondition) conditions.push(searchCondition);
    }

    const where = conditions.length > 0 ? and(...conditions) : undefined;
    const [data, countResult] = await Promise.all([
      this.db
        .select()
        .from(records)
        .where(where)
        .orderBy(desc(records.createdAt))
        .limit(query.limit)
        .offset(pageOffset(query)),
      this.db.select({ total: count() }).from(records).where(where),
    ]);

    return { data, total: countResult[0]?.total ?? 0 };
  }

  async countByWorkflow(workflowId: string): Promise<number> {
    const [row] = await this.db
      .select({ total: count() })
      .from(records)
      .where(eq(records.workflowId, workflowId));
    return row?.total ?? 0;
  }

  async countInState(stateId: string): Promise<number> {
    const [row] = await this.db
      .select({ total: count() })
      .from(records)
      .where(eq(records.currentStateId, stateId));
    return row?.total ?? 0;
  }

  async applyMutation(
    recordId: string,
    expectedVersion: number,
    mutation: RecordMutation,
  ): Promise<CaseRecord | null> {
    return this.db.transaction(async (tx) => {
      const [updated] = await tx
        .update(records)
        .set({ ...compact(mutation.patch), version: expectedVersion + 1 })
        .where(and(eq(records.id, recordId), eq(records.version, expectedVersion)))
        .returning();
      if (!updated) return null;

      if (mutation.history) await tx.insert(transitionHistory).values(mutation.history);
      if (mutation.comment) await tx.insert(comments).values(mutation.comment);
      if (mutation.attachment) await tx.insert(attachments).values(mutation.attachment);
      if (mutation.feedback) await tx.insert(feedback).values(mutation.feedback);
      await tx.insert(revisions).values(mutation.revision);
      return updated;
    });
  }

  async findSlaCandidates(query: SlaCandidateQuery): Promise<SlaTrackedRecord[]> {
    const conditions: SQL[] = [
      eq(records.slaBreached, false),
      isNotNull(records.slaDueAt),
      lt(records.slaDueAt, query.now),
    ];
    if (query.excludeStateIds.length > 0) {
      conditions.push(notInArray(records.currentStateId, [...query.excludeStateIds]));
    }
    if (query.after) {
      const cursor = or(
        gt(records.slaDueAt, query.after.slaDueAt),
        and(eq(records.slaDueAt, query.after.slaDueAt), gt(records.id, query.after.id)),
      );
      if (cursor) conditions.push(cursor);
    }

    const rows = await this.db
      .select()
      .from(records)
      .where(and(...conditions))
      .orderBy(asc(records.slaDueAt), asc(records.id))
      .limit(query.limit);
    return rows.filter(hasSlaDueAt);
  }

  async markSlaBreached(
    recordId: string,
    now: Date,
    buildRevision: (flagged: CaseRecord) => Revision,
  ): Promise<CaseRecord | null> {
    return this.db.transaction(async (tx) => {
      const [flagged] = await tx
        .update(records)
        .set({ slaBreached: true, version: sql`${records.version} + 1`, updatedAt: now })
        .where(
          and(eq(records.id, recordId), eq(records.slaBreached, false), lt(records.slaDueAt, now)),
        )
        .returning();
      if (!flagged) return null;
      await tx.insert(revisions).values(buildRevision(flagged));
      return flagged;
    });
  }

  async appendRevision(revision: Revision): Promise<Revision> {
    const [created] = await this.db.insert(revisions).values(revision).returning();
    return created ?? revision;
  }

  async listRevisions(query: RevisionQuery): Promise<Page<Revision>> {
    const conditions: SQL[] = [eq(revisions.recordId, query.recordId)];
    if (query.actionType !== undefined) conditions.push(eq(revisions.actionType, query.actionType));
    if (query.performedBy !== undefined) conditions.push(eq(revisions.performedBy, query.performedBy));
    if (query.from !== undefined) conditions.push(gte(revisions.createdAt, query.from));
    if (query.to !== undefined) conditions.push(lte(revisions.createdAt, query.to));

    const direction = query.order === "asc" ? asc : desc;
    const where = and(...conditions);
    const [data, countResult] = await Promise.all([
      this.db
        .select()
        .from(revisions)
        .where(where)
        .orderBy(direction(revisions.createdAt), direction(revisions.revisionNumber))
        .limit(query.limit)
        .offset(pageOffset(query)),
      this.db.select({ total: count() }).from(revisions).where(where),
    ]);

    return { data, total: countResult[0]?.total ?? 0 };
  }

  async purgeRevisions(before: Date): Promise<number> {
    const removed = await this.db
      .delete(revisions)
      .where(lt(revisions.createdAt, before))
      .returning({ id: revisions.id });
    return removed.length;
  }

  async listHistory(recordId: string): Promise<TransitionHistoryEntry[]> {
    return this.db
      .select()
      .from(transitionHistory)
      .where(eq(transitionHistory.recordId, recordId))
      .orderBy(asc(transitionHistory.transitionedAt));
  }

  async listComments(recordId: string): Promise<RecordComment[]> {
    return this.db
      .select()
      .from(comments)
      .where(eq(comments.recordId, recordId))
      .orderBy(asc(comments.createdAt));
  }

  async listAttachments(recordId: string): Promise<RecordAttachment[]> {
    return this.db
      .select()
      .from(attachments)
      .where(eq(attachments.recordId, recordId))
      .orderBy(asc(attachments.createdAt));
  }

  async listFeedback(recordId: string): Promise<RecordFeedback[]> {
    return this.db
      .select()
      .from(feedback)
      .where(eq(feedback.recordId, recordId))
      .orderBy(asc(feedback.createdAt));
  }
}
