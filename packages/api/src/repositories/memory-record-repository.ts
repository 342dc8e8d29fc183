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
import { compact } from "../lib/compact.js";
import { paginate, type Page } from "../lib/pagination.js";
import type {
  RecordMutation,
  RecordQuery,
  RecordRepository,
  RevisionQuery,
  SlaCandidateQuery,
} from "./types.js";

const byCreatedAt = <T extends { createdAt: Date }>(a: T, b: T) =>
  a.createdAt.getTime() - b.createdAt.getTime();

/**
 * Process-local record store. Every method runs to completion without
 * yielding between its read and its write, which gives the same atomicity
 * the Postgres store gets from a transaction.
 */
export class InMemoryRecordRepository implements RecordRepository {
  private readonly records = new Map<string, CaseRecord>();
  private readonly counters = new Map<RecordType, number>();
  private revisions: Revision[] = [];
  private readonly history: TransitionHistoryEntry[] = [];
  private readonly comments: RecordComment[] = [];
  private readonly attachments: RecordAttachment[] = [];
  private readonly feedback: RecordFeedback[] = [];

  async nextReferenceNumber(recordType: RecordType): Promise<string> {
    const next = (this.counters.get(recordType) ?? 0) + 1;
    this.counters.set(recordType, next);
    return formatReferenceNumber(REFERENCE_PREFIXES[recordType], next);
  }

  async insert(record: CaseRecord, revision: Revision): Promise<CaseRecord> {
    this.records.set(record.id, structuredClone(record));
    this.revisions.push(structuredClone(revision));
    return structuredClone(record);
  }

  async findById(id: string): Promise<CaseRecord | null> {
    const found = this.records.get(id);
    return found ? structuredClone(found) : null;
  }

  async list(query: RecordQuery): Promise<Page<CaseRecord>> {
    const search = query.search?.toLowerCase();
    const matching = [...this.records.values()]
      .filter((r) => query.recordType === undefined || r.recordType === query.recordType)
      .filter((r) => query.workflowId === undefined || r.workflowId === query.workflowId)
      .filter((r) => query.currentStateId === undefined || r.currentStateId === query.currentStateId)
      .filter((r) => query.assigneeId === undefined || r.assigneeId === query.assigneeId)
      .filter((r) => query.reporterId === undefined || r.reporterId === query.reporterId)
      .filter((r) => query.slaBreached === undefined || r.slaBreached === query.slaBreached)
      .filter(
        (r) =>
          search === undefined ||
          r.title.toLowerCase().includes(search) ||
          r.referenceNumber.toLowerCase().includes(search),
      )
      .sort((a, b) => byCreatedAt(b, a));
    const page = paginate(matching, query);
    return { data: page.data.map((r) => structuredClone(r)), total: page.total };
  }

  async countByWorkflow(workflowId: string): Promise<number> {
    return [...this.records.values()].filter((r) => r.workflowId === workflowId).length;
  }

  async countInState(stateId: string): Promise<number> {
    return [...this.records.values()].filter((r) => r.currentStateId === stateId).length;
  }

  async applyMutation(
    recordId: string,
    expectedVersion: number,
    mutation: RecordMutation,
  ): Promise<CaseRecord | null> {
    const current = this.records.get(recordId);
    if (!current || current.version !== expectedVersion) return null;

    const next: CaseRecord = {
      ...current,
      ...structuredClone(compact(mutation.patch)),
      version: expectedVersion + 1,
    };
    this.records.set(recordId, next);
    this.revisions.push(structuredClone(mutation.revision));
    if (mutation.history) this.history.push(structuredClone(mutation.history));
    if (mutation.comment) this.comments.push(structuredClone(mutation.comment));
    if (mutation.attachment) this.attachments.push(structuredClone(mutation.attachment));
    if (mutation.feedback) this.feedback.push(structuredClone(mutation.feedback));
    return structuredClone(next);
  }

  async findSlaCandidates(query: SlaCandidateQuery): Promise<SlaTrackedRecord[]> {
    const excluded = new Set(query.excludeStateIds);
    const { after } = query;
    return [...this.records.values()]
      .filter(hasSlaDueAt)
      .filter((r) => !r.slaBreached && r.slaDueAt.getTime() < query.now.getTime())
      .filter((r) => !excluded.has(r.currentStateId))
      .sort((a, b) => a.slaDueAt.getTime() - b.slaDueAt.getTime() || a.id.localeCompare(b.id))
      .filter((r) => {
        if (!after) return true;
        const diff = r.slaDueAt.getTime() - after.slaDueAt.getTime();
        return diff > 0 || (diff === 0 && r.id.localeCompare(after.id) > 0);
      })
      .slice(0, query.limit)
      .map((r) => structuredClone(r));
  }

  async markSlaBreached(
    recordId: string,
    now: Date,
    buildRevision: (flagged: CaseRecord) => Revision,
  ): Promise<CaseRecord | null> {
    const current = this.records.get(recordId);
    if (!current || current.slaBreached || current.slaDueAt === null) return null;
    if (current.slaDueAt.getTime() >= now.getTime()) return null;

    const flagged: CaseRecord = {
      ...current,
      slaBreached: true,
      version: current.version + 1,
      updatedAt: now,
    };
    this.records.set(recordId, flagged);
    this.revisions.push(structuredClone(buildRevision(structuredClone(flagged))));
    return structuredClone(flagged);
  }

  async appendRevision(revision: Revision): Promise<Revision> {
    this.revisions.push(structuredClone(revision));
    return structuredClone(revision);
  }

  async listRevisions(query: RevisionQuery): Promise<Page<Revision>> {
    const matching = this.revisions
      .filter((r) => r.recordId === query.recordId)
      .filter((r) => query.actionType === undefined || r.actionType === query.actionType)
      .filter((r) => query.performedBy === undefined || r.performedBy === query.performedBy)
      .filter((r) => query.from === undefined || r.createdAt.getTime() >= query.from.getTime())
      .filter((r) => query.to === undefined || r.createdAt.getTime() <= query.to.getTime());

    // insertion order breaks createdAt ties
    const ordered = query.order === "asc" ? matching : [...matching].reverse();
    const sorted = [...ordered].sort((a, b) =>
      query.order === "asc" ? byCreatedAt(a, b) : byCreatedAt(b, a),
    );
    const page = paginate(sorted, query);
    return { data: page.data.map((r) => structuredClone(r)), total: page.total };
  }

  async purgeRevisions(before: Date): Promise<number> {
    const kept = this.revisions.filter((r) => r.createdAt.getTime() >= before.getTime());
    const removed = this.revisions.length - kept.length;
    this.revisions = kept;
    return removed;
  }

  async listHistory(recordId: string): Promise<TransitionHistoryEntry[]> {
    return this.history
      .filter((h) => h.recordId === recordId)
      .map((h) => structuredClone(h));
  }

  async listComments(recordId: string): Promise<RecordComment[]> {
    return this.comments
      .filter((c) => c.recordId === recordId)
      .sort(byCreatedAt)
      .map((c) => structuredClone(c));
  }

  async listAttachments(recordId: string): Promise<RecordAttachment[]> {
    return this.attachments
      .filter((a) => a.recordId === recordId)
      .sort(byCreatedAt)
      .map((a) => structuredClone(a));
  }

  async listFeedback(recordId: string): Promise<RecordFeedback[]> {
    return this.feedback
      .filter((f) => f.recordId === recordId)
      .sort(byCreatedAt)
      .map((f) => structuredClone(f));
  }
}
