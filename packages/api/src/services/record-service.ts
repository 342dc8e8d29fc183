import { randomUUID } from "node:crypto";
import {
  WorkflowError,
  computeSlaDueAt,
  notFound,
  readRecordField,
  type ActorContext,
  type CaseRecord,
  type Clock,
  type RecordAttachment,
  type RecordComment,
  type RecordFeedback,
} from "@caseflow/shared";
import type { Logger } from "../lib/logger.js";
import type { Page } from "../lib/pagination.js";
import { parseInput } from "../lib/validation.js";
import type { RecordMutation, RecordQuery, RecordRepository } from "../repositories/types.js";
import {
  WORKFLOW_OWNED_FIELDS,
  addAttachmentSchema,
  addCommentSchema,
  assignSchema,
  createRecordSchema,
  updateRecordSchema,
  type AddAttachmentInput,
  type AddCommentInput,
  type CreateRecordInput,
} from "../schemas/record.schema.js";
import { newRevision } from "./revision-service.js";
import { staleVersion } from "./transition-service.js";
import type { WorkflowService } from "./workflow-service.js";

export interface RecordServiceDeps {
  records: RecordRepository;
  workflowService: WorkflowService;
  clock: Clock;
  logger: Logger;
}

export interface RecordDetail extends CaseRecord {
  comments: RecordComment[];
  attachments: RecordAttachment[];
  feedback: RecordFeedback[];
}

const OWNED_FIELD_SET: ReadonlySet<string> = new Set(WORKFLOW_OWNED_FIELDS);

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

// ─── Record Service ──────────────────────────────────────────────────

/** Creates records and applies every change that is not a state move. */
export class RecordService {
  private readonly records: RecordRepository;
  private readonly workflowService: WorkflowService;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(deps: RecordServiceDeps) {
    this.records = deps.records;
    this.workflowService = deps.workflowService;
    this.clock = deps.clock;
    this.logger = deps.logger.child({ component: "record-service" });
  }

  async createRecord(input: CreateRecordInput, actor: ActorContext): Promise<CaseRecord> {
    const data = parseInput(createRecordSchema, input, "record");
    const { workflowId, reporterId, ...fields } = data;
    const { graph, initial } = await this.workflowService.seatFor({ ...fields, workflowId });
    const { workflow } = graph;

    const now = this.clock.now();
    const draft: CaseRecord = {
      id: randomUUID(),
      referenceNumber: "",
      ...fields,
      workflowId: workflow.id,
      currentStateId: initial.id,
      reporterId: reporterId ?? actor.actorId,
      slaDueAt: computeSlaDueAt(now, initial.slaHours),
      slaBreached: false,
      resolvedAt: null,
      closedAt: null,
      version: 1,
      createdAt: now,
      updatedAt: now,
    };

    const missing = workflow.requiredFields.filter((field) => isBlank(readRecordField(draft, field)));
    if (missing.length > 0) {
      throw new WorkflowError(`Missing required fields: ${missing.join(", ")}`, "VALIDATION_FAILED", {
        missing,
      });
    }

    const record: CaseRecord = {
      ...draft,
      referenceNumber: await this.records.nextReferenceNumber(data.recordType),
    };
    const created = await this.records.insert(
      record,
      newRevision({
        recordId: record.id,
        revisionNumber: 1,
        actionType: "created",
        performedBy: actor.actorId,
        description: `Created ${record.referenceNumber} in "${initial.name}"`,
        payload: { workflowId: workflow.id, stateId: initial.id },
        createdAt: now,
      }),
    );

    this.logger.info(
      { recordId: created.id, referenceNumber: created.referenceNumber, workflowId: workflow.id },
      "record created",
    );
    return created;
  }

  async getRecord(id: string): Promise<RecordDetail> {
    const record = await this.requireRecord(id);
    const [comments, attachments, feedback] = await Promise.all([
      this.records.listComments(id),
      this.records.listAttachments(id),
      this.records.listFeedback(id),
    ]);
    return { ...record, comments, attachments, feedback };
  }

  async listRecords(query: RecordQuery): Promise<Page<CaseRecord>> {
    return this.records.list(query);
  }

  async updateRecord(
    id: string,
    changes: Record<string, unknown>,
    actor: ActorContext,
    expectedVersion: number,
  ): Promise<CaseRecord> {
    const owned = Object.keys(changes).filter((key) => OWNED_FIELD_SET.has(key));
    if (owned.length > 0) {
      throw new WorkflowError(
        `Fields managed by the workflow cannot be edited: ${owned.join(", ")}`,
        "VALIDATION_FAILED",
        { fields: owned },
      );
    }
    const patch = parseInput(updateRecordSchema, changes, "record changes");
    const changed = Object.keys(patch);
    if (changed.length === 0) {
      throw new WorkflowError("No changes given", "VALIDATION_FAILED");
    }

    return this.mutate(id, expectedVersion, (record, now) => ({
      patch: { ...patch, updatedAt: now },
      revision: newRevision({
        recordId: id,
        revisionNumber: record.version + 1,
        actionType: "updated",
        performedBy: actor.actorId,
        description: `Updated ${changed.join(", ")}`,
        payload: { fields: changed, changes: patch },
        createdAt: now,
      }),
    }));
  }

  async addComment(id: string, input: AddCommentInput, actor: ActorContext): Promise<RecordComment> {
    const data = parseInput(addCommentSchema, input, "comment");
    const comment: RecordComment = {
      id: randomUUID(),
      recordId: id,
      authorId: actor.actorId,
      content: data.content,
      isInternal: data.isInternal,
      transitionHistoryId: null,
      createdAt: this.clock.now(),
    };

    await this.mutate(id, data.expectedVersion, (record, now) => ({
      patch: { updatedAt: now },
      comment,
      revision: newRevision({
        recordId: id,
        revisionNumber: record.version + 1,
        actionType: "comment_added",
        performedBy: actor.actorId,
        description: data.isInternal ? "Internal comment added" : "Comment added",
        payload: { commentId: comment.id },
        createdAt: now,
      }),
    }));
    return comment;
  }

  async addAttachment(id: string, input: AddAttachmentInput, actor: ActorContext): Promise<RecordAttachment> {
    const { expectedVersion, ...metadata } = parseInput(addAttachmentSchema, input, "attachment");
    const attachment: RecordAttachment = {
      id: randomUUID(),
      recordId: id,
      ...metadata,
      uploadedBy: actor.actorId,
      createdAt: this.clock.now(),
    };

    await this.mutate(id, expectedVersion, (record, now) => ({
      patch: { updatedAt: now },
      attachment,
      revision: newRevision({
        recordId: id,
        revisionNumber: record.version + 1,
        actionType: "attachment_added",
        performedBy: actor.actorId,
        description: `Attached ${attachment.fileName}`,
        payload: { attachmentId: attachment.id, fileName: attachment.fileName, size: attachment.size },
        createdAt: now,
      }),
    }));
    return attachment;
  }

  async assign(
    id: string,
    input: { expectedVersion: number; assigneeId: string | null },
    actor: ActorContext,
  ): Promise<CaseRecord> {
    const { expectedVersion, assigneeId } = parseInput(assignSchema, input, "assignment");
    return this.mutate(id, expectedVersion, (record, now) => ({
      patch: { assigneeId, updatedAt: now },
      revision: newRevision({
        recordId: id,
        revisionNumber: record.version + 1,
        actionType: "assigned",
        performedBy: actor.actorId,
        description: assigneeId ? `Assigned to ${assigneeId}` : "Unassigned",
        payload: { from: record.assigneeId, to: assigneeId },
        createdAt: now,
      }),
    }));
  }

  // ─── Internal helpers ───────────────────────────────────────────────

  private async requireRecord(id: string): Promise<CaseRecord> {
    const record = await this.records.findById(id);
    if (!record) throw notFound("Record", id);
    return record;
  }

  /** Loads, checks the version, and commits with compare-and-swap. */
  private async mutate(
    id: string,
    expectedVersion: number,
    build: (record: CaseRecord, now: Date) => RecordMutation,
  ): Promise<CaseRecord> {
    const record = await this.requireRecord(id);
    if (record.version !== expectedVersion) throw staleVersion(record, expectedVersion);

    const updated = await this.records.applyMutation(id, expectedVersion, build(record, this.clock.now()));
    if (!updated) throw staleVersion(await this.requireRecord(id), expectedVersion);
    return updated;
  }
}
