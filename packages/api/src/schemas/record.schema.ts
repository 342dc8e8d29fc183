import { z } from "zod";
import { RECORD_TYPES, REVISION_ACTION_TYPES, transitionPayloadSchema } from "@caseflow/shared";
import { paginationSchema } from "../lib/pagination.js";
import { booleanQuery, expectedVersion } from "./common.schema.js";

const level = z.number().int().min(1).max(5);

// ─── Records ─────────────────────────────────────────────────────────

export const createRecordSchema = z.object({
  title: z.string().min(1).max(255),
  description: z.string().max(10_000).default(""),
  recordType: z.enum(RECORD_TYPES),
  workflowId: z.string().uuid().optional(),
  classificationId: z.string().min(1).nullable().default(null),
  departmentId: z.string().min(1).nullable().default(null),
  locationId: z.string().min(1).nullable().default(null),
  channel: z.string().min(1).max(50).nullable().default(null),
  priority: level.default(3),
  severity: level.default(3),
  assigneeId: z.string().min(1).nullable().default(null),
  reporterId: z.string().min(1).optional(),
  customFields: z.record(z.unknown()).default({}),
});

/** Columns the workflow owns are not in this list and are refused. */
export const updateRecordSchema = z
  .object({
    title: z.string().min(1).max(255),
    description: z.string().max(10_000),
    classificationId: z.string().min(1).nullable(),
    departmentId: z.string().min(1).nullable(),
    locationId: z.string().min(1).nullable(),
    channel: z.string().min(1).max(50).nullable(),
    priority: level,
    severity: level,
    customFields: z.record(z.unknown()),
  })
  .partial()
  .strict();

export const WORKFLOW_OWNED_FIELDS = [
  "currentStateId",
  "workflowId",
  "version",
  "slaDueAt",
  "slaBreached",
  "resolvedAt",
  "closedAt",
  "recordType",
  "referenceNumber",
] as const;

export const updateRecordBody = z.object({
  expectedVersion,
  changes: z.record(z.unknown()),
});

export const listRecordsQuery = paginationSchema.extend({
  recordType: z.enum(RECORD_TYPES).optional(),
  workflowId: z.string().uuid().optional(),
  currentStateId: z.string().uuid().optional(),
  assigneeId: z.string().min(1).optional(),
  reporterId: z.string().min(1).optional(),
  slaBreached: booleanQuery.optional(),
  search: z.string().min(1).max(100).optional(),
});

export const executeTransitionBody = transitionPayloadSchema.extend({
  transitionId: z.string().uuid(),
});

// ─── Sub-resources ───────────────────────────────────────────────────

export const addCommentSchema = z.object({
  expectedVersion,
  content: z.string().min(1).max(10_000),
  isInternal: z.boolean().default(false),
});

export const addAttachmentSchema = z.object({
  expectedVersion,
  fileName: z.string().min(1).max(255),
  contentType: z.string().min(1).max(100),
  size: z.number().int().min(0),
  storageKey: z.string().min(1).max(500),
});

export const assignSchema = z.object({
  expectedVersion,
  assigneeId: z.string().min(1).nullable(),
});

// ─── Revisions ───────────────────────────────────────────────────────

export const listRevisionsQuery = paginationSchema.extend({
  actionType: z.enum(REVISION_ACTION_TYPES).optional(),
  performedBy: z.string().min(1).optional(),
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
  order: z.enum(["asc", "desc"]).default("desc"),
});

/** Without olderThanDays the configured retention applies. */
export const purgeRevisionsQuery = z.object({
  olderThanDays: z.coerce.number().int().min(1).optional(),
});

export type CreateRecordInput = z.input<typeof createRecordSchema>;
export type AddCommentInput = z.input<typeof addCommentSchema>;
export type AddAttachmentInput = z.input<typeof addAttachmentSchema>;
export type ListRevisionsInput = z.input<typeof listRevisionsQuery>;
