import type { RecordType } from "../workflow/types.js";

export interface CaseRecord {
  id: string;
  referenceNumber: string;
  title: string;
  description: string;
  recordType: RecordType;
  workflowId: string;
  currentStateId: string;
  classificationId: string | null;
  departmentId: string | null;
  locationId: string | null;
  channel: string | null;
  priority: number;
  severity: number;
  assigneeId: string | null;
  reporterId: string | null;
  customFields: Record<string, unknown>;
  slaDueAt: Date | null;
  slaBreached: boolean;
  resolvedAt: Date | null;
  closedAt: Date | null;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

/** Columns a mutation may change. Identity and version are managed by the store. */
export type RecordPatch = Partial<Omit<CaseRecord, "id" | "version" | "createdAt">>;

export interface RecordComment {
  id: string;
  recordId: string;
  authorId: string;
  content: string;
  isInternal: boolean;
  transitionHistoryId: string | null;
  createdAt: Date;
}

export interface RecordAttachment {
  id: string;
  recordId: string;
  fileName: string;
  contentType: string;
  size: number;
  storageKey: string;
  uploadedBy: string;
  createdAt: Date;
}

/** A rating left while moving a record, usually on closure. */
export interface RecordFeedback {
  id: string;
  recordId: string;
  transitionHistoryId: string | null;
  rating: number;
  comment: string | null;
  submittedBy: string;
  createdAt: Date;
}

export interface TransitionHistoryEntry {
  id: string;
  recordId: string;
  transitionId: string;
  fromStateId: string;
  toStateId: string;
  performedBy: string;
  comment: string | null;
  transitionedAt: Date;
}

// ─── Revisions ───────────────────────────────────────────────────────

export const REVISION_ACTION_TYPES = [
  "created",
  "updated",
  "transitioned",
  "comment_added",
  "attachment_added",
  "assigned",
  "record_type_changed",
  "sla_recomputed",
  "sla_breached",
  "action_failed",
] as const;
export type RevisionActionType = (typeof REVISION_ACTION_TYPES)[number];

export interface Revision {
  id: string;
  recordId: string;
  revisionNumber: number;
  actionType: RevisionActionType;
  performedBy: string;
  description: string;
  payload: Record<string, unknown>;
  createdAt: Date;
}

// ─── Field access ────────────────────────────────────────────────────

const READABLE_FIELDS = [
  "title",
  "description",
  "recordType",
  "classificationId",
  "departmentId",
  "locationId",
  "channel",
  "priority",
  "severity",
  "assigneeId",
  "reporterId",
] as const;
type ReadableField = (typeof READABLE_FIELDS)[number];
const READABLE_FIELD_SET: ReadonlySet<string> = new Set(READABLE_FIELDS);

function isReadableField(field: string): field is ReadableField {
  return READABLE_FIELD_SET.has(field);
}

/**
 * Reads a named field off a record. `custom.<name>` and any name that is not
 * a record column resolve against the record's custom fields.
 */
export function readRecordField(record: CaseRecord, field: string): unknown {
  if (field.startsWith("custom.")) return record.customFields[field.slice("custom.".length)];
  if (isReadableField(field)) return record[field];
  return record.customFields[field];
}

export function formatReferenceNumber(prefix: string, sequence: number): string {
  return `${prefix}-${String(sequence).padStart(6, "0")}`;
}
