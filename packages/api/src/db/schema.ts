import {
  pgSchema,
  uuid,
  varchar,
  text,
  integer,
  boolean,
  timestamp,
  jsonb,
  index,
  uniqueIndex,
  primaryKey,
} from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import {
  DEFAULT_STATE_COLOR,
  RECORD_TYPES,
  WORKFLOW_RECORD_TYPES,
  type MatchConstraints,
  type TransitionAction,
  type TransitionRequirement,
} from "@caseflow/shared";

// ─── Schemas ─────────────────────────────────────────────────────────
export const workflowSchema = pgSchema("workflow");
export const casesSchema = pgSchema("cases");

// ─── Enums ───────────────────────────────────────────────────────────

export const workflowRecordTypeEnum = workflowSchema.enum("workflow_record_type", WORKFLOW_RECORD_TYPES);

export const workflowLifecycleEnum = workflowSchema.enum("workflow_lifecycle", [
  "active",
  "soft_deleted",
]);

export const recordTypeEnum = casesSchema.enum("record_type", RECORD_TYPES);

// ─── 1. workflows ────────────────────────────────────────────────────

export const workflows = workflowSchema.table(
  "workflows",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    name: varchar("name", { length: 100 }).notNull(),
    code: varchar("code", { length: 50 }).notNull(),
    description: varchar("description", { length: 500 }).notNull().default(""),
    recordType: workflowRecordTypeEnum("record_type").notNull(),
    isActive: boolean("is_active").notNull().default(true),
    isDefault: boolean("is_default").notNull().default(false),
    lifecycle: workflowLifecycleEnum("lifecycle").notNull().default("active"),
    deletedAt: timestamp("deleted_at", { withTimezone: true }),
    matchConstraints: jsonb("match_constraints").$type<MatchConstraints>().notNull().default({}),
    requiredFields: jsonb("required_fields").$type<string[]>().notNull().default([]),
    createdBy: varchar("created_by", { length: 255 }),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    uniqueIndex("uq_workflows_code").on(table.code),
    index("idx_workflows_record_type").on(table.recordType),
    // at most one default per record type
    uniqueIndex("uq_workflows_default_per_type")
      .on(table.recordType)
      .where(sql`${table.isDefault} AND ${table.lifecycle} = 'active'`),
  ],
);

// ─── 2. workflow_classifications ─────────────────────────────────────

export const workflowClassifications = workflowSchema.table(
  "workflow_classifications",
  {
    workflowId: uuid("workflow_id")
      .notNull()
      .references(() => workflows.id, { onDelete: "cascade" }),
    classificationId: varchar("classification_id", { length: 100 }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.workflowId, table.classificationId] }),
    index("idx_workflow_classifications_classification").on(table.classificationId),
  ],
);

// ─── 3. states ───────────────────────────────────────────────────────

export const states = workflowSchema.table(
  "states",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    workflowId: uuid("workflow_id")
      .notNull()
      .references(() => workflows.id, { onDelete: "cascade" }),
    name: varchar("name", { length: 100 }).notNull(),
    code: varchar("code", { length: 50 }).notNull(),
    description: varchar("description", { length: 500 }).notNull().default(""),
    isInitial: boolean("is_initial").notNull().default(false),
    isTerminal: boolean("is_terminal").notNull().default(false),
    slaHours: integer("sla_hours"),
    color: varchar("color", { length: 20 }).notNull().default(DEFAULT_STATE_COLOR),
    sortOrder: integer("sort_order").notNull().default(0),
    isActive: boolean("is_active").notNull().default(true),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    uniqueIndex("uq_states_workflow_code").on(table.workflowId, table.code),
    uniqueIndex("uq_states_one_initial").on(table.workflowId).where(sql`${table.isInitial}`),
    index("idx_states_terminal").on(table.isTerminal),
  ],
);

// ─── 4. transitions ──────────────────────────────────────────────────

export const transitions = workflowSchema.table(
  "transitions",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    workflowId: uuid("workflow_id")
      .notNull()
      .references(() => workflows.id, { onDelete: "cascade" }),
    name: varchar("name", { length: 100 }).notNull(),
    code: varchar("code", { length: 50 }).notNull(),
    description: varchar("description", { length: 500 }).notNull().default(""),
    fromStateId: uuid("from_state_id")
      .notNull()
      .references(() => states.id, { onDelete: "cascade" }),
    toStateId: uuid("to_state_id")
      .notNull()
      .references(() => states.id, { onDelete: "cascade" }),
    allowedRoles: jsonb("allowed_roles").$type<string[]>().notNull().default([]),
    requirements: jsonb("requirements").$type<TransitionRequirement[]>().notNull().default([]),
    actions: jsonb("actions").$type<TransitionAction[]>().notNull().default([]),
    sortOrder: integer("sort_order").notNull().default(0),
    isActive: boolean("is_active").notNull().default(true),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    uniqueIndex("uq_transitions_workflow_code").on(table.workflowId, table.code),
    index("idx_transitions_from_state").on(table.fromStateId),
    index("idx_transitions_to_state").on(table.toStateId),
  ],
);

// ─── 5. record_counters ──────────────────────────────────────────────

export const recordCounters = casesSchema.table("record_counters", {
  recordType: recordTypeEnum("record_type").primaryKey(),
  lastValue: integer("last_value").notNull().default(0),
});

// ─── 6. records ──────────────────────────────────────────────────────

export const records = casesSchema.table(
  "records",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    referenceNumber: varchar("reference_number", { length: 30 }).notNull(),
    title: varchar("title", { length: 255 }).notNull(),
    description: text("description").notNull().default(""),
    recordType: recordTypeEnum("record_type").notNull(),
    workflowId: uuid("workflow_id")
      .notNull()
      .references(() => workflows.id, { onDelete: "restrict" }),
    currentStateId: uuid("current_state_id")
      .notNull()
      .references(() => states.id, { onDelete: "restrict" }),
    classificationId: varchar("classification_id", { length: 100 }),
    departmentId: varchar("department_id", { length: 100 }),
    locationId: varchar("location_id", { length: 100 }),
    channel: varchar("channel", { length: 50 }),
    priority: integer("priority").notNull().default(3),
    severity: integer("severity").notNull().default(3),
    assigneeId: varchar("assignee_id", { length: 255 }),
    reporterId: varchar("reporter_id", { length: 255 }),
    customFields: jsonb("custom_fields").$type<Record<string, unknown>>().notNull().default({}),
    slaDueAt: timestamp("sla_due_at", { withTimezone: true }),
    slaBreached: boolean("sla_breached").notNull().default(false),
    resolvedAt: timestamp("resolved_at", { withTimezone: true }),
    closedAt: timestamp("closed_at", { withTimezone: true }),
    version: integer("version").notNull().default(1),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    uniqueIndex("uq_records_reference_number").on(table.referenceNumber),
    index("idx_records_workflow").on(table.workflowId),
    index("idx_records_current_state").on(table.currentStateId),
    index("idx_records_assignee").on(table.assigneeId),
    index("idx_records_sla_due").on(table.slaDueAt).where(sql`${table.slaBreached} = false`),
  ],
);

// ─── 7. comments ─────────────────────────────────────────────────────

export const comments = casesSchema.table(
  "comments",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    recordId: uuid("record_id")
      .notNull()
      .references(() => records.id, { onDelete: "cascade" }),
    authorId: varchar("author_id", { length: 255 }).notNull(),
    content: text("content").notNull(),
    isInternal: boolean("is_internal").notNull().default(false),
    transitionHistoryId: uuid("transition_history_id"),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [index("idx_comments_record").on(table.recordId)],
);

// ─── 8. attachments ──────────────────────────────────────────────────

export const attachments = casesSchema.table(
  "attachments",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    recordId: uuid("record_id")
      .notNull()
      .references(() => records.id, { onDelete: "cascade" }),
    fileName: varchar("file_name", { length: 255 }).notNull(),
    contentType: varchar("content_type", { length: 100 }).notNull(),
    size: integer("size").notNull(),
    storageKey: varchar("storage_key", { length: 500 }).notNull(),
    uploadedBy: varchar("uploaded_by", { length: 255 }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [index("idx_attachments_record").on(table.recordId)],
);

// ─── 9. feedback ─────────────────────────────────────────────────────

export const feedback = casesSchema.table(
  "feedback",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    recordId: uuid("record_id")
      .notNull()
      .references(() => records.id, { onDelete: "cascade" }),
    transitionHistoryId: uuid("transition_history_id"),
    rating: integer("rating").notNull(),
    comment: text("comment"),
    submittedBy: varchar("submitted_by", { length: 255 }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [index("idx_feedback_record").on(table.recordId)],
);
