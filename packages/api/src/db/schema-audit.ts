import {
  pgSchema,
  uuid,
  varchar,
  text,
  integer,
  timestamp,
  jsonb,
  index,
} from "drizzle-orm/pg-core";
import { REVISION_ACTION_TYPES } from "@caseflow/shared";
import { records } from "./schema.js";

// ─── Schema ──────────────────────────────────────────────────────────
export const auditSchema = pgSchema("audit");

// ─── Enums ───────────────────────────────────────────────────────────

export const revisionActionEnum = auditSchema.enum("revision_action", REVISION_ACTION_TYPES);

// ─── 1. transition_history ───────────────────────────────────────────

export const transitionHistory = auditSchema.table(
  "transition_history",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    recordId: uuid("record_id")
      .notNull()
      .references(() => records.id, { onDelete: "cascade" }),
    // no FK: history outlives edits to the workflow definition
    transitionId: uuid("transition_id").notNull(),
    fromStateId: uuid("from_state_id").notNull(),
    toStateId: uuid("to_state_id").notNull(),
    performedBy: varchar("performed_by", { length: 255 }).notNull(),
    comment: text("comment"),
    transitionedAt: timestamp("transitioned_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index("idx_transition_history_record").on(table.recordId, table.transitionedAt),
  ],
);

// ─── 2. revisions ────────────────────────────────────────────────────

export const revisions = auditSchema.table(
  "revisions",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    recordId: uuid("record_id")
      .notNull()
      .references(() => records.id, { onDelete: "cascade" }),
    revisionNumber: integer("revision_number").notNull(),
    actionType: revisionActionEnum("action_type").notNull(),
    performedBy: varchar("performed_by", { length: 255 }).notNull(),
    description: text("description").notNull(),
    payload: jsonb("payload").$type<Record<string, unknown>>().notNull().default({}),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index("idx_revisions_record_created").on(table.recordId, table.createdAt),
    index("idx_revisions_action_type").on(table.actionType),
    index("idx_revisions_created_at").on(table.createdAt),
  ],
);

// NOTE: revisions are append-only. Rows are never updated; the only delete
// path is the retention purge, which removes rows by created_at.
