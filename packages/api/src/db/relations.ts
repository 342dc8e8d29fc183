import { relations } from "drizzle-orm";
import {
  workflows,
  workflowClassifications,
  states,
  transitions,
  records,
  comments,
  attachments,
  feedback,
} from "./schema.js";
import { revisions, transitionHistory } from "./schema-audit.js";

// ─── workflows ───────────────────────────────────────────────────────

export const workflowsRelations = relations(workflows, ({ many }) => ({
  classifications: many(workflowClassifications),
  states: many(states),
  transitions: many(transitions),
  records: many(records),
}));

export const workflowClassificationsRelations = relations(workflowClassifications, ({ one }) => ({
  workflow: one(workflows, {
    fields: [workflowClassifications.workflowId],
    references: [workflows.id],
  }),
}));

// ─── states / transitions ────────────────────────────────────────────

export const statesRelations = relations(states, ({ one }) => ({
  workflow: one(workflows, {
    fields: [states.workflowId],
    references: [workflows.id],
  }),
}));

export const transitionsRelations = relations(transitions, ({ one }) => ({
  workflow: one(workflows, {
    fields: [transitions.workflowId],
    references: [workflows.id],
  }),
}));

// ─── records ─────────────────────────────────────────────────────────

export const recordsRelations = relations(records, ({ one, many }) => ({
  workflow: one(workflows, {
    fields: [records.workflowId],
    references: [workflows.id],
  }),
  currentState: one(states, {
    fields: [records.currentStateId],
    references: [states.id],
  }),
  comments: many(comments),
  attachments: many(attachments),
  feedback: many(feedback),
  history: many(transitionHistory),
  revisions: many(revisions),
}));

export const commentsRelations = relations(comments, ({ one }) => ({
  record: one(records, {
    fields: [comments.recordId],
    references: [records.id],
  }),
}));

export const attachmentsRelations = relations(attachments, ({ one }) => ({
  record: one(records, {
    fields: [attachments.recordId],
    references: [records.id],
  }),
}));

export const feedbackRelations = relations(feedback, ({ one }) => ({
  record: one(records, {
    fields: [feedback.recordId],
    references: [records.id],
  }),
}));
