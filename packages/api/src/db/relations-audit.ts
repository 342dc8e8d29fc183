import { relations } from "drizzle-orm";
import { records } from "./schema.js";
import { revisions, transitionHistory } from "./schema-audit.js";

export const transitionHistoryRelations = relations(transitionHistory, ({ one }) => ({
  record: one(records, {
    fields: [transitionHistory.recordId],
    references: [records.id],
  }),
}));

export const revisionsRelations = relations(revisions, ({ one }) => ({
  record: one(records, {
    fields: [revisions.recordId],
    references: [records.id],
  }),
}));
