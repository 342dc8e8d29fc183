export {
  REVISION_ACTION_TYPES,
  formatReferenceNumber,
  readRecordField,
} from "./types.js";
export type {
  CaseRecord,
  RecordPatch,
  RecordComment,
  RecordAttachment,
  RecordFeedback,
  TransitionHistoryEntry,
  Revision,
  RevisionActionType,
} from "./types.js";
export { computeSlaDueAt, hasSlaDueAt, isSlaOverdue } from "./sla.js";
export type { SlaTrackedRecord } from "./sla.js";
