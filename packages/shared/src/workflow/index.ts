export { WorkflowEngine } from "./engine.js";
export type {
  EngineOptions,
  ResolvedTransition,
  TopologyWarning,
  TopologyWarningCode,
} from "./engine.js";
export {
  RECORD_TYPES,
  WORKFLOW_RECORD_TYPES,
  WORKFLOW_LIFECYCLES,
  REFERENCE_PREFIXES,
  WorkflowError,
  notFound,
} from "./types.js";
export type {
  RecordType,
  WorkflowRecordType,
  WorkflowLifecycle,
  StoredWorkflowLifecycle,
  MatchConstraints,
  WorkflowDefinition,
  WorkflowState,
  WorkflowTransition,
  WorkflowGraph,
  ActorContext,
  WorkflowErrorCode,
} from "./types.js";
export {
  requirementSchema,
  feedbackSchema,
  transitionPayloadSchema,
  validateRequirements,
} from "./requirements.js";
export type {
  TransitionRequirement,
  TransitionRequirementInput,
  RequirementKind,
  RequirementViolation,
  TransitionPayload,
  TransitionPayloadInput,
} from "./requirements.js";
export { actionSchema, SETTABLE_FIELDS } from "./actions.js";
export type {
  TransitionAction,
  TransitionActionInput,
  ActionKind,
  ActionWarning,
  SettableField,
} from "./actions.js";
export {
  WORKFLOW_LIFECYCLE_MOVES,
  canMoveLifecycle,
  assertLifecycleMove,
} from "./lifecycle.js";
export type { LifecycleMove } from "./lifecycle.js";
export {
  WORKFLOW_EXPORT_FORMAT,
  WORKFLOW_EXPORT_VERSION,
  matchConstraintsSchema,
  workflowExportSchema,
  exportWorkflowGraph,
  checkExportTopology,
} from "./export-format.js";
export type { WorkflowExport, WorkflowExportInput } from "./export-format.js";
