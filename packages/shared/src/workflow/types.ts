import type { TransitionAction } from "./actions.js";
import type { TransitionRequirement } from "./requirements.js";

// ─── Record types ────────────────────────────────────────────────────

export const RECORD_TYPES = ["incident", "request", "complaint", "query"] as const;
export type RecordType = (typeof RECORD_TYPES)[number];

/** A workflow may serve one record type or every type. */
export const WORKFLOW_RECORD_TYPES = [...RECORD_TYPES, "all"] as const;
export type WorkflowRecordType = (typeof WORKFLOW_RECORD_TYPES)[number];

export const REFERENCE_PREFIXES: Record<RecordType, string> = {
  incident: "INC",
  request: "REQ",
  complaint: "CMP",
  query: "QRY",
};

// ─── Workflow lifecycle ──────────────────────────────────────────────

export const WORKFLOW_LIFECYCLES = ["active", "soft_deleted", "purged"] as const;
export type WorkflowLifecycle = (typeof WORKFLOW_LIFECYCLES)[number];

/** Purged workflows no longer exist, so stored rows only carry these two. */
export type StoredWorkflowLifecycle = Exclude<WorkflowLifecycle, "purged">;

// ─── Definitions ─────────────────────────────────────────────────────

export interface MatchConstraints {
  locationIds?: string[];
  departmentIds?: string[];
  channels?: string[];
}

export interface WorkflowDefinition {
  id: string;
  name: string;
  code: string;
  description: string;
  recordType: WorkflowRecordType;
  isActive: boolean;
  isDefault: boolean;
  lifecycle: StoredWorkflowLifecycle;
  deletedAt: Date | null;
  classificationIds: string[];
  matchConstraints: MatchConstraints;
  requiredFields: string[];
  createdBy: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface WorkflowState {
  id: string;
  workflowId: string;
  name: string;
  code: string;
  description: string;
  isInitial: boolean;
  isTerminal: boolean;
  slaHours: number | null;
  color: string;
  sortOrder: number;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface WorkflowTransition {
  id: string;
  workflowId: string;
  name: string;
  code: string;
  description: string;
  fromStateId: string;
  toStateId: string;
  allowedRoles: string[];
  requirements: TransitionRequirement[];
  actions: TransitionAction[];
  sortOrder: number;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/** A workflow together with its states and transitions, loaded as one unit. */
export interface WorkflowGraph {
  workflow: WorkflowDefinition;
  states: WorkflowState[];
  transitions: WorkflowTransition[];
}

// ─── Identity ────────────────────────────────────────────────────────

export interface ActorContext {
  actorId: string;
  roles: readonly string[];
}

// ─── Error types ─────────────────────────────────────────────────────

export type WorkflowErrorCode =
  | "NOT_FOUND"
  | "INVALID_TOPOLOGY"
  | "FORBIDDEN"
  | "REQUIREMENTS_NOT_MET"
  | "TERMINAL_STATE"
  | "STALE_VERSION"
  | "HAS_DEPENDENT_RECORDS"
  | "VALIDATION_FAILED";

export class WorkflowError extends Error {
  constructor(
    message: string,
    public readonly code: WorkflowErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "WorkflowError";
  }
}

export function notFound(entity: string, id: string): WorkflowError {
  return new WorkflowError(`${entity} not found: ${id}`, "NOT_FOUND", { entity, id });
}
