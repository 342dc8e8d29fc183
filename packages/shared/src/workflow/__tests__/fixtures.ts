import type { CaseRecord } from "../../records/types.js";
import type {
  WorkflowDefinition,
  WorkflowGraph,
  WorkflowState,
  WorkflowTransition,
} from "../types.js";

const T0 = new Date("2024-03-01T09:00:00.000Z");

export function workflow(overrides: Partial<WorkflowDefinition> = {}): WorkflowDefinition {
  return {
    id: "wf-1",
    name: "Incident handling",
    code: "incident_handling",
    description: "",
    recordType: "incident",
    isActive: true,
    isDefault: false,
    lifecycle: "active",
    deletedAt: null,
    classificationIds: [],
    matchConstraints: {},
    requiredFields: [],
    createdBy: null,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function state(id: string, overrides: Partial<WorkflowState> = {}): WorkflowState {
  return {
    id,
    workflowId: "wf-1",
    name: id,
    code: id,
    description: "",
    isInitial: false,
    isTerminal: false,
    slaHours: null,
    color: "#6366f1",
    sortOrder: 0,
    isActive: true,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function transition(
  id: string,
  fromStateId: string,
  toStateId: string,
  overrides: Partial<WorkflowTransition> = {},
): WorkflowTransition {
  return {
    id,
    workflowId: "wf-1",
    name: id,
    code: id,
    description: "",
    fromStateId,
    toStateId,
    allowedRoles: ["agent"],
    requirements: [],
    actions: [],
    sortOrder: 0,
    isActive: true,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

/** new -> in_progress -> resolved, with a guarded resolve step. */
export function incidentGraph(): WorkflowGraph {
  return {
    workflow: workflow(),
    states: [
      state("new", { name: "New", isInitial: true, slaHours: 24, sortOrder: 0 }),
      state("in_progress", { name: "In Progress", slaHours: 48, sortOrder: 1 }),
      state("resolved", { name: "Resolved", isTerminal: true, sortOrder: 2 }),
    ],
    transitions: [
      transition("start", "new", "in_progress", { name: "Start work", sortOrder: 0 }),
      transition("escalate", "new", "in_progress", {
        name: "Escalate",
        isActive: false,
        sortOrder: 1,
      }),
      transition("resolve", "in_progress", "resolved", {
        name: "Resolve",
        requirements: [
          { id: "req-comment", kind: "comment", isMandatory: true },
          { id: "req-code", kind: "field_value", field: "resolution_code", isMandatory: true },
        ],
      }),
    ],
  };
}

export function record(overrides: Partial<CaseRecord> = {}): CaseRecord {
  return {
    id: "rec-1",
    referenceNumber: "INC-000001",
    title: "Printer on fire",
    description: "",
    recordType: "incident",
    workflowId: "wf-1",
    currentStateId: "new",
    classificationId: null,
    departmentId: null,
    locationId: null,
    channel: null,
    priority: 3,
    severity: 3,
    assigneeId: null,
    reporterId: "reporter-1",
    customFields: {},
    slaDueAt: null,
    slaBreached: false,
    resolvedAt: null,
    closedAt: null,
    version: 1,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}
