import { randomUUID } from "node:crypto";
import {
  ManualClock,
  actionSchema,
  type ActorContext,
  type CaseRecord,
  type Revision,
  type TransitionActionInput,
  type TransitionPayload,
  type WorkflowDefinition,
  type WorkflowState,
  type WorkflowTransition,
} from "@caseflow/shared";
import { loadConfig } from "../lib/config.js";
import { createLogger } from "../lib/logger.js";
import { InMemoryRecordRepository } from "../repositories/memory-record-repository.js";
import { InMemoryWorkflowRepository } from "../repositories/memory-workflow-repository.js";
import type { RecordRepository } from "../repositories/types.js";
import type { CreateWorkflowInput } from "../schemas/workflow.schema.js";
import { StaticDirectory, type Directory } from "../services/directory.js";
import { createServices, type AppServices } from "../services/index.js";
import type { NotificationRequest, Notifier } from "../services/notifier.js";

export const TEST_CONFIG = loadConfig({
  NODE_ENV: "test",
  JWT_SECRET: "test-secret",
  SLA_MONITOR_ENABLED: "false",
});

export const silentLogger = createLogger(TEST_CONFIG);

export const actors = {
  admin: { actorId: "admin-1", roles: ["admin"] },
  agent: { actorId: "agent-1", roles: ["agent"] },
  viewer: { actorId: "viewer-1", roles: ["viewer"] },
  superAdmin: { actorId: "root-1", roles: ["super_admin"] },
} satisfies Record<string, ActorContext>;

// ─── Notifier that remembers what it was asked ───────────────────────

export class RecordingNotifier implements Notifier {
  readonly requests: NotificationRequest[] = [];
  failWith: Error | null = null;

  async notify(request: NotificationRequest): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.requests.push(request);
  }
}

// ─── Service harness ─────────────────────────────────────────────────

export interface Harness {
  clock: ManualClock;
  workflowRepository: InMemoryWorkflowRepository;
  recordRepository: RecordRepository;
  notifier: RecordingNotifier;
  services: AppServices;
}

export function createHarness(
  options: { directory?: Directory; records?: RecordRepository; batchSize?: number } = {},
): Harness {
  const clock = new ManualClock();
  const workflowRepository = new InMemoryWorkflowRepository();
  const recordRepository = options.records ?? new InMemoryRecordRepository();
  const notifier = new RecordingNotifier();

  const services = createServices({
    workflowRepository,
    recordRepository,
    notifier,
    directory: options.directory ?? new StaticDirectory(),
    clock,
    logger: silentLogger,
    config: {
      ...TEST_CONFIG,
      sla: { ...TEST_CONFIG.sla, batchSize: options.batchSize ?? TEST_CONFIG.sla.batchSize },
    },
  });

  return { clock, workflowRepository, recordRepository, notifier, services };
}

// ─── Seed: New → In Progress → Resolved ──────────────────────────────

export interface IncidentWorkflow {
  workflow: WorkflowDefinition;
  newState: WorkflowState;
  inProgress: WorkflowState;
  resolved: WorkflowState;
  start: WorkflowTransition;
  resolve: WorkflowTransition;
}

export async function seedIncidentWorkflow(
  services: AppServices,
  overrides: Partial<CreateWorkflowInput> = {},
): Promise<IncidentWorkflow> {
  const { workflows } = services;
  const workflow = await workflows.createWorkflow(
    {
      name: "Incident handling",
      code: "incident_handling",
      recordType: "incident",
      isDefault: true,
      ...overrides,
    },
    actors.admin,
  );

  const newState = await workflows.createState(workflow.id, {
    name: "New",
    code: "new",
    isInitial: true,
    slaHours: 24,
    sortOrder: 0,
  });
  const inProgress = await workflows.createState(workflow.id, {
    name: "In Progress",
    code: "in_progress",
    slaHours: 48,
    sortOrder: 1,
  });
  const resolved = await workflows.createState(workflow.id, {
    name: "Resolved",
    code: "resolved",
    isTerminal: true,
    sortOrder: 2,
  });

  const start = await workflows.createTransition(workflow.id, {
    name: "Start work",
    code: "start",
    fromStateId: newState.id,
    toStateId: inProgress.id,
    allowedRoles: ["agent"],
    actions: [{ kind: "recompute_sla", name: "Reset SLA" }],
    sortOrder: 0,
  });
  const resolve = await workflows.createTransition(workflow.id, {
    name: "Resolve",
    code: "resolve",
    fromStateId: inProgress.id,
    toStateId: resolved.id,
    allowedRoles: ["agent"],
    requirements: [{ kind: "comment" }, { kind: "field_value", field: "resolution_code" }],
    sortOrder: 1,
  });

  return { workflow, newState, inProgress, resolved, start, resolve };
}

// ─── Plain builders ──────────────────────────────────────────────────

export const T0 = new Date("2024-01-01T00:00:00.000Z");

export function makeRecord(overrides: Partial<CaseRecord> = {}): CaseRecord {
  return {
    id: randomUUID(),
    referenceNumber: "INC-000001",
    title: "Printer on fire",
    description: "",
    recordType: "incident",
    workflowId: "wf-1",
    currentStateId: "state-1",
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

export function createdRevision(record: CaseRecord): Revision {
  return {
    id: randomUUID(),
    recordId: record.id,
    revisionNumber: record.version,
    actionType: "created",
    performedBy: "test",
    description: "created",
    payload: {},
    createdAt: record.createdAt,
  };
}

export function makePayload(overrides: Partial<TransitionPayload> = {}): TransitionPayload {
  return { expectedVersion: 1, attachments: [], fields: {}, ...overrides };
}

export function makeState(overrides: Partial<WorkflowState> = {}): WorkflowState {
  return {
    id: "state-2",
    workflowId: "wf-1",
    name: "Triaged",
    code: "triaged",
    description: "",
    isInitial: false,
    isTerminal: false,
    slaHours: 8,
    color: "#6366f1",
    sortOrder: 1,
    isActive: true,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function makeTransition(actions: TransitionActionInput[]): WorkflowTransition {
  return {
    id: "transition-1",
    workflowId: "wf-1",
    name: "Triage",
    code: "triage",
    description: "",
    fromStateId: "state-1",
    toStateId: "state-2",
    allowedRoles: ["agent"],
    requirements: [],
    actions: actions.map((a) => actionSchema.parse(a)),
    sortOrder: 0,
    isActive: true,
    createdAt: T0,
    updatedAt: T0,
  };
}

export async function revisionsOf(records: RecordRepository, recordId: string): Promise<Revision[]> {
  const page = await records.listRevisions({ recordId, order: "asc", page: 1, limit: 100 });
  return page.data;
}

/** Runs a promise that must reject and returns the error it rejected with. */
export async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected the promise to reject");
}
