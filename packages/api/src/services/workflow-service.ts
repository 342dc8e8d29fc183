import { randomUUID } from "node:crypto";
import {
  WorkflowEngine,
  WorkflowError,
  assertLifecycleMove,
  checkExportTopology,
  exportWorkflowGraph,
  notFound,
  workflowExportSchema,
  workflowMatcher,
  type ActorContext,
  type Clock,
  type MatchCandidate,
  type RecordType,
  type TopologyWarning,
  type WorkflowDefinition,
  type WorkflowDimension,
  type WorkflowExportInput,
  type WorkflowGraph,
  type WorkflowRecordType,
  type WorkflowState,
  type WorkflowTransition,
} from "@caseflow/shared";
import type { Logger } from "../lib/logger.js";
import { parseInput } from "../lib/validation.js";
import type { RecordRepository, WorkflowRepository } from "../repositories/types.js";
import {
  assignClassificationsSchema,
  createStateSchema,
  createTransitionSchema,
  createWorkflowSchema,
  matchWorkflowSchema,
  updateStateSchema,
  updateTransitionSchema,
  updateWorkflowSchema,
  type CreateStateInput,
  type CreateTransitionInput,
  type CreateWorkflowInput,
  type MatchWorkflowInput,
  type UpdateStateInput,
  type UpdateTransitionInput,
  type UpdateWorkflowInput,
} from "../schemas/workflow.schema.js";

// ─── Types ───────────────────────────────────────────────────────────

export interface WorkflowServiceDeps {
  workflows: WorkflowRepository;
  records: RecordRepository;
  clock: Clock;
  logger: Logger;
}

export interface WorkflowMatch {
  matches: WorkflowDefinition[];
  single: boolean;
  matchedId: string | null;
  /** True when nothing matched and the record type's default workflow was used. */
  fallback: boolean;
  initialState: WorkflowState | null;
  requiredFields: string[];
}

/** What decides which workflow a record belongs to. */
export interface SeatCriteria {
  /** Skips matching when given. */
  workflowId?: string;
  recordType: RecordType;
  classificationId: string | null;
  locationId: string | null;
  departmentId: string | null;
  channel: string | null;
}

export interface WorkflowSeat {
  graph: WorkflowGraph;
  initial: WorkflowState;
}

export interface ImportResult {
  graph: WorkflowGraph;
  warnings: string[];
}

interface WorkflowCandidate extends MatchCandidate<WorkflowDimension> {
  workflow: WorkflowDefinition;
}

const unique = (values: readonly string[]) => [...new Set(values)];
const shortId = () => randomUUID().slice(0, 8);

function toCandidate(workflow: WorkflowDefinition): WorkflowCandidate {
  return {
    id: workflow.id,
    workflow,
    constraints: {
      classification: workflow.classificationIds,
      location: workflow.matchConstraints.locationIds,
      department: workflow.matchConstraints.departmentIds,
      channel: workflow.matchConstraints.channels,
      recordType: workflow.recordType === "all" ? undefined : [workflow.recordType],
    },
  };
}

// ─── Workflow Service ────────────────────────────────────────────────

/** Stores workflow definitions and keeps their topology consistent. */
export class WorkflowService {
  private readonly workflows: WorkflowRepository;
  private readonly records: RecordRepository;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(deps: WorkflowServiceDeps) {
    this.workflows = deps.workflows;
    this.records = deps.records;
    this.clock = deps.clock;
    this.logger = deps.logger.child({ component: "workflow-service" });
  }

  // ─── Workflows ──────────────────────────────────────────────────────

  async createWorkflow(input: CreateWorkflowInput, actor: ActorContext): Promise<WorkflowDefinition> {
    const data = parseInput(createWorkflowSchema, input, "workflow");
    await this.assertCodeAvailable(data.code);

    const now = this.clock.now();
    const workflow: WorkflowDefinition = {
      id: randomUUID(),
      ...data,
      isDefault: false,
      classificationIds: unique(data.classificationIds),
      lifecycle: "active",
      deletedAt: null,
      createdBy: actor.actorId,
      createdAt: now,
      updatedAt: now,
    };
    await this.workflows.insertWorkflow(workflow);
    if (data.isDefault) await this.workflows.markDefault(workflow.id);

    this.logger.info({ workflowId: workflow.id, code: workflow.code }, "workflow created");
    return this.requireWorkflow(workflow.id);
  }

  async getWorkflow(id: string): Promise<WorkflowGraph> {
    const graph = await this.workflows.loadGraph(id);
    if (!graph) throw notFound("Workflow", id);
    return graph;
  }

  async listWorkflows(
    query: { recordType?: WorkflowRecordType; activeOnly?: boolean } = {},
  ): Promise<WorkflowDefinition[]> {
    return this.workflows.listWorkflows({ ...query, lifecycle: "active" });
  }

  async listDeletedWorkflows(): Promise<WorkflowDefinition[]> {
    return this.workflows.listWorkflows({ lifecycle: "soft_deleted" });
  }

  async updateWorkflow(id: string, input: UpdateWorkflowInput): Promise<WorkflowDefinition> {
    const data = parseInput(updateWorkflowSchema, input, "workflow");
    const current = await this.requireEditableWorkflow(id);
    if (data.code !== undefined && data.code !== current.code) await this.assertCodeAvailable(data.code);

    const { isDefault, classificationIds, ...columns } = data;
    await this.workflows.updateWorkflow(id, {
      ...columns,
      ...(classificationIds !== undefined ? { classificationIds: unique(classificationIds) } : {}),
      ...(isDefault === false ? { isDefault: false } : {}),
      updatedAt: this.clock.now(),
    });

    const typeChanged = columns.recordType !== undefined && columns.recordType !== current.recordType;
    if (isDefault === true || (isDefault === undefined && current.isDefault && typeChanged)) {
      await this.workflows.markDefault(id);
    }
    return this.requireWorkflow(id);
  }

  async assignClassifications(id: string, input: { classificationIds: string[] }): Promise<WorkflowDefinition> {
    const { classificationIds } = parseInput(assignClassificationsSchema, input, "classifications");
    await this.requireEditableWorkflow(id);
    await this.workflows.updateWorkflow(id, {
      classificationIds: unique(classificationIds),
      updatedAt: this.clock.now(),
    });
    return this.requireWorkflow(id);
  }

  async softDeleteWorkflow(id: string, actor: ActorContext): Promise<WorkflowDefinition> {
    const current = await this.requireWorkflow(id);
    assertLifecycleMove(id, current.lifecycle, "soft_deleted");

    const now = this.clock.now();
    await this.workflows.updateWorkflow(id, {
      lifecycle: "soft_deleted",
      deletedAt: now,
      isDefault: false,
      updatedAt: now,
    });
    this.logger.info({ workflowId: id, actorId: actor.actorId }, "workflow soft-deleted");
    return this.requireWorkflow(id);
  }

  async restoreWorkflow(id: string, actor: ActorContext): Promise<WorkflowDefinition> {
    const current = await this.requireWorkflow(id);
    assertLifecycleMove(id, current.lifecycle, "active");

    await this.workflows.updateWorkflow(id, {
      lifecycle: "active",
      deletedAt: null,
      updatedAt: this.clock.now(),
    });
    this.logger.info({ workflowId: id, actorId: actor.actorId }, "workflow restored");
    return this.requireWorkflow(id);
  }

  async permanentlyDeleteWorkflow(id: string, actor: ActorContext): Promise<void> {
    const current = await this.requireWorkflow(id);
    assertLifecycleMove(id, current.lifecycle, "purged");

    const dependents = await this.records.countByWorkflow(id);
    if (dependents > 0) {
      throw new WorkflowError(
        `Workflow "${current.code}" is used by ${dependents} record(s)`,
        "HAS_DEPENDENT_RECORDS",
        { workflowId: id, records: dependents },
      );
    }

    await this.workflows.purgeWorkflow(id);
    this.logger.info({ workflowId: id, actorId: actor.actorId }, "workflow purged");
  }

  // ─── States ─────────────────────────────────────────────────────────

  async createState(workflowId: string, input: CreateStateInput): Promise<WorkflowState> {
    const data = parseInput(createStateSchema, input, "state");
    await this.requireEditableWorkflow(workflowId);
    this.assertNotInitialAndTerminal(data);

    const siblings = await this.workflows.listStates(workflowId);
    this.assertUniqueWithin(siblings, data.code, "State");

    const now = this.clock.now();
    return this.workflows.insertState({
      id: randomUUID(),
      workflowId,
      ...data,
      createdAt: now,
      updatedAt: now,
    });
  }

  async updateState(stateId: string, input: UpdateStateInput): Promise<WorkflowState> {
    const data = parseInput(updateStateSchema, input, "state");
    const current = await this.requireState(stateId);
    await this.requireEditableWorkflow(current.workflowId);

    this.assertNotInitialAndTerminal({
      isInitial: data.isInitial ?? current.isInitial,
      isTerminal: data.isTerminal ?? current.isTerminal,
    });

    if (data.code !== undefined && data.code !== current.code) {
      const siblings = await this.workflows.listStates(current.workflowId);
      this.assertUniqueWithin(siblings, data.code, "State");
    }

    if (data.isTerminal === true && !current.isTerminal) {
      const outgoing = (await this.workflows.listTransitionsTouching(stateId)).filter(
        (t) => t.fromStateId === stateId,
      );
      if (outgoing.length > 0) {
        throw new WorkflowError(
          `State "${current.name}" has outgoing transitions and cannot become terminal`,
          "INVALID_TOPOLOGY",
          { stateId, transitionIds: outgoing.map((t) => t.id) },
        );
      }
    }

    const updated = await this.workflows.updateState(stateId, { ...data, updatedAt: this.clock.now() });
    if (!updated) throw notFound("State", stateId);
    return updated;
  }

  async deleteState(stateId: string): Promise<void> {
    const current = await this.requireState(stateId);
    await this.requireEditableWorkflow(current.workflowId);

    const touching = await this.workflows.listTransitionsTouching(stateId);
    if (touching.length > 0) {
      throw new WorkflowError(
        `State "${current.name}" is referenced by ${touching.length} transition(s)`,
        "INVALID_TOPOLOGY",
        { stateId, transitionIds: touching.map((t) => t.id) },
      );
    }

    const occupants = await this.records.countInState(stateId);
    if (occupants > 0) {
      throw new WorkflowError(
        `State "${current.name}" holds ${occupants} record(s)`,
        "HAS_DEPENDENT_RECORDS",
        { stateId, records: occupants },
      );
    }

    await this.workflows.deleteState(stateId);
  }

  // ─── Transitions ────────────────────────────────────────────────────

  async createTransition(workflowId: string, input: CreateTransitionInput): Promise<WorkflowTransition> {
    const data = parseInput(createTransitionSchema, input, "transition");
    await this.requireEditableWorkflow(workflowId);
    await this.assertEndpoints(workflowId, data.fromStateId, data.toStateId);

    const siblings = await this.workflows.listTransitions(workflowId);
    this.assertUniqueWithin(siblings, data.code, "Transition");

    const now = this.clock.now();
    return this.workflows.insertTransition({
      id: randomUUID(),
      workflowId,
      ...data,
      allowedRoles: unique(data.allowedRoles),
      createdAt: now,
      updatedAt: now,
    });
  }

  async updateTransition(transitionId: string, input: UpdateTransitionInput): Promise<WorkflowTransition> {
    const data = parseInput(updateTransitionSchema, input, "transition");
    const current = await this.requireTransition(transitionId);
    await this.requireEditableWorkflow(current.workflowId);

    const fromStateId = data.fromStateId ?? current.fromStateId;
    const toStateId = data.toStateId ?? current.toStateId;
    if (fromStateId !== current.fromStateId || toStateId !== current.toStateId) {
      await this.assertEndpoints(current.workflowId, fromStateId, toStateId);
    }

    if (data.code !== undefined && data.code !== current.code) {
      const siblings = await this.workflows.listTransitions(current.workflowId);
      this.assertUniqueWithin(siblings, data.code, "Transition");
    }

    const updated = await this.workflows.updateTransition(transitionId, {
      ...data,
      ...(data.allowedRoles !== undefined ? { allowedRoles: unique(data.allowedRoles) } : {}),
      updatedAt: this.clock.now(),
    });
    if (!updated) throw notFound("Transition", transitionId);
    return updated;
  }

  async deleteTransition(transitionId: string): Promise<void> {
    const current = await this.requireTransition(transitionId);
    await this.requireEditableWorkflow(current.workflowId);
    await this.workflows.deleteTransition(transitionId);
  }

  // ─── Queries ────────────────────────────────────────────────────────

  async initialStateOf(workflowId: string): Promise<WorkflowState> {
    return new WorkflowEngine(await this.getWorkflow(workflowId)).initialState();
  }

  async transitionsFrom(stateId: string): Promise<WorkflowTransition[]> {
    const state = await this.requireState(stateId);
    return new WorkflowEngine(await this.getWorkflow(state.workflowId)).transitionsFrom(stateId);
  }

  async transitionsOf(workflowId: string): Promise<WorkflowTransition[]> {
    await this.requireWorkflow(workflowId);
    return this.workflows.listTransitions(workflowId);
  }

  async validateWorkflow(workflowId: string): Promise<TopologyWarning[]> {
    return new WorkflowEngine(await this.getWorkflow(workflowId)).validateTopology();
  }

  // ─── Copy, export, import ───────────────────────────────────────────

  async duplicateWorkflow(id: string, actor: ActorContext): Promise<WorkflowGraph> {
    const source = await this.getWorkflow(id);
    const now = this.clock.now();
    const workflowId = randomUUID();

    const stateIds = new Map(source.states.map((s) => [s.id, randomUUID()]));
    const remap = (stateId: string): string => {
      const mapped = stateIds.get(stateId);
      if (mapped === undefined) {
        throw new WorkflowError(`State ${stateId} is not part of the workflow`, "INVALID_TOPOLOGY", { stateId });
      }
      return mapped;
    };

    const copy: WorkflowGraph = {
      workflow: {
        ...source.workflow,
        id: workflowId,
        name: `${source.workflow.name} (Copy)`.slice(0, 100),
        code: `${source.workflow.code.slice(0, 36)}_copy_${shortId()}`,
        isActive: false,
        isDefault: false,
        lifecycle: "active",
        deletedAt: null,
        classificationIds: [...source.workflow.classificationIds],
        createdBy: actor.actorId,
        createdAt: now,
        updatedAt: now,
      },
      states: source.states.map((s) => ({
        ...s,
        id: remap(s.id),
        workflowId,
        createdAt: now,
        updatedAt: now,
      })),
      transitions: source.transitions.map((t) => ({
        ...t,
        id: randomUUID(),
        workflowId,
        fromStateId: remap(t.fromStateId),
        toStateId: remap(t.toStateId),
        requirements: t.requirements.map((r) => ({ ...r, id: randomUUID() })),
        actions: t.actions.map((a) => ({ ...a, id: randomUUID() })),
        createdAt: now,
        updatedAt: now,
      })),
    };

    await this.workflows.saveGraph(copy);
    this.logger.info({ sourceId: id, workflowId }, "workflow duplicated");
    return copy;
  }

  async exportWorkflow(id: string): Promise<WorkflowExportInput> {
    return exportWorkflowGraph(await this.getWorkflow(id), this.clock.now());
  }

  /**
   * Recreates an exported workflow with fresh identifiers. The import is
   * inactive and not the default until an administrator says otherwise.
   */
  async importWorkflow(document: unknown, actor: ActorContext): Promise<ImportResult> {
    const doc = parseInput(workflowExportSchema, document, "workflow document");
    const problems = checkExportTopology(doc);
    if (problems.length > 0) {
      throw new WorkflowError("Workflow document is inconsistent", "VALIDATION_FAILED", { problems });
    }

    const warnings: string[] = [];
    let code = doc.workflow.code;
    if (await this.workflows.findWorkflowByCode(code)) {
      code = `${code.slice(0, 32)}_imported_${shortId()}`;
      warnings.push(`Code "${doc.workflow.code}" is already in use; imported as "${code}"`);
    }
    if (doc.workflow.isDefault) {
      warnings.push("Imported workflow is not the default for its record type");
    }

    const now = this.clock.now();
    const workflowId = randomUUID();
    const stateIds = new Map(doc.states.map((s) => [s.code, randomUUID()]));
    const idOf = (stateCode: string): string => {
      const id = stateIds.get(stateCode);
      if (id === undefined) {
        throw new WorkflowError(`Unknown state code "${stateCode}"`, "VALIDATION_FAILED", { stateCode });
      }
      return id;
    };

    const graph: WorkflowGraph = {
      workflow: {
        id: workflowId,
        ...doc.workflow,
        code,
        isActive: false,
        isDefault: false,
        lifecycle: "active",
        deletedAt: null,
        classificationIds: unique(doc.workflow.classificationIds),
        createdBy: actor.actorId,
        createdAt: now,
        updatedAt: now,
      },
      states: doc.states.map((s) => ({
        ...s,
        id: idOf(s.code),
        workflowId,
        createdAt: now,
        updatedAt: now,
      })),
      transitions: doc.transitions.map(({ from, to, ...t }) => ({
        ...t,
        id: randomUUID(),
        workflowId,
        fromStateId: idOf(from),
        toStateId: idOf(to),
        allowedRoles: unique(t.allowedRoles),
        requirements: t.requirements.map((r) => ({ ...r, id: randomUUID() })),
        actions: t.actions.map((a) => ({ ...a, id: randomUUID() })),
        createdAt: now,
        updatedAt: now,
      })),
    };

    warnings.push(...new WorkflowEngine(graph).validateTopology().map((w) => w.message));
    await this.workflows.saveGraph(graph);

    this.logger.info({ workflowId, code, warnings: warnings.length }, "workflow imported");
    return { graph, warnings };
  }

  // ─── Matching ───────────────────────────────────────────────────────

  async matchWorkflow(input: MatchWorkflowInput): Promise<WorkflowMatch> {
    const criteria = parseInput(matchWorkflowSchema, input, "match criteria");
    const candidates = await this.workflows.listWorkflows({
      recordType: criteria.recordType,
      activeOnly: true,
      lifecycle: "active",
    });

    const result = workflowMatcher.match(candidates.map(toCandidate), {
      classification: criteria.classificationId ?? null,
      location: criteria.locationId ?? null,
      department: criteria.departmentId ?? null,
      channel: criteria.channel ?? null,
      recordType: criteria.recordType,
    });

    let matches = result.matches.map((c) => c.workflow);
    let fallback = false;
    if (matches.length === 0) {
      const byDefault =
        candidates.find((w) => w.isDefault && w.recordType === criteria.recordType) ??
        candidates.find((w) => w.isDefault && w.recordType === "all");
      if (byDefault) {
        matches = [byDefault];
        fallback = true;
      }
    }

    const matched = matches.length === 1 ? matches[0] : undefined;
    let initialState: WorkflowState | null = null;
    if (matched) {
      const graph = await this.workflows.loadGraph(matched.id);
      initialState = graph?.states.find((s) => s.isInitial) ?? null;
    }

    return {
      matches,
      single: matched !== undefined,
      matchedId: matched?.id ?? null,
      fallback,
      initialState,
      requiredFields: matched?.requiredFields ?? [],
    };
  }

  /**
   * Picks the workflow a record of the given type enters, and its initial
   * state. The workflow must be active and built for that record type.
   */
  async seatFor(criteria: SeatCriteria): Promise<WorkflowSeat> {
    const graph = await this.workflowFor(criteria);
    const { workflow } = graph;

    if (workflow.lifecycle !== "active" || !workflow.isActive) {
      throw new WorkflowError(`Workflow "${workflow.code}" is not accepting records`, "INVALID_TOPOLOGY", {
        workflowId: workflow.id,
      });
    }
    if (workflow.recordType !== "all" && workflow.recordType !== criteria.recordType) {
      throw new WorkflowError(
        `Workflow "${workflow.code}" handles ${workflow.recordType} records, not ${criteria.recordType}`,
        "VALIDATION_FAILED",
        { workflowId: workflow.id },
      );
    }
    return { graph, initial: new WorkflowEngine(graph).initialState() };
  }

  // ─── Internal helpers ───────────────────────────────────────────────

  private async workflowFor(criteria: SeatCriteria): Promise<WorkflowGraph> {
    if (criteria.workflowId !== undefined) {
      const graph = await this.workflows.loadGraph(criteria.workflowId);
      if (!graph) throw notFound("Workflow", criteria.workflowId);
      return graph;
    }

    const match = await this.matchWorkflow({
      recordType: criteria.recordType,
      classificationId: criteria.classificationId ?? undefined,
      locationId: criteria.locationId ?? undefined,
      departmentId: criteria.departmentId ?? undefined,
      channel: criteria.channel ?? undefined,
    });
    if (match.matchedId === null) {
      throw new WorkflowError(
        match.matches.length === 0
          ? `No workflow handles ${criteria.recordType} records with these attributes`
          : `${match.matches.length} workflows match equally; choose one`,
        "VALIDATION_FAILED",
        { candidateIds: match.matches.map((w) => w.id) },
      );
    }
    return this.getWorkflow(match.matchedId);
  }

  private async requireWorkflow(id: string): Promise<WorkflowDefinition> {
    const workflow = await this.workflows.findWorkflow(id);
    if (!workflow) throw notFound("Workflow", id);
    return workflow;
  }

  private async requireEditableWorkflow(id: string): Promise<WorkflowDefinition> {
    const workflow = await this.requireWorkflow(id);
    if (workflow.lifecycle !== "active") {
      throw new WorkflowError(
        `Workflow "${workflow.code}" is deleted; restore it before editing`,
        "INVALID_TOPOLOGY",
        { workflowId: id, lifecycle: workflow.lifecycle },
      );
    }
    return workflow;
  }

  private async requireState(id: string): Promise<WorkflowState> {
    const state = await this.workflows.findState(id);
    if (!state) throw notFound("State", id);
    return state;
  }

  private async requireTransition(id: string): Promise<WorkflowTransition> {
    const transition = await this.workflows.findTransition(id);
    if (!transition) throw notFound("Transition", id);
    return transition;
  }

  private async assertCodeAvailable(code: string): Promise<void> {
    if (await this.workflows.findWorkflowByCode(code)) {
      throw new WorkflowError(`Workflow code "${code}" is already in use`, "VALIDATION_FAILED", { code });
    }
  }

  private assertUniqueWithin(siblings: readonly { code: string }[], code: string, entity: string): void {
    if (siblings.some((s) => s.code === code)) {
      throw new WorkflowError(`${entity} code "${code}" is already used in this workflow`, "VALIDATION_FAILED", {
        code,
      });
    }
  }

  private assertNotInitialAndTerminal(flags: { isInitial: boolean; isTerminal: boolean }): void {
    if (flags.isInitial && flags.isTerminal) {
      throw new WorkflowError("A state cannot be both initial and terminal", "VALIDATION_FAILED");
    }
  }

  private async assertEndpoints(workflowId: string, fromStateId: string, toStateId: string): Promise<void> {
    const [from, to] = await Promise.all([
      this.workflows.findState(fromStateId),
      this.workflows.findState(toStateId),
    ]);
    if (!from) throw notFound("State", fromStateId);
    if (!to) throw notFound("State", toStateId);

    if (from.workflowId !== workflowId || to.workflowId !== workflowId) {
      throw new WorkflowError("Both endpoints must belong to the transition's workflow", "INVALID_TOPOLOGY", {
        workflowId,
        fromStateId,
        toStateId,
      });
    }
    if (from.isTerminal) {
      throw new WorkflowError(`Terminal state "${from.name}" cannot have outgoing transitions`, "INVALID_TOPOLOGY", {
        fromStateId,
      });
    }
  }
}
