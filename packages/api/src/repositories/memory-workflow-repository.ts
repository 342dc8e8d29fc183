import type {
  WorkflowDefinition,
  WorkflowGraph,
  WorkflowState,
  WorkflowTransition,
} from "@caseflow/shared";
import { compact } from "../lib/compact.js";
import type {
  StatePatch,
  TransitionPatch,
  WorkflowPatch,
  WorkflowQuery,
  WorkflowRepository,
} from "./types.js";

const bySortOrder = <T extends { sortOrder: number }>(a: T, b: T) => a.sortOrder - b.sortOrder;

/** Process-local store with the same semantics as the Postgres one. */
export class InMemoryWorkflowRepository implements WorkflowRepository {
  private readonly workflows = new Map<string, WorkflowDefinition>();
  private readonly states = new Map<string, WorkflowState>();
  private readonly transitions = new Map<string, WorkflowTransition>();

  // ─── Workflows ──────────────────────────────────────────────────────

  async insertWorkflow(workflow: WorkflowDefinition): Promise<WorkflowDefinition> {
    this.assertUniqueCode(workflow.code, workflow.id);
    this.workflows.set(workflow.id, structuredClone(workflow));
    return structuredClone(workflow);
  }

  async updateWorkflow(id: string, patch: WorkflowPatch): Promise<WorkflowDefinition | null> {
    const current = this.workflows.get(id);
    if (!current) return null;
    if (patch.code !== undefined) this.assertUniqueCode(patch.code, id);
    const next = { ...current, ...structuredClone(compact(patch)) };
    this.workflows.set(id, next);
    return structuredClone(next);
  }

  async findWorkflow(id: string): Promise<WorkflowDefinition | null> {
    const found = this.workflows.get(id);
    return found ? structuredClone(found) : null;
  }

  async findWorkflowByCode(code: string): Promise<WorkflowDefinition | null> {
    for (const workflow of this.workflows.values()) {
      if (workflow.code === code) return structuredClone(workflow);
    }
    return null;
  }

  async listWorkflows(query: WorkflowQuery): Promise<WorkflowDefinition[]> {
    const lifecycle = query.lifecycle ?? "active";
    return [...this.workflows.values()]
      .filter((w) => w.lifecycle === lifecycle)
      .filter((w) => !query.activeOnly || w.isActive)
      .filter(
        (w) =>
          query.recordType === undefined ||
          w.recordType === query.recordType ||
          w.recordType === "all",
      )
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((w) => structuredClone(w));
  }

  async markDefault(id: string): Promise<void> {
    const target = this.workflows.get(id);
    if (!target) return;
    for (const workflow of this.workflows.values()) {
      if (workflow.id !== id && workflow.recordType === target.recordType && workflow.isDefault) {
        workflow.isDefault = false;
      }
    }
    target.isDefault = true;
  }

  async loadGraph(id: string): Promise<WorkflowGraph | null> {
    const workflow = this.workflows.get(id);
    if (!workflow) return null;
    return {
      workflow: structuredClone(workflow),
      states: await this.listStates(id),
      transitions: await this.listTransitions(id),
    };
  }

  async saveGraph(graph: WorkflowGraph): Promise<void> {
    this.assertUniqueCode(graph.workflow.code, graph.workflow.id);
    this.workflows.set(graph.workflow.id, structuredClone(graph.workflow));
    for (const state of graph.states) this.states.set(state.id, structuredClone(state));
    for (const t of graph.transitions) this.transitions.set(t.id, structuredClone(t));
  }

  async purgeWorkflow(id: string): Promise<void> {
    for (const t of this.transitions.values()) {
      if (t.workflowId === id) this.transitions.delete(t.id);
    }
    for (const s of this.states.values()) {
      if (s.workflowId === id) this.states.delete(s.id);
    }
    this.workflows.delete(id);
  }

  // ─── States ─────────────────────────────────────────────────────────

  async insertState(state: WorkflowState): Promise<WorkflowState> {
    if (state.isInitial) this.demoteInitial(state.workflowId, state.id);
    this.states.set(state.id, structuredClone(state));
    return structuredClone(state);
  }

  async updateState(id: string, patch: StatePatch): Promise<WorkflowState | null> {
    const current = this.states.get(id);
    if (!current) return null;
    if (patch.isInitial === true) this.demoteInitial(current.workflowId, id);
    const next = { ...current, ...structuredClone(compact(patch)) };
    this.states.set(id, next);
    return structuredClone(next);
  }

  async deleteState(id: string): Promise<void> {
    this.states.delete(id);
  }

  async findState(id: string): Promise<WorkflowState | null> {
    const found = this.states.get(id);
    return found ? structuredClone(found) : null;
  }

  async listStates(workflowId: string): Promise<WorkflowState[]> {
    return [...this.states.values()]
      .filter((s) => s.workflowId === workflowId)
      .sort(bySortOrder)
      .map((s) => structuredClone(s));
  }

  async listTerminalStateIds(): Promise<string[]> {
    return [...this.states.values()].filter((s) => s.isTerminal).map((s) => s.id);
  }

  // ─── Transitions ────────────────────────────────────────────────────

  async insertTransition(transition: WorkflowTransition): Promise<WorkflowTransition> {
    this.transitions.set(transition.id, structuredClone(transition));
    return structuredClone(transition);
  }

  async updateTransition(id: string, patch: TransitionPatch): Promise<WorkflowTransition | null> {
    const current = this.transitions.get(id);
    if (!current) return null;
    const next = { ...current, ...structuredClone(compact(patch)) };
    this.transitions.set(id, next);
    return structuredClone(next);
  }

  async deleteTransition(id: string): Promise<void> {
    this.transitions.delete(id);
  }

  async findTransition(id: string): Promise<WorkflowTransition | null> {
    const found = this.transitions.get(id);
    return found ? structuredClone(found) : null;
  }

  async listTransitions(workflowId: string): Promise<WorkflowTransition[]> {
    return [...this.transitions.values()]
      .filter((t) => t.workflowId === workflowId)
      .sort(bySortOrder)
      .map((t) => structuredClone(t));
  }

  async listTransitionsTouching(stateId: string): Promise<WorkflowTransition[]> {
    return [...this.transitions.values()]
      .filter((t) => t.fromStateId === stateId || t.toStateId === stateId)
      .sort(bySortOrder)
      .map((t) => structuredClone(t));
  }

  // ─── Internal helpers ───────────────────────────────────────────────

  private demoteInitial(workflowId: string, exceptId: string): void {
    for (const state of this.states.values()) {
      if (state.workflowId === workflowId && state.id !== exceptId && state.isInitial) {
        state.isInitial = false;
      }
    }
  }

  private assertUniqueCode(code: string, ownerId: string): void {
    for (const workflow of this.workflows.values()) {
      if (workflow.code === code && workflow.id !== ownerId) {
        throw new Error(`duplicate key value violates unique constraint "uq_workflows_code"`);
      }
    }
  }
}
