import { and, asc, eq, inArray, ne, or, type SQL } from "drizzle-orm";
import type {
  WorkflowDefinition,
  WorkflowGraph,
  WorkflowState,
  WorkflowTransition,
} from "@caseflow/shared";
import type { Database } from "../db/index.js";
import { states, transitions, workflowClassifications, workflows } from "../db/schema.js";
import { compact } from "../lib/compact.js";
import type {
  StatePatch,
  TransitionPatch,
  WorkflowPatch,
  WorkflowQuery,
  WorkflowRepository,
} from "./types.js";

type WorkflowRow = typeof workflows.$inferSelect;

function toWorkflow(row: WorkflowRow, classificationIds: string[]): WorkflowDefinition {
  return { ...row, classificationIds };
}

function classificationRows(workflowId: string, classificationIds: readonly string[]) {
  return [...new Set(classificationIds)].map((classificationId) => ({ workflowId, classificationId }));
}

export class DrizzleWorkflowRepository implements WorkflowRepository {
  constructor(private readonly db: Database) {}

  // ─── Workflows ──────────────────────────────────────────────────────

  async insertWorkflow(workflow: WorkflowDefinition): Promise<WorkflowDefinition> {
    const { classificationIds, ...row } = workflow;
    await this.db.transaction(async (tx) => {
      await tx.insert(workflows).values(row);
      if (classificationIds.length > 0) {
        await tx.insert(workflowClassifications).values(classificationRows(workflow.id, classificationIds));
      }
    });
    return workflow;
  }

  async updateWorkflow(id: string, patch: WorkflowPatch): Promise<WorkflowDefinition | null> {
    const { classificationIds, ...columns } = patch;
    const set = compact(columns);

    await this.db.transaction(async (tx) => {
      if (Object.keys(set).length > 0) {
        await tx.update(workflows).set(set).where(eq(workflows.id, id));
      }
      if (classificationIds !== undefined) {
        await tx.delete(workflowClassifications).where(eq(workflowClassifications.workflowId, id));
        if (classificationIds.length > 0) {
          await tx.insert(workflowClassifications).values(classificationRows(id, classificationIds));
        }
      }
    });

    return this.findWorkflow(id);
  }

  async findWorkflow(id: string): Promise<WorkflowDefinition | null> {
    const [row] = await this.db.select().from(workflows).where(eq(workflows.id, id));
    if (!row) return null;
    const [withClasses] = await this.attachClassifications([row]);
    return withClasses ?? null;
  }

  async findWorkflowByCode(code: string): Promise<WorkflowDefinition | null> {
    const [row] = await this.db.select().from(workflows).where(eq(workflows.code, code));
    if (!row) return null;
    const [withClasses] = await this.attachClassifications([row]);
    return withClasses ?? null;
  }

  async listWorkflows(query: WorkflowQuery): Promise<WorkflowDefinition[]> {
    const conditions: SQL[] = [eq(workflows.lifecycle, query.lifecycle ?? "active")];
    if (query.activeOnly) conditions.push(eq(workflows.isActive, true));
    if (query.recordType !== undefined) {
      const typeCondition = or(eq(workflows.recordType, query.recordType), eq(workflows.recordType, "all"));
      if (typeCondition) conditions.push(typeCondition);
    }

    const rows = await this.db
      .select()
      .from(workflows)
      .where(and(...conditions))
      .orderBy(asc(workflows.name));
    return this.attachClassifications(rows);
  }

  async markDefault(id: string): Promise<void> {
    await this.db.transaction(async (tx) => {
      const [target] = await tx
        .select({ recordType: workflows.recordType })
        .from(workflows)
        .where(eq(workflows.id, id));
      if (!target) return;
      await tx
        .update(workflows)
        .set({ isDefault: false })
        .where(and(eq(workflows.recordType, target.recordType), ne(workflows.id, id)));
      await tx.update(workflows).set({ isDefault: true }).where(eq(workflows.id, id));
    });
  }

  async loadGraph(id: string): Promise<WorkflowGraph | null> {
    const row = await this.db.query.workflows.findFirst({
      where: eq(workflows.id, id),
      with: {
        classifications: true,
        states: { orderBy: [asc(states.sortOrder)] },
        transitions: { orderBy: [asc(transitions.sortOrder)] },
      },
    });
    if (!row) return null;

    const { classifications, states: stateRows, transitions: transitionRows, ...workflow } = row;
    return {
      workflow: toWorkflow(workflow, classifications.map((c) => c.classificationId)),
      states: stateRows,
      transitions: transitionRows,
    };
  }

  async saveGraph(graph: WorkflowGraph): Promise<void> {
    const { classificationIds, ...row } = graph.workflow;
    await this.db.transaction(async (tx) => {
      await tx.insert(workflows).values(row);
      if (classificationIds.length > 0) {
        await tx.insert(workflowClassifications).values(classificationRows(row.id, classificationIds));
      }
      if (graph.states.length > 0) await tx.insert(states).values(graph.states);
      if (graph.transitions.length > 0) await tx.insert(transitions).values(graph.transitions);
    });
  }

  async purgeWorkflow(id: string): Promise<void> {
    // states, transitions and classifications cascade
    await this.db.delete(workflows).where(eq(workflows.id, id));
  }

  // ─── States ─────────────────────────────────────────────────────────

  async insertState(state: WorkflowState): Promise<WorkflowState> {
    return this.db.transaction(async (tx) => {
      if (state.isInitial) {
        await tx
          .update(states)
          .set({ isInitial: false })
          .where(and(eq(states.workflowId, state.workflowId), eq(states.isInitial, true)));
      }
      const [created] = await tx.insert(states).values(state).returning();
      return created ?? state;
    });
  }

  async updateState(id: string, patch: StatePatch): Promise<WorkflowState | null> {
    const set = compact(patch);
    return this.db.transaction(async (tx) => {
      const [current] = await tx.select().from(states).where(eq(states.id, id));
      if (!current) return null;
      if (Object.keys(set).length === 0) return current;

      if (set.isInitial === true) {
        await tx
          .update(states)
          .set({ isInitial: false })
          .where(
            and(eq(states.workflowId, current.workflowId), eq(states.isInitial, true), ne(states.id, id)),
          );
      }
      const [updated] = await tx.update(states).set(set).where(eq(states.id, id)).returning();
      return updated ?? null;
    });
  }

  async deleteState(id: string): Promise<void> {
    await this.db.delete(states).where(eq(states.id, id));
  }

  async findState(id: string): Promise<WorkflowState | null> {
    const [row] = await this.db.select().from(states).where(eq(states.id, id));
    return row ?? null;
  }

  async listStates(workflowId: string): Promise<WorkflowState[]> {
    return this.db
      .select()
      .from(states)
      .where(eq(states.workflowId, workflowId))
      .orderBy(asc(states.sortOrder));
  }

  async listTerminalStateIds(): Promise<string[]> {
    const rows = await this.db.select({ id: states.id }).from(states).where(eq(states.isTerminal, true));
    return rows.map((r) => r.id);
  }

  // ─── Transitions ────────────────────────────────────────────────────

  async insertTransition(transition: WorkflowTransition): Promise<WorkflowTransition> {
    const [created] = await this.db.insert(transitions).values(transition).returning();
    return created ?? transition;
  }

  async updateTransition(id: string, patch: TransitionPatch): Promise<WorkflowTransition | null> {
    const set = compact(patch);
    if (Object.keys(set).length === 0) return this.findTransition(id);
    const [updated] = await this.db.update(transitions).set(set).where(eq(transitions.id, id)).returning();
    return updated ?? null;
  }

  async deleteTransition(id: string): Promise<void> {
    await this.db.delete(transitions).where(eq(transitions.id, id));
  }

  async findTransition(id: string): Promise<WorkflowTransition | null> {
    const [row] = await this.db.select().from(transitions).where(eq(transitions.id, id));
    return row ?? null;
  }

  async listTransitions(workflowId: string): Promise<WorkflowTransition[]> {
    return this.db
      .select()
      .from(transitions)
      .where(eq(transitions.workflowId, workflowId))
      .orderBy(asc(transitions.sortOrder));
  }

  async listTransitionsTouching(stateId: string): Promise<WorkflowTransition[]> {
    return this.db
      .select()
      .from(transitions)
      .where(or(eq(transitions.fromStateId, stateId), eq(transitions.toStateId, stateId)))
      .orderBy(asc(transitions.sortOrder));
  }

  // ─── Internal helpers ───────────────────────────────────────────────

  private async attachClassifications(rows: WorkflowRow[]): Promise<WorkflowDefinition[]> {
    if (rows.length === 0) return [];
    const links = await this.db
      .select()
      .from(workflowClassifications)
      .where(inArray(workflowClassifications.workflowId, rows.map((r) => r.id)));

    const byWorkflow = new Map<string, string[]>();
    for (const link of links) {
      const list = byWorkflow.get(link.workflowId) ?? [];
      list.push(link.classificationId);
      byWorkflow.set(link.workflowId, list);
    }
    return rows.map((row) => toWorkflow(row, byWorkflow.get(row.id) ?? []));
  }
}
