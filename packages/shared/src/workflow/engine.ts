import type { CaseRecord } from "../records/types.js";
import { validateRequirements, type TransitionPayload } from "./requirements.js";
import type {
  ActorContext,
  WorkflowGraph,
  WorkflowState,
  WorkflowTransition,
} from "./types.js";
import { WorkflowError } from "./types.js";

export interface EngineOptions {
  /** Holders of this role pass every role guard. */
  superAdminRole?: string;
}

export interface ResolvedTransition {
  transition: WorkflowTransition;
  from: WorkflowState;
  to: WorkflowState;
}

export type TopologyWarningCode =
  | "NO_STATES"
  | "NO_INITIAL_STATE"
  | "UNREACHABLE_STATE"
  | "DEAD_END_STATE";

export interface TopologyWarning {
  code: TopologyWarningCode;
  message: string;
  stateId?: string;
}

const bySortOrder = <T extends { sortOrder: number }>(a: T, b: T) => a.sortOrder - b.sortOrder;

// ─── Workflow Engine ─────────────────────────────────────────────────

/**
 * Read-only view over one workflow graph. Answers topology questions and
 * decides whether a transition may fire; it never mutates anything.
 */
export class WorkflowEngine {
  private readonly stateMap: Map<string, WorkflowState>;
  private readonly transitionMap: Map<string, WorkflowTransition>;
  private readonly outgoing: Map<string, WorkflowTransition[]>;

  constructor(
    public readonly graph: WorkflowGraph,
    private readonly options: EngineOptions = {},
  ) {
    this.stateMap = new Map(graph.states.map((s) => [s.id, s]));
    this.transitionMap = new Map(graph.transitions.map((t) => [t.id, t]));
    this.outgoing = new Map();

    for (const t of [...graph.transitions].sort(bySortOrder)) {
      const list = this.outgoing.get(t.fromStateId) ?? [];
      list.push(t);
      this.outgoing.set(t.fromStateId, list);
    }
  }

  get workflowId(): string {
    return this.graph.workflow.id;
  }

  // ─── Query methods ──────────────────────────────────────────────────

  getState(stateId: string): WorkflowState | undefined {
    return this.stateMap.get(stateId);
  }

  initialState(): WorkflowState {
    if (this.graph.states.length === 0) {
      throw new WorkflowError(
        `Workflow "${this.graph.workflow.code}" has no states`,
        "INVALID_TOPOLOGY",
        { workflowId: this.workflowId },
      );
    }
    const initial = this.graph.states.find((s) => s.isInitial);
    if (!initial) {
      throw new WorkflowError(
        `Workflow "${this.graph.workflow.code}" has no initial state`,
        "INVALID_TOPOLOGY",
        { workflowId: this.workflowId },
      );
    }
    return initial;
  }

  isTerminal(stateId: string): boolean {
    return this.stateMap.get(stateId)?.isTerminal ?? false;
  }

  /** Every transition leaving the state, active or not, by sort order. */
  transitionsFrom(stateId: string): WorkflowTransition[] {
    return [...(this.outgoing.get(stateId) ?? [])];
  }

  /** An empty role set leaves the transition open to every actor. */
  authorize(transition: WorkflowTransition, actor: ActorContext): boolean {
    const { superAdminRole } = this.options;
    if (superAdminRole !== undefined && actor.roles.includes(superAdminRole)) return true;
    if (transition.allowedRoles.length === 0) return true;
    return actor.roles.some((role) => transition.allowedRoles.includes(role));
  }

  /** Transitions the actor could attempt from the state, before requirements. */
  availableTransitions(stateId: string, actor: ActorContext): WorkflowTransition[] {
    if (this.isTerminal(stateId)) return [];
    return this.transitionsFrom(stateId).filter((t) => t.isActive && this.authorize(t, actor));
  }

  // ─── Transition resolution ──────────────────────────────────────────

  /**
   * Runs every guard for firing a transition on a record, in a fixed order,
   * and returns the endpoints when all pass.
   */
  resolveTransition(
    transitionId: string,
    record: CaseRecord,
    actor: ActorContext,
    payload: TransitionPayload,
  ): ResolvedTransition {
    const transition = this.transitionMap.get(transitionId);
    if (!transition) {
      throw new WorkflowError(
        `Transition "${transitionId}" does not exist in workflow "${this.graph.workflow.code}"`,
        "NOT_FOUND",
        { entity: "transition", id: transitionId, workflowId: this.workflowId },
      );
    }

    const current = this.stateMap.get(record.currentStateId);
    if (!current) {
      throw new WorkflowError(
        `Current state "${record.currentStateId}" is not part of workflow "${this.graph.workflow.code}"`,
        "INVALID_TOPOLOGY",
        { currentStateId: record.currentStateId, workflowId: this.workflowId },
      );
    }

    if (current.isTerminal) {
      throw new WorkflowError(
        `Record is in terminal state "${current.name}"`,
        "TERMINAL_STATE",
        { stateId: current.id },
      );
    }

    if (transition.fromStateId !== current.id) {
      throw new WorkflowError(
        `Transition "${transition.name}" does not start from "${current.name}"`,
        "INVALID_TOPOLOGY",
        {
          transitionId: transition.id,
          fromStateId: transition.fromStateId,
          currentStateId: current.id,
          availableTransitionIds: this.transitionsFrom(current.id).map((t) => t.id),
        },
      );
    }

    if (!transition.isActive) {
      throw new WorkflowError(
        `Transition "${transition.name}" is inactive`,
        "INVALID_TOPOLOGY",
        { transitionId: transition.id },
      );
    }

    if (!this.authorize(transition, actor)) {
      throw new WorkflowError(
        `Actor "${actor.actorId}" may not perform "${transition.name}"`,
        "FORBIDDEN",
        { transitionId: transition.id, allowedRoles: transition.allowedRoles, roles: [...actor.roles] },
      );
    }

    const violations = validateRequirements(transition, record, payload);
    if (violations.length > 0) {
      throw new WorkflowError(
        `Requirements not met for "${transition.name}"`,
        "REQUIREMENTS_NOT_MET",
        { transitionId: transition.id, violations },
      );
    }

    const to = this.stateMap.get(transition.toStateId);
    if (!to) {
      throw new WorkflowError(
        `Target state "${transition.toStateId}" is not part of workflow "${this.graph.workflow.code}"`,
        "INVALID_TOPOLOGY",
        { transitionId: transition.id, toStateId: transition.toStateId },
      );
    }

    return { transition, from: current, to };
  }

  // ─── Configuration checks ───────────────────────────────────────────

  validateTopology(): TopologyWarning[] {
    const { states, transitions } = this.graph;
    if (states.length === 0) {
      return [{ code: "NO_STATES", message: "Workflow has no states" }];
    }

    const warnings: TopologyWarning[] = [];
    if (!states.some((s) => s.isInitial)) {
      warnings.push({ code: "NO_INITIAL_STATE", message: "Workflow has no initial state" });
    }

    const active = transitions.filter((t) => t.isActive);
    const targets = new Set(active.map((t) => t.toStateId));
    const sources = new Set(active.map((t) => t.fromStateId));

    for (const state of [...states].sort(bySortOrder)) {
      if (!state.isInitial && !targets.has(state.id)) {
        warnings.push({
          code: "UNREACHABLE_STATE",
          message: `State "${state.name}" has no incoming transitions`,
          stateId: state.id,
        });
      }
      if (!state.isTerminal && !sources.has(state.id)) {
        warnings.push({
          code: "DEAD_END_STATE",
          message: `Non-terminal state "${state.name}" has no outgoing transitions`,
          stateId: state.id,
        });
      }
    }

    return warnings;
  }
}
