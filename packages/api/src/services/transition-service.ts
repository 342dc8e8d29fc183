import { randomUUID } from "node:crypto";
import {
  WorkflowEngine,
  WorkflowError,
  notFound,
  transitionPayloadSchema,
  type ActionWarning,
  type ActorContext,
  type CaseRecord,
  type Clock,
  type RecordPatch,
  type TransitionHistoryEntry,
  type TransitionPayloadInput,
  type TransitionRequirement,
  type WorkflowGraph,
} from "@caseflow/shared";
import type { Logger } from "../lib/logger.js";
import { parseInput } from "../lib/validation.js";
import type { RecordRepository, WorkflowRepository } from "../repositories/types.js";
import type { ActionExecutor } from "./action-executor.js";
import { newRevision } from "./revision-service.js";

export interface TransitionServiceDeps {
  workflows: WorkflowRepository;
  records: RecordRepository;
  actions: ActionExecutor;
  clock: Clock;
  logger: Logger;
  superAdminRole?: string;
}

export interface TransitionOutcome {
  record: CaseRecord;
  history: TransitionHistoryEntry;
  warnings: ActionWarning[];
}

export interface AvailableTransition {
  id: string;
  name: string;
  code: string;
  toStateId: string;
  toStateName: string;
  requirements: TransitionRequirement[];
}

export function staleVersion(record: CaseRecord, expectedVersion: number): WorkflowError {
  return new WorkflowError(
    `Record ${record.referenceNumber} is at version ${record.version}, not ${expectedVersion}`,
    "STALE_VERSION",
    { recordId: record.id, expectedVersion, currentVersion: record.version },
  );
}

// ─── Transition Service ──────────────────────────────────────────────

/**
 * Moves records between states. Apart from a record type change, which
 * re-seats the record in another workflow, this is the only path by which
 * currentStateId changes.
 */
export class TransitionService {
  private readonly workflows: WorkflowRepository;
  private readonly records: RecordRepository;
  private readonly actions: ActionExecutor;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly superAdminRole: string | undefined;

  constructor(deps: TransitionServiceDeps) {
    this.workflows = deps.workflows;
    this.records = deps.records;
    this.actions = deps.actions;
    this.clock = deps.clock;
    this.logger = deps.logger.child({ component: "transition-service" });
    this.superAdminRole = deps.superAdminRole;
  }

  async executeTransition(
    recordId: string,
    transitionId: string,
    actor: ActorContext,
    input: TransitionPayloadInput,
  ): Promise<TransitionOutcome> {
    const payload = parseInput(transitionPayloadSchema, input, "transition payload");

    const record = await this.requireRecord(recordId);
    if (record.version !== payload.expectedVersion) throw staleVersion(record, payload.expectedVersion);

    const engine = await this.engineFor(record.workflowId);
    const { transition, from, to } = engine.resolveTransition(transitionId, record, actor, payload);

    const now = this.clock.now();
    const history: TransitionHistoryEntry = {
      id: randomUUID(),
      recordId,
      transitionId: transition.id,
      fromStateId: from.id,
      toStateId: to.id,
      performedBy: actor.actorId,
      comment: payload.comment ?? null,
      transitionedAt: now,
    };

    const patch: RecordPatch = { currentStateId: to.id, updatedAt: now };
    if (to.isTerminal) {
      patch.closedAt = now;
      patch.resolvedAt = record.resolvedAt ?? now;
    }

    const committed = await this.records.applyMutation(recordId, payload.expectedVersion, {
      patch,
      history,
      comment: payload.comment
        ? {
            id: randomUUID(),
            recordId,
            authorId: actor.actorId,
            content: payload.comment,
            isInternal: true,
            transitionHistoryId: history.id,
            createdAt: now,
          }
        : undefined,
      feedback: payload.feedback
        ? {
            id: randomUUID(),
            recordId,
            transitionHistoryId: history.id,
            rating: payload.feedback.rating,
            comment: payload.feedback.comment ?? null,
            submittedBy: actor.actorId,
            createdAt: now,
          }
        : undefined,
      revision: newRevision({
        recordId,
        revisionNumber: payload.expectedVersion + 1,
        actionType: "transitioned",
        performedBy: actor.actorId,
        description: `${transition.name}: ${from.name} → ${to.name}`,
        payload: {
          transitionId: transition.id,
          fromStateId: from.id,
          toStateId: to.id,
          fields: payload.fields,
          attachments: payload.attachments,
          ...(payload.feedback ? { feedback: payload.feedback } : {}),
        },
        createdAt: now,
      }),
    });
    if (!committed) {
      const latest = await this.requireRecord(recordId);
      throw staleVersion(latest, payload.expectedVersion);
    }

    this.logger.info(
      { recordId, transitionId: transition.id, from: from.code, to: to.code, actorId: actor.actorId },
      "record transitioned",
    );

    const { record: final, warnings } = await this.actions.run({
      record: committed,
      transition,
      to,
      actor,
      payload,
    });
    return { record: final, history, warnings };
  }

  async availableTransitions(recordId: string, actor: ActorContext): Promise<AvailableTransition[]> {
    const record = await this.requireRecord(recordId);
    const engine = await this.engineFor(record.workflowId);

    return engine.availableTransitions(record.currentStateId, actor).flatMap((t) => {
      const target = engine.getState(t.toStateId);
      if (!target) return [];
      return [
        {
          id: t.id,
          name: t.name,
          code: t.code,
          toStateId: target.id,
          toStateName: target.name,
          requirements: t.requirements.filter((r) => r.isMandatory),
        },
      ];
    });
  }

  async history(recordId: string): Promise<TransitionHistoryEntry[]> {
    await this.requireRecord(recordId);
    return this.records.listHistory(recordId);
  }

  private async requireRecord(id: string): Promise<CaseRecord> {
    const record = await this.records.findById(id);
    if (!record) throw notFound("Record", id);
    return record;
  }

  private async engineFor(workflowId: string): Promise<WorkflowEngine> {
    const graph: WorkflowGraph | null = await this.workflows.loadGraph(workflowId);
    if (!graph) throw notFound("Workflow", workflowId);
    return new WorkflowEngine(graph, { superAdminRole: this.superAdminRole });
  }
}
