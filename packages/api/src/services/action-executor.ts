import {
  SETTABLE_FIELDS,
  WorkflowError,
  computeSlaDueAt,
  departmentMatcher,
  userMatcher,
  type ActionWarning,
  type ActorContext,
  type CaseRecord,
  type Clock,
  type RecordPatch,
  type RevisionActionType,
  type SettableField,
  type TransitionAction,
  type TransitionPayload,
  type WorkflowState,
  type WorkflowTransition,
} from "@caseflow/shared";
import type { Logger } from "../lib/logger.js";
import type { RecordRepository } from "../repositories/types.js";
import type { Directory } from "./directory.js";
import { dispatchNotification, type Notifier } from "./notifier.js";
import { newRevision } from "./revision-service.js";
import type { SeatCriteria, WorkflowSeat } from "./workflow-service.js";

/** Where a record lands when its type changes. */
export interface WorkflowSeating {
  seatFor(criteria: SeatCriteria): Promise<WorkflowSeat>;
}

export interface ActionExecutorDeps {
  records: RecordRepository;
  workflows: WorkflowSeating;
  directory: Directory;
  notifier: Notifier;
  clock: Clock;
  logger: Logger;
}

/** What the actions of one committed transition run against. */
export interface ActionContext {
  record: CaseRecord;
  transition: WorkflowTransition;
  to: WorkflowState;
  actor: ActorContext;
  payload: TransitionPayload;
}

export interface ActionRunResult {
  record: CaseRecord;
  warnings: ActionWarning[];
}

interface ActionChange {
  patch: RecordPatch;
  actionType: RevisionActionType;
  description: string;
  /** Merged into the revision payload. */
  extra?: Record<string, unknown>;
}

const SETTABLE_FIELD_SET: ReadonlySet<string> = new Set(SETTABLE_FIELDS);

function isSettableField(field: string): field is SettableField {
  return SETTABLE_FIELD_SET.has(field);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Picks one id out of the top tier of a match. A tie is settled by the
 * caller's hint when the hint is among the tied ids.
 */
function pickOne(ids: readonly string[], hint: string | undefined, what: string): string {
  const [only, ...rest] = ids;
  if (only === undefined) throw new Error(`No ${what} matches the record`);
  if (rest.length === 0) return only;
  if (hint !== undefined && ids.includes(hint)) return hint;
  throw new Error(`Ambiguous ${what}: ${ids.length} candidates match equally (${ids.join(", ")})`);
}

function fieldPatch(record: CaseRecord, field: string, value: string | number | boolean | null): RecordPatch {
  if (field.startsWith("custom.")) {
    return { customFields: { ...record.customFields, [field.slice("custom.".length)]: value } };
  }
  if (!isSettableField(field)) throw new Error(`Field "${field}" cannot be set by an action`);

  switch (field) {
    case "priority":
    case "severity":
      if (typeof value !== "number" || !Number.isInteger(value) || value < 1 || value > 5) {
        throw new Error(`Field "${field}" takes an integer from 1 to 5`);
      }
      return field === "priority" ? { priority: value } : { severity: value };
    case "title":
    case "description":
      if (typeof value !== "string") throw new Error(`Field "${field}" takes a string`);
      return field === "title" ? { title: value } : { description: value };
    case "channel":
    case "locationId":
    case "classificationId":
      if (value !== null && typeof value !== "string") {
        throw new Error(`Field "${field}" takes a string or null`);
      }
      if (field === "channel") return { channel: value };
      return field === "locationId" ? { locationId: value } : { classificationId: value };
  }
}

// ─── Action Executor ─────────────────────────────────────────────────

/**
 * Runs the side effects of a transition after it has been committed. Each
 * action succeeds or fails on its own; a failure becomes a warning and an
 * `action_failed` revision, and never undoes the transition.
 */
export class ActionExecutor {
  private readonly records: RecordRepository;
  private readonly workflows: WorkflowSeating;
  private readonly directory: Directory;
  private readonly notifier: Notifier;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(deps: ActionExecutorDeps) {
    this.records = deps.records;
    this.workflows = deps.workflows;
    this.directory = deps.directory;
    this.notifier = deps.notifier;
    this.clock = deps.clock;
    this.logger = deps.logger.child({ component: "action-executor" });
  }

  async run(context: ActionContext): Promise<ActionRunResult> {
    let record = context.record;
    const warnings: ActionWarning[] = [];

    for (const action of context.transition.actions) {
      if (!action.isActive) continue;
      try {
        record = await this.apply(action, { ...context, record });
      } catch (err) {
        const warning: ActionWarning = {
          actionId: action.id,
          actionName: action.name,
          kind: action.kind,
          message: errorMessage(err),
        };
        warnings.push(warning);
        this.logger.warn({ recordId: record.id, ...warning }, "transition action failed");
        await this.recordFailure(record, context.actor, warning);
      }
    }

    return { record, warnings };
  }

  private async apply(action: TransitionAction, context: ActionContext): Promise<CaseRecord> {
    const { record } = context;

    switch (action.kind) {
      case "assign_user":
        return this.commit(context, action, {
          patch: { assigneeId: action.userId },
          actionType: "assigned",
          description: `Assigned to ${action.userId}`,
        });

      case "assign_role": {
        const users = await this.directory.listUsersWithRole(action.roleId);
        const pool = action.autoMatch
          ? userMatcher.match(users, {
              classification: record.classificationId,
              location: record.locationId,
              department: record.departmentId,
            }).matches
          : users;
        const userId = pickOne(
          pool.map((u) => u.id),
          context.payload.assigneeId,
          `user with role "${action.roleId}"`,
        );
        return this.commit(context, action, {
          patch: { assigneeId: userId },
          actionType: "assigned",
          description: `Assigned to ${userId} (role ${action.roleId})`,
        });
      }

      case "assign_department": {
        let departmentId = action.departmentId;
        if (departmentId === undefined) {
          if (!action.autoDetect) throw new Error("No department configured");
          const departments = await this.directory.listDepartments();
          const { matches } = departmentMatcher.match(departments, {
            classification: record.classificationId,
            location: record.locationId,
          });
          departmentId = pickOne(
            matches.map((d) => d.id),
            context.payload.departmentId,
            "department",
          );
        }
        return this.commit(context, action, {
          patch: { departmentId },
          actionType: "assigned",
          description: `Routed to department ${departmentId}`,
        });
      }

      case "set_field":
        return this.commit(context, action, {
          patch: fieldPatch(record, action.field, action.value),
          actionType: "updated",
          description: `Set ${action.field}`,
        });

      case "recompute_sla": {
        const hours = action.hours ?? context.to.slaHours;
        const slaDueAt = computeSlaDueAt(this.clock.now(), hours);
        return this.commit(context, action, {
          patch: { slaDueAt, slaBreached: false },
          actionType: "sla_recomputed",
          description: slaDueAt ? `SLA due ${slaDueAt.toISOString()}` : "SLA cleared",
        });
      }

      case "change_record_type": {
        if (action.recordType === record.recordType && action.workflowId === undefined) {
          throw new Error(`Record is already a ${record.recordType}`);
        }
        const { graph, initial } = await this.workflows.seatFor({
          workflowId: action.workflowId,
          recordType: action.recordType,
          classificationId: record.classificationId,
          locationId: record.locationId,
          departmentId: record.departmentId,
          channel: record.channel,
        });
        const referenceNumber =
          action.recordType === record.recordType
            ? record.referenceNumber
            : await this.records.nextReferenceNumber(action.recordType);

        return this.commit(context, action, {
          patch: {
            recordType: action.recordType,
            referenceNumber,
            workflowId: graph.workflow.id,
            currentStateId: initial.id,
            slaDueAt: computeSlaDueAt(this.clock.now(), initial.slaHours),
            slaBreached: false,
            resolvedAt: null,
            closedAt: null,
          },
          actionType: "record_type_changed",
          description:
            `${record.referenceNumber} became ${referenceNumber}: ${record.recordType} to ${action.recordType}, ` +
            `now in "${initial.name}" of workflow "${graph.workflow.code}"`,
          extra: {
            previous: {
              referenceNumber: record.referenceNumber,
              recordType: record.recordType,
              workflowId: record.workflowId,
              stateId: record.currentStateId,
            },
          },
        });
      }

      case "notify": {
        const recipients = this.resolveRecipients(action.recipients, record);
        if (recipients.length === 0) throw new Error("No recipients could be resolved");
        dispatchNotification(this.notifier, this.logger, {
          kind: action.template,
          recordId: record.id,
          recipients,
          context: {
            referenceNumber: record.referenceNumber,
            title: record.title,
            transitionName: context.transition.name,
            stateName: context.to.name,
            actorId: context.actor.actorId,
          },
        });
        return record;
      }
    }
  }

  private resolveRecipients(recipients: readonly string[], record: CaseRecord): string[] {
    const resolved = new Set<string>();
    for (const recipient of recipients) {
      if (recipient === "assignee") {
        if (record.assigneeId) resolved.add(record.assigneeId);
      } else if (recipient === "reporter") {
        if (record.reporterId) resolved.add(record.reporterId);
      } else if (recipient.startsWith("user:")) {
        resolved.add(recipient.slice("user:".length));
      } else {
        // role:<id> stays symbolic for the delivery side to expand
        resolved.add(recipient);
      }
    }
    return [...resolved];
  }

  private async commit(
    context: ActionContext,
    action: TransitionAction,
    change: ActionChange,
  ): Promise<CaseRecord> {
    const { record, actor } = context;
    const now = this.clock.now();

    const updated = await this.records.applyMutation(record.id, record.version, {
      patch: { ...change.patch, updatedAt: now },
      revision: newRevision({
        recordId: record.id,
        revisionNumber: record.version + 1,
        actionType: change.actionType,
        performedBy: actor.actorId,
        description: change.description,
        payload: {
          actionId: action.id,
          transitionId: context.transition.id,
          changes: change.patch,
          ...change.extra,
        },
        createdAt: now,
      }),
    });
    if (!updated) {
      throw new WorkflowError("Record changed while actions were running", "STALE_VERSION", {
        recordId: record.id,
        expectedVersion: record.version,
      });
    }
    return updated;
  }

  private async recordFailure(record: CaseRecord, actor: ActorContext, warning: ActionWarning): Promise<void> {
    try {
      await this.records.appendRevision(
        newRevision({
          recordId: record.id,
          revisionNumber: record.version,
          actionType: "action_failed",
          performedBy: actor.actorId,
          description: `Action "${warning.actionName}" failed: ${warning.message}`,
          payload: { ...warning },
          createdAt: this.clock.now(),
        }),
      );
    } catch (err) {
      this.logger.error({ err, recordId: record.id, actionId: warning.actionId }, "could not record action failure");
    }
  }
}
