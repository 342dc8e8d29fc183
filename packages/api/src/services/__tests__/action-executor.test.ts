import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  ManualClock,
  type CaseRecord,
  type TransitionActionInput,
  type TransitionPayload,
} from "@caseflow/shared";
import { InMemoryRecordRepository } from "../../repositories/memory-record-repository.js";
import { InMemoryWorkflowRepository } from "../../repositories/memory-workflow-repository.js";
import { ActionExecutor } from "../action-executor.js";
import { StaticDirectory } from "../directory.js";
import { WorkflowService } from "../workflow-service.js";
import {
  RecordingNotifier,
  T0,
  actors,
  createdRevision,
  makePayload,
  makeRecord,
  makeState,
  makeTransition,
  revisionsOf,
  silentLogger,
} from "../../__tests__/helpers.js";

const directory = new StaticDirectory(
  [
    { id: "dept-network", name: "Network", constraints: { classification: ["cls-network"] } },
    { id: "dept-downtown", name: "Downtown", constraints: { location: ["loc-downtown"] } },
    { id: "dept-general", name: "General", constraints: {} },
  ],
  [
    { id: "tech-net", roleIds: ["tech"], constraints: { classification: ["cls-network"] } },
    { id: "tech-any", roleIds: ["tech"], constraints: {} },
    { id: "lead-1", roleIds: ["lead"], constraints: { location: ["loc-downtown"] } },
    { id: "lead-2", roleIds: ["lead"], constraints: { location: ["loc-downtown"] } },
  ],
);

let records: InMemoryRecordRepository;
let notifier: RecordingNotifier;
let clock: ManualClock;
let workflows: WorkflowService;
let executor: ActionExecutor;

beforeEach(() => {
  records = new InMemoryRecordRepository();
  notifier = new RecordingNotifier();
  clock = new ManualClock("2024-03-01T12:00:00.000Z");
  workflows = new WorkflowService({
    workflows: new InMemoryWorkflowRepository(),
    records,
    clock,
    logger: silentLogger,
  });
  executor = new ActionExecutor({ records, workflows, directory, notifier, clock, logger: silentLogger });
});

async function stored(overrides: Partial<CaseRecord> = {}): Promise<CaseRecord> {
  const record = makeRecord(overrides);
  return records.insert(record, createdRevision(record));
}

async function runActions(
  record: CaseRecord,
  actions: TransitionActionInput[],
  hints: Partial<TransitionPayload> = {},
) {
  return executor.run({
    record,
    transition: makeTransition(actions),
    to: makeState(),
    actor: actors.agent,
    payload: makePayload({ expectedVersion: record.version, ...hints }),
  });
}

describe("ActionExecutor", () => {
  it("assigns a fixed user with an assigned revision", async () => {
    const record = await stored();
    const { record: after, warnings } = await runActions(record, [
      { kind: "assign_user", name: "Give to Sam", userId: "sam" },
    ]);

    expect(warnings).toEqual([]);
    expect(after.assigneeId).toBe("sam");
    expect(after.version).toBe(2);

    const revisions = await revisionsOf(records, record.id);
    expect(revisions.map((r) => [r.actionType, r.revisionNumber])).toEqual([
      ["created", 1],
      ["assigned", 2],
    ]);
  });

  it("picks the most specific user of a role", async () => {
    const record = await stored({ classificationId: "cls-network" });
    const { record: after } = await runActions(record, [
      { kind: "assign_role", name: "Route to tech", roleId: "tech", autoMatch: true },
    ]);
    expect(after.assigneeId).toBe("tech-net");
  });

  it("reports an ambiguous role match as a warning and keeps going", async () => {
    const record = await stored({ locationId: "loc-downtown" });
    const { record: after, warnings } = await runActions(record, [
      { id: "act-lead", kind: "assign_role", name: "Route to lead", roleId: "lead", autoMatch: true },
      { kind: "set_field", name: "Bump priority", field: "priority", value: 1 },
    ]);

    expect(warnings).toEqual([
      {
        actionId: "act-lead",
        actionName: "Route to lead",
        kind: "assign_role",
        message: 'Ambiguous user with role "lead": 2 candidates match equally (lead-1, lead-2)',
      },
    ]);
    expect(after.assigneeId).toBeNull();
    expect(after.priority).toBe(1);

    const revisions = await revisionsOf(records, record.id);
    expect(revisions.map((r) => [r.actionType, r.revisionNumber])).toEqual([
      ["created", 1],
      ["action_failed", 1],
      ["updated", 2],
    ]);
  });

  it("settles a tie with the assignee named in the payload", async () => {
    const record = await stored({ locationId: "loc-downtown" });
    const { record: after, warnings } = await runActions(
      record,
      [{ kind: "assign_role", name: "Route to lead", roleId: "lead", autoMatch: true }],
      { assigneeId: "lead-2" },
    );
    expect(warnings).toEqual([]);
    expect(after.assigneeId).toBe("lead-2");
  });

  it("detects the department from the record's attributes", async () => {
    const record = await stored({ classificationId: "cls-network" });
    const { record: after } = await runActions(record, [
      { kind: "assign_department", name: "Route", autoDetect: true },
    ]);
    expect(after.departmentId).toBe("dept-network");
  });

  it("fails a department action with neither a department nor auto-detection", async () => {
    const record = await stored();
    const { warnings } = await runActions(record, [{ kind: "assign_department", name: "Route" }]);
    expect(warnings.map((w) => w.message)).toEqual(["No department configured"]);
  });

  it("rejects a set_field value of the wrong type", async () => {
    const record = await stored();
    const { record: after, warnings } = await runActions(record, [
      { kind: "set_field", name: "Set priority", field: "priority", value: "high" },
    ]);
    expect(warnings.map((w) => w.message)).toEqual(['Field "priority" takes an integer from 1 to 5']);
    expect(after.version).toBe(1);
  });

  it("writes custom fields without touching the others", async () => {
    const record = await stored({ customFields: { asset: "PRN-7" } });
    const { record: after } = await runActions(record, [
      { kind: "set_field", name: "Flag", field: "custom.escalated", value: true },
    ]);
    expect(after.customFields).toEqual({ asset: "PRN-7", escalated: true });
  });

  it("recomputes the SLA from the target state's hours", async () => {
    const record = await stored({ slaBreached: true });
    const { record: after } = await runActions(record, [{ kind: "recompute_sla", name: "Reset SLA" }]);

    expect(after.slaDueAt).toEqual(new Date("2024-03-01T20:00:00.000Z"));
    expect(after.slaBreached).toBe(false);
    const revisions = await revisionsOf(records, record.id);
    expect(revisions[1]?.actionType).toBe("sla_recomputed");
  });

  describe("change_record_type", () => {
    async function seedRequestWorkflow() {
      const workflow = await workflows.createWorkflow(
        { name: "Service requests", code: "service_requests", recordType: "request", isDefault: true },
        actors.admin,
      );
      const submitted = await workflows.createState(workflow.id, {
        name: "Submitted",
        code: "submitted",
        isInitial: true,
        slaHours: 72,
      });
      return { workflow, submitted };
    }

    it("re-seats the record at the initial state of a workflow for its new type", async () => {
      const { workflow, submitted } = await seedRequestWorkflow();
      const record = await stored({ closedAt: T0, resolvedAt: T0, slaBreached: true });

      const { record: after, warnings } = await runActions(record, [
        { kind: "change_record_type", name: "Convert to request", recordType: "request" },
      ]);

      expect(warnings).toEqual([]);
      expect(after).toMatchObject({
        recordType: "request",
        referenceNumber: "REQ-000001",
        workflowId: workflow.id,
        currentStateId: submitted.id,
        slaBreached: false,
        resolvedAt: null,
        closedAt: null,
        version: 2,
      });
      expect(after.slaDueAt).toEqual(new Date("2024-03-04T12:00:00.000Z"));

      const revisions = await revisionsOf(records, record.id);
      expect(revisions[1]).toMatchObject({
        actionType: "record_type_changed",
        revisionNumber: 2,
        description: 'INC-000001 became REQ-000001: incident to request, now in "Submitted" of workflow "service_requests"',
      });
      expect(revisions[1]?.payload["previous"]).toEqual({
        referenceNumber: "INC-000001",
        recordType: "incident",
        workflowId: "wf-1",
        stateId: "state-1",
      });
    });

    it("fails when no workflow takes the new type", async () => {
      await seedRequestWorkflow();
      const record = await stored();

      const { record: after, warnings } = await runActions(record, [
        { kind: "change_record_type", name: "Convert to complaint", recordType: "complaint" },
      ]);

      expect(warnings.map((w) => w.message)).toEqual([
        "No workflow handles complaint records with these attributes",
      ]);
      expect(after).toMatchObject({ recordType: "incident", workflowId: "wf-1", version: 1 });
    });

    it("refuses a named workflow built for another type", async () => {
      const { workflow } = await seedRequestWorkflow();
      const record = await stored();

      const { warnings } = await runActions(record, [
        { kind: "change_record_type", name: "Convert", recordType: "complaint", workflowId: workflow.id },
      ]);

      expect(warnings.map((w) => w.message)).toEqual([
        'Workflow "service_requests" handles request records, not complaint',
      ]);
    });
  });

  it("hands notifications to the notifier without a revision", async () => {
    const record = await stored({ assigneeId: "sam" });
    const { warnings } = await runActions(record, [
      { kind: "notify", name: "Tell people", template: "triaged", recipients: ["assignee", "reporter", "role:leads"] },
    ]);

    expect(warnings).toEqual([]);
    await vi.waitFor(() => expect(notifier.requests).toHaveLength(1));
    expect(notifier.requests[0]).toEqual({
      kind: "triaged",
      recordId: record.id,
      recipients: ["sam", "reporter-1", "role:leads"],
      context: {
        referenceNumber: "INC-000001",
        title: "Printer on fire",
        transitionName: "Triage",
        stateName: "Triaged",
        actorId: "agent-1",
      },
    });
    expect(await revisionsOf(records, record.id)).toHaveLength(1);
  });

  it("does not surface notifier failures", async () => {
    notifier.failWith = new Error("smtp unavailable");
    const record = await stored({ assigneeId: "sam" });
    const { warnings } = await runActions(record, [
      { kind: "notify", name: "Tell assignee", template: "triaged", recipients: ["assignee"] },
    ]);
    expect(warnings).toEqual([]);
  });

  it("skips inactive actions", async () => {
    const record = await stored();
    const { record: after } = await runActions(record, [
      { kind: "assign_user", name: "Disabled", userId: "sam", isActive: false },
    ]);
    expect(after.assigneeId).toBeNull();
    expect(after.version).toBe(1);
  });

  it("turns a lost version race into a warning", async () => {
    const record = await stored();
    await records.applyMutation(record.id, 1, {
      patch: { title: "Changed elsewhere" },
      revision: { ...createdRevision(record), actionType: "updated", revisionNumber: 2 },
    });

    const { warnings } = await runActions(record, [{ kind: "assign_user", name: "Give to Sam", userId: "sam" }]);
    expect(warnings.map((w) => w.message)).toEqual(["Record changed while actions were running"]);
  });
});
