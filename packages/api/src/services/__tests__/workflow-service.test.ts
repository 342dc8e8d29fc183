import { describe, it, expect, beforeEach } from "vitest";
import { WorkflowError, type WorkflowGraph } from "@caseflow/shared";
import {
  actors,
  createHarness,
  rejection,
  seedIncidentWorkflow,
  type Harness,
  type IncidentWorkflow,
} from "../../__tests__/helpers.js";

let harness: Harness;
let seed: IncidentWorkflow;

beforeEach(async () => {
  harness = createHarness();
  seed = await seedIncidentWorkflow(harness.services);
});

async function workflowError(promise: Promise<unknown>): Promise<WorkflowError> {
  const err = await rejection(promise);
  if (!(err instanceof WorkflowError)) throw err;
  return err;
}

/** Shape of a graph with identifiers and timestamps stripped. */
function shapeOf(graph: WorkflowGraph) {
  const codeOf = new Map(graph.states.map((s) => [s.id, s.code]));
  return {
    states: graph.states.map((s) => ({
      code: s.code,
      name: s.name,
      isInitial: s.isInitial,
      isTerminal: s.isTerminal,
      slaHours: s.slaHours,
    })),
    transitions: graph.transitions.map((t) => ({
      code: t.code,
      from: codeOf.get(t.fromStateId),
      to: codeOf.get(t.toStateId),
      allowedRoles: t.allowedRoles,
      requirements: t.requirements.map(({ id: _id, ...rest }) => rest),
      actions: t.actions.map(({ id: _id, ...rest }) => rest),
    })),
  };
}

describe("WorkflowService definitions", () => {
  it("keeps one default workflow per record type", async () => {
    const { workflows } = harness.services;
    const second = await workflows.createWorkflow(
      { name: "Major incidents", code: "major_incidents", recordType: "incident", isDefault: true },
      actors.admin,
    );

    const listed = await workflows.listWorkflows({ recordType: "incident" });
    expect(listed.filter((w) => w.isDefault).map((w) => w.id)).toEqual([second.id]);
    expect((await workflows.getWorkflow(seed.workflow.id)).workflow.isDefault).toBe(false);
  });

  it("rejects a workflow code already in use", async () => {
    const err = await workflowError(
      harness.services.workflows.createWorkflow(
        { name: "Another", code: "incident_handling", recordType: "request" },
        actors.admin,
      ),
    );
    expect(err.code).toBe("VALIDATION_FAILED");
    expect(err.message).toBe('Workflow code "incident_handling" is already in use');
  });

  it("demotes the previous initial state when a new one is added", async () => {
    const { workflows } = harness.services;
    const triage = await workflows.createState(seed.workflow.id, {
      name: "Triage",
      code: "triage",
      isInitial: true,
    });

    const { states } = await workflows.getWorkflow(seed.workflow.id);
    expect(states.filter((s) => s.isInitial).map((s) => s.id)).toEqual([triage.id]);
    expect((await workflows.initialStateOf(seed.workflow.id)).code).toBe("triage");
  });

  it("rejects a state that is both initial and terminal", async () => {
    const err = await workflowError(
      harness.services.workflows.createState(seed.workflow.id, {
        name: "Instant",
        code: "instant",
        isInitial: true,
        isTerminal: true,
      }),
    );
    expect(err.code).toBe("VALIDATION_FAILED");
  });

  it("rejects a duplicate state code within a workflow", async () => {
    const err = await workflowError(
      harness.services.workflows.createState(seed.workflow.id, { name: "New again", code: "new" }),
    );
    expect(err.code).toBe("VALIDATION_FAILED");
  });

  it("refuses outgoing transitions from a terminal state", async () => {
    const err = await workflowError(
      harness.services.workflows.createTransition(seed.workflow.id, {
        name: "Reopen",
        code: "reopen",
        fromStateId: seed.resolved.id,
        toStateId: seed.inProgress.id,
      }),
    );
    expect(err.code).toBe("INVALID_TOPOLOGY");
  });

  it("refuses to make a state terminal while it has outgoing transitions", async () => {
    const err = await workflowError(
      harness.services.workflows.updateState(seed.inProgress.id, { isTerminal: true }),
    );
    expect(err.code).toBe("INVALID_TOPOLOGY");
    expect(err.details).toEqual({ stateId: seed.inProgress.id, transitionIds: [seed.resolve.id] });
  });

  it("refuses a transition whose endpoints live in another workflow", async () => {
    const { workflows } = harness.services;
    const other = await workflows.createWorkflow(
      { name: "Requests", code: "requests", recordType: "request" },
      actors.admin,
    );
    const err = await workflowError(
      workflows.createTransition(other.id, {
        name: "Borrow",
        code: "borrow",
        fromStateId: seed.newState.id,
        toStateId: seed.inProgress.id,
      }),
    );
    expect(err.code).toBe("INVALID_TOPOLOGY");
  });

  it("reports a missing endpoint as not found", async () => {
    const err = await workflowError(
      harness.services.workflows.createTransition(seed.workflow.id, {
        name: "Nowhere",
        code: "nowhere",
        fromStateId: seed.newState.id,
        toStateId: "00000000-0000-4000-8000-000000000000",
      }),
    );
    expect(err.code).toBe("NOT_FOUND");
  });

  it("guards state deletion against transitions and occupants", async () => {
    const { workflows, records } = harness.services;
    const touched = await workflowError(workflows.deleteState(seed.newState.id));
    expect(touched.code).toBe("INVALID_TOPOLOGY");

    const parked = await workflows.createState(seed.workflow.id, { name: "Parked", code: "parked" });
    await workflows.createState(seed.workflow.id, { name: "Holding", code: "holding", isInitial: true });
    const holding = await workflows.initialStateOf(seed.workflow.id);
    await records.createRecord(
      { title: "Held record", recordType: "incident", workflowId: seed.workflow.id },
      actors.agent,
    );
    const occupied = await workflowError(workflows.deleteState(holding.id));
    expect(occupied.code).toBe("HAS_DEPENDENT_RECORDS");

    await workflows.deleteState(parked.id);
    const { states } = await workflows.getWorkflow(seed.workflow.id);
    expect(states.map((s) => s.code)).not.toContain("parked");
  });

  it("lists the transitions leaving a state in sort order", async () => {
    const { workflows } = harness.services;
    const escalate = await workflows.createTransition(seed.workflow.id, {
      name: "Escalate",
      code: "escalate",
      fromStateId: seed.inProgress.id,
      toStateId: seed.newState.id,
      sortOrder: -1,
    });
    const leaving = await workflows.transitionsFrom(seed.inProgress.id);
    expect(leaving.map((t) => t.id)).toEqual([escalate.id, seed.resolve.id]);
  });

  it("warns about unreachable and dead-end states", async () => {
    const { workflows } = harness.services;
    expect(await workflows.validateWorkflow(seed.workflow.id)).toEqual([]);

    await workflows.createState(seed.workflow.id, { name: "Limbo", code: "limbo", sortOrder: 5 });
    const warnings = await workflows.validateWorkflow(seed.workflow.id);
    expect(warnings.map((w) => w.code)).toEqual(["UNREACHABLE_STATE", "DEAD_END_STATE"]);
  });
});

describe("WorkflowService lifecycle", () => {
  it("soft-deletes, restores, and refuses edits while deleted", async () => {
    const { workflows } = harness.services;
    const deleted = await workflows.softDeleteWorkflow(seed.workflow.id, actors.admin);
    expect(deleted.lifecycle).toBe("soft_deleted");
    expect(deleted.isDefault).toBe(false);
    expect(deleted.deletedAt).toEqual(harness.clock.now());
    expect(await workflows.listWorkflows()).toEqual([]);
    expect((await workflows.listDeletedWorkflows()).map((w) => w.id)).toEqual([seed.workflow.id]);

    const edit = await workflowError(workflows.updateWorkflow(seed.workflow.id, { name: "Renamed" }));
    expect(edit.code).toBe("INVALID_TOPOLOGY");
    const again = await workflowError(workflows.softDeleteWorkflow(seed.workflow.id, actors.admin));
    expect(again.code).toBe("INVALID_TOPOLOGY");

    const restored = await workflows.restoreWorkflow(seed.workflow.id, actors.admin);
    expect(restored.lifecycle).toBe("active");
    expect(restored.deletedAt).toBeNull();
  });

  it("refuses to purge a workflow that records still use", async () => {
    const { workflows, records } = harness.services;
    await records.createRecord({ title: "Keeps it alive", recordType: "incident" }, actors.agent);

    const err = await workflowError(workflows.permanentlyDeleteWorkflow(seed.workflow.id, actors.admin));
    expect(err.code).toBe("HAS_DEPENDENT_RECORDS");
    expect(err.details).toEqual({ workflowId: seed.workflow.id, records: 1 });
  });

  it("purges an unused workflow with its states and transitions", async () => {
    const { workflows } = harness.services;
    await workflows.permanentlyDeleteWorkflow(seed.workflow.id, actors.admin);

    expect((await workflowError(workflows.getWorkflow(seed.workflow.id))).code).toBe("NOT_FOUND");
    expect(await harness.workflowRepository.findState(seed.newState.id)).toBeNull();
    expect(await harness.workflowRepository.findTransition(seed.start.id)).toBeNull();
  });
});

describe("WorkflowService copies", () => {
  it("duplicates a workflow as an inactive copy with fresh identifiers", async () => {
    const copy = await harness.services.workflows.duplicateWorkflow(seed.workflow.id, actors.admin);
    const source = await harness.services.workflows.getWorkflow(seed.workflow.id);

    expect(copy.workflow.name).toBe("Incident handling (Copy)");
    expect(copy.workflow.code).toMatch(/^incident_handling_copy_[0-9a-f]{8}$/);
    expect(copy.workflow.isActive).toBe(false);
    expect(copy.workflow.isDefault).toBe(false);

    const sourceIds = new Set([...source.states.map((s) => s.id), ...source.transitions.map((t) => t.id)]);
    expect(copy.states.some((s) => sourceIds.has(s.id))).toBe(false);
    expect(copy.transitions.some((t) => sourceIds.has(t.id))).toBe(false);

    const stored = await harness.services.workflows.getWorkflow(copy.workflow.id);
    expect(shapeOf(stored)).toEqual(shapeOf(source));
  });

  it("imports an export as an equivalent, inactive workflow", async () => {
    const { workflows } = harness.services;
    const document = await workflows.exportWorkflow(seed.workflow.id);
    const { graph, warnings } = await workflows.importWorkflow(document, actors.admin);

    expect(graph.workflow.code).toMatch(/^incident_handling_imported_[0-9a-f]{8}$/);
    expect(graph.workflow.isActive).toBe(false);
    expect(graph.workflow.isDefault).toBe(false);
    expect(warnings).toEqual([
      `Code "incident_handling" is already in use; imported as "${graph.workflow.code}"`,
      "Imported workflow is not the default for its record type",
    ]);

    const source = await workflows.getWorkflow(seed.workflow.id);
    expect(shapeOf(await workflows.getWorkflow(graph.workflow.id))).toEqual(shapeOf(source));
  });

  it("rejects a document whose transitions name unknown states", async () => {
    const { workflows } = harness.services;
    const document = await workflows.exportWorkflow(seed.workflow.id);
    const broken = {
      ...document,
      transitions: document.transitions.map((t) => ({ ...t, to: "missing" })),
    };

    const err = await workflowError(workflows.importWorkflow(broken, actors.admin));
    expect(err.code).toBe("VALIDATION_FAILED");
  });
});

describe("WorkflowService.matchWorkflow", () => {
  beforeEach(async () => {
    const { workflows } = harness.services;
    await workflows.createWorkflow(
      { name: "Network incidents", code: "network", recordType: "incident", classificationIds: ["cls-network"] },
      actors.admin,
    );
    await workflows.createWorkflow(
      {
        name: "Downtown network",
        code: "downtown_network",
        recordType: "incident",
        classificationIds: ["cls-network"],
        matchConstraints: { locationIds: ["loc-downtown"] },
      },
      actors.admin,
    );
  });

  it("prefers the workflow that constrains the most dimensions", async () => {
    const match = await harness.services.workflows.matchWorkflow({
      recordType: "incident",
      classificationId: "cls-network",
      locationId: "loc-downtown",
    });
    expect(match.single).toBe(true);
    expect(match.matches.map((w) => w.code)).toEqual(["downtown_network"]);
    expect(match.fallback).toBe(false);
  });

  it("reports a tie without picking", async () => {
    await harness.services.workflows.createWorkflow(
      {
        name: "Network by phone",
        code: "network_phone",
        recordType: "incident",
        classificationIds: ["cls-network"],
        matchConstraints: { channels: ["phone"] },
      },
      actors.admin,
    );
    const match = await harness.services.workflows.matchWorkflow({
      recordType: "incident",
      classificationId: "cls-network",
      locationId: "loc-downtown",
      channel: "phone",
    });
    expect(match.single).toBe(false);
    expect(match.matchedId).toBeNull();
    expect(match.matches.map((w) => w.code)).toEqual(["downtown_network", "network_phone"]);
  });

  it("matches the generic workflow when nothing more specific applies", async () => {
    const match = await harness.services.workflows.matchWorkflow({ recordType: "incident" });
    expect(match.matchedId).toBe(seed.workflow.id);
    expect(match.initialState?.id).toBe(seed.newState.id);
  });

  it("falls back to the all-types default when nothing matches", async () => {
    const { workflows } = harness.services;
    const general = await workflows.createWorkflow(
      { name: "General intake", code: "general", recordType: "all", isDefault: true },
      actors.admin,
    );
    await workflows.createWorkflow(
      { name: "Billing queries", code: "billing", recordType: "query", classificationIds: ["cls-billing"] },
      actors.admin,
    );
    await workflows.updateWorkflow(general.id, { classificationIds: ["cls-general"] });

    const match = await workflows.matchWorkflow({ recordType: "query" });
    expect(match.fallback).toBe(true);
    expect(match.matchedId).toBe(general.id);
  });

  it("ignores inactive workflows", async () => {
    const { workflows } = harness.services;
    await workflows.updateWorkflow(seed.workflow.id, { isActive: false });
    const match = await workflows.matchWorkflow({ recordType: "incident" });
    expect(match.matches).toEqual([]);
    expect(match.matchedId).toBeNull();
  });
});
