import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { HOUR_MS, type CaseRecord, type Revision } from "@caseflow/shared";
import { InMemoryRecordRepository } from "../../repositories/memory-record-repository.js";
import { SLA_MONITOR_ACTOR, SlaMonitor, type SlaMonitorConfig } from "../sla-monitor.js";
import {
  actors,
  createHarness,
  revisionsOf,
  seedIncidentWorkflow,
  silentLogger,
  type Harness,
  type IncidentWorkflow,
} from "../../__tests__/helpers.js";

/** Fails to flag the records it is told to. */
class FlakyRecordRepository extends InMemoryRecordRepository {
  readonly failing = new Set<string>();

  override async markSlaBreached(
    recordId: string,
    now: Date,
    buildRevision: (flagged: CaseRecord) => Revision,
  ): Promise<CaseRecord | null> {
    if (this.failing.has(recordId)) throw new Error("connection reset");
    return super.markSlaBreached(recordId, now, buildRevision);
  }
}

let harness: Harness;
let seed: IncidentWorkflow;

async function setUp(options: Parameters<typeof createHarness>[0] = {}) {
  harness = createHarness(options);
  seed = await seedIncidentWorkflow(harness.services);
}

function createRecord(title: string, assigneeId: string | null = null) {
  return harness.services.records.createRecord({ title, recordType: "incident", assigneeId }, actors.agent);
}

function monitorWith(config: SlaMonitorConfig): SlaMonitor {
  return new SlaMonitor(
    {
      workflows: harness.workflowRepository,
      records: harness.recordRepository,
      notifier: harness.notifier,
      clock: harness.clock,
      logger: silentLogger,
    },
    config,
  );
}

describe("SlaMonitor.scan", () => {
  beforeEach(async () => {
    await setUp();
  });

  it("flags an overdue record once", async () => {
    const record = await createRecord("Printer on fire");
    harness.clock.advance(25 * HOUR_MS);

    expect(await harness.services.slaMonitor.scan()).toEqual({ scanned: 1, breached: 1, skipped: 0, failed: 0 });
    expect(await harness.services.slaMonitor.scan()).toEqual({ scanned: 0, breached: 0, skipped: 0, failed: 0 });

    const flagged = await harness.services.records.getRecord(record.id);
    expect(flagged.slaBreached).toBe(true);
    expect(flagged.version).toBe(2);

    const revisions = await revisionsOf(harness.recordRepository, record.id);
    expect(revisions[1]).toMatchObject({
      actionType: "sla_breached",
      revisionNumber: 2,
      performedBy: SLA_MONITOR_ACTOR,
      description: "SLA breached (due 2024-01-02T00:00:00.000Z)",
      payload: { slaDueAt: "2024-01-02T00:00:00.000Z", detectedAt: "2024-01-02T01:00:00.000Z" },
    });
  });

  it("leaves records that are not yet due", async () => {
    await createRecord("Printer on fire");
    harness.clock.advance(23 * HOUR_MS);
    expect((await harness.services.slaMonitor.scan()).scanned).toBe(0);
  });

  it("skips records in terminal states", async () => {
    const record = await createRecord("Printer on fire");
    const { transitions } = harness.services;
    await transitions.executeTransition(record.id, seed.start.id, actors.agent, { expectedVersion: 1 });
    await transitions.executeTransition(record.id, seed.resolve.id, actors.agent, {
      expectedVersion: 3,
      comment: "done",
      fields: { resolution_code: "fixed" },
    });

    harness.clock.advance(72 * HOUR_MS);
    expect((await harness.services.slaMonitor.scan()).scanned).toBe(0);
    expect((await harness.services.records.getRecord(record.id)).slaBreached).toBe(false);
  });

  it("notifies the assignee of a breach", async () => {
    const record = await createRecord("Printer on fire", "agent-7");
    harness.clock.advance(25 * HOUR_MS);
    await harness.services.slaMonitor.scan();

    await vi.waitFor(() => expect(harness.notifier.requests).toHaveLength(1));
    expect(harness.notifier.requests[0]).toEqual({
      kind: "sla_breached",
      recordId: record.id,
      recipients: ["agent-7"],
      context: { referenceNumber: "INC-000001", title: "Printer on fire" },
    });
  });

  it("shares a scan already under way", async () => {
    await createRecord("Printer on fire");
    harness.clock.advance(25 * HOUR_MS);

    const first = harness.services.slaMonitor.scan();
    const second = harness.services.slaMonitor.scan();
    expect(second).toBe(first);
    expect((await first).breached).toBe(1);
  });
});

describe("SlaMonitor batching", () => {
  it("pages through every candidate in batches", async () => {
    await setUp({ batchSize: 2 });
    for (const title of ["one", "two", "three", "four", "five"]) await createRecord(title);
    harness.clock.advance(25 * HOUR_MS);

    expect(await harness.services.slaMonitor.scan()).toEqual({ scanned: 5, breached: 5, skipped: 0, failed: 0 });
    const page = await harness.services.records.listRecords({ page: 1, limit: 10, slaBreached: false });
    expect(page.total).toBe(0);
  });

  it("keeps going when one record cannot be flagged", async () => {
    const records = new FlakyRecordRepository();
    await setUp({ records });
    const broken = await createRecord("Broken");
    const healthy = await createRecord("Healthy");
    records.failing.add(broken.id);
    harness.clock.advance(25 * HOUR_MS);

    expect(await harness.services.slaMonitor.scan()).toEqual({ scanned: 2, breached: 1, skipped: 0, failed: 1 });
    expect((await records.findById(healthy.id))?.slaBreached).toBe(true);
    expect((await records.findById(broken.id))?.slaBreached).toBe(false);
  });
});

describe("SlaMonitor timer", () => {
  beforeEach(async () => {
    vi.useFakeTimers();
    await setUp();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("scans on every interval until stopped", () => {
    const monitor = monitorWith({ intervalMs: 60_000 });
    const scan = vi.spyOn(monitor, "scan").mockResolvedValue({ scanned: 0, breached: 0, skipped: 0, failed: 0 });

    monitor.start();
    expect(monitor.running).toBe(true);
    expect(scan).not.toHaveBeenCalled();

    vi.advanceTimersByTime(120_000);
    expect(scan).toHaveBeenCalledTimes(2);

    monitor.stop();
    expect(monitor.running).toBe(false);
    vi.advanceTimersByTime(120_000);
    expect(scan).toHaveBeenCalledTimes(2);
  });

  it("runs a first scan immediately when asked to", () => {
    const monitor = monitorWith({ intervalMs: 60_000, runOnStart: true });
    const scan = vi.spyOn(monitor, "scan").mockResolvedValue({ scanned: 0, breached: 0, skipped: 0, failed: 0 });

    monitor.start();
    expect(scan).toHaveBeenCalledTimes(1);
    monitor.stop();
  });

  it("stays idle when disabled", () => {
    const monitor = monitorWith({ enabled: false });
    monitor.start();
    expect(monitor.running).toBe(false);
  });
});
