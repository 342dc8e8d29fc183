/**
 * SLA monitor: periodically flags records whose due time has passed.
 *
 * Each flip is a conditional update, so several processes may scan the
 * same table without double-flagging a record.
 */

import {
  DEFAULT_SLA_CHECK_INTERVAL_MS,
  DEFAULT_SLA_SCAN_BATCH_SIZE,
  type CaseRecord,
  type Clock,
} from "@caseflow/shared";
import type { Logger } from "../lib/logger.js";
import type { RecordRepository, WorkflowRepository } from "../repositories/types.js";
import { dispatchNotification, type Notifier } from "./notifier.js";
import { newRevision } from "./revision-service.js";

// ─── Configuration ───────────────────────────────────────────────────

export interface SlaMonitorConfig {
  enabled?: boolean;
  intervalMs?: number;
  batchSize?: number;
  /** Run a scan as soon as the monitor starts instead of one interval later. */
  runOnStart?: boolean;
}

const DEFAULT_CONFIG: Required<SlaMonitorConfig> = {
  enabled: true,
  intervalMs: DEFAULT_SLA_CHECK_INTERVAL_MS,
  batchSize: DEFAULT_SLA_SCAN_BATCH_SIZE,
  runOnStart: false,
};

export interface SlaMonitorDeps {
  workflows: WorkflowRepository;
  records: RecordRepository;
  notifier: Notifier;
  clock: Clock;
  logger: Logger;
}

export interface SlaScanResult {
  scanned: number;
  breached: number;
  /** Candidates another writer flagged first. */
  skipped: number;
  failed: number;
}

export const SLA_MONITOR_ACTOR = "system:sla-monitor";

// ─── SlaMonitor class ────────────────────────────────────────────────

export class SlaMonitor {
  private readonly config: Required<SlaMonitorConfig>;
  private readonly workflows: WorkflowRepository;
  private readonly records: RecordRepository;
  private readonly notifier: Notifier;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<SlaScanResult> | null = null;

  constructor(deps: SlaMonitorDeps, config?: SlaMonitorConfig) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.workflows = deps.workflows;
    this.records = deps.records;
    this.notifier = deps.notifier;
    this.clock = deps.clock;
    this.logger = deps.logger.child({ component: "sla-monitor" });
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (!this.config.enabled || this.timer) return;
    this.timer = setInterval(() => this.tick(), this.config.intervalMs);
    this.timer.unref();
    this.logger.info({ intervalMs: this.config.intervalMs }, "sla monitor started");
    if (this.config.runOnStart) this.tick();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info("sla monitor stopped");
  }

  /**
   * One pass over every overdue record. Concurrent calls in this process
   * share the pass already under way.
   */
  scan(): Promise<SlaScanResult> {
    if (this.inFlight) return this.inFlight;
    const pass = this.runScan().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = pass;
    return pass;
  }

  private tick(): void {
    this.scan().catch((err: unknown) => {
      this.logger.error({ err }, "sla scan failed");
    });
  }

  private async runScan(): Promise<SlaScanResult> {
    const now = this.clock.now();
    const result: SlaScanResult = { scanned: 0, breached: 0, skipped: 0, failed: 0 };
    const excludeStateIds = await this.workflows.listTerminalStateIds();

    let after: { slaDueAt: Date; id: string } | undefined;
    for (;;) {
      const batch = await this.records.findSlaCandidates({
        now,
        excludeStateIds,
        limit: this.config.batchSize,
        after,
      });

      for (const candidate of batch) {
        result.scanned++;
        try {
          const flagged = await this.records.markSlaBreached(candidate.id, now, (record) =>
            newRevision({
              recordId: record.id,
              revisionNumber: record.version,
              actionType: "sla_breached",
              performedBy: SLA_MONITOR_ACTOR,
              description: `SLA breached (due ${candidate.slaDueAt.toISOString()})`,
              payload: { slaDueAt: candidate.slaDueAt.toISOString(), detectedAt: now.toISOString() },
              createdAt: now,
            }),
          );
          if (flagged) {
            result.breached++;
            this.notifyBreach(flagged);
          } else {
            result.skipped++;
          }
        } catch (err) {
          result.failed++;
          this.logger.error({ err, recordId: candidate.id }, "could not flag sla breach");
        }
      }

      const last = batch[batch.length - 1];
      if (!last || batch.length < this.config.batchSize) break;
      after = { slaDueAt: last.slaDueAt, id: last.id };
    }

    if (result.scanned > 0) this.logger.info({ ...result }, "sla scan finished");
    return result;
  }

  private notifyBreach(record: CaseRecord): void {
    if (!record.assigneeId) return;
    dispatchNotification(this.notifier, this.logger, {
      kind: "sla_breached",
      recordId: record.id,
      recipients: [record.assigneeId],
      context: { referenceNumber: record.referenceNumber, title: record.title },
    });
  }
}
