import type { Clock } from "@caseflow/shared";
import type { AppConfig } from "../lib/config.js";
import type { Logger } from "../lib/logger.js";
import type { RecordRepository, WorkflowRepository } from "../repositories/types.js";
import { ActionExecutor } from "./action-executor.js";
import type { Directory } from "./directory.js";
import type { Notifier } from "./notifier.js";
import { RecordService } from "./record-service.js";
import { RevisionService } from "./revision-service.js";
import { SlaMonitor } from "./sla-monitor.js";
import { TransitionService } from "./transition-service.js";
import { WorkflowService } from "./workflow-service.js";

export interface ServiceDeps {
  workflowRepository: WorkflowRepository;
  recordRepository: RecordRepository;
  notifier: Notifier;
  directory: Directory;
  clock: Clock;
  logger: Logger;
  config: Pick<AppConfig, "superAdminRole" | "workflowAdminRole" | "sla">;
}

export interface AppServices {
  workflows: WorkflowService;
  records: RecordService;
  transitions: TransitionService;
  revisions: RevisionService;
  slaMonitor: SlaMonitor;
}

export function createServices(deps: ServiceDeps): AppServices {
  const { workflowRepository: workflows, recordRepository: records, clock, logger, config } = deps;

  const workflowService = new WorkflowService({ workflows, records, clock, logger });
  const actions = new ActionExecutor({
    records,
    workflows: workflowService,
    directory: deps.directory,
    notifier: deps.notifier,
    clock,
    logger,
  });

  return {
    workflows: workflowService,
    records: new RecordService({ records, workflowService, clock, logger }),
    transitions: new TransitionService({
      workflows,
      records,
      actions,
      clock,
      logger,
      superAdminRole: config.superAdminRole,
    }),
    revisions: new RevisionService({
      records,
      clock,
      logger,
      purgeRoles: [config.workflowAdminRole, config.superAdminRole],
    }),
    slaMonitor: new SlaMonitor(
      { workflows, records, notifier: deps.notifier, clock, logger },
      { enabled: config.sla.enabled, intervalMs: config.sla.intervalMs, batchSize: config.sla.batchSize },
    ),
  };
}

export { WorkflowService } from "./workflow-service.js";
export { TransitionService } from "./transition-service.js";
export { ActionExecutor } from "./action-executor.js";
export { SlaMonitor } from "./sla-monitor.js";
export { RevisionService } from "./revision-service.js";
export { RecordService } from "./record-service.js";
export { LogNotifier, dispatchNotification } from "./notifier.js";
export type { Notifier, NotificationContext, NotificationRequest } from "./notifier.js";
export { StaticDirectory } from "./directory.js";
export type { Directory, DepartmentEntry, UserEntry } from "./directory.js";
