import { randomUUID } from "node:crypto";
import {
  DAY_MS,
  WorkflowError,
  notFound,
  type ActorContext,
  type Clock,
  type Revision,
} from "@caseflow/shared";
import type { Logger } from "../lib/logger.js";
import type { Page } from "../lib/pagination.js";
import { parseInput } from "../lib/validation.js";
import type { RecordRepository } from "../repositories/types.js";
import { listRevisionsQuery, type ListRevisionsInput } from "../schemas/record.schema.js";

export function newRevision(fields: Omit<Revision, "id">): Revision {
  return { id: randomUUID(), ...fields };
}

export interface RevisionServiceDeps {
  records: RecordRepository;
  clock: Clock;
  logger: Logger;
  /** Roles allowed to purge; any one of them suffices. */
  purgeRoles: readonly string[];
}

/** Read side and retention of the append-only revision log. */
export class RevisionService {
  private readonly records: RecordRepository;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly purgeRoles: readonly string[];

  constructor(deps: RevisionServiceDeps) {
    this.records = deps.records;
    this.clock = deps.clock;
    this.logger = deps.logger.child({ component: "revision-service" });
    this.purgeRoles = deps.purgeRoles;
  }

  async list(recordId: string, input: ListRevisionsInput = {}): Promise<Page<Revision>> {
    const query = parseInput(listRevisionsQuery, input, "revision query");
    if (!(await this.records.findById(recordId))) throw notFound("Record", recordId);
    return this.records.listRevisions({ ...query, recordId });
  }

  async purgeOlderThan(days: number, actor: ActorContext): Promise<number> {
    if (!actor.roles.some((role) => this.purgeRoles.includes(role))) {
      throw new WorkflowError("Purging revisions requires an administrator", "FORBIDDEN", {
        requiredRoles: [...this.purgeRoles],
      });
    }
    if (!Number.isInteger(days) || days < 1) {
      throw new WorkflowError("Retention must be a whole number of days, at least 1", "VALIDATION_FAILED", {
        days,
      });
    }

    const cutoff = new Date(this.clock.now().getTime() - days * DAY_MS);
    const removed = await this.records.purgeRevisions(cutoff);
    this.logger.info({ removed, cutoff: cutoff.toISOString(), actorId: actor.actorId }, "revisions purged");
    return removed;
  }
}
