import type { WorkflowLifecycle } from "./types.js";
import { WorkflowError } from "./types.js";

export interface LifecycleMove {
  from: WorkflowLifecycle;
  to: WorkflowLifecycle;
}

export const WORKFLOW_LIFECYCLE_MOVES: readonly LifecycleMove[] = [
  { from: "active", to: "soft_deleted" },
  { from: "soft_deleted", to: "active" },
  { from: "active", to: "purged" },
  { from: "soft_deleted", to: "purged" },
];

export function canMoveLifecycle(from: WorkflowLifecycle, to: WorkflowLifecycle): boolean {
  return WORKFLOW_LIFECYCLE_MOVES.some((m) => m.from === from && m.to === to);
}

export function assertLifecycleMove(
  workflowId: string,
  from: WorkflowLifecycle,
  to: WorkflowLifecycle,
): void {
  if (!canMoveLifecycle(from, to)) {
    throw new WorkflowError(
      `Workflow cannot move from "${from}" to "${to}"`,
      "INVALID_TOPOLOGY",
      {
        workflowId,
        from,
        to,
        allowed: WORKFLOW_LIFECYCLE_MOVES.filter((m) => m.from === from).map((m) => m.to),
      },
    );
  }
}
