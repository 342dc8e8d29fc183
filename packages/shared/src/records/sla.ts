import { HOUR_MS } from "../constants.js";
import type { CaseRecord } from "./types.js";

export function computeSlaDueAt(from: Date, hours: number | null | undefined): Date | null {
  if (hours === null || hours === undefined || hours <= 0) return null;
  return new Date(from.getTime() + hours * HOUR_MS);
}

export type SlaTrackedRecord = CaseRecord & { slaDueAt: Date };

export function hasSlaDueAt(record: CaseRecord): record is SlaTrackedRecord {
  return record.slaDueAt !== null;
}

/** Past due and not yet flagged. */
export function isSlaOverdue(record: CaseRecord, now: Date): boolean {
  return !record.slaBreached && record.slaDueAt !== null && record.slaDueAt.getTime() < now.getTime();
}
