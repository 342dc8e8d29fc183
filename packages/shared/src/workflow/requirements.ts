import { randomUUID } from "node:crypto";
import { z } from "zod";
import { readRecordField, type CaseRecord } from "../records/types.js";
import type { WorkflowTransition } from "./types.js";

// ─── Configuration ───────────────────────────────────────────────────

const requirementBase = {
  id: z.string().min(1).default(() => randomUUID()),
  isMandatory: z.boolean().default(true),
  errorMessage: z.string().max(200).optional(),
};

export const requirementSchema = z.discriminatedUnion("kind", [
  z.object({ ...requirementBase, kind: z.literal("comment") }),
  z.object({
    ...requirementBase,
    kind: z.literal("field_value"),
    field: z.string().min(1).max(100),
    expectedValue: z.string().optional(),
  }),
  z.object({ ...requirementBase, kind: z.literal("attachment") }),
  z.object({
    ...requirementBase,
    kind: z.literal("min_attachments"),
    count: z.number().int().min(1).max(50),
  }),
  z.object({ ...requirementBase, kind: z.literal("feedback") }),
]);

export type TransitionRequirement = z.output<typeof requirementSchema>;
export type TransitionRequirementInput = z.input<typeof requirementSchema>;
export type RequirementKind = TransitionRequirement["kind"];

// ─── Payload ─────────────────────────────────────────────────────────

export const feedbackSchema = z.object({
  rating: z.number().int().min(1).max(5),
  comment: z.string().max(2000).optional(),
});

export const transitionPayloadSchema = z.object({
  expectedVersion: z.number().int().min(1),
  comment: z.string().max(5000).optional(),
  attachments: z.array(z.string().min(1)).default([]),
  fields: z.record(z.unknown()).default({}),
  feedback: feedbackSchema.optional(),
  assigneeId: z.string().min(1).optional(),
  departmentId: z.string().min(1).optional(),
});

export type TransitionPayload = z.output<typeof transitionPayloadSchema>;
export type TransitionPayloadInput = z.input<typeof transitionPayloadSchema>;

// ─── Validation ──────────────────────────────────────────────────────

export interface RequirementViolation {
  requirementId: string;
  kind: RequirementKind;
  message: string;
  field?: string;
}

function isBlank(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === "string") return value.trim().length === 0;
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

/**
 * Checks every mandatory requirement of a transition against the payload
 * and the record. All failures are reported; an empty list means the
 * transition may proceed.
 */
export function validateRequirements(
  transition: Pick<WorkflowTransition, "requirements">,
  record: CaseRecord,
  payload: TransitionPayload,
): RequirementViolation[] {
  const violations: RequirementViolation[] = [];

  for (const requirement of transition.requirements) {
    if (!requirement.isMandatory) continue;

    const fail = (fallback: string, field?: string) => {
      violations.push({
        requirementId: requirement.id,
        kind: requirement.kind,
        message: requirement.errorMessage ?? fallback,
        ...(field !== undefined ? { field } : {}),
      });
    };

    switch (requirement.kind) {
      case "comment":
        if (isBlank(payload.comment)) fail("A comment is required");
        break;

      case "field_value": {
        const supplied = payload.fields[requirement.field];
        const value = supplied !== undefined ? supplied : readRecordField(record, requirement.field);
        if (isBlank(value)) {
          fail(`Field "${requirement.field}" is required`, requirement.field);
        } else if (
          requirement.expectedValue !== undefined &&
          String(value) !== requirement.expectedValue
        ) {
          fail(
            `Field "${requirement.field}" must equal "${requirement.expectedValue}"`,
            requirement.field,
          );
        }
        break;
      }

      case "attachment":
        if (payload.attachments.length === 0) fail("An attachment is required");
        break;

      case "min_attachments":
        if (payload.attachments.length < requirement.count) {
          fail(`At least ${requirement.count} attachment(s) required`);
        }
        break;

      case "feedback":
        if (payload.feedback === undefined) fail("Feedback with a rating from 1 to 5 is required");
        break;
    }
  }

  return violations;
}
