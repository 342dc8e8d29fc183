import { z } from "zod";
import {
  DEFAULT_STATE_COLOR,
  RECORD_TYPES,
  WORKFLOW_RECORD_TYPES,
  actionSchema,
  matchConstraintsSchema,
  requirementSchema,
} from "@caseflow/shared";
import { booleanQuery } from "./common.schema.js";

const code = z
  .string()
  .min(2)
  .max(50)
  .regex(/^[a-z0-9_]+$/, "Use lowercase letters, digits and underscores");

// ─── Workflows ───────────────────────────────────────────────────────

export const createWorkflowSchema = z.object({
  name: z.string().min(2).max(100),
  code,
  description: z.string().max(500).default(""),
  recordType: z.enum(WORKFLOW_RECORD_TYPES).default("all"),
  isActive: z.boolean().default(true),
  isDefault: z.boolean().default(false),
  classificationIds: z.array(z.string().min(1)).default([]),
  matchConstraints: matchConstraintsSchema.default({}),
  requiredFields: z.array(z.string().min(1)).default([]),
});

export const updateWorkflowSchema = createWorkflowSchema.partial();

export const listWorkflowsQuery = z.object({
  recordType: z.enum(WORKFLOW_RECORD_TYPES).optional(),
  activeOnly: booleanQuery.optional(),
});

export const deleteWorkflowQuery = z.object({
  permanent: booleanQuery.default("false"),
});

export const assignClassificationsSchema = z.object({
  classificationIds: z.array(z.string().min(1)),
});

export const matchWorkflowSchema = z.object({
  recordType: z.enum(RECORD_TYPES),
  classificationId: z.string().min(1).nullish(),
  locationId: z.string().min(1).nullish(),
  departmentId: z.string().min(1).nullish(),
  channel: z.string().min(1).nullish(),
});

// ─── States ──────────────────────────────────────────────────────────

export const createStateSchema = z.object({
  name: z.string().min(1).max(100),
  code,
  description: z.string().max(500).default(""),
  isInitial: z.boolean().default(false),
  isTerminal: z.boolean().default(false),
  slaHours: z.number().int().positive().nullable().default(null),
  color: z.string().regex(/^#[0-9a-fA-F]{6}$/).default(DEFAULT_STATE_COLOR),
  sortOrder: z.number().int().default(0),
  isActive: z.boolean().default(true),
});

export const updateStateSchema = createStateSchema.partial();

// ─── Transitions ─────────────────────────────────────────────────────

export const createTransitionSchema = z.object({
  name: z.string().min(1).max(100),
  code,
  description: z.string().max(500).default(""),
  fromStateId: z.string().uuid(),
  toStateId: z.string().uuid(),
  allowedRoles: z.array(z.string().min(1)).default([]),
  requirements: z.array(requirementSchema).default([]),
  actions: z.array(actionSchema).default([]),
  sortOrder: z.number().int().default(0),
  isActive: z.boolean().default(true),
});

export const updateTransitionSchema = createTransitionSchema.partial();

export type CreateWorkflowInput = z.input<typeof createWorkflowSchema>;
export type UpdateWorkflowInput = z.input<typeof updateWorkflowSchema>;
export type MatchWorkflowInput = z.input<typeof matchWorkflowSchema>;
export type CreateStateInput = z.input<typeof createStateSchema>;
export type UpdateStateInput = z.input<typeof updateStateSchema>;
export type CreateTransitionInput = z.input<typeof createTransitionSchema>;
export type UpdateTransitionInput = z.input<typeof updateTransitionSchema>;
