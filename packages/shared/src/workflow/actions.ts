import { randomUUID } from "node:crypto";
import { z } from "zod";
import { RECORD_TYPES } from "./types.js";

/** Record fields a `set_field` action may write; `custom.<name>` targets custom fields. */
export const SETTABLE_FIELDS = [
  "priority",
  "severity",
  "title",
  "description",
  "channel",
  "locationId",
  "classificationId",
] as const;
export type SettableField = (typeof SETTABLE_FIELDS)[number];

const SETTABLE_FIELD_RE = new RegExp(`^(${SETTABLE_FIELDS.join("|")}|custom\\.[A-Za-z0-9_]+)$`);

/** `assignee`, `reporter`, `user:<id>` or `role:<id>` */
const RECIPIENT_RE = /^(assignee|reporter|user:.+|role:.+)$/;

const actionBase = {
  id: z.string().min(1).default(() => randomUUID()),
  name: z.string().min(1).max(100),
  isActive: z.boolean().default(true),
};

export const actionSchema = z.discriminatedUnion("kind", [
  z.object({
    ...actionBase,
    kind: z.literal("assign_user"),
    userId: z.string().min(1),
  }),
  z.object({
    ...actionBase,
    kind: z.literal("assign_role"),
    roleId: z.string().min(1),
    autoMatch: z.boolean().default(false),
  }),
  z.object({
    ...actionBase,
    kind: z.literal("assign_department"),
    departmentId: z.string().min(1).optional(),
    autoDetect: z.boolean().default(false),
  }),
  z.object({
    ...actionBase,
    kind: z.literal("set_field"),
    field: z.string().regex(SETTABLE_FIELD_RE, "Unsupported field"),
    value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
  }),
  z.object({
    ...actionBase,
    kind: z.literal("recompute_sla"),
    hours: z.number().positive().optional(),
  }),
  z.object({
    ...actionBase,
    kind: z.literal("change_record_type"),
    recordType: z.enum(RECORD_TYPES),
    /** Workflow to move the record to; matched for the new type when absent. */
    workflowId: z.string().uuid().optional(),
  }),
  z.object({
    ...actionBase,
    kind: z.literal("notify"),
    template: z.string().min(1).max(100),
    recipients: z.array(z.string().regex(RECIPIENT_RE, "Unknown recipient")).min(1),
  }),
]);

export type TransitionAction = z.output<typeof actionSchema>;
export type TransitionActionInput = z.input<typeof actionSchema>;
export type ActionKind = TransitionAction["kind"];

export interface ActionWarning {
  actionId: string;
  actionName: string;
  kind: ActionKind;
  message: string;
}
