import { z } from "zod";
import { DEFAULT_STATE_COLOR } from "../constants.js";
import { actionSchema } from "./actions.js";
import { requirementSchema } from "./requirements.js";
import type { WorkflowGraph } from "./types.js";
import { WORKFLOW_RECORD_TYPES } from "./types.js";

export const WORKFLOW_EXPORT_FORMAT = "caseflow.workflow";
export const WORKFLOW_EXPORT_VERSION = 1;

export const matchConstraintsSchema = z.object({
  locationIds: z.array(z.string().min(1)).optional(),
  departmentIds: z.array(z.string().min(1)).optional(),
  channels: z.array(z.string().min(1)).optional(),
});

const exportedStateSchema = z.object({
  code: z.string().min(1).max(50),
  name: z.string().min(1).max(100),
  description: z.string().max(500).default(""),
  isInitial: z.boolean().default(false),
  isTerminal: z.boolean().default(false),
  slaHours: z.number().int().positive().nullable().default(null),
  color: z.string().max(20).default(DEFAULT_STATE_COLOR),
  sortOrder: z.number().int().default(0),
  isActive: z.boolean().default(true),
});

const exportedTransitionSchema = z.object({
  code: z.string().min(1).max(50),
  name: z.string().min(1).max(100),
  description: z.string().max(500).default(""),
  from: z.string().min(1),
  to: z.string().min(1),
  allowedRoles: z.array(z.string().min(1)).default([]),
  requirements: z.array(requirementSchema).default([]),
  actions: z.array(actionSchema).default([]),
  sortOrder: z.number().int().default(0),
  isActive: z.boolean().default(true),
});

/**
 * Portable workflow document. States are referenced by code so the graph can
 * be recreated with fresh identifiers.
 */
export const workflowExportSchema = z.object({
  format: z.literal(WORKFLOW_EXPORT_FORMAT),
  version: z.literal(WORKFLOW_EXPORT_VERSION),
  exportedAt: z.string().datetime().optional(),
  workflow: z.object({
    name: z.string().min(1).max(100),
    code: z.string().min(1).max(50),
    description: z.string().max(500).default(""),
    recordType: z.enum(WORKFLOW_RECORD_TYPES),
    isDefault: z.boolean().default(false),
    classificationIds: z.array(z.string().min(1)).default([]),
    matchConstraints: matchConstraintsSchema.default({}),
    requiredFields: z.array(z.string().min(1)).default([]),
  }),
  states: z.array(exportedStateSchema),
  transitions: z.array(exportedTransitionSchema),
});

export type WorkflowExport = z.output<typeof workflowExportSchema>;
export type WorkflowExportInput = z.input<typeof workflowExportSchema>;

export function exportWorkflowGraph(graph: WorkflowGraph, exportedAt: Date): WorkflowExportInput {
  const codeById = new Map(graph.states.map((s) => [s.id, s.code]));
  const codeOf = (stateId: string): string => {
    const code = codeById.get(stateId);
    if (code === undefined) throw new Error(`State ${stateId} is not part of the workflow`);
    return code;
  };
  const { workflow } = graph;

  return {
    format: WORKFLOW_EXPORT_FORMAT,
    version: WORKFLOW_EXPORT_VERSION,
    exportedAt: exportedAt.toISOString(),
    workflow: {
      name: workflow.name,
      code: workflow.code,
      description: workflow.description,
      recordType: workflow.recordType,
      isDefault: workflow.isDefault,
      classificationIds: [...workflow.classificationIds],
      matchConstraints: structuredClone(workflow.matchConstraints),
      requiredFields: [...workflow.requiredFields],
    },
    states: [...graph.states]
      .sort((a, b) => a.sortOrder - b.sortOrder)
      .map((s) => ({
        code: s.code,
        name: s.name,
        description: s.description,
        isInitial: s.isInitial,
        isTerminal: s.isTerminal,
        slaHours: s.slaHours,
        color: s.color,
        sortOrder: s.sortOrder,
        isActive: s.isActive,
      })),
    transitions: [...graph.transitions]
      .sort((a, b) => a.sortOrder - b.sortOrder)
      .map((t) => ({
        code: t.code,
        name: t.name,
        description: t.description,
        from: codeOf(t.fromStateId),
        to: codeOf(t.toStateId),
        allowedRoles: [...t.allowedRoles],
        requirements: t.requirements.map((r) => ({ ...r })),
        actions: t.actions.map((a) => ({ ...a })),
        sortOrder: t.sortOrder,
        isActive: t.isActive,
      })),
  };
}

/** Structural problems that make a document unimportable. */
export function checkExportTopology(doc: WorkflowExport): string[] {
  const problems: string[] = [];
  const stateCodes = new Set<string>();
  const terminal = new Set<string>();

  for (const state of doc.states) {
    if (stateCodes.has(state.code)) problems.push(`Duplicate state code "${state.code}"`);
    stateCodes.add(state.code);
    if (state.isTerminal) terminal.add(state.code);
    if (state.isInitial && state.isTerminal) {
      problems.push(`State "${state.code}" cannot be both initial and terminal`);
    }
  }

  if (doc.states.filter((s) => s.isInitial).length > 1) {
    problems.push("More than one initial state");
  }

  const transitionCodes = new Set<string>();
  for (const t of doc.transitions) {
    if (transitionCodes.has(t.code)) problems.push(`Duplicate transition code "${t.code}"`);
    transitionCodes.add(t.code);
    if (!stateCodes.has(t.from)) problems.push(`Transition "${t.code}" starts from unknown state "${t.from}"`);
    if (!stateCodes.has(t.to)) problems.push(`Transition "${t.code}" targets unknown state "${t.to}"`);
    if (terminal.has(t.from)) problems.push(`Transition "${t.code}" leaves terminal state "${t.from}"`);
  }

  return problems;
}
