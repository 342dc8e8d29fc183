import type {
  CaseRecord,
  RecordAttachment,
  RecordComment,
  RecordFeedback,
  RecordPatch,
  RecordType,
  Revision,
  RevisionActionType,
  SlaTrackedRecord,
  TransitionHistoryEntry,
  WorkflowDefinition,
  WorkflowGraph,
  WorkflowRecordType,
  WorkflowState,
  WorkflowTransition,
} from "@caseflow/shared";
import type { Page, PaginationParams } from "../lib/pagination.js";

// ─── Workflow definitions ────────────────────────────────────────────

export type WorkflowPatch = Partial<Omit<WorkflowDefinition, "id" | "createdAt" | "createdBy">>;
export type StatePatch = Partial<Omit<WorkflowState, "id" | "workflowId" | "createdAt">>;
export type TransitionPatch = Partial<Omit<WorkflowTransition, "id" | "workflowId" | "createdAt">>;

export interface WorkflowQuery {
  /** Includes workflows that serve every record type. */
  recordType?: WorkflowRecordType;
  activeOnly?: boolean;
  lifecycle?: WorkflowDefinition["lifecycle"];
}

export interface WorkflowRepository {
  insertWorkflow(workflow: WorkflowDefinition): Promise<WorkflowDefinition>;
  updateWorkflow(id: string, patch: WorkflowPatch): Promise<WorkflowDefinition | null>;
  findWorkflow(id: string): Promise<WorkflowDefinition | null>;
  findWorkflowByCode(code: string): Promise<WorkflowDefinition | null>;
  listWorkflows(query: WorkflowQuery): Promise<WorkflowDefinition[]>;
  /** Clears the default flag on every other workflow of the same record type, then sets it on this one. */
  markDefault(id: string): Promise<void>;
  loadGraph(id: string): Promise<WorkflowGraph | null>;
  /** Inserts a complete graph in one unit of work. */
  saveGraph(graph: WorkflowGraph): Promise<void>;
  /** Removes the workflow with its states, transitions and classifications. */
  purgeWorkflow(id: string): Promise<void>;

  /** Inserting an initial state demotes the current initial state of the workflow in the same unit of work. */
  insertState(state: WorkflowState): Promise<WorkflowState>;
  /** Same demotion rule as insertState when the patch sets isInitial. */
  updateState(id: string, patch: StatePatch): Promise<WorkflowState | null>;
  deleteState(id: string): Promise<void>;
  findState(id: string): Promise<WorkflowState | null>;
  listStates(workflowId: string): Promise<WorkflowState[]>;
  listTerminalStateIds(): Promise<string[]>;

  insertTransition(transition: WorkflowTransition): Promise<WorkflowTransition>;
  updateTransition(id: string, patch: TransitionPatch): Promise<WorkflowTransition | null>;
  deleteTransition(id: string): Promise<void>;
  findTransition(id: string): Promise<WorkflowTransition | null>;
  listTransitions(workflowId: string): Promise<WorkflowTransition[]>;
  /** Transitions starting or ending at the state. */
  listTransitionsTouching(stateId: string): Promise<WorkflowTransition[]>;
}

// ─── Records ─────────────────────────────────────────────────────────

export interface RecordQuery extends PaginationParams {
  recordType?: RecordType;
  workflowId?: string;
  currentStateId?: string;
  assigneeId?: string;
  reporterId?: string;
  slaBreached?: boolean;
  search?: string;
}

export interface RevisionQuery extends PaginationParams {
  recordId: string;
  actionType?: RevisionActionType;
  performedBy?: string;
  from?: Date;
  to?: Date;
  order: "asc" | "desc";
}

/**
 * Everything one mutation writes. The store applies it atomically or not at
 * all: record patch, version increment, and every row given here.
 */
export interface RecordMutation {
  patch: RecordPatch;
  revision: Revision;
  history?: TransitionHistoryEntry;
  comment?: RecordComment;
  attachment?: RecordAttachment;
  feedback?: RecordFeedback;
}

export interface SlaCandidateQuery {
  now: Date;
  excludeStateIds: readonly string[];
  limit: number;
  /** Keyset cursor: candidates strictly after this position in (slaDueAt, id) order. */
  after?: { slaDueAt: Date; id: string };
}

export interface RecordRepository {
  /** Next reference number for the type; never reused. */
  nextReferenceNumber(recordType: RecordType): Promise<string>;
  insert(record: CaseRecord, revision: Revision): Promise<CaseRecord>;
  findById(id: string): Promise<CaseRecord | null>;
  list(query: RecordQuery): Promise<Page<CaseRecord>>;
  countByWorkflow(workflowId: string): Promise<number>;
  countInState(stateId: string): Promise<number>;

  /**
   * Compare-and-swap: applies the mutation only while the stored version
   * equals `expectedVersion`, and bumps the version by one. Returns null
   * when the version moved on.
   */
  applyMutation(
    recordId: string,
    expectedVersion: number,
    mutation: RecordMutation,
  ): Promise<CaseRecord | null>;

  /** Overdue, unflagged records ordered by (slaDueAt, id). */
  findSlaCandidates(query: SlaCandidateQuery): Promise<SlaTrackedRecord[]>;
  /**
   * Flips slaBreached only if it is still false and the due time is still
   * before `now`, bumping the version and appending the revision built from
   * the flipped record. Returns null when another writer got there first.
   */
  markSlaBreached(
    recordId: string,
    now: Date,
    buildRevision: (flagged: CaseRecord) => Revision,
  ): Promise<CaseRecord | null>;

  appendRevision(revision: Revision): Promise<Revision>;
  listRevisions(query: RevisionQuery): Promise<Page<Revision>>;
  /** Removes revisions created before the cutoff; returns how many. */
  purgeRevisions(before: Date): Promise<number>;

  listHistory(recordId: string): Promise<TransitionHistoryEntry[]>;
  listComments(recordId: string): Promise<RecordComment[]>;
  listAttachments(recordId: string): Promise<RecordAttachment[]>;
  listFeedback(recordId: string): Promise<RecordFeedback[]>;
}
