import { CriteriaMatcher } from "./matcher.js";

export const WORKFLOW_DIMENSIONS = [
  "classification",
  "location",
  "department",
  "channel",
  "recordType",
] as const;
export type WorkflowDimension = (typeof WORKFLOW_DIMENSIONS)[number];

export const DEPARTMENT_DIMENSIONS = ["classification", "location"] as const;
export type DepartmentDimension = (typeof DEPARTMENT_DIMENSIONS)[number];

export const USER_DIMENSIONS = ["classification", "location", "department"] as const;
export type UserDimension = (typeof USER_DIMENSIONS)[number];

export const workflowMatcher = new CriteriaMatcher<WorkflowDimension>(WORKFLOW_DIMENSIONS);
export const departmentMatcher = new CriteriaMatcher<DepartmentDimension>(DEPARTMENT_DIMENSIONS);
export const userMatcher = new CriteriaMatcher<UserDimension>(USER_DIMENSIONS);
