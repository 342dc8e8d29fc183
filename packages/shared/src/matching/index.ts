export { CriteriaMatcher } from "./matcher.js";
export type {
  ConstraintSet,
  MatchCriteria,
  MatchCandidate,
  RankedCandidate,
  MatchResult,
} from "./matcher.js";
export {
  WORKFLOW_DIMENSIONS,
  DEPARTMENT_DIMENSIONS,
  USER_DIMENSIONS,
  workflowMatcher,
  departmentMatcher,
  userMatcher,
} from "./dimensions.js";
export type { WorkflowDimension, DepartmentDimension, UserDimension } from "./dimensions.js";
