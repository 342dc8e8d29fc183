export const APP_NAME = "Caseflow";
export const API_VERSION = "v1";
export const DEFAULT_PAGE_SIZE = 25;
export const MAX_PAGE_SIZE = 100;

export const DEFAULT_SLA_CHECK_INTERVAL_MS = 5 * 60 * 1000;
export const DEFAULT_SLA_SCAN_BATCH_SIZE = 500;
export const DEFAULT_REVISION_RETENTION_DAYS = 365;

export const DEFAULT_SUPER_ADMIN_ROLE = "super_admin";
export const DEFAULT_WORKFLOW_ADMIN_ROLE = "admin";

export const DEFAULT_STATE_COLOR = "#6366f1";

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;
