export * from "./constants.js";
export * from "./clock.js";
export * from "./workflow/index.js";
export * from "./records/index.js";
export * from "./matching/index.js";
