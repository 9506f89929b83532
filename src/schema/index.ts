// Re-export all schemas and types

export * from "./common.js";
export * from "./change.js";
export * from "./config.js";
