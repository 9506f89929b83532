// Re-export utilities

export { hashContent } from "./hash.js";
export { archiveDate, formatRelativeTime } from "./time.js";
