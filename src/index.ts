/**
 * speclane library entry point.
 *
 * The CLI is a thin layer over ProposalLifecycle; everything it does is
 * available here.
 */

export * from './errors.js';
export * from './schema/index.js';
export * from './parser/index.js';
export * from './store/index.js';
export * from './merge/index.js';
export * from './validation/index.js';
export * from './lifecycle/index.js';
export { hashContent, archiveDate } from './utils/index.js';
