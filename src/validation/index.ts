// Re-export validation

export type {
  Diagnostic,
  DiagnosticRule,
  ValidateOptions,
  ValidationReport,
} from './types.js';
export { checkProposal, checkTasks, validateChange } from './validator.js';
