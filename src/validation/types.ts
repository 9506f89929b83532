/**
 * Validation report types
 */

import type { Severity } from '../schema/index.js';
import type { ParseErrorKind } from '../parser/types.js';

/**
 * Rule that produced a diagnostic. Parse failures use their ParseErrorKind.
 */
export type DiagnosticRule =
  | 'MissingFile'
  | 'NoDeltas'
  | 'InvalidCapabilityName'
  | 'MissingProposalSection'
  | 'SectionOutOfOrder'
  | 'EmptyProposalSection'
  | 'UnknownRelatedCapability'
  | 'EmptyDelta'
  | 'MergeConflict'
  | 'MergeTargetMismatch'
  | 'TaskWithoutCheckbox'
  | 'NoTasks'
  | ParseErrorKind;

export interface Diagnostic {
  severity: Severity;
  /** Path relative to the change directory */
  file: string;
  /** 1-based line, when the problem has one */
  line?: number;
  rule: DiagnosticRule;
  message: string;
}

export interface ValidationReport {
  changeId: string;
  strict: boolean;
  /** Whether the change passes: no errors, and no warnings when strict */
  valid: boolean;
  diagnostics: Diagnostic[];
  stats: {
    errors: number;
    warnings: number;
    deltas: number;
    requirements: number;
    tasks: number;
  };
}

export interface ValidateOptions {
  strict?: boolean;
}
