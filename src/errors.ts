/**
 * Error classes for lifecycle operations.
 *
 * Validation findings are never thrown: they are collected as diagnostics
 * in a ValidationReport. Everything here is fatal to the single operation
 * that raised it, and the CLI maps each code to an exit status.
 */

import type { ValidationReport } from './validation/types.js';

/**
 * Malformed canonical markdown (a spec.md in the specs tree that no longer
 * follows the requirement grammar).
 */
export class StructuralError extends Error {
  constructor(
    message: string,
    public file: string,
    public line?: number
  ) {
    super(line ? `${file}:${line}: ${message}` : `${file}: ${message}`);
    this.name = 'StructuralError';
  }
}

export type InputErrorCode =
  | 'INVALID_ID'
  | 'DUPLICATE_ID'
  | 'NOT_FOUND'
  | 'NO_WORKSPACE'
  | 'INVALID_CONFIG'
  | 'ALREADY_INITIALIZED'
  | 'UNKNOWN_TASK';

/**
 * Bad user input: ids that fail the naming rules, or that collide.
 */
export class InputError extends Error {
  constructor(
    message: string,
    public code: InputErrorCode,
    public suggestion?: string
  ) {
    super(message);
    this.name = 'InputError';
  }
}

export type StateErrorCode =
  | 'STALE_VALIDATION'
  | 'INCOMPLETE_TASKS'
  | 'CHANGE_LOCKED'
  | 'INVALID_TRANSITION'
  | 'VALIDATION_FAILED';

/**
 * Illegal lifecycle transition for the change's current state.
 */
export class StateError extends Error {
  constructor(
    message: string,
    public code: StateErrorCode,
    public suggestion?: string
  ) {
    super(message);
    this.name = 'StateError';
  }
}

/**
 * Apply refused because tasks are still open.
 */
export class IncompleteTasksError extends StateError {
  constructor(
    message: string,
    public remaining: number
  ) {
    super(message, 'INCOMPLETE_TASKS', 'Mark the remaining tasks done, or pass --all once they are');
    this.name = 'IncompleteTasksError';
  }
}

/**
 * Validate ran but the report does not pass, so no transition happened.
 */
export class ValidationFailedError extends StateError {
  constructor(
    message: string,
    public report: ValidationReport
  ) {
    super(message, 'VALIDATION_FAILED');
    this.name = 'ValidationFailedError';
  }
}

export type MergeErrorCode =
  | 'REQUIREMENT_NOT_FOUND'
  | 'REQUIREMENT_ALREADY_EXISTS'
  | 'MERGE_CONFLICT';

/**
 * One problem found while merging deltas into the specs tree.
 */
export interface MergeIssue {
  code: MergeErrorCode;
  capability: string;
  requirement: string;
  message: string;
}

/**
 * Merge refused. Nothing in the specs tree was written.
 */
export class MergeError extends Error {
  constructor(
    message: string,
    public code: MergeErrorCode,
    public issues: MergeIssue[]
  ) {
    super(message);
    this.name = 'MergeError';
  }
}

/**
 * Filesystem failure, carrying the path that was being touched.
 */
export class FileSystemError extends Error {
  constructor(
    public operation: string,
    public path: string,
    cause: unknown
  ) {
    super(`Failed to ${operation} ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'FileSystemError';
  }
}

/**
 * Node error with an errno code, e.g. ENOENT
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
