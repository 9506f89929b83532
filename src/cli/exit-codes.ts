/**
 * Semantic exit codes for the speclane CLI
 *
 * Centralized constants for all CLI exit codes
 *
 * @see Use these constants instead of magic numbers throughout the CLI
 */

import { InputError, StateError } from '../errors.js';

export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** Operation refused or failed (failing report, stale validation, open tasks, merge error, file system) */
  ERROR: 1,

  /** Usage error (invalid or duplicate change id, unknown task number, bad config) */
  USAGE_ERROR: 2,

  /** Not found (change or workspace doesn't exist) */
  NOT_FOUND: 3,

  /** Another invocation holds the change's lock */
  LOCKED: 4,

  /** Workspace already initialized */
  CONFLICT: 5,
} as const;

/**
 * Type for exit codes
 */
export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code metadata for documentation
 */
export const EXIT_CODE_METADATA = [
  {
    code: EXIT_CODES.SUCCESS,
    name: 'SUCCESS',
    description: 'Command completed successfully',
    commands: 'All commands',
  },
  {
    code: EXIT_CODES.ERROR,
    name: 'ERROR',
    description: 'Validation failed, validation stale, tasks open, merge refused, or file system error',
    commands: 'All commands',
  },
  {
    code: EXIT_CODES.USAGE_ERROR,
    name: 'USAGE_ERROR',
    description: 'Invalid or duplicate change id, unknown task, bad arguments or config',
    commands: 'All commands',
  },
  {
    code: EXIT_CODES.NOT_FOUND,
    name: 'NOT_FOUND',
    description: 'Change or workspace not found',
    commands: 'validate, apply, archive, show',
  },
  {
    code: EXIT_CODES.LOCKED,
    name: 'LOCKED',
    description: 'Change is locked by another invocation',
    commands: 'validate, apply, archive',
  },
  {
    code: EXIT_CODES.CONFLICT,
    name: 'CONFLICT',
    description: 'Workspace already exists',
    commands: 'init',
  },
] as const;

/**
 * Exit code for an error thrown by a lifecycle operation
 */
export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof InputError) {
    switch (err.code) {
      case 'NOT_FOUND':
      case 'NO_WORKSPACE':
        return EXIT_CODES.NOT_FOUND;
      case 'ALREADY_INITIALIZED':
        return EXIT_CODES.CONFLICT;
      default:
        return EXIT_CODES.USAGE_ERROR;
    }
  }
  if (err instanceof StateError && err.code === 'CHANGE_LOCKED') {
    return EXIT_CODES.LOCKED;
  }
  return EXIT_CODES.ERROR;
}
