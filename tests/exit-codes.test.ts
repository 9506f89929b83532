/**
 * Tests for exit code constants and the error-to-exit-code mapping
 */

import { describe, it, expect } from 'vitest';
import { EXIT_CODES, EXIT_CODE_METADATA, exitCodeFor } from '../src/cli/exit-codes.js';
import {
  FileSystemError,
  IncompleteTasksError,
  InputError,
  MergeError,
  StateError,
  StructuralError,
} from '../src/errors.js';

describe('EXIT_CODES constants', () => {
  it('should define all semantic exit codes', () => {
    expect(EXIT_CODES.SUCCESS).toBe(0);
    expect(EXIT_CODES.ERROR).toBe(1);
    expect(EXIT_CODES.USAGE_ERROR).toBe(2);
    expect(EXIT_CODES.NOT_FOUND).toBe(3);
    expect(EXIT_CODES.LOCKED).toBe(4);
    expect(EXIT_CODES.CONFLICT).toBe(5);
  });

  it('should have unique values for each exit code', () => {
    const values = Object.values(EXIT_CODES);
    const uniqueValues = new Set(values);
    expect(uniqueValues.size).toBe(values.length);
  });
});

describe('EXIT_CODE_METADATA documentation', () => {
  it('should document all exit codes', () => {
    const codes = Object.values(EXIT_CODES);
    const documentedCodes = EXIT_CODE_METADATA.map((m) => m.code);

    expect(documentedCodes).toHaveLength(codes.length);
    for (const code of codes) {
      expect(documentedCodes).toContain(code);
    }
  });

  it('should map metadata code values to EXIT_CODES constants', () => {
    const metadataByCode = Object.fromEntries(EXIT_CODE_METADATA.map((m) => [m.code, m]));

    expect(metadataByCode[EXIT_CODES.SUCCESS]?.name).toBe('SUCCESS');
    expect(metadataByCode[EXIT_CODES.ERROR]?.name).toBe('ERROR');
    expect(metadataByCode[EXIT_CODES.USAGE_ERROR]?.name).toBe('USAGE_ERROR');
    expect(metadataByCode[EXIT_CODES.NOT_FOUND]?.name).toBe('NOT_FOUND');
    expect(metadataByCode[EXIT_CODES.LOCKED]?.name).toBe('LOCKED');
    expect(metadataByCode[EXIT_CODES.CONFLICT]?.name).toBe('CONFLICT');
  });
});

describe('exitCodeFor', () => {
  it('should map input errors by code', () => {
    expect(exitCodeFor(new InputError('bad id', 'INVALID_ID'))).toBe(EXIT_CODES.USAGE_ERROR);
    expect(exitCodeFor(new InputError('no task 9', 'UNKNOWN_TASK'))).toBe(EXIT_CODES.USAGE_ERROR);
    expect(exitCodeFor(new InputError('missing', 'NOT_FOUND'))).toBe(EXIT_CODES.NOT_FOUND);
    expect(exitCodeFor(new InputError('no workspace', 'NO_WORKSPACE'))).toBe(EXIT_CODES.NOT_FOUND);
    expect(exitCodeFor(new InputError('exists', 'DUPLICATE_ID'))).toBe(EXIT_CODES.USAGE_ERROR);
    expect(exitCodeFor(new InputError('exists', 'ALREADY_INITIALIZED'))).toBe(EXIT_CODES.CONFLICT);
  });

  it('should map state errors', () => {
    expect(exitCodeFor(new StateError('stale', 'STALE_VALIDATION'))).toBe(EXIT_CODES.ERROR);
    expect(exitCodeFor(new IncompleteTasksError('open', 2))).toBe(EXIT_CODES.ERROR);
    expect(exitCodeFor(new StateError('draft', 'INVALID_TRANSITION'))).toBe(EXIT_CODES.ERROR);
    expect(exitCodeFor(new StateError('locked', 'CHANGE_LOCKED'))).toBe(EXIT_CODES.LOCKED);
  });

  it('should treat every merge refusal as a failed operation', () => {
    expect(exitCodeFor(new MergeError('conflict', 'MERGE_CONFLICT', []))).toBe(EXIT_CODES.ERROR);
    expect(exitCodeFor(new MergeError('missing', 'REQUIREMENT_NOT_FOUND', []))).toBe(EXIT_CODES.ERROR);
  });

  it('should treat everything else as a general error', () => {
    expect(exitCodeFor(new StructuralError('bad header', 'specs/auth/spec.md', 3))).toBe(EXIT_CODES.ERROR);
    expect(exitCodeFor(new FileSystemError('read', '/x', new Error('EACCES')))).toBe(EXIT_CODES.ERROR);
    expect(exitCodeFor('boom')).toBe(EXIT_CODES.ERROR);
  });
});
