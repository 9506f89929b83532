/**
 * Validation report text
 */

import chalk from 'chalk';

/**
 * Diagnostic messages produced by the validator
 */
export const diagnostics = {
  missingFile: (file: string) => `Missing required file ${file}`,
  noDeltas: 'No spec deltas: add at least one specs/<capability>/spec.md',
  invalidCapabilityDir: (name: string) =>
    `Capability directory "${name}" is not lowercase kebab-case`,
  missingSection: (name: string) => `Missing required section "## ${name}"`,
  sectionOutOfOrder: (name: string, after: string) =>
    `Section "${name}" must come before "${after}"`,
  emptySections: (names: string[]) =>
    `Section${names.length === 1 ? '' : 's'} left empty: ${names.join(', ')}`,
  unknownRelated: (capability: string) =>
    `Related capability "${capability}" does not exist and no ADDED delta in this change introduces it`,
  emptyDelta: 'Spec delta has no ADDED, MODIFIED or REMOVED requirements',
  bareBullet: (text: string) => `List item is not a task checkbox ("- [ ]" or "- [x]"): ${text}`,
  noTasks: 'tasks.md has no tasks',
  addedExists: (title: string, capability: string) =>
    `ADDED "${title}" already exists in ${capability}; archiving will fail`,
  targetMissing: (operation: string, title: string, capability: string) =>
    `${operation} "${title}" not found in ${capability}; archiving will fail`,
  canonicalUnreadable: (capability: string) =>
    `Canonical spec for ${capability} does not parse; cannot check targets`,
} as const;

/**
 * Report summary lines
 */
export const report = {
  passed: (id: string) => chalk.green.bold(`✓ Change ${id} is valid`),
  failed: (id: string) => chalk.red.bold(`✗ Change ${id} has problems`),
  counts: (errors: number, warnings: number) =>
    chalk.gray(`${errors} error(s), ${warnings} warning(s)`),
  strictNote: chalk.gray('(strict: warnings count as errors)'),
} as const;
