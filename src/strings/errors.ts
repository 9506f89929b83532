/**
 * Centralized error messages for CLI commands and lifecycle operations
 *
 * Organizes error messages by category to improve maintainability and consistency.
 */

/**
 * Change id and lookup errors
 */
export const inputErrors = {
  invalidIdFormat: (id: string) =>
    `Invalid change id "${id}": use lowercase kebab-case, e.g. add-user-auth`,
  invalidIdTooShort: (id: string) =>
    `Invalid change id "${id}": name what changes after the verb, e.g. ${id}-something`,
  invalidIdVerb: (id: string, verb: string) =>
    `Invalid change id "${id}": must start with a verb ("${verb}" is not one)`,
  verbHint: (verbs: string[]) => `Known verbs: ${verbs.join(', ')}`,
  duplicateId: (id: string) => `Change "${id}" already exists`,
  duplicateArchivedId: (id: string, dir: string) =>
    `Change "${id}" was already archived as ${dir}`,
  changeNotFound: (id: string) => `Change not found: ${id}`,
  invalidCapability: (name: string) =>
    `Invalid capability name "${name}": use lowercase kebab-case`,
} as const;

/**
 * Workspace and configuration errors
 */
export const projectErrors = {
  noWorkspace: 'No openspec/ directory found in this directory or any parent',
  initHint: 'Run `speclane init` to create one',
  alreadyInitialized: (dir: string) => `Workspace already exists at ${dir}`,
  invalidConfig: (file: string, issues: string) => `Invalid config ${file}: ${issues}`,
} as const;

/**
 * Lifecycle state errors
 */
export const stateErrors = {
  changeLocked: (id: string, operation?: string, pid?: number) =>
    operation && pid
      ? `Change "${id}" is locked by another ${operation} (pid ${pid})`
      : `Change "${id}" is locked by another invocation`,
  changeLockedHint: (lockPath: string) =>
    `Retry when it finishes, or remove ${lockPath} if no other invocation is running`,
  notValidated: (id: string, status: string) =>
    `Cannot apply "${id}": status is ${status}, it must be validated first`,
  validateHint: (id: string) => `Run \`speclane validate ${id}\``,
  cannotApplyArchived: (id: string) => `Cannot apply "${id}": it is already archived`,
  notApplied: (id: string, status: string) =>
    `Cannot archive "${id}": status is ${status}, it must be applied first`,
  staleValidation: (id: string, files: string[]) =>
    `Validation of "${id}" is stale: ${files.join(', ')} changed since it passed`,
  incompleteTasks: (remaining: number) =>
    `${remaining} task${remaining === 1 ? '' : 's'} not done`,
  unknownTask: (index: number, total: number) =>
    `No task #${index} (tasks.md has ${total})`,
  validationFailed: (id: string, errors: number, warnings: number, strict: boolean) =>
    strict && errors === 0
      ? `Change "${id}" failed strict validation with ${warnings} warning(s)`
      : `Change "${id}" failed validation with ${errors} error(s)`,
} as const;

/**
 * Merge errors
 */
export const mergeErrors = {
  requirementNotFound: (capability: string, title: string, operation: string) =>
    `${operation} "${title}": no such requirement in ${capability}`,
  requirementAlreadyExists: (capability: string, title: string) =>
    `ADDED "${title}": ${capability} already has this requirement`,
  conflict: (capability: string, title: string, operations: string[]) =>
    `"${title}" in ${capability} is both ${operations.join(' and ')}`,
  failed: (count: number) => `Merge failed with ${count} problem(s); specs left unchanged`,
  conflictSummary: (count: number) =>
    `${count} requirement(s) have contradictory operations; nothing merged`,
  malformedSpec: 'Canonical spec does not parse',
} as const;

/**
 * Generic operation failures (with err object)
 */
export const operationFailures = {
  initWorkspace: 'Failed to initialize workspace',
  propose: 'Failed to create change',
  validate: 'Failed to validate change',
  apply: 'Failed to apply change',
  archive: 'Failed to archive change',
  list: 'Failed to list changes',
  show: 'Failed to show change',
} as const;

/**
 * Re-export all error categories as a single object for convenience
 */
export const errors = {
  input: inputErrors,
  project: projectErrors,
  state: stateErrors,
  merge: mergeErrors,
  failures: operationFailures,
} as const;
