/**
 * Field labels and section headers used throughout the CLI output
 */

import chalk from 'chalk';

/**
 * Change detail field labels
 */
export const fieldLabels = {
  id: 'ID:',
  status: 'Status:',
  author: 'Author:',
  created: 'Created:',
  validated: 'Validated:',
  applied: 'Applied:',
  archived: 'Archived:',
  location: 'Location:',
  capabilities: 'Capabilities:',
  tasks: 'Tasks:',
} as const;

/**
 * Output section separators
 */
export const sectionHeaders = {
  deltas: chalk.gray('─── Spec Deltas ───'),
  tasks: chalk.gray('─── Tasks ───'),
} as const;

/**
 * Summary/count messages
 */
export const summaries = {
  noChanges: chalk.gray('No changes found'),
  changeCount: (count: number) => chalk.gray(`${count} change(s)`),
  taskProgress: (done: number, total: number) => `${done}/${total} done`,
  deltaCounts: (added: number, modified: number, removed: number) =>
    `+${added} ~${modified} -${removed}`,
} as const;
