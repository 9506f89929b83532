import chalk from 'chalk';
import type { ChangeRecord } from '../lifecycle/index.js';
import type { ChangeStatus } from '../schema/index.js';
import { fieldLabels, report as reportStrings } from '../strings/index.js';
import type { Diagnostic, ValidationReport } from '../validation/index.js';

/**
 * Global output format (set by --json flag)
 */
let globalJsonMode = false;

/**
 * Debug output (set by --verbose flag)
 */
let globalVerboseMode = false;

export function setJsonMode(enabled: boolean): void {
  globalJsonMode = enabled;
}

export function isJsonMode(): boolean {
  return globalJsonMode;
}

export function setVerboseMode(enabled: boolean): void {
  globalVerboseMode = enabled;
}

export function getVerboseMode(): boolean {
  return globalVerboseMode;
}

/**
 * Output data - JSON if --json flag, otherwise formatted
 */
export function output(data: unknown, formatter?: () => void): void {
  if (globalJsonMode) {
    console.log(JSON.stringify(data, null, 2));
  } else if (formatter) {
    formatter();
  } else {
    console.log(data);
  }
}

/**
 * Output success message
 */
export function success(message: string, data?: Record<string, unknown>): void {
  if (globalJsonMode) {
    console.log(JSON.stringify({ success: true, message, ...data }));
  } else {
    console.log(chalk.green('OK'), message);
  }
}

/**
 * Output error message. Errors carrying a code or suggestion show both.
 */
export function error(message: string, details?: unknown): void {
  const code = errorField(details, 'code');
  const suggestion = errorField(details, 'suggestion');

  if (globalJsonMode) {
    console.error(
      JSON.stringify({
        success: false,
        error: message,
        code,
        details: details instanceof Error ? details.message : details,
        suggestion,
      })
    );
    return;
  }

  console.error(chalk.red('✗'), message);
  if (details instanceof Error) {
    console.error(chalk.gray(details.message));
    if (globalVerboseMode && details.stack) {
      console.error(chalk.gray(details.stack));
    }
  } else if (details) {
    console.error(chalk.gray(String(details)));
  }
  if (suggestion) {
    console.error(chalk.yellow(`Hint: ${suggestion}`));
  }
}

/**
 * Output warning message
 */
export function warn(message: string): void {
  if (globalJsonMode) {
    // Warnings are suppressed in JSON mode
  } else {
    console.warn(chalk.yellow('⚠'), message);
  }
}

/**
 * Output info message
 */
export function info(message: string): void {
  if (globalJsonMode) {
    // Info messages suppressed in JSON mode
  } else {
    console.log(chalk.blue('ℹ'), message);
  }
}

/**
 * Debug message, shown with --verbose only
 */
export function debug(message: string): void {
  if (globalVerboseMode && !globalJsonMode) {
    console.error(chalk.gray(`[debug] ${message}`));
  }
}

function errorField(details: unknown, field: 'code' | 'suggestion'): string | undefined {
  if (!(details instanceof Error) || !(field in details)) return undefined;
  const value: unknown = Reflect.get(details, field);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Get color for change status
 */
export function statusColor(status: ChangeStatus): (text: string) => string {
  switch (status) {
    case 'draft':
      return (t: string) => chalk.gray(t);
    case 'validated':
      return (t: string) => chalk.blue(t);
    case 'applied':
      return (t: string) => chalk.green(t);
    case 'archived':
      return (t: string) => chalk.strikethrough.gray(t);
  }
}

/**
 * One diagnostic as `file:line severity message [rule]`
 */
export function formatDiagnostic(d: Diagnostic): string {
  const location = d.line ? `${d.file}:${d.line}` : d.file;
  const severity = d.severity === 'error' ? chalk.red('error') : chalk.yellow('warning');
  return `  ${chalk.cyan(location)} ${severity} ${d.message} ${chalk.gray(`[${d.rule}]`)}`;
}

/**
 * Print a validation report
 */
export function formatReport(report: ValidationReport): void {
  console.log(report.valid ? reportStrings.passed(report.changeId) : reportStrings.failed(report.changeId));

  for (const d of report.diagnostics) {
    console.log(formatDiagnostic(d));
  }

  console.log(reportStrings.counts(report.stats.errors, report.stats.warnings));
  if (report.strict && report.stats.warnings > 0) {
    console.log(reportStrings.strictNote);
  }
}

/**
 * Print the metadata block of a change
 */
export function formatChangeDetails(change: ChangeRecord, location: string): void {
  const m = change.metadata;
  console.log(chalk.bold(change.id));
  console.log(chalk.gray('─'.repeat(40)));
  console.log(`${fieldLabels.status.padEnd(14)}${statusColor(m.status)(m.status)}`);
  console.log(`${fieldLabels.author.padEnd(14)}${m.author}`);
  console.log(`${fieldLabels.created.padEnd(14)}${m.created_at}`);
  if (m.validated_at) {
    const mode = m.strict ? chalk.gray(' (strict)') : '';
    console.log(`${fieldLabels.validated.padEnd(14)}${m.validated_at}${mode}`);
  }
  if (m.applied_at) console.log(`${fieldLabels.applied.padEnd(14)}${m.applied_at}`);
  if (m.archived_at) console.log(`${fieldLabels.archived.padEnd(14)}${m.archived_at}`);
  console.log(`${fieldLabels.location.padEnd(14)}${location}`);
  if (m.capabilities.length > 0) {
    console.log(`${fieldLabels.capabilities.padEnd(14)}${m.capabilities.join(', ')}`);
  }
}
