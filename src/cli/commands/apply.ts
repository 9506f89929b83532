import { InvalidArgumentError, type Command } from 'commander';
import { errors, nextSteps } from '../../strings/index.js';
import { createLifecycle, loadContext } from '../context.js';
import { EXIT_CODES, exitCodeFor } from '../exit-codes.js';
import { error, isJsonMode, success } from '../output.js';

/**
 * Parse a 1-based task number for --complete
 */
function parseTaskNumber(value: string, previous: number[] = []): number[] {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1 || String(n) !== value.trim()) {
    throw new InvalidArgumentError(`"${value}" is not a task number`);
  }
  return [...previous, n];
}

/**
 * Register the 'apply' command
 */
export function registerApplyCommand(program: Command): void {
  program
    .command('apply')
    .description('Mark a validated change as implemented')
    .argument('<change-id>', 'Change to apply')
    .option('--complete <task...>', 'Confirm task numbers as done (1-based, in file order)', parseTaskNumber)
    .option('--all', 'Confirm every task as done')
    .action(async (id: string, options: { complete?: number[]; all?: boolean }) => {
      try {
        const ctx = await loadContext();
        const result = await createLifecycle(ctx).apply(id, {
          complete: options.complete,
          all: options.all,
        });

        if (result.alreadyApplied) {
          success(`Change ${id} is already applied`, { id, status: 'applied', marked: [] });
        } else {
          success(`Applied ${id}`, { id, status: 'applied', marked: result.marked });
          if (!isJsonMode()) {
            console.log(nextSteps.afterApply(id));
          }
        }
        process.exit(EXIT_CODES.SUCCESS);
      } catch (err) {
        error(errors.failures.apply, err);
        process.exit(exitCodeFor(err));
      }
    });
}
