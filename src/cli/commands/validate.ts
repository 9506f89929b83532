import type { Command } from 'commander';
import { errors, nextSteps } from '../../strings/index.js';
import { createLifecycle, loadContext } from '../context.js';
import { EXIT_CODES, exitCodeFor } from '../exit-codes.js';
import { error, formatReport, info, isJsonMode, output } from '../output.js';

/**
 * Register the 'validate' command
 */
export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check a change and move it from draft to validated')
    .argument('<change-id>', 'Change to validate')
    .option('--strict', 'Treat warnings as errors')
    .action(async (id: string, options: { strict?: boolean }) => {
      try {
        const ctx = await loadContext();
        const result = await createLifecycle(ctx).validate(id, {
          strict: options.strict ? true : undefined,
        });

        output(
          {
            ...result.report,
            status: result.change.metadata.status,
            previous_status: result.previousStatus,
          },
          () => {
            formatReport(result.report);
            if (result.error) {
              console.log(nextSteps.fixAndRevalidate(id));
            } else if (result.change.metadata.status === 'validated') {
              if (result.previousStatus === 'draft') {
                info(`${id}: draft -> validated`);
              }
              console.log(nextSteps.afterValidate(id));
            }
          }
        );

        if (result.error) {
          if (!isJsonMode()) console.error(result.error.message);
          process.exit(EXIT_CODES.ERROR);
        }
        process.exit(EXIT_CODES.SUCCESS);
      } catch (err) {
        error(errors.failures.validate, err);
        process.exit(exitCodeFor(err));
      }
    });
}
