import * as readline from 'node:readline';
import chalk from 'chalk';
import type { Command } from 'commander';
import { MergeError } from '../../errors.js';
import { errors, summaries } from '../../strings/index.js';
import { createLifecycle, loadContext } from '../context.js';
import { EXIT_CODES, exitCodeFor } from '../exit-codes.js';
import { error, info, isJsonMode, output, success, warn } from '../output.js';

interface ArchiveCommandOptions {
  yes?: boolean;
  skipSpecs?: boolean;
}

/**
 * Simple yes/no prompt
 */
async function confirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(`${question} [y/N] `, (answer) => {
      rl.close();
      resolve(/^y(es)?$/i.test(answer.trim()));
    });
  });
}

/**
 * Register the 'archive' command
 */
export function registerArchiveCommand(program: Command): void {
  program
    .command('archive')
    .description('Merge an applied change into the specs and move it to the archive')
    .argument('<change-id>', 'Change to archive')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .option('--skip-specs', 'Archive without merging spec deltas')
    .action(async (id: string, options: ArchiveCommandOptions) => {
      try {
        const ctx = await loadContext();
        const lifecycle = createLifecycle(ctx);

        const interactive = !options.yes && !isJsonMode() && process.stdin.isTTY === true;
        if (interactive) {
          const change = await lifecycle.get(id);
          if (!change.archived) {
            const what = options.skipSpecs ? 'without merging its specs' : 'and merge its spec deltas';
            if (!(await confirm(`Archive ${id} ${what}?`))) {
              info('Archive cancelled');
              process.exit(EXIT_CODES.SUCCESS);
            }
          }
        }

        const result = await lifecycle.archive(id, { skipSpecs: options.skipSpecs });

        if (result.alreadyArchived) {
          success(`Change ${id} is already archived at ${result.archivePath}`, {
            id,
            status: 'archived',
            archive_path: result.archivePath,
            merged: [],
          });
          process.exit(EXIT_CODES.SUCCESS);
        }

        output(
          {
            success: true,
            id,
            status: 'archived',
            archive_path: result.archivePath,
            specs_skipped: options.skipSpecs === true,
            merged: result.merged,
          },
          () => {
            for (const m of result.merged) {
              const verb = m.created ? chalk.green('created') : chalk.cyan('updated');
              console.log(
                `  ${verb} specs/${m.capability}/spec.md ${chalk.gray(summaries.deltaCounts(m.added, m.modified, m.removed))}`
              );
            }
            if (options.skipSpecs) {
              warn('Spec deltas were not merged (--skip-specs)');
            }
            success(`Archived ${id} to ${result.archivePath}`);
          }
        );
        process.exit(EXIT_CODES.SUCCESS);
      } catch (err) {
        error(errors.failures.archive, err);
        if (err instanceof MergeError && !isJsonMode()) {
          for (const issue of err.issues) {
            console.error(chalk.gray(`  - ${issue.message}`));
          }
        }
        process.exit(exitCodeFor(err));
      }
    });
}
