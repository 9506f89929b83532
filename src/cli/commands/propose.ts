import * as path from 'node:path';
import type { Command } from 'commander';
import { getAuthor } from '../../store/index.js';
import { errors, nextSteps } from '../../strings/index.js';
import { createLifecycle, loadContext } from '../context.js';
import { EXIT_CODES, exitCodeFor } from '../exit-codes.js';
import { error, isJsonMode, success } from '../output.js';

interface ProposeOptions {
  capability?: string;
  title?: string;
  author?: string;
}

/**
 * Register the 'propose' command
 */
export function registerProposeCommand(program: Command): void {
  program
    .command('propose')
    .description('Scaffold a new change proposal in draft')
    .argument('<change-id>', 'Verb-led kebab-case id, e.g. add-user-auth')
    .option('-c, --capability <name>', 'Capability the spec delta targets (default: id without its verb)')
    .option('-t, --title <title>', 'Proposal title')
    .option('--author <name>', 'Author recorded on the change')
    .action(async (id: string, options: ProposeOptions) => {
      try {
        const ctx = await loadContext();
        const change = await createLifecycle(ctx).create(id, {
          author: options.author ?? getAuthor(ctx.config),
          capability: options.capability,
          title: options.title,
        });

        const location = path.relative(ctx.rootDir, change.dir);
        success(`Created change ${change.id} at ${location}`, {
          id: change.id,
          status: change.metadata.status,
          path: change.dir,
        });
        if (!isJsonMode()) {
          console.log(nextSteps.afterPropose(change.id));
        }
        process.exit(EXIT_CODES.SUCCESS);
      } catch (err) {
        error(errors.failures.propose, err);
        process.exit(exitCodeFor(err));
      }
    });
}
