import * as path from 'node:path';
import type { Command } from 'commander';
import { initWorkspace } from '../../store/index.js';
import { errors } from '../../strings/index.js';
import { getRootDir } from '../context.js';
import { EXIT_CODES, exitCodeFor } from '../exit-codes.js';
import { error, info, success } from '../output.js';

/**
 * Register the 'init' command
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create an openspec/ workspace')
    .argument('[dir]', 'Project directory (default: current directory)')
    .action(async (dir: string | undefined) => {
      try {
        const workspaceDir = await initWorkspace(path.resolve(getRootDir(), dir ?? '.'));
        success(`Initialized workspace at ${workspaceDir}`, { workspace: workspaceDir });
        info('Next: speclane propose <change-id>');
        process.exit(EXIT_CODES.SUCCESS);
      } catch (err) {
        error(errors.failures.initWorkspace, err);
        process.exit(exitCodeFor(err));
      }
    });
}
