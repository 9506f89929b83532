#!/usr/bin/env node

import { realpathSync } from 'node:fs';
import { createRequire } from 'node:module';
import { pathToFileURL } from 'node:url';
import chalk from 'chalk';
import { Command } from 'commander';

// Read version from package.json at runtime
const require = createRequire(import.meta.url);
const { version } = require('../../package.json');

import {
  registerApplyCommand,
  registerArchiveCommand,
  registerInitCommand,
  registerListCommand,
  registerProposeCommand,
  registerShowCommand,
  registerValidateCommand,
} from './commands/index.js';
import { setRootDir } from './context.js';
import { EXIT_CODES, EXIT_CODE_METADATA } from './exit-codes.js';
import { setJsonMode, setVerboseMode } from './output.js';
import { COMMAND_ALIASES, findClosestCommand, getAllCommands } from './suggest.js';

const program = new Command();

const exitCodeHelp = [
  '',
  'Exit codes:',
  ...EXIT_CODE_METADATA.map((m) => `  ${String(m.code).padEnd(3)}${m.name.padEnd(19)}${m.description}`),
].join('\n');

program
  .name('speclane')
  .description('Change proposals for markdown specs: propose, validate, apply, archive')
  .version(version)
  .option('--json', 'Output in JSON format')
  .option('--root <dir>', 'Search for openspec/ from this directory instead of the current one')
  .option('--verbose', 'Show debug output and error stacks')
  .addHelpText('after', exitCodeHelp)
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<{ json?: boolean; root?: string; verbose?: boolean }>();
    if (opts.json) {
      setJsonMode(true);
    }
    if (opts.verbose) {
      setVerboseMode(true);
    }
    setRootDir(opts.root);
  });

registerInitCommand(program);
registerProposeCommand(program);
registerValidateCommand(program);
registerApplyCommand(program);
registerArchiveCommand(program);
registerListCommand(program);
registerShowCommand(program);

// Handle unknown commands with suggestions
program.on('command:*', (operands: string[]) => {
  const unknownCommand = operands[0];
  console.error(chalk.red(`error: unknown command '${unknownCommand}'`));

  const suggestion = COMMAND_ALIASES[unknownCommand] ?? findClosestCommand(unknownCommand, getAllCommands(program));
  if (suggestion) {
    console.error(chalk.yellow(`Did you mean: speclane ${suggestion}?`));
  } else {
    console.error(chalk.gray(`Run 'speclane --help' to see available commands`));
  }

  process.exit(EXIT_CODES.USAGE_ERROR);
});

export { program };

// Parse and execute (only when run directly)
// Use realpathSync to resolve symlinks (e.g., when run via npm link)
const scriptPath = process.argv[1] ? realpathSync(process.argv[1]) : '';
if (import.meta.url === pathToFileURL(scriptPath).href) {
  program.parseAsync().catch((err: unknown) => {
    console.error(chalk.red('✗'), err instanceof Error ? err.message : String(err));
    process.exit(EXIT_CODES.ERROR);
  });
}
