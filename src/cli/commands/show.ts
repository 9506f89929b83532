import * as path from 'node:path';
import chalk from 'chalk';
import type { Command } from 'commander';
import { parseSpecDelta, parseTasks, type TaskEntry } from '../../parser/index.js';
import { TASKS_FILE } from '../../store/index.js';
import { errors, fieldLabels, sectionHeaders, summaries } from '../../strings/index.js';
import { createLifecycle, loadContext } from '../context.js';
import { EXIT_CODES, exitCodeFor } from '../exit-codes.js';
import { error, formatChangeDetails, output } from '../output.js';

interface DeltaSummary {
  capability: string;
  added: number;
  modified: number;
  removed: number;
  /** First parse error, if the delta does not parse */
  error?: string;
}

/**
 * Register the 'show' command
 */
export function registerShowCommand(program: Command): void {
  program
    .command('show')
    .description('Show a change: status, spec deltas and tasks')
    .argument('<change-id>', 'Change to show')
    .action(async (id: string) => {
      try {
        const ctx = await loadContext();
        const lifecycle = createLifecycle(ctx);
        const change = await lifecycle.get(id);

        const deltas: DeltaSummary[] = [];
        for (const file of await ctx.store.listDeltaFiles(change.dir)) {
          const result = parseSpecDelta((await ctx.store.readText(file.file)) ?? '', file.capability);
          deltas.push(
            result.ok
              ? {
                  capability: file.capability,
                  added: result.value.added.length,
                  modified: result.value.modified.length,
                  removed: result.value.removed.length,
                }
              : { capability: file.capability, added: 0, modified: 0, removed: 0, error: result.errors[0].message }
          );
        }

        const tasksText = await ctx.store.readText(path.join(change.dir, TASKS_FILE));
        const tasks: TaskEntry[] = tasksText === null ? [] : parseTasks(tasksText).tasks;
        const stale =
          change.metadata.status === 'validated' ? await lifecycle.staleFiles(change) : [];
        const location = path.relative(ctx.rootDir, change.dir);

        output({ ...change, deltas, tasks, stale_files: stale }, () => {
          formatChangeDetails(change, location);
          const done = tasks.filter((t) => t.done).length;
          console.log(`${fieldLabels.tasks.padEnd(14)}${summaries.taskProgress(done, tasks.length)}`);
          if (stale.length > 0) {
            console.log(chalk.yellow(`Changed since validation: ${stale.join(', ')}`));
          }

          if (deltas.length > 0) {
            console.log(`\n${sectionHeaders.deltas}`);
            for (const d of deltas) {
              const counts = d.error
                ? chalk.red(`does not parse: ${d.error}`)
                : chalk.gray(summaries.deltaCounts(d.added, d.modified, d.removed));
              console.log(`  ${d.capability} ${counts}`);
            }
          }

          if (tasks.length > 0) {
            console.log(`\n${sectionHeaders.tasks}`);
            let phase: string | undefined;
            for (const task of tasks) {
              if (task.phase !== phase) {
                phase = task.phase;
                if (phase) console.log(chalk.bold(`  ${phase}`));
              }
              const check = task.done ? chalk.green('✓') : chalk.gray('○');
              const text = task.done ? chalk.strikethrough.gray(task.text) : task.text;
              console.log(`  ${chalk.gray(String(task.index).padStart(2))} ${check} ${text}`);
            }
          }
        });
        process.exit(EXIT_CODES.SUCCESS);
      } catch (err) {
        error(errors.failures.show, err);
        process.exit(exitCodeFor(err));
      }
    });
}
