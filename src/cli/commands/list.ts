import * as path from 'node:path';
import chalk from 'chalk';
import Table from 'cli-table3';
import type { Command } from 'commander';
import type { ChangeRecord } from '../../lifecycle/index.js';
import { parseTasks } from '../../parser/index.js';
import { TASKS_FILE, type DocumentStore } from '../../store/index.js';
import { errors, summaries } from '../../strings/index.js';
import { formatRelativeTime } from '../../utils/index.js';
import { createLifecycle, loadContext } from '../context.js';
import { EXIT_CODES, exitCodeFor } from '../exit-codes.js';
import { error, output, statusColor } from '../output.js';

interface ChangeRow {
  id: string;
  status: string;
  author: string;
  created_at: string;
  archived: boolean;
  tasks: { done: number; total: number };
}

async function toRow(store: DocumentStore, change: ChangeRecord): Promise<ChangeRow> {
  const text = await store.readText(path.join(change.dir, TASKS_FILE));
  const tasks = text === null ? [] : parseTasks(text).tasks;
  return {
    id: change.id,
    status: change.metadata.status,
    author: change.metadata.author,
    created_at: change.metadata.created_at,
    archived: change.archived,
    tasks: { done: tasks.filter((t) => t.done).length, total: tasks.length },
  };
}

/**
 * Register the 'list' command
 */
export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List changes')
    .option('-a, --archived', 'Include archived changes')
    .action(async (options: { archived?: boolean }) => {
      try {
        const ctx = await loadContext();
        const changes = await createLifecycle(ctx).list(options.archived === true);
        const rows: ChangeRow[] = [];
        for (const change of changes) {
          rows.push(await toRow(ctx.store, change));
        }

        output(rows, () => {
          if (rows.length === 0) {
            console.log(summaries.noChanges);
            return;
          }

          const table = new Table({
            head: [chalk.bold('ID'), chalk.bold('Status'), chalk.bold('Tasks'), chalk.bold('Author'), chalk.bold('Created')],
            style: {
              head: [],
              border: [],
            },
          });
          const now = new Date();
          for (const [i, row] of rows.entries()) {
            table.push([
              row.id,
              statusColor(changes[i].metadata.status)(row.status),
              summaries.taskProgress(row.tasks.done, row.tasks.total),
              row.author,
              chalk.gray(formatRelativeTime(new Date(row.created_at), now)),
            ]);
          }
          console.log(table.toString());
          console.log(summaries.changeCount(rows.length));
        });
        process.exit(EXIT_CODES.SUCCESS);
      } catch (err) {
        error(errors.failures.list, err);
        process.exit(exitCodeFor(err));
      }
    });
}
