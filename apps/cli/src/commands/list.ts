import { Command } from 'commander';
import { getSortedTasks } from '@tasktrack/core';
import type { TaskSession } from '../session.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createListCommand(session: TaskSession): Command {
  return new Command('list')
    .alias('ls')
    .description('List all tasks by due date')
    .option('--json', 'Output in JSON format')
    .action((opts: { json?: boolean }) => $try(() => {
      const tasks = getSortedTasks(session.store);

      if (opts.json) {
        out.info(JSON.stringify(tasks, null, 2));
        return;
      }

      if (tasks.length === 0) {
        out.info('No tasks available.');
        return;
      }

      const now = session.now();
      for (const task of tasks) {
        out.info(out.formatTaskLine(task, now));
      }
    }));
}
