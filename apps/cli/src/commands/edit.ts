import { Command } from 'commander';
import { editTask } from '@tasktrack/core';
import type { TaskChanges } from '@tasktrack/core';
import type { TaskSession } from '../session.js';
import * as out from '../output.js';
import { $try, parseDueArg, parsePriorityArg } from '../helpers.js';

interface EditOptions {
  title?: string;
  description?: string;
  clearDescription?: boolean;
  due?: string;
  priority?: string;
}

export function createEditCommand(session: TaskSession): Command {
  return new Command('edit')
    .description('Edit a task; fields not given keep their current values')
    .argument('<taskId>', 'The task id (or a unique prefix)')
    .option('-t, --title <title>', 'New title')
    .option('-d, --description <text>', 'New description')
    .option('--clear-description', 'Remove the description')
    .option('--due <date>', 'New due date')
    .option('-p, --priority <n>', 'New priority from 1 to 5')
    .action((taskId: string, opts: EditOptions) => $try(() => {
      if (opts.description !== undefined && opts.clearDescription) {
        out.error('Cannot use both --description and --clear-description');
        return;
      }

      const now = session.now();
      const changes: TaskChanges = {};
      if (opts.title !== undefined) changes.title = opts.title;
      if (opts.description !== undefined) changes.description = opts.description;
      if (opts.clearDescription) changes.description = null;
      if (opts.due !== undefined) changes.dueDate = parseDueArg(opts.due, now);
      if (opts.priority !== undefined) changes.priority = parsePriorityArg(opts.priority);

      if (Object.keys(changes).length === 0) {
        out.warning('Nothing to change. Use --title, --description, --due or --priority');
        return;
      }

      out.printResult(editTask(session.store, taskId, changes, now));
    }));
}
