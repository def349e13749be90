import { Command } from 'commander';
import { addTask, shortId } from '@tasktrack/core';
import type { TaskSession } from '../session.js';
import * as out from '../output.js';
import { $try, parseDueArg, parsePriorityArg } from '../helpers.js';

interface AddOptions {
  description?: string;
  due: string;
  priority?: string;
}

export function createAddCommand(session: TaskSession): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title...>', 'Task title')
    .option('-d, --description <text>', 'Optional description')
    .option('--due <date>', 'Due date (today, tomorrow, friday, +3d, yyyy-MM-dd)', 'today')
    .option('-p, --priority <n>', 'Priority from 1 to 5')
    .action((words: string[], opts: AddOptions) => $try(() => {
      const now = session.now();
      const result = addTask(session.store, {
        title: words.join(' '),
        description: opts.description ?? null,
        dueDate: parseDueArg(opts.due, now),
        priority: opts.priority !== undefined
          ? parsePriorityArg(opts.priority)
          : session.config.defaultPriority,
      }, now);

      if (result.type === 'success') {
        out.success(`${result.message} (${shortId(result.data.id)})`);
      } else {
        out.printResult(result);
      }
    }));
}
