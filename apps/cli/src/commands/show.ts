import { Command } from 'commander';
import chalk from 'chalk';
import { resolveTaskId } from '@tasktrack/core';
import type { Task } from '@tasktrack/core';
import type { TaskSession } from '../session.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createShowCommand(session: TaskSession): Command {
  return new Command('show')
    .description('Show every field of a task')
    .argument('<taskId>', 'The task id (or a unique prefix)')
    .option('--json', 'Output in JSON format')
    .action((taskId: string, opts: { json?: boolean }) => $try(() => {
      const resolved = resolveTaskId(session.store, taskId);
      const task = resolved.type === 'success' ? session.store.get(resolved.data) : null;
      if (!task) {
        out.printResult(resolved);
        return;
      }

      if (opts.json) {
        out.info(JSON.stringify(task, null, 2));
      } else {
        outputHumanReadable(task, session.now());
      }
    }));
}

function outputHumanReadable(task: Task, now: Date): void {
  out.info(`${chalk.bold('ID:')}          ${task.id}`);
  out.info(`${chalk.bold('Title:')}       ${task.title}`);
  out.info(`${chalk.bold('Description:')} ${task.description ?? 'None'}`);
  out.info(`${chalk.bold('Due Date:')}    ${task.dueDate}  ${out.formatDueDate(task.dueDate, task.completed, now)}`);
  out.info(`${chalk.bold('Priority:')}    ${task.priority}`);
  out.info(`${chalk.bold('Completed:')}   ${task.completed ? 'Yes' : 'No'}`);
}
