import { Command } from 'commander';
import { removeTasks } from '@tasktrack/core';
import type { TaskSession } from '../session.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createDeleteCommand(session: TaskSession): Command {
  return new Command('delete')
    .alias('rm')
    .description('Delete one or more tasks')
    .argument('<taskIds...>', 'The id(s) of the task(s) to delete')
    .action((taskIds: string[]) => $try(() => {
      out.printBatchResults(removeTasks(session.store, taskIds));
    }));
}
