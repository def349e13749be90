import { Command } from 'commander';
import { completeTasks } from '@tasktrack/core';
import type { TaskSession } from '../session.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createDoneCommand(session: TaskSession): Command {
  return new Command('done')
    .description('Mark one or more tasks complete')
    .argument('<taskIds...>', 'The id(s) of the task(s) to complete')
    .action((taskIds: string[]) => $try(() => {
      out.printBatchResults(completeTasks(session.store, taskIds));
    }));
}
