import { Command } from 'commander';
import chalk from 'chalk';
import { getStats } from '@tasktrack/core';
import type { TaskSession } from '../session.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createStatsCommand(session: TaskSession): Command {
  return new Command('stats')
    .description('Count active, completed and overdue tasks')
    .action(() => $try(() => {
      const stats = getStats(session.store, session.now());

      const doneLabel = stats.completed > 0 ? chalk.green(`${stats.completed} completed`) : chalk.dim('0 completed');
      const overdueLabel = stats.overdue > 0 ? chalk.red(`${stats.overdue} overdue`) : chalk.dim('0 overdue');
      out.info(`${stats.total} task(s): ${stats.active} active, ${doneLabel}, ${overdueLabel}`);
    }));
}
