/**
 * One interactive session: a TaskStore of its own, and a command program
 * built fresh for every input line.
 */

import { createInterface } from 'node:readline';
import { Command, CommanderError } from 'commander';
import { TaskStore } from '@tasktrack/core';
import type { CliConfig } from './config.js';
import * as out from './output.js';
import { $try, tokenize } from './helpers.js';
import { createAddCommand } from './commands/add.js';
import { createEditCommand } from './commands/edit.js';
import { createDoneCommand } from './commands/done.js';
import { createDeleteCommand } from './commands/delete.js';
import { createListCommand } from './commands/list.js';
import { createShowCommand } from './commands/show.js';
import { createStatsCommand } from './commands/stats.js';

export const PROMPT = 'tasktrack> ';

const EXIT_WORDS = new Set(['exit', 'quit']);

export type LineOutcome = 'continue' | 'exit';

export class TaskSession {
  readonly store = new TaskStore();

  constructor(
    readonly config: CliConfig,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /** The session's notion of "now", used for every date rule */
  now(): Date {
    return this.clock();
  }

  /** Run a single command line */
  async execute(line: string): Promise<LineOutcome> {
    const [name] = line.trim().split(/\s+/);
    if (name !== undefined && EXIT_WORDS.has(name.toLowerCase())) return 'exit';

    await $try(async () => {
      const args = tokenize(line);
      if (args.length === 0) return;

      out.debug(`> ${args.join(' ')}`);
      try {
        await this.createProgram().parseAsync(args, { from: 'user' });
      } catch (err: unknown) {
        // commander has already printed its own message
        if (!(err instanceof CommanderError)) throw err;
      }
      out.debug(`${this.store.size} task(s) in session`);
    });

    return 'continue';
  }

  /** Read lines until end of input or an exit command */
  async run(input: NodeJS.ReadableStream, output: NodeJS.WritableStream, interactive: boolean): Promise<void> {
    const rl = createInterface({ input, output, terminal: interactive });
    rl.setPrompt(PROMPT);

    if (interactive) {
      out.info('Type "help" for commands, "exit" to quit.');
      rl.prompt();
    }

    try {
      for await (const line of rl) {
        if (await this.execute(line) === 'exit') break;
        if (interactive) rl.prompt();
      }
    } finally {
      rl.close();
    }
  }

  private createProgram(): Command {
    const program = new Command()
      .name('')
      .usage('<command> [options]')
      .description('Session commands')
      .addCommand(createAddCommand(this))
      .addCommand(createEditCommand(this))
      .addCommand(createDoneCommand(this))
      .addCommand(createDeleteCommand(this))
      .addCommand(createListCommand(this))
      .addCommand(createShowCommand(this))
      .addCommand(createStatsCommand(this));

    for (const cmd of [program, ...program.commands]) {
      cmd.exitOverride().configureOutput({
        writeOut: (s) => out.info(s.trimEnd()),
        writeErr: (s) => out.error(s.trimEnd()),
      });
    }
    return program;
  }
}
