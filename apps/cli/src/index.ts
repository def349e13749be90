#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig } from './config.js';
import type { ConfigFlags } from './config.js';
import { TaskSession } from './session.js';
import * as out from './output.js';

const program = new Command()
  .name('tasktrack')
  .description('Single-user task tracker. Starts an interactive session; tasks live until it ends.')
  .version('1.0.0')
  .option('-p, --default-priority <n>', 'Priority for tasks added without one (1-5, default 3)')
  .option('-v, --verbose', 'Print debug output')
  .action(async (opts: ConfigFlags) => {
    const loaded = loadConfig(opts, process.env);
    if (!loaded.success) {
      for (const issue of loaded.issues) out.error(`Invalid configuration: ${issue}`);
      process.exitCode = 1;
      return;
    }

    out.setVerbose(loaded.config.verbose);
    const session = new TaskSession(loaded.config);
    await session.run(process.stdin, process.stdout, process.stdin.isTTY === true);
  });

await program.parseAsync();
