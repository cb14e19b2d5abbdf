#!/usr/bin/env node

// liftlog - turns free-text workout logs into structured workout rows
// CLI entry point

import { Command } from 'commander';
import { runAdd } from './commands/add.js';
import { runCheckpointReset, runCheckpointSet, runCheckpointShow } from './commands/checkpoint.js';
import { runInit } from './commands/init.js';
import { runProcess } from './commands/process.js';
import { runRuns } from './commands/runs.js';
import { errorMessage } from './lib/errors.js';
import { VERSION } from './version.js';

/**
 * Run a command body and turn any error into exit code 1
 */
async function guarded(body: () => void | Promise<void>): Promise<void> {
  try {
    await body();
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name('liftlog')
  .description('Parse free-text workout logs into structured workout rows')
  .version(VERSION);

// liftlog init
program
  .command('init')
  .description('Create the local state file (checkpoint and run history)')
  .action(() => guarded(() => runInit()));

// liftlog process
program
  .command('process')
  .description('Parse raw logs newer than the checkpoint and write workouts back to the sheet')
  .option('-l, --limit <n>', 'Max raw rows to fetch (default: LIFTLOG_FETCH_LIMIT or 100)')
  .option('--dry-run', 'List the entries that would be processed without calling the model or writing')
  .action((options) => guarded(() => runProcess({
    limit: options.limit !== undefined ? parseInt(options.limit, 10) : undefined,
    dryRun: options.dryRun
  })));

// liftlog add
program
  .command('add <text>')
  .description('Append a raw workout log to the sheet (same row the chat bot writes)')
  .option('-u, --user <id>', 'User id to record', 'cli')
  .action((text, options) => guarded(() => runAdd(text, { user: options.user })));

// liftlog checkpoint
const checkpointCmd = program
  .command('checkpoint')
  .description('Show or change the processing checkpoint')
  .action(() => guarded(() => runCheckpointShow()));

checkpointCmd
  .command('set <timestamp>')
  .description('Mark every raw log up to and including <timestamp> as processed')
  .action((timestamp) => guarded(() => runCheckpointSet(timestamp)));

checkpointCmd
  .command('reset')
  .description('Clear the checkpoint so the next run reprocesses everything it fetches')
  .action(() => guarded(() => runCheckpointReset()));

// liftlog runs
program
  .command('runs')
  .description('Show recent pipeline runs')
  .option('-l, --limit <n>', 'Max runs', '10')
  .action((options) => guarded(() => runRuns(parseInt(options.limit, 10))));

// Parse and run
await program.parseAsync();
