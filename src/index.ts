#!/usr/bin/env node
import { Command } from 'commander';
import { createIngestCommand } from './commands/ingest.js';
import { createPushCommand } from './commands/push.js';
import { createServeCommand } from './commands/serve.js';
import { createInitCommand } from './commands/init.js';
import { closeStore } from './store/index.js';
import { setLogLevel } from './utils/logger.js';

const program = new Command();

program
  .name('devlog')
  .version('0.1.0')
  .description('Capture coding-assistant sessions as durable, shareable records')
  .option('-v, --verbose', 'Print debug logs')
  .option('-q, --quiet', 'Only print warnings and errors')
  .hook('preAction', (command) => {
    const { verbose, quiet } = command.opts<{ verbose?: boolean; quiet?: boolean }>();
    if (verbose) setLogLevel('debug');
    else if (quiet) setLogLevel('warn');
  });

program.addCommand(createIngestCommand());
program.addCommand(createPushCommand());
program.addCommand(createServeCommand());
program.addCommand(createInitCommand());

program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (err) {
    // Filter Commander control-flow "errors" (help, version display)
    if (
      err instanceof Error &&
      'code' in err &&
      (err.code === 'commander.helpDisplayed' ||
        err.code === 'commander.version' ||
        err.code === 'commander.help')
    ) {
      return;
    }
    throw err;
  } finally {
    closeStore();
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
