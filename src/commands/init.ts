import { Command } from 'commander';
import fs from 'node:fs';
import chalk from 'chalk';
import { writeDefaultConfig } from '../config/index.js';
import { DEVLOG_CONFIG_PATH } from '../utils/paths.js';

function runInit(options: { force?: boolean }): void {
  if (fs.existsSync(DEVLOG_CONFIG_PATH) && !options.force) {
    console.log(
      chalk.yellow('⚠') + ` ${DEVLOG_CONFIG_PATH} already exists. Use --force to overwrite.`,
    );
    return;
  }

  writeDefaultConfig(DEVLOG_CONFIG_PATH);
  console.log(chalk.green('✓') + ` Created ${DEVLOG_CONFIG_PATH}`);
  console.log(
    chalk.cyan('\nAdd ') +
      chalk.bold('devlog ingest') +
      chalk.cyan(' as a SessionEnd hook to capture every session.'),
  );
}

export function createInitCommand(): Command {
  return new Command('init')
    .description('Write the default configuration to ~/.devlog/config.yml')
    .option('--force', 'Overwrite an existing configuration')
    .action(runInit);
}
