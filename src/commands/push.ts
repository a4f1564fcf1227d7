import { Command } from 'commander';
import path from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig, resolveMachineId, resolveProjectDir } from '../config/index.js';
import { createPushClient } from '../relay/client.js';
import { findLatestDocument, readSessionDocument } from '../session/writer.js';
import { info } from '../utils/logger.js';

async function runPush(
  documentPath: string | undefined,
  options: { endpoint?: string },
): Promise<void> {
  const config = loadConfig();
  const pushConfig = options.endpoint
    ? { ...config.push, endpoint: options.endpoint, enabled: true }
    : config.push;

  let target = documentPath;
  if (!target) {
    const outputDir = path.resolve(resolveProjectDir(), config.output_dir);
    target = (await findLatestDocument(outputDir)) ?? undefined;
    if (!target) {
      console.error(chalk.red(`No session documents found in ${outputDir}`));
      process.exitCode = 1;
      return;
    }
  }

  info(`Pushing devlog from: ${target}`);
  const doc = await readSessionDocument(target);

  const spinner = ora(`Pushing session ${doc.session_id}...`).start();
  const outcome = await createPushClient({
    config: pushConfig,
    machineId: resolveMachineId(config),
  }).push(doc);

  switch (outcome.status) {
    case 'stored':
    case 'overwritten':
      spinner.succeed(`Session ${outcome.sessionId} ${outcome.status}`);
      break;
    case 'skipped':
      spinner.warn(
        `Push skipped: ${outcome.reason}. Enable push in config or pass --endpoint.`,
      );
      break;
    case 'failed':
      // Relay failures never fail the command
      spinner.fail(`Push failed: ${outcome.error}`);
      break;
  }
}

export function createPushCommand(): Command {
  return new Command('push')
    .description('Push a session document to the relay')
    .argument('[path]', 'Session document; the newest one in the output directory when omitted')
    .option('--endpoint <url>', 'Relay ingest URL (overrides config and enables push)')
    .action(runPush);
}
