import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, resolveMachineId, resolveProjectDir } from '../config/index.js';
import { createGitContextProvider } from '../git/context.js';
import { ingestTranscript, resolveTranscriptInput } from '../ingest/pipeline.js';
import { createPushClient } from '../relay/client.js';
import { PersistenceError } from '../session/writer.js';
import { error, info } from '../utils/logger.js';

async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) return '';
  process.stdin.setEncoding('utf-8');
  let text = '';
  for await (const chunk of process.stdin) {
    text += chunk;
  }
  return text;
}

async function runIngest(
  transcriptPath: string | undefined,
  options: { push: boolean; output?: string },
): Promise<void> {
  const config = loadConfig();

  const stdinText = transcriptPath ? '' : await readStdin();
  const input = resolveTranscriptInput(transcriptPath, stdinText);
  if (!input) {
    console.error(
      chalk.red('No transcript given. Pass a path, or pipe hook JSON with "transcript_path" on stdin.'),
    );
    process.exitCode = 1;
    return;
  }

  const projectDir = resolveProjectDir(process.env, input.projectDir ?? process.cwd());
  info(`Ingesting session from: ${input.transcriptPath}`);

  // Ctrl-C mid-read abandons the run before anything is written
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort(new Error('Interrupted'));
  process.once('SIGINT', onInterrupt);

  try {
    const result = await ingestTranscript({
      transcriptPath: input.transcriptPath,
      sessionId: input.sessionId,
      projectDir,
      outputDir: options.output ?? config.output_dir,
      git: createGitContextProvider({ timeoutMs: config.git.timeout_ms }),
      pushClient: options.push
        ? createPushClient({ config: config.push, machineId: resolveMachineId(config) })
        : undefined,
      signal: controller.signal,
    });

    if (result.parseFailures > 0) {
      info(`Skipped ${result.parseFailures} malformed line(s)`);
    }
    console.error(chalk.green('✓') + ` Wrote ${result.outputPath}`);
  } catch (err) {
    if (err instanceof PersistenceError) {
      error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

export function createIngestCommand(): Command {
  return new Command('ingest')
    .description('Ingest a session transcript (JSONL) into the project devlog')
    .argument('[path]', 'Transcript file; read from hook JSON on stdin when omitted')
    .option('-o, --output <dir>', 'Output directory (relative to the project)')
    .option('--no-push', 'Do not push to the relay even if enabled')
    .action(runIngest);
}
