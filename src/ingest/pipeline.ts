import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { openTranscript } from '../transcript/reader.js';
import { classifyRecord } from '../transcript/classify.js';
import { ActionAggregator } from '../transcript/aggregator.js';
import type { ConversationEntry, TranscriptLine } from '../transcript/types.js';
import type { GitContextProvider } from '../git/context.js';
import { buildSessionDocument, sessionIdFromPath } from '../session/document.js';
import type { SessionDocument } from '../session/document.js';
import { writeSessionDocument } from '../session/writer.js';
import type { PushClient, PushOutcome } from '../relay/client.js';
import { debug, warn } from '../utils/logger.js';

export interface CollectedConversation {
  conversation: ConversationEntry[];
  linesRead: number;
  parseFailures: number;
}

/**
 * Drive decoded lines through the classifier and the action aggregator.
 * Undecodable lines are logged and skipped.
 */
export async function collectConversation(
  lines: AsyncIterable<TranscriptLine>,
): Promise<CollectedConversation> {
  const aggregator = new ActionAggregator();
  const conversation: ConversationEntry[] = [];
  let linesRead = 0;
  let parseFailures = 0;

  for await (const { lineNumber, result } of lines) {
    linesRead++;
    if (!result.ok) {
      parseFailures++;
      warn(`Failed to parse line ${lineNumber}: ${result.error} (skipping)`);
      continue;
    }
    for (const entry of classifyRecord(result.record)) {
      if (entry.kind === 'other') debug(`Line ${lineNumber}: ignored (${entry.reason})`);
      conversation.push(...aggregator.accept(entry));
    }
  }
  conversation.push(...aggregator.finish());

  return { conversation, linesRead, parseFailures };
}

export interface IngestOptions {
  transcriptPath: string;
  projectDir: string;
  /** Resolved against `projectDir` when relative. */
  outputDir: string;
  git: GitContextProvider;
  sessionId?: string;
  pushClient?: PushClient;
  signal?: AbortSignal;
  now?: () => Date;
}

export interface IngestResult {
  document: SessionDocument;
  outputPath: string;
  parseFailures: number;
  push: PushOutcome;
}

/**
 * Read → classify → aggregate → build → write → push.
 *
 * Only a local write failure (or an unreadable transcript) rejects. The
 * document is written only after the whole transcript has been read, and
 * the push runs after the write and never changes the outcome.
 */
export async function ingestTranscript(options: IngestOptions): Promise<IngestResult> {
  const transcriptPath = path.resolve(options.transcriptPath);
  await fs.access(transcriptPath);

  const { conversation, linesRead, parseFailures } = await collectConversation(
    openTranscript(transcriptPath, { signal: options.signal }),
  );
  debug(`Read ${linesRead} lines, kept ${conversation.length} entries`);

  const git = await options.git.resolve(options.projectDir);
  const now = options.now ? options.now() : new Date();

  const document = buildSessionDocument({
    conversation,
    git,
    sessionId: options.sessionId ?? sessionIdFromPath(transcriptPath, now),
    projectDir: options.projectDir,
    now,
  });

  const outputPath = await writeSessionDocument(document, {
    outputDir: path.resolve(options.projectDir, options.outputDir),
  });

  const push: PushOutcome = options.pushClient
    ? await options.pushClient.push(document)
    : { status: 'skipped', reason: 'no push client' };

  return { document, outputPath, parseFailures, push };
}

// --- Hook input ---

const HookInputSchema = z.object({
  transcript_path: z.string().min(1).optional(),
  session_file: z.string().min(1).optional(),
  session_id: z.string().min(1).optional(),
  cwd: z.string().min(1).optional(),
});

export interface TranscriptInput {
  transcriptPath: string;
  sessionId?: string;
  projectDir?: string;
}

/**
 * An explicit path wins; otherwise the JSON a session hook writes to stdin
 * (`transcript_path` or `session_file`, plus optional `session_id`/`cwd`).
 */
export function resolveTranscriptInput(
  pathArg: string | undefined,
  stdinText: string,
): TranscriptInput | null {
  if (pathArg) return { transcriptPath: pathArg };

  const trimmed = stdinText.trim();
  if (trimmed === '') return null;

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch {
    warn('stdin is not valid JSON; ignoring it');
    return null;
  }

  const parsed = HookInputSchema.safeParse(raw);
  if (!parsed.success) return null;

  const transcriptPath = parsed.data.transcript_path ?? parsed.data.session_file;
  if (!transcriptPath) return null;

  return {
    transcriptPath,
    sessionId: parsed.data.session_id,
    projectDir: parsed.data.cwd,
  };
}
