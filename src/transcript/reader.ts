import { createReadStream } from 'node:fs';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { errorMessage } from '../utils/errors.js';
import type { DecodeResult, TranscriptLine } from './types.js';

export interface ReadOptions {
  signal?: AbortSignal;
}

export function decodeLine(line: string): DecodeResult {
  try {
    return { ok: true, record: JSON.parse(line) as unknown };
  } catch (err) {
    return {
      ok: false,
      raw: line,
      error: errorMessage(err),
    };
  }
}

/**
 * Stream a JSONL transcript one decoded line at a time.
 *
 * Every non-blank line yields exactly one result; a line that is not valid
 * JSON yields a failure carrying its raw text and the stream moves on.
 * Aborting the signal stops at the next line boundary by throwing the
 * signal's reason.
 */
export async function* readTranscript(
  input: Readable,
  options: ReadOptions = {},
): AsyncGenerator<TranscriptLine> {
  const { signal } = options;
  signal?.throwIfAborted();

  const rl = createInterface({ input, crlfDelay: Infinity });
  let lineNumber = 0;

  try {
    for await (const line of rl) {
      lineNumber++;
      signal?.throwIfAborted();

      if (line.trim() === '') continue;

      yield { lineNumber, result: decodeLine(line) };
    }
  } finally {
    rl.close();
  }
}

export async function* openTranscript(
  filePath: string,
  options: ReadOptions = {},
): AsyncGenerator<TranscriptLine> {
  const stream = createReadStream(filePath, { encoding: 'utf-8' });
  try {
    yield* readTranscript(stream, options);
  } finally {
    stream.destroy();
  }
}
