import path from 'node:path';
import { Readable } from 'node:stream';
import { fileURLToPath } from 'node:url';
import { decodeLine, openTranscript, readTranscript } from '../../src/transcript/reader.js';
import type { TranscriptLine } from '../../src/transcript/types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURE_DIR = path.join(__dirname, '..', 'fixtures', 'transcripts');

async function collect(lines: AsyncIterable<TranscriptLine>): Promise<TranscriptLine[]> {
  const out: TranscriptLine[] = [];
  for await (const line of lines) out.push(line);
  return out;
}

function streamOf(text: string): Readable {
  return Readable.from([text]);
}

describe('decodeLine', () => {
  it('decodes a JSON object', () => {
    expect(decodeLine('{"type":"user"}')).toEqual({ ok: true, record: { type: 'user' } });
  });

  it('reports a failure with the raw text', () => {
    const result = decodeLine('{not json');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.raw).toBe('{not json');
      expect(result.error).not.toBe('');
    }
  });
});

describe('readTranscript', () => {
  it('yields one result per line with 1-based line numbers', async () => {
    const lines = await collect(readTranscript(streamOf('{"a":1}\n{"b":2}\n')));
    expect(lines).toEqual([
      { lineNumber: 1, result: { ok: true, record: { a: 1 } } },
      { lineNumber: 2, result: { ok: true, record: { b: 2 } } },
    ]);
  });

  it('continues past a malformed line', async () => {
    const lines = await collect(
      readTranscript(streamOf('{"a":1}\nnot json\n{"b":2}\n')),
    );
    expect(lines.map((l) => [l.lineNumber, l.result.ok])).toEqual([
      [1, true],
      [2, false],
      [3, true],
    ]);
    const failure = lines[1].result;
    expect(failure.ok === false && failure.raw).toBe('not json');
  });

  it('skips blank lines but keeps counting them', async () => {
    const lines = await collect(readTranscript(streamOf('{"a":1}\n\n   \n{"b":2}')));
    expect(lines.map((l) => l.lineNumber)).toEqual([1, 4]);
  });

  it('handles CRLF line endings', async () => {
    const lines = await collect(readTranscript(streamOf('{"a":1}\r\n{"b":2}\r\n')));
    expect(lines.map((l) => l.result.ok)).toEqual([true, true]);
  });

  it('ends without error on empty input', async () => {
    expect(await collect(readTranscript(streamOf('')))).toEqual([]);
  });

  it('throws the abort reason when already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stop'));
    await expect(
      collect(readTranscript(streamOf('{"a":1}\n'), { signal: controller.signal })),
    ).rejects.toThrow('stop');
  });

  it('stops at the next line boundary after an abort', async () => {
    const controller = new AbortController();
    const seen: number[] = [];

    const consume = async (): Promise<void> => {
      for await (const line of readTranscript(streamOf('{"a":1}\n{"b":2}\n{"c":3}\n'), {
        signal: controller.signal,
      })) {
        seen.push(line.lineNumber);
        controller.abort(new Error('stop'));
      }
    };

    await expect(consume()).rejects.toThrow('stop');
    expect(seen).toEqual([1]);
  });
});

describe('openTranscript', () => {
  it('reads a transcript file from disk', async () => {
    const lines = await collect(openTranscript(path.join(FIXTURE_DIR, 'scenario.jsonl')));
    expect(lines).toHaveLength(4);
    expect(lines.every((l) => l.result.ok)).toBe(true);
  });
});
