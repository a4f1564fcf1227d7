import fs from 'node:fs/promises';
import path from 'node:path';
import type { SessionDocument } from './document.js';
import { SessionDocumentSchema, formatIssues } from './schema.js';
import { debug } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export const SHORT_ID_LENGTH = 8;

// Anything else (separators, dots, control characters) becomes `_`
const SAFE_ID_CHAR = /^[A-Za-z0-9_-]$/;

export class PersistenceError extends Error {
  readonly path: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
    this.path = filePath;
  }
}

export interface WriterOptions {
  outputDir: string;
}

/**
 * `YYYY-MM-DD-HHMMSS-<short id>.json`, in UTC, from the document's
 * ingestion timestamp. Sorts chronologically by name. The short id keeps
 * only filename-safe characters, so the file always lands in `outputDir`.
 */
export function documentFilename(doc: SessionDocument): string {
  const parsed = new Date(doc.timestamp);
  const when = Number.isNaN(parsed.getTime()) ? new Date() : parsed;
  const iso = when.toISOString();
  const date = iso.slice(0, 10);
  const time = iso.slice(11, 19).replace(/:/g, '');
  const shortId = Array.from(doc.session_id)
    .slice(0, SHORT_ID_LENGTH)
    .map((ch) => (SAFE_ID_CHAR.test(ch) ? ch : '_'))
    .join('');
  return `${date}-${time}-${shortId}.json`;
}

export async function writeSessionDocument(
  doc: SessionDocument,
  options: WriterOptions,
): Promise<string> {
  const outputDir = path.resolve(options.outputDir);

  try {
    await fs.mkdir(outputDir, { recursive: true });
  } catch (err) {
    throw new PersistenceError(
      `Failed to create output directory ${outputDir}: ${errorMessage(err)}`,
      outputDir,
      { cause: err },
    );
  }

  const outputPath = path.join(outputDir, documentFilename(doc));
  try {
    await fs.writeFile(outputPath, JSON.stringify(doc, null, 2) + '\n', 'utf-8');
  } catch (err) {
    throw new PersistenceError(
      `Failed to write ${outputPath}: ${errorMessage(err)}`,
      outputPath,
      { cause: err },
    );
  }

  debug(`Wrote ${doc.conversation.length} entries to ${outputPath}`);
  return outputPath;
}

export async function readSessionDocument(filePath: string): Promise<SessionDocument> {
  const raw = await fs.readFile(filePath, 'utf-8');
  const result = SessionDocumentSchema.safeParse(JSON.parse(raw));
  if (!result.success) {
    throw new Error(`Invalid session document ${filePath}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/** Most recently modified `.json` document in `outputDir`, or `null`. */
export async function findLatestDocument(outputDir: string): Promise<string | null> {
  let files: string[];
  try {
    const entries = await fs.readdir(outputDir);
    files = entries.filter((f) => f.endsWith('.json'));
  } catch {
    return null;
  }

  let latest: { path: string; mtimeMs: number } | null = null;
  for (const file of files) {
    const filePath = path.join(outputDir, file);
    try {
      const stat = await fs.stat(filePath);
      if (stat.isFile() && (!latest || stat.mtimeMs > latest.mtimeMs)) {
        latest = { path: filePath, mtimeMs: stat.mtimeMs };
      }
    } catch {
      debug(`Failed to stat ${filePath}`);
    }
  }
  return latest?.path ?? null;
}
