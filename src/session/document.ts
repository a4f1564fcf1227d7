import path from 'node:path';
import type { GitContext } from '../git/context.js';
import type { ConversationEntry } from '../transcript/types.js';

export const SCHEMA_VERSION = '1.0';

/** Serialized as-is; field names are part of the on-disk format. */
export interface SessionDocument {
  schema_version: string;
  session_id: string;
  /** Ingestion time (ISO-8601, UTC), not transcript time. */
  timestamp: string;
  project_dir: string;
  git: GitContext | null;
  conversation: ConversationEntry[];
}

export interface BuildDocumentInput {
  conversation: ConversationEntry[];
  git: GitContext | null;
  sessionId: string;
  projectDir: string;
  now?: Date;
}

export function buildSessionDocument(input: BuildDocumentInput): SessionDocument {
  return {
    schema_version: SCHEMA_VERSION,
    session_id: input.sessionId,
    timestamp: (input.now ?? new Date()).toISOString(),
    project_dir: path.resolve(input.projectDir),
    git: input.git
      ? { remote: input.git.remote, branch: input.git.branch, commit: input.git.commit }
      : null,
    conversation: input.conversation,
  };
}

/**
 * Session id from a transcript filename (`<uuid>.jsonl` → `<uuid>`), or a
 * time-based id when the name has no usable stem.
 */
export function sessionIdFromPath(filePath: string, now: Date = new Date()): string {
  const stem = path.basename(filePath, path.extname(filePath));
  if (stem !== '' && !stem.startsWith('.')) return stem;
  return `session_${Math.floor(now.getTime() / 1000)}`;
}
