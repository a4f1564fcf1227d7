import type BetterSqlite3 from 'better-sqlite3';
import { z } from 'zod';
import type { SessionDocument } from '../session/document.js';
import { ConversationEntrySchema } from '../session/schema.js';
import type { ConversationEntry } from '../transcript/types.js';

/** One logical record per (machine_id, session_id). */
export interface StoredSessionRecord {
  id: number;
  machine_id: string;
  session_id: string;
  schema_version: string;
  timestamp: string;
  project_dir: string;
  git_remote: string | null;
  git_branch: string | null;
  git_commit: string | null;
  conversation: ConversationEntry[];
  /** Server receipt time, ISO-8601 UTC. */
  received_at: string;
  push_count: number;
}

export type UpsertOutcome = 'stored' | 'overwritten';

export interface UpsertResult {
  outcome: UpsertOutcome;
  record: StoredSessionRecord;
}

interface SessionRow {
  id: number;
  machine_id: string;
  session_id: string;
  schema_version: string;
  timestamp: string;
  project_dir: string;
  git_remote: string | null;
  git_branch: string | null;
  git_commit: string | null;
  conversation: string;
  received_at: number;
  push_count: number;
}

const ConversationSchema = z.array(ConversationEntrySchema);

function rowToRecord(row: SessionRow): StoredSessionRecord {
  return {
    id: row.id,
    machine_id: row.machine_id,
    session_id: row.session_id,
    schema_version: row.schema_version,
    timestamp: row.timestamp,
    project_dir: row.project_dir,
    git_remote: row.git_remote,
    git_branch: row.git_branch,
    git_commit: row.git_commit,
    conversation: ConversationSchema.parse(JSON.parse(row.conversation)),
    received_at: new Date(row.received_at).toISOString(),
    push_count: row.push_count,
  };
}

/**
 * Insert or replace the record for (machineId, doc.session_id) in a single
 * statement; the UNIQUE constraint arbitrates concurrent pushes. A replaced
 * record's `received_at` always moves forward, even when two pushes land in
 * the same millisecond.
 */
export function upsertSession(
  db: BetterSqlite3.Database,
  machineId: string,
  doc: SessionDocument,
  receivedAt: Date = new Date(),
): UpsertResult {
  const row = db
    .prepare(
      `INSERT INTO sessions (session_id, machine_id, project_dir, timestamp, schema_version,
                             git_remote, git_branch, git_commit, conversation, received_at)
       VALUES (@session_id, @machine_id, @project_dir, @timestamp, @schema_version,
               @git_remote, @git_branch, @git_commit, @conversation, @received_at)
       ON CONFLICT (machine_id, session_id) DO UPDATE SET
         project_dir = excluded.project_dir,
         timestamp = excluded.timestamp,
         schema_version = excluded.schema_version,
         git_remote = excluded.git_remote,
         git_branch = excluded.git_branch,
         git_commit = excluded.git_commit,
         conversation = excluded.conversation,
         received_at = MAX(excluded.received_at, sessions.received_at + 1),
         push_count = sessions.push_count + 1
       RETURNING *`,
    )
    .get({
      session_id: doc.session_id,
      machine_id: machineId,
      project_dir: doc.project_dir,
      // Normalized to UTC so range lookups compare lexicographically
      timestamp: new Date(doc.timestamp).toISOString(),
      schema_version: doc.schema_version,
      git_remote: doc.git?.remote ?? null,
      git_branch: doc.git?.branch ?? null,
      git_commit: doc.git?.commit ?? null,
      conversation: JSON.stringify(doc.conversation),
      received_at: receivedAt.getTime(),
    }) as SessionRow;

  return {
    outcome: row.push_count > 1 ? 'overwritten' : 'stored',
    record: rowToRecord(row),
  };
}

export function getStoredSession(
  db: BetterSqlite3.Database,
  machineId: string,
  sessionId: string,
): StoredSessionRecord | null {
  const row = db
    .prepare('SELECT * FROM sessions WHERE machine_id = ? AND session_id = ?')
    .get(machineId, sessionId) as SessionRow | undefined;
  return row ? rowToRecord(row) : null;
}

export interface TimeRange {
  since?: Date;
  until?: Date;
}

export function listSessionsByMachine(
  db: BetterSqlite3.Database,
  machineId: string,
  range: TimeRange = {},
): StoredSessionRecord[] {
  const rows = db
    .prepare(
      `SELECT * FROM sessions
       WHERE machine_id = @machine_id
         AND (@since IS NULL OR timestamp >= @since)
         AND (@until IS NULL OR timestamp <= @until)
       ORDER BY timestamp DESC`,
    )
    .all({
      machine_id: machineId,
      since: range.since?.toISOString() ?? null,
      until: range.until?.toISOString() ?? null,
    }) as SessionRow[];
  return rows.map(rowToRecord);
}

export function listSessionsByProject(
  db: BetterSqlite3.Database,
  projectDir: string,
): StoredSessionRecord[] {
  const rows = db
    .prepare('SELECT * FROM sessions WHERE project_dir = ? ORDER BY timestamp DESC')
    .all(projectDir) as SessionRow[];
  return rows.map(rowToRecord);
}

export function listSessionsByRemote(
  db: BetterSqlite3.Database,
  remote: string,
): StoredSessionRecord[] {
  const rows = db
    .prepare('SELECT * FROM sessions WHERE git_remote = ? ORDER BY timestamp DESC')
    .all(remote) as SessionRow[];
  return rows.map(rowToRecord);
}

export function countSessions(db: BetterSqlite3.Database): number {
  const row = db.prepare('SELECT COUNT(*) as n FROM sessions').get() as { n: number };
  return row.n;
}
