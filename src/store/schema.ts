export interface Migration {
  version: number;
  description: string;
  up: string;
}

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'Relay sessions',
    up: `
      CREATE TABLE IF NOT EXISTS sessions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        machine_id TEXT NOT NULL,
        project_dir TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        schema_version TEXT NOT NULL,
        git_remote TEXT,
        git_branch TEXT,
        git_commit TEXT,
        conversation TEXT NOT NULL CHECK (json_valid(conversation)),
        received_at INTEGER NOT NULL,
        push_count INTEGER NOT NULL DEFAULT 1,
        UNIQUE (machine_id, session_id)
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_machine_timestamp ON sessions(machine_id, timestamp);
      CREATE INDEX IF NOT EXISTS idx_sessions_project ON sessions(project_dir);
      CREATE INDEX IF NOT EXISTS idx_sessions_git_remote ON sessions(git_remote);
    `,
  },
];
