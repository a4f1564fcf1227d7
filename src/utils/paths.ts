import path from 'node:path';
import os from 'node:os';

export const DEVLOG_DIR = path.join(os.homedir(), '.devlog');

export const DEVLOG_CONFIG_PATH = path.join(DEVLOG_DIR, 'config.yml');

export const DEVLOG_RELAY_DB_PATH = path.join(DEVLOG_DIR, 'relay.db');

// Project-relative output directory
export const DEVLOG_OUTPUT_SUBDIR = '.devlog';

/**
 * Last path component of a project directory, splitting on `/` and `\`.
 * e.g. `C:\work\api` → `api`
 */
export function projectName(projectDir: string): string {
  const parts = projectDir.split(/[\\/]/).filter(Boolean);
  return parts.length > 0 ? parts[parts.length - 1] : 'unknown';
}
