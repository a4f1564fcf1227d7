import { simpleGit } from 'simple-git';
import type { SimpleGit } from 'simple-git';
import { debug } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export interface GitContext {
  remote: string | null;
  branch: string;
  commit: string;
}

export interface GitContextProvider {
  /** Never rejects: any failure resolves to `null`. */
  resolve(dir: string): Promise<GitContext | null>;
}

export interface GitProviderOptions {
  timeoutMs?: number;
}

async function readRef(git: SimpleGit, args: string[]): Promise<string | null> {
  try {
    const value = (await git.raw(args)).trim();
    return value === '' ? null : value;
  } catch {
    return null;
  }
}

export async function getGitContext(
  dir: string,
  options: GitProviderOptions = {},
): Promise<GitContext | null> {
  let git: SimpleGit;
  try {
    git = simpleGit({
      baseDir: dir,
      timeout: options.timeoutMs ? { block: options.timeoutMs } : undefined,
    });
  } catch (err) {
    debug(`git unavailable for ${dir}: ${errorMessage(err)}`);
    return null;
  }

  const inside = await readRef(git, ['rev-parse', '--is-inside-work-tree']);
  if (inside !== 'true') {
    debug(`${dir} is not inside a git work tree`);
    return null;
  }

  const branch = await readRef(git, ['rev-parse', '--abbrev-ref', 'HEAD']);
  const commit = await readRef(git, ['rev-parse', 'HEAD']);
  if (!branch || !commit) {
    debug('Could not resolve branch or HEAD commit (no commits yet?)');
    return null;
  }

  // No origin configured is fine; the rest of the context still stands
  const remote = await readRef(git, ['remote', 'get-url', 'origin']);

  return { remote, branch, commit };
}

export function createGitContextProvider(
  options: GitProviderOptions = {},
): GitContextProvider {
  return {
    resolve: (dir) => getGitContext(dir, options),
  };
}
