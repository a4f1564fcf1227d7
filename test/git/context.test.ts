import { createGitContextProvider, getGitContext } from '../../src/git/context.js';

const mocks = vi.hoisted(() => ({
  responses: new Map<string, string | Error>(),
  simpleGit: vi.fn(),
}));

vi.mock('simple-git', () => ({ simpleGit: mocks.simpleGit }));

function fakeGit() {
  return {
    raw: vi.fn(async (args: string[]) => {
      const response = mocks.responses.get(args.join(' '));
      if (response === undefined || response instanceof Error) {
        throw response ?? new Error(`fatal: unexpected git ${args.join(' ')}`);
      }
      return response;
    }),
  };
}

const COMMIT = '0123456789abcdef0123456789abcdef01234567';

function setRepo(overrides: Record<string, string | Error> = {}): void {
  mocks.responses.clear();
  const defaults: Record<string, string | Error> = {
    'rev-parse --is-inside-work-tree': 'true\n',
    'rev-parse --abbrev-ref HEAD': 'main\n',
    'rev-parse HEAD': `${COMMIT}\n`,
    'remote get-url origin': 'git@example.com:team/app.git\n',
  };
  for (const [key, value] of Object.entries({ ...defaults, ...overrides })) {
    mocks.responses.set(key, value);
  }
}

describe('getGitContext', () => {
  beforeEach(() => {
    mocks.simpleGit.mockReset();
    mocks.simpleGit.mockImplementation(fakeGit);
  });

  it('resolves remote, branch and commit', async () => {
    setRepo();
    await expect(getGitContext('/srv/app')).resolves.toEqual({
      remote: 'git@example.com:team/app.git',
      branch: 'main',
      commit: COMMIT,
    });
  });

  it('passes the directory and timeout to simple-git', async () => {
    setRepo();
    await getGitContext('/srv/app', { timeoutMs: 1500 });
    expect(mocks.simpleGit).toHaveBeenCalledWith({
      baseDir: '/srv/app',
      timeout: { block: 1500 },
    });
  });

  it('keeps the context when there is no origin remote', async () => {
    setRepo({ 'remote get-url origin': new Error("error: No such remote 'origin'") });
    await expect(getGitContext('/srv/app')).resolves.toEqual({
      remote: null,
      branch: 'main',
      commit: COMMIT,
    });
  });

  it('returns null outside a work tree', async () => {
    setRepo({ 'rev-parse --is-inside-work-tree': new Error('fatal: not a git repository') });
    await expect(getGitContext('/tmp')).resolves.toBeNull();
  });

  it('returns null in a repository without commits', async () => {
    setRepo({ 'rev-parse HEAD': new Error("fatal: ambiguous argument 'HEAD'") });
    await expect(getGitContext('/srv/app')).resolves.toBeNull();
  });

  it('returns null when simple-git cannot start', async () => {
    mocks.simpleGit.mockImplementation(() => {
      throw new Error('Cannot use simple-git on a directory that does not exist');
    });
    await expect(getGitContext('/missing')).resolves.toBeNull();
  });
});

describe('createGitContextProvider', () => {
  beforeEach(() => {
    mocks.simpleGit.mockReset();
    mocks.simpleGit.mockImplementation(fakeGit);
  });

  it('resolves through the configured options', async () => {
    setRepo({ 'rev-parse --abbrev-ref HEAD': 'feature/login\n' });
    const provider = createGitContextProvider({ timeoutMs: 250 });

    await expect(provider.resolve('/srv/app')).resolves.toEqual({
      remote: 'git@example.com:team/app.git',
      branch: 'feature/login',
      commit: COMMIT,
    });
    expect(mocks.simpleGit).toHaveBeenCalledWith({
      baseDir: '/srv/app',
      timeout: { block: 250 },
    });
  });
});
