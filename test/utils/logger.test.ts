import { debug, error, getLogLevel, info, setLogLevel, warn } from '../../src/utils/logger.js';
import type { LogLevel } from '../../src/utils/logger.js';

describe('logger', () => {
  let initial: LogLevel;
  let lines: string[];

  beforeEach(() => {
    initial = getLogLevel();
    lines = [];
    vi.spyOn(console, 'error').mockImplementation((msg: unknown) => {
      lines.push(String(msg));
    });
  });

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it('writes levels at or above the threshold with a prefix', () => {
    setLogLevel('info');
    debug('hidden');
    info('starting');
    error('broken');

    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain('[info] starting');
    expect(lines[1]).toContain('[error] broken');
  });

  it('prints debug output when verbose', () => {
    setLogLevel('debug');
    debug('details');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('[debug] details');
  });

  it('keeps only warnings and errors when quiet', () => {
    setLogLevel('warn');
    info('progress');
    warn('careful');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('[warn] careful');
  });
});
