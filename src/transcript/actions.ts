export const MAX_COMMAND_LENGTH = 50;
export const MAX_PATTERN_LENGTH = 40;

type ActionFormatter = (input: Record<string, unknown>) => string;

/** Truncates by code point, so surrogate pairs are never split. */
export function truncate(str: string, max: number): string {
  const chars = Array.from(str);
  if (chars.length <= max) return str;
  return chars.slice(0, max - 3).join('') + '...';
}

function stringField(
  input: Record<string, unknown>,
  keys: string[],
  fallback: string,
): string {
  for (const key of keys) {
    const value = input[key];
    if (typeof value === 'string' && value !== '') return value;
  }
  return fallback;
}

const filePath = (input: Record<string, unknown>): string =>
  stringField(input, ['file_path', 'path', 'notebook_path'], '<unknown>');

const pattern = (input: Record<string, unknown>): string =>
  truncate(stringField(input, ['pattern'], '<pattern>'), MAX_PATTERN_LENGTH);

const FORMATTERS = new Map<string, ActionFormatter>([
  ['Edit', (input) => `edited ${filePath(input)}`],
  ['MultiEdit', (input) => `edited ${filePath(input)}`],
  ['NotebookEdit', (input) => `edited ${filePath(input)}`],
  // Write is the only tool that explicitly creates a new file
  ['Write', (input) => `created ${filePath(input)}`],
  ['Read', (input) => `read ${filePath(input)}`],
  [
    'Bash',
    (input) => `ran ${truncate(stringField(input, ['command'], '<command>'), MAX_COMMAND_LENGTH)}`,
  ],
  ['Glob', (input) => `searched for ${pattern(input)}`],
  ['Grep', (input) => `searched for ${pattern(input)}`],
  [
    'WebFetch',
    (input) => `fetched ${truncate(stringField(input, ['url'], '<url>'), MAX_PATTERN_LENGTH)}`,
  ],
  ['Task', () => 'used subagent'],
  ['TodoWrite', () => 'updated todo list'],
]);

/**
 * One-line, human-readable description of a tool call. Tool output is
 * never part of it; unknown tools fall back to `used <name>`.
 */
export function formatAction(
  toolName: string,
  input: Record<string, unknown>,
): string {
  const formatter = FORMATTERS.get(toolName);
  return formatter ? formatter(input) : `used ${toolName}`;
}
