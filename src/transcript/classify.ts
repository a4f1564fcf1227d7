import type {
  ClassifiedEntry,
  OtherEntry,
  ToolInvocationEntry,
} from './types.js';

// Harness-injected user turns (slash commands and their local output)
const COMMAND_PREFIXES = ['<command-name>', '<local-command-'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function other(reason: string): OtherEntry {
  return { kind: 'other', reason };
}

/**
 * Normalize message content to a single string.
 *
 * Plain strings are returned verbatim. Segment lists keep only the `text`
 * of segments tagged `text`, joined by newlines. Anything else is `null`.
 */
export function extractText(content: unknown): string | null {
  if (typeof content === 'string') return content;
  if (!Array.isArray(content)) return null;

  const texts: string[] = [];
  for (const segment of content) {
    if (isRecord(segment) && segment.type === 'text' && typeof segment.text === 'string') {
      texts.push(segment.text);
    }
  }
  return texts.join('\n');
}

function messageContent(record: Record<string, unknown>): unknown {
  const message = record.message;
  if (typeof message === 'string') return message;
  if (isRecord(message) && message.content !== undefined) return message.content;
  return record.content;
}

function toInput(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function isToolResultOnly(content: unknown): boolean {
  return (
    Array.isArray(content) &&
    content.length > 0 &&
    content.every((segment) => isRecord(segment) && segment.type === 'tool_result')
  );
}

function classifyUser(
  record: Record<string, unknown>,
  timestamp: string | null,
): ClassifiedEntry {
  const content = messageContent(record);
  if (isToolResultOnly(content)) return { kind: 'tool_result' };

  const text = extractText(content);
  if (text === null) return other('user turn without text content');
  if (text.trim() === '') return other('empty user turn');
  if (COMMAND_PREFIXES.some((prefix) => text.startsWith(prefix))) {
    return other('harness command');
  }
  return { kind: 'user', timestamp, text };
}

function embeddedInvocations(record: Record<string, unknown>): ToolInvocationEntry[] {
  const invocations: ToolInvocationEntry[] = [];
  const message = record.message;
  if (!isRecord(message)) return invocations;

  if (Array.isArray(message.content)) {
    for (const segment of message.content) {
      if (isRecord(segment) && segment.type === 'tool_use' && typeof segment.name === 'string') {
        invocations.push({
          kind: 'tool_invocation',
          toolName: segment.name,
          input: toInput(segment.input),
        });
      }
    }
  }

  // Older transcripts list calls beside the content instead of inside it
  if (Array.isArray(message.tool_use)) {
    for (const call of message.tool_use) {
      if (!isRecord(call)) continue;
      const name =
        typeof call.name === 'string'
          ? call.name
          : typeof call.type === 'string'
            ? call.type
            : null;
      if (name) {
        invocations.push({ kind: 'tool_invocation', toolName: name, input: toInput(call.input) });
      }
    }
  }

  return invocations;
}

function classifyAssistant(
  record: Record<string, unknown>,
  timestamp: string | null,
): ClassifiedEntry[] {
  const entries: ClassifiedEntry[] = [];

  const text = extractText(messageContent(record));
  if (text !== null && text.trim() !== '') {
    entries.push({ kind: 'assistant', timestamp, text });
  }
  entries.push(...embeddedInvocations(record));

  return entries.length > 0 ? entries : [other('assistant turn without text or tool calls')];
}

function classifyToolUse(record: Record<string, unknown>): ClassifiedEntry {
  const name =
    typeof record.tool === 'string'
      ? record.tool
      : typeof record.name === 'string'
        ? record.name
        : null;
  if (!name) return other('tool_use without tool name');
  return { kind: 'tool_invocation', toolName: name, input: toInput(record.input) };
}

/**
 * Map one decoded transcript record to the entries it carries.
 *
 * Missing or mistyped fields degrade to `other` instead of failing. An
 * assistant record yields its text first, then one `tool_invocation` per
 * embedded tool call, in order.
 */
export function classifyRecord(record: unknown): ClassifiedEntry[] {
  if (!isRecord(record)) return [other('record is not an object')];

  const type = record.type;
  if (typeof type !== 'string') return [other('record without type')];
  if (record.isSidechain === true) return [other('sidechain record')];

  const timestamp = typeof record.timestamp === 'string' ? record.timestamp : null;

  switch (type) {
    case 'human':
    case 'user':
      return [classifyUser(record, timestamp)];
    case 'assistant':
      return classifyAssistant(record, timestamp);
    case 'tool_use':
      return [classifyToolUse(record)];
    case 'tool_result':
      return [{ kind: 'tool_result' }];
    default:
      return [other(`unhandled record type "${type}"`)];
  }
}
