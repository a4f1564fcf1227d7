// --- Classified entries (ephemeral, one or more per transcript line) ---

export interface UserMessageEntry {
  kind: 'user';
  timestamp: string | null;
  text: string;
}

export interface AssistantMessageEntry {
  kind: 'assistant';
  timestamp: string | null;
  text: string;
}

export interface ToolInvocationEntry {
  kind: 'tool_invocation';
  toolName: string;
  input: Record<string, unknown>;
}

export interface ToolResultEntry {
  kind: 'tool_result';
}

export interface OtherEntry {
  kind: 'other';
  reason: string;
}

export type ClassifiedEntry =
  | UserMessageEntry
  | AssistantMessageEntry
  | ToolInvocationEntry
  | ToolResultEntry
  | OtherEntry;

export type MessageEntry = UserMessageEntry | AssistantMessageEntry;

// --- Retained conversation entries (serialized as-is) ---

export interface UserConversationEntry {
  type: 'user';
  timestamp: string | null;
  content: string;
}

export interface AssistantConversationEntry {
  type: 'assistant';
  timestamp: string | null;
  content: string;
}

export interface ToolSummaryEntry {
  type: 'tool_summary';
  actions: string[];
}

export type ConversationEntry =
  | UserConversationEntry
  | AssistantConversationEntry
  | ToolSummaryEntry;

// --- Reader output ---

export type DecodeResult =
  | { ok: true; record: unknown }
  | { ok: false; raw: string; error: string };

export interface TranscriptLine {
  lineNumber: number;
  result: DecodeResult;
}
