import { z } from 'zod';
import type { SessionDocument } from './document.js';

const MessageEntrySchema = {
  timestamp: z.string().nullable(),
  content: z.string(),
};

export const ConversationEntrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('user'), ...MessageEntrySchema }),
  z.object({ type: z.literal('assistant'), ...MessageEntrySchema }),
  z.object({ type: z.literal('tool_summary'), actions: z.array(z.string()).min(1) }),
]);

export const GitContextSchema = z.object({
  remote: z.string().nullable(),
  branch: z.string().min(1),
  commit: z.string().min(1),
});

const SessionDocumentObject = z.object({
  schema_version: z.string().min(1),
  session_id: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
  project_dir: z.string().min(1),
  git: GitContextSchema.nullable(),
  conversation: z.array(ConversationEntrySchema),
});

export const SessionDocumentSchema: z.ZodType<SessionDocument> = SessionDocumentObject;

/** Body of a relay submission: the document plus the pushing machine. */
export const PushPayloadSchema = SessionDocumentObject.extend({
  machine_id: z.string().min(1),
});

export type PushPayload = z.infer<typeof PushPayloadSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
