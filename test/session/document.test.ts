import path from 'node:path';
import {
  SCHEMA_VERSION,
  buildSessionDocument,
  sessionIdFromPath,
} from '../../src/session/document.js';
import { PushPayloadSchema, SessionDocumentSchema, formatIssues } from '../../src/session/schema.js';

const NOW = new Date('2026-03-04T05:06:07.890Z');

describe('buildSessionDocument', () => {
  it('stamps version, ingestion time and absolute project dir', () => {
    const doc = buildSessionDocument({
      conversation: [{ type: 'user', timestamp: null, content: 'hi' }],
      git: null,
      sessionId: 'abc',
      projectDir: 'relative/project',
      now: NOW,
    });

    expect(doc).toEqual({
      schema_version: SCHEMA_VERSION,
      session_id: 'abc',
      timestamp: '2026-03-04T05:06:07.890Z',
      project_dir: path.resolve('relative/project'),
      git: null,
      conversation: [{ type: 'user', timestamp: null, content: 'hi' }],
    });
  });

  it('copies the git context', () => {
    const git = { remote: null, branch: 'feature/x', commit: 'deadbeef' };
    const doc = buildSessionDocument({
      conversation: [],
      git,
      sessionId: 'abc',
      projectDir: '/srv/app',
      now: NOW,
    });

    expect(doc.git).toEqual({ remote: null, branch: 'feature/x', commit: 'deadbeef' });
    expect(doc.git).not.toBe(git);
  });

  it('produces documents the schema accepts', () => {
    const doc = buildSessionDocument({
      conversation: [
        { type: 'user', timestamp: '2026-03-04T05:00:00Z', content: 'go' },
        { type: 'tool_summary', actions: ['ran ls'] },
      ],
      git: { remote: 'https://example.com/a.git', branch: 'main', commit: 'abc123' },
      sessionId: 'abc',
      projectDir: '/srv/app',
      now: NOW,
    });

    expect(SessionDocumentSchema.safeParse(doc).success).toBe(true);
  });
});

describe('sessionIdFromPath', () => {
  it('uses the file stem', () => {
    expect(sessionIdFromPath('/tmp/transcripts/0a1b2c3d-aaaa.jsonl', NOW)).toBe(
      '0a1b2c3d-aaaa',
    );
  });

  it('falls back to a time-based id', () => {
    expect(sessionIdFromPath('/tmp/.jsonl', NOW)).toBe('session_1772600767');
  });
});

describe('schemas', () => {
  it('rejects an empty tool summary', () => {
    const result = SessionDocumentSchema.safeParse({
      schema_version: '1.0',
      session_id: 'abc',
      timestamp: NOW.toISOString(),
      project_dir: '/srv/app',
      git: null,
      conversation: [{ type: 'tool_summary', actions: [] }],
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toBe(
        'conversation.0.actions: Array must contain at least 1 element(s)',
      );
    }
  });

  it('requires machine_id on a push payload', () => {
    const result = PushPayloadSchema.safeParse({
      schema_version: '1.0',
      session_id: 'abc',
      timestamp: NOW.toISOString(),
      project_dir: '/srv/app',
      git: null,
      conversation: [],
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toBe('machine_id: Required');
    }
  });

  it('labels root-level issues', () => {
    const result = SessionDocumentSchema.safeParse('nope');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toBe('(root): Expected object, received string');
    }
  });
});
