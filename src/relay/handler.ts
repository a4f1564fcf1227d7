import type BetterSqlite3 from 'better-sqlite3';
import { createHash, timingSafeEqual } from 'node:crypto';
import { PushPayloadSchema, formatIssues } from '../session/schema.js';
import { upsertSession } from '../store/sessions.js';
import { projectName } from '../utils/paths.js';
import { error, info } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export type FetchHandler = (request: Request) => Promise<Response>;

export interface RelayHandlerOptions {
  db: BetterSqlite3.Database;
  /** When set, `/ingest` requires `Authorization: Bearer <token>`. */
  token?: string;
  now?: () => Date;
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

function isAuthorized(request: Request, token: string | undefined): boolean {
  if (!token) return true;
  const header = request.headers.get('authorization') ?? '';
  const match = header.match(/^Bearer\s+(.+)$/i);
  if (!match) return false;
  return timingSafeEqual(digest(match[1]), digest(token));
}

async function handleIngest(
  request: Request,
  options: RelayHandlerOptions,
): Promise<Response> {
  if (!isAuthorized(request, options.token)) {
    return json({ status: 'error', error: 'Unauthorized' }, 401);
  }

  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return json({ status: 'error', error: 'Request body is not valid JSON' }, 400);
  }

  const parsed = PushPayloadSchema.safeParse(body);
  if (!parsed.success) {
    return json({ status: 'error', error: formatIssues(parsed.error) }, 400);
  }

  const { machine_id: machineId, ...doc } = parsed.data;
  info(
    `Received session ${doc.session_id} from machine ${machineId} (project: ${projectName(doc.project_dir)})`,
  );

  const receivedAt = options.now ? options.now() : new Date();
  try {
    const result = upsertSession(options.db, machineId, doc, receivedAt);
    info(`Session ${doc.session_id} ${result.outcome}`);
    return json({
      status: result.outcome,
      session_id: doc.session_id,
      received_at: result.record.received_at,
    });
  } catch (err) {
    error(`Failed to store session ${doc.session_id}: ${errorMessage(err)}`);
    return json({ status: 'error', error: errorMessage(err) }, 500);
  }
}

/**
 * Fetch-style handler for the relay:
 *  - `GET /health`: liveness only, no auth and no store access.
 *  - `POST /ingest`: idempotent upsert of one pushed session.
 */
export function createRelayHandler(options: RelayHandlerOptions): FetchHandler {
  return async (request) => {
    const { pathname } = new URL(request.url);

    if (pathname === '/health') {
      if (request.method !== 'GET' && request.method !== 'HEAD') {
        return json({ status: 'error', error: 'Method not allowed' }, 405);
      }
      return json({ status: 'ok' });
    }

    if (pathname === '/ingest') {
      if (request.method !== 'POST') {
        return json({ status: 'error', error: 'Method not allowed' }, 405);
      }
      return handleIngest(request, options);
    }

    return json({ status: 'error', error: 'Not found' }, 404);
  };
}
