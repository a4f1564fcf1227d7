import { z } from 'zod';
import type { PushConfig } from '../config/index.js';
import type { SessionDocument } from '../session/document.js';
import type { PushPayload } from '../session/schema.js';
import { debug, info, warn } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export type PushOutcome =
  | { status: 'stored' | 'overwritten'; sessionId: string }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: string };

export interface PushClientOptions {
  config: PushConfig;
  machineId: string;
  fetchImpl?: typeof fetch;
}

export interface PushClient {
  /** Never rejects: every failure is reported as `{ status: 'failed' }`. */
  push(doc: SessionDocument): Promise<PushOutcome>;
}

const IngestResponseSchema = z.object({
  status: z.enum(['stored', 'overwritten']),
  session_id: z.string(),
});

async function readErrorBody(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, 500);
  } catch {
    return 'unknown error';
  }
}

export function createPushClient(options: PushClientOptions): PushClient {
  const { config, machineId } = options;
  const fetchImpl = options.fetchImpl ?? fetch;

  async function send(doc: SessionDocument): Promise<PushOutcome> {
    const payload: PushPayload = { machine_id: machineId, ...doc };
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (config.token) headers.Authorization = `Bearer ${config.token}`;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), config.timeout_ms);

    try {
      const response = await fetchImpl(config.endpoint, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (!response.ok) {
        return {
          status: 'failed',
          error: `HTTP ${response.status}: ${await readErrorBody(response)}`,
        };
      }

      const parsed = IngestResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        return { status: 'failed', error: 'Unexpected response from relay' };
      }
      return { status: parsed.data.status, sessionId: parsed.data.session_id };
    } catch (err) {
      if (controller.signal.aborted) {
        return { status: 'failed', error: `Timed out after ${config.timeout_ms}ms` };
      }
      return { status: 'failed', error: errorMessage(err) };
    } finally {
      clearTimeout(timer);
    }
  }

  return {
    async push(doc) {
      if (!config.enabled) {
        debug('Push disabled in config');
        return { status: 'skipped', reason: 'push disabled' };
      }

      info(`Pushing session ${doc.session_id} to ${config.endpoint}`);
      const outcome = await send(doc);

      if (outcome.status === 'failed') {
        warn(`Failed to push session ${doc.session_id}: ${outcome.error}`);
      } else if (outcome.status !== 'skipped') {
        info(`Session ${outcome.sessionId} ${outcome.status} on relay`);
      }
      return outcome;
    },
  };
}
