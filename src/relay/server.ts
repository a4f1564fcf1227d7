import { serve } from '@hono/node-server';
import type { ServerType } from '@hono/node-server';
import type { FetchHandler } from './handler.js';
import { info } from '../utils/logger.js';

export interface RelayServerOptions {
  handler: FetchHandler;
  host: string;
  port: number;
}

export interface RelayServer {
  close(): Promise<void>;
}

export function startRelayServer(options: RelayServerOptions): RelayServer {
  const server: ServerType = serve(
    { fetch: options.handler, hostname: options.host, port: options.port },
    (address) => {
      info(`Relay listening on ${address.address}:${address.port}`);
    },
  );

  return {
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
