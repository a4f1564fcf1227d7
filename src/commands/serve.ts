import { Command } from 'commander';
import { loadConfig, loadRelayConfig, parseBindAddress } from '../config/index.js';
import { initStore } from '../store/index.js';
import { createRelayHandler } from '../relay/handler.js';
import { startRelayServer } from '../relay/server.js';
import { info } from '../utils/logger.js';

async function runServe(options: { bind?: string; db?: string }): Promise<void> {
  const relay = loadRelayConfig(loadConfig());
  const { host, port } = options.bind
    ? parseBindAddress(options.bind)
    : { host: relay.host, port: relay.port };
  const dbPath = options.db ?? relay.db_path;

  const db = initStore(dbPath);
  info(`Database initialized at: ${dbPath}`);

  const server = startRelayServer({
    handler: createRelayHandler({ db, token: relay.token }),
    host,
    port,
  });

  // Resolve only on shutdown so the store stays open while serving
  await new Promise<void>((resolve, reject) => {
    const shutdown = (signal: string): void => {
      info(`Received ${signal}, shutting down`);
      server.close().then(resolve, reject);
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });
}

export function createServeCommand(): Command {
  return new Command('serve')
    .description('Run the relay that stores pushed sessions')
    .option('--bind <host:port>', 'Address to listen on (default from config)')
    .option('--db <path>', 'SQLite database path (default from config)')
    .action(runServe);
}
