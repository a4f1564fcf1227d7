import { z } from 'zod';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import YAML from 'yaml';
import {
  DEVLOG_CONFIG_PATH,
  DEVLOG_OUTPUT_SUBDIR,
  DEVLOG_RELAY_DB_PATH,
} from '../utils/paths.js';
import { formatIssues } from '../session/schema.js';
import { warn } from '../utils/logger.js';

const PushConfigSchema = z.object({
  enabled: z.boolean().default(false),
  endpoint: z.string().url().default('http://localhost:8080/ingest'),
  timeout_ms: z.number().int().positive().default(30_000),
  token: z.string().min(1).optional(),
});

const RelayConfigSchema = z.object({
  db_path: z.string().min(1).default(DEVLOG_RELAY_DB_PATH),
  host: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(0).max(65535).default(8080),
  token: z.string().min(1).optional(),
});

const GitConfigSchema = z.object({
  timeout_ms: z.number().int().positive().default(5_000),
});

const PUSH_DISABLED: PushConfig = PushConfigSchema.parse({});

// `relay` is validated by `loadRelayConfig`, which only `devlog serve` calls
const ConfigSchema = z.object({
  version: z.literal(1),
  machine_id: z.string().min(1).optional(),
  output_dir: z.string().min(1).default(DEVLOG_OUTPUT_SUBDIR),
  push: PushConfigSchema.default({}).catch((ctx) => {
    warn(`Ignoring invalid push config (${formatIssues(ctx.error)}); push disabled`);
    return PUSH_DISABLED;
  }),
  relay: z.unknown().optional(),
  git: GitConfigSchema.default({}),
});

export type PushConfig = z.infer<typeof PushConfigSchema>;
export type RelayConfig = z.infer<typeof RelayConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function applyEnv(config: Config, env: Env): Config {
  const push = { ...config.push };

  if (env.DEVLOG_PUSH_ENDPOINT) {
    push.endpoint = env.DEVLOG_PUSH_ENDPOINT;
    push.enabled = true;
  }
  if (env.DEVLOG_PUSH_TOKEN) push.token = env.DEVLOG_PUSH_TOKEN;

  return {
    ...config,
    machine_id: env.DEVLOG_MACHINE_ID || config.machine_id,
    push,
  };
}

/**
 * Relay settings for `devlog serve`: the `relay` section plus
 * `DEVLOG_DB_PATH`, `DEVLOG_RELAY_TOKEN` and `DEVLOG_BIND_ADDR`.
 * Throws on invalid values.
 */
export function loadRelayConfig(config: Config, env: Env = process.env): RelayConfig {
  const parsed = RelayConfigSchema.safeParse(config.relay ?? {});
  if (!parsed.success) {
    throw new Error(`Invalid relay config: ${formatIssues(parsed.error)}`);
  }
  const relay = { ...parsed.data };

  if (env.DEVLOG_DB_PATH) relay.db_path = env.DEVLOG_DB_PATH;
  if (env.DEVLOG_RELAY_TOKEN) relay.token = env.DEVLOG_RELAY_TOKEN;
  if (env.DEVLOG_BIND_ADDR) {
    const { host, port } = parseBindAddress(env.DEVLOG_BIND_ADDR);
    relay.host = host;
    relay.port = port;
  }
  return relay;
}

/** `host:port` (the host may be an IPv6 literal in brackets). */
export function parseBindAddress(addr: string): { host: string; port: number } {
  const match = addr.match(/^(\[[^\]]+\]|[^:]+):(\d+)$/);
  if (!match) {
    throw new Error(`Invalid bind address "${addr}". Use host:port, e.g. 0.0.0.0:8080`);
  }
  const port = parseInt(match[2], 10);
  if (port > 65535) {
    throw new Error(`Invalid port in bind address "${addr}"`);
  }
  return { host: match[1].replace(/^\[|\]$/g, ''), port };
}

export function loadConfig(
  configPath: string = DEVLOG_CONFIG_PATH,
  env: Env = process.env,
): Config {
  let config: Config;
  if (!fs.existsSync(configPath)) {
    config = ConfigSchema.parse({ version: 1 });
  } else {
    const raw = fs.readFileSync(configPath, 'utf-8');
    config = ConfigSchema.parse(YAML.parse(raw));
  }
  return applyEnv(config, env);
}

export function writeDefaultConfig(configPath: string = DEVLOG_CONFIG_PATH): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  const defaults = {
    ...ConfigSchema.parse({ version: 1 }),
    relay: RelayConfigSchema.parse({}),
  };
  const yamlStr = YAML.stringify(defaults, { indent: 2 });
  fs.writeFileSync(configPath, yamlStr, 'utf-8');
}

export function resolveMachineId(config: Config): string {
  return config.machine_id ?? os.hostname();
}

/** `CLAUDE_PROJECT_DIR` when the assistant's hook sets it, else the cwd. */
export function resolveProjectDir(env: Env = process.env, cwd: string = process.cwd()): string {
  return path.resolve(env.CLAUDE_PROJECT_DIR || cwd);
}
