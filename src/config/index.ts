/**
 * Server configuration
 *
 * Read from a TOML file, validated with zod, then adjusted by environment
 * variables. A missing file means every default applies.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { parse, stringify } from '@iarna/toml';
import { z } from 'zod';
import { ConfigError } from '../errors';
import { LOG_LEVELS } from '../logger';
import { NAME } from '../version';

export const ConfigSchema = z.object({
  server: z
    .object({
      bind: z.string().min(1).default('0.0.0.0'),
      port: z.number().int().min(0).max(65535).default(3030),
      body_limit: z.string().min(1).default('10mb'),
    })
    .default({}),
  database: z
    .object({
      path: z.string().min(1).default(`${NAME}.sqlite`),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
      pretty: z.boolean().default(false),
    })
    .default({}),
  tokens: z
    .array(
      z.object({
        name: z.string().min(1),
        token_hash: z.string().min(1),
      })
    )
    .default([]),
});

export type Config = z.infer<typeof ConfigSchema>;
export type TokenConfig = Config['tokens'][number];

export type Env = Record<string, string | undefined>;

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Where the config lives when no path is given: TASKSYNC_CONFIG, then
 * ./config.toml, then /data/config.toml (container volume), then the XDG
 * config directory.
 */
export function defaultConfigPath(env: Env = process.env): string {
  if (env.TASKSYNC_CONFIG) {
    return env.TASKSYNC_CONFIG;
  }
  const local = join(process.cwd(), 'config.toml');
  if (existsSync(local)) {
    return local;
  }
  const data = '/data/config.toml';
  if (existsSync(data)) {
    return data;
  }
  const base = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(base, NAME, 'config.toml');
}

export function parseConfig(content: string, source: string = 'config'): Config {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse ${source}: ${reason}`, { cause: error });
  }
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${source}: ${details}`);
  }
  return result.data;
}

export function loadConfigFrom(path: string): Config {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to read config file ${path}`, { cause: error });
  }
  return parseConfig(content, path);
}

/** PORT, BIND, DATABASE_PATH and LOG_LEVEL take precedence over the file. */
export function applyEnvOverrides(config: Config, env: Env = process.env): Config {
  const overridden: Config = {
    ...config,
    server: { ...config.server },
    database: { ...config.database },
    logging: { ...config.logging },
  };

  if (env.PORT) {
    const port = parseInt(env.PORT, 10);
    if (Number.isNaN(port) || port < 0 || port > 65535) {
      throw new ConfigError(`PORT must be a number between 0 and 65535, got "${env.PORT}"`);
    }
    overridden.server.port = port;
  }
  if (env.BIND) {
    overridden.server.bind = env.BIND;
  }
  if (env.DATABASE_PATH) {
    overridden.database.path = env.DATABASE_PATH;
  }
  if (env.LOG_LEVEL) {
    const level = LOG_LEVELS.find((candidate) => candidate === env.LOG_LEVEL);
    if (!level) {
      throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${env.LOG_LEVEL}"`);
    }
    overridden.logging.level = level;
  }

  return overridden;
}

export interface LoadedConfig {
  config: Config;
  path: string;
  fromFile: boolean;
}

export function loadConfig(path?: string, env: Env = process.env): LoadedConfig {
  if (path) {
    return { config: applyEnvOverrides(loadConfigFrom(path), env), path, fromFile: true };
  }
  const resolved = defaultConfigPath(env);
  if (!existsSync(resolved)) {
    return { config: applyEnvOverrides(defaultConfig(), env), path: resolved, fromFile: false };
  }
  return { config: applyEnvOverrides(loadConfigFrom(resolved), env), path: resolved, fromFile: true };
}

export function serializeConfig(config: Config): string {
  const body = stringify({
    server: {
      bind: config.server.bind,
      port: config.server.port,
      body_limit: config.server.body_limit,
    },
    database: {
      path: config.database.path,
    },
    logging: {
      level: config.logging.level,
      pretty: config.logging.pretty,
    },
    tokens: config.tokens.map((token) => ({ name: token.name, token_hash: token.token_hash })),
  });

  return (
    `# ${NAME} configuration\n\n` +
    body +
    `\n# Add tokens with: ${NAME} token --name <device-name>\n`
  );
}

export function saveConfig(config: Config, path: string): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  writeFileSync(path, serializeConfig(config), { mode: 0o600 });
}
