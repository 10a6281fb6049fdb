/**
 * `tasksync token` — Issue, list and revoke API tokens.
 *
 * Only the hash is written to the config file. The token itself is printed
 * once and cannot be recovered.
 */

import { Command } from 'commander';
import { existsSync } from 'fs';
import { generateToken, hashToken } from '../../auth/tokens';
import { Config, defaultConfig, defaultConfigPath, loadConfigFrom, saveConfig } from '../../config';
import { ConfigError } from '../../errors';

interface TokenOptions {
  name?: string;
  list?: boolean;
  revoke?: string;
  config?: string;
}

// No environment overrides here: whatever is loaded gets written back.
function readConfigFile(path: string): Config {
  return existsSync(path) ? loadConfigFrom(path) : defaultConfig();
}

export async function issueToken(configPath: string, name: string): Promise<string> {
  const config = readConfigFile(configPath);
  if (config.tokens.some((token) => token.name === name)) {
    throw new ConfigError(`A token named "${name}" already exists; revoke it first`);
  }
  const token = generateToken();
  config.tokens.push({ name, token_hash: await hashToken(token) });
  saveConfig(config, configPath);
  return token;
}

export interface TokenSummary {
  name: string;
  /** Leading characters of the stored hash. */
  hashPreview: string;
}

const PREVIEW_LENGTH = 20;

export function listTokens(configPath: string): TokenSummary[] {
  return readConfigFile(configPath).tokens.map((token) => ({
    name: token.name,
    hashPreview:
      token.token_hash.length > PREVIEW_LENGTH
        ? `${token.token_hash.slice(0, PREVIEW_LENGTH)}...`
        : token.token_hash,
  }));
}

/** False when no token has that name. */
export function revokeToken(configPath: string, name: string): boolean {
  const config = readConfigFile(configPath);
  const remaining = config.tokens.filter((token) => token.name !== name);
  if (remaining.length === config.tokens.length) {
    return false;
  }
  saveConfig({ ...config, tokens: remaining }, configPath);
  return true;
}

export function createTokenCommand(): Command {
  const cmd = new Command('token');

  cmd
    .description('Manage API tokens')
    .option('-n, --name <name>', 'Device name for a new token', 'default')
    .option('-l, --list', 'List configured token names')
    .option('-r, --revoke <name>', 'Remove the token with this name')
    .option('-c, --config <path>', 'Path to config.toml')
    .action(async (options: TokenOptions) => {
      await runToken(options);
    });

  return cmd;
}

async function runToken(options: TokenOptions): Promise<void> {
  const configPath = options.config ?? defaultConfigPath();

  if (options.list) {
    if (!existsSync(configPath)) {
      console.log(`No config file found at ${configPath}`);
      console.log('Run `tasksync init` to create one.');
      return;
    }
    const tokens = listTokens(configPath);
    if (tokens.length === 0) {
      console.log('No tokens configured.');
      console.log('Generate one with: tasksync token --name <device-name>');
      return;
    }
    console.log(`Tokens in ${configPath}:\n`);
    for (const token of tokens) {
      console.log(`  ${token.name} - ${token.hashPreview}`);
    }
    return;
  }

  if (options.revoke) {
    if (!revokeToken(configPath, options.revoke)) {
      throw new ConfigError(`No token named "${options.revoke}"`);
    }
    console.log(`Revoked token "${options.revoke}". Restart the server to apply.`);
    return;
  }

  const name = options.name ?? 'default';
  const token = await issueToken(configPath, name);
  console.log(`\nNew token for "${name}":\n\n  ${token}\n`);
  console.log('Store it now; it is not shown again.');
  console.log(`The hash was saved to ${configPath}. Restart the server to apply.`);
  console.log('Clients send it as: Authorization: Bearer <token>\n');
}
