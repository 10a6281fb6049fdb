/**
 * `tasksync init` — Write a default configuration file.
 */

import { Command } from 'commander';
import { existsSync } from 'fs';
import { join } from 'path';
import { defaultConfig, saveConfig } from '../../config';
import { ConfigError } from '../../errors';

interface InitOptions {
  output?: string;
  force?: boolean;
}

/** Where `init` writes when no --output is given. */
export function defaultInitPath(cwd: string = process.cwd()): string {
  return join(cwd, 'config.toml');
}

export function initConfig(path: string, force = false): void {
  if (existsSync(path) && !force) {
    throw new ConfigError(`${path} already exists; use --force to overwrite`);
  }
  saveConfig(defaultConfig(), path);
}

export function createInitCommand(): Command {
  const cmd = new Command('init');

  cmd
    .description('Create a configuration file with default settings')
    .option('-o, --output <path>', 'Where to write the file (default: ./config.toml)')
    .option('-f, --force', 'Overwrite an existing file')
    .action((options: InitOptions) => {
      const path = options.output ?? defaultInitPath();
      initConfig(path, options.force);
      console.log(`Wrote ${path}`);
      console.log('Next: tasksync token --name <device-name>');
    });

  return cmd;
}
