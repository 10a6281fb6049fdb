/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { NAME, VERSION } from '../version';
import { createInitCommand } from './commands/init';
import { createServeCommand } from './commands/serve';
import { createStatusCommand } from './commands/status';
import { createTokenCommand } from './commands/token';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Self-hosted sync server for tasks, lists and tags');

  program.addCommand(createServeCommand());
  program.addCommand(createTokenCommand());
  program.addCommand(createInitCommand());
  program.addCommand(createStatusCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\nError: ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    } else {
      console.error(error);
    }
    process.exit(1);
  }
}
