/**
 * `tasksync serve` — Run the sync server until SIGINT or SIGTERM.
 */

import { Command } from 'commander';
import { loadConfig } from '../../config';
import { createLogger } from '../../logger';
import { startServer } from '../../server';

interface ServeOptions {
  config?: string;
  port?: number;
  bind?: string;
}

function parsePort(value: string): number {
  const port = parseInt(value, 10);
  if (Number.isNaN(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

export function createServeCommand(): Command {
  const cmd = new Command('serve');

  cmd
    .description('Start the sync server')
    .option('-c, --config <path>', 'Path to config.toml')
    .option('-p, --port <port>', 'Port to listen on', parsePort)
    .option('-b, --bind <address>', 'Address to bind to')
    .action(async (options: ServeOptions) => {
      await serve(options);
    });

  return cmd;
}

async function serve(options: ServeOptions): Promise<void> {
  const { config, path, fromFile } = loadConfig(options.config);
  if (options.port !== undefined) config.server.port = options.port;
  if (options.bind) config.server.bind = options.bind;

  const logger = createLogger({ level: config.logging.level, pretty: config.logging.pretty });
  if (fromFile) {
    logger.info({ path }, 'Loaded configuration');
  } else {
    logger.info({ path }, 'No configuration file found, using defaults');
  }

  const running = await startServer(config, logger);

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down');
    running.close().then(
      () => logger.info('Server stopped'),
      (err: unknown) => {
        logger.error({ err }, 'Error during shutdown');
        process.exitCode = 1;
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}
