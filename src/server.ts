import { Server, createServer } from 'http';
import { AddressInfo } from 'net';
import { Logger } from 'pino';
import { createApp } from './app';
import type { Config } from './config';
import { SyncEngine } from './services/syncEngine';
import { SqliteStorage } from './stores/sqliteStorage';

export interface RunningServer {
  server: Server;
  address: AddressInfo;
  close(): Promise<void>;
}

function listen(server: Server, port: number, host: string): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error(`Unexpected listen address: ${String(address)}`));
        return;
      }
      resolve(address);
    });
  });
}

/**
 * Opens the database, builds the app and starts listening. A port of 0
 * binds an ephemeral port; the chosen one is on `address`.
 */
export async function startServer(config: Config, logger: Logger): Promise<RunningServer> {
  const storage = await SqliteStorage.open(config.database.path);
  const engine = new SyncEngine(storage, { logger: logger.child({ component: 'sync' }) });
  const app = createApp({
    engine,
    tokens: config.tokens,
    logger,
    bodyLimit: config.server.body_limit,
  });

  if (config.tokens.length === 0) {
    logger.warn('No API tokens configured; every sync request will be rejected');
  }

  const server = createServer(app);
  let address: AddressInfo;
  try {
    address = await listen(server, config.server.port, config.server.bind);
  } catch (error) {
    await storage.close();
    throw error;
  }
  logger.info(
    { address: address.address, port: address.port, database: config.database.path },
    'Server listening'
  );

  let closing: Promise<void> | undefined;
  const close = (): Promise<void> => {
    closing ??= new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeIdleConnections();
    }).then(() => storage.close());
    return closing;
  };

  return { server, address, close };
}
