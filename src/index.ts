export * from './types';
export * from './errors';
export { SyncEngine, orderChanges } from './services/syncEngine';
export type { SyncEngineOptions } from './services/syncEngine';
export { canonicalize, compareVersions, shouldReplace } from './services/conflictResolver';
export * from './stores';
export { Database } from './db/database';
export { parseSyncRequest, syncRequestSchema } from './validation/syncRequest';
export { createApp } from './app';
export type { AppOptions } from './app';
export { startServer } from './server';
export type { RunningServer } from './server';
export * from './config';
export { createLogger } from './logger';
export { generateToken, hashToken, verifyToken, findMatchingToken } from './auth/tokens';
export { NAME, VERSION } from './version';
