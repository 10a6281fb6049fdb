export * from './types';
export { SqliteRecordStore } from './recordStore';
export { SqliteTombstoneStore } from './tombstoneStore';
export { SqliteCursorStore } from './cursorStore';
export { SqliteStorage } from './sqliteStorage';
