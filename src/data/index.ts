export { Database, DEFAULT_MIGRATIONS_DIR, createPoolConfig } from './database';
export type { Queryable, ConnectionPool, PooledClient, DatabaseOptions } from './database';
export { AccountRegistry, parseAccountSpec } from './account-registry';
export { SnapshotStore } from './snapshot-store';
export { IngestionScheduler } from './ingestion-scheduler';
export type {
  AccountSource,
  ProfileSource,
  SnapshotSink,
  IngestionSchedulerOptions,
  SchedulerStatus,
} from './ingestion-scheduler';
export { importLegacyData, LEGACY_PROFILES_FILE, LEGACY_HISTORY_FILE } from './legacy-importer';
export type { ImportResult } from './legacy-importer';
