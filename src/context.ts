import { AccountRegistry, Database, IngestionScheduler, SnapshotStore } from './data';
import { SourceClient } from './ncore';
import { Config } from './types';
import { HealthChecker, createDatabaseHealthCheck, createSchedulerHealthCheck } from './utils';

/** Everything the process shares, built once at startup and passed down explicitly. */
export interface AppContext {
  config: Config;
  db: Database;
  registry: AccountRegistry;
  store: SnapshotStore;
  client: SourceClient;
  scheduler: IngestionScheduler;
  healthChecker: HealthChecker;
}

export function createAppContext(config: Config, db: Database): AppContext {
  const registry = new AccountRegistry(db);
  const store = new SnapshotStore(db);
  const client = new SourceClient(
    { nick: config.ncore.nick, pass: config.ncore.pass },
    { baseUrl: config.ncore.baseUrl, timeoutMs: config.ncore.timeoutMs }
  );
  const scheduler = new IngestionScheduler(registry, client, store, {
    intervalMs: config.ingestion.intervalMs,
    pauseMs: config.ingestion.pauseMs,
  });

  const healthChecker = new HealthChecker();
  healthChecker.registerCheck('database', createDatabaseHealthCheck(db));
  healthChecker.registerCheck('scheduler', createSchedulerHealthCheck(scheduler));

  return { config, db, registry, store, client, scheduler, healthChecker };
}
