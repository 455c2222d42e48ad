#!/usr/bin/env node
import { Command } from 'commander';
import { setTimeout as sleep } from 'timers/promises';
import { loadConfig, loadEnvFiles } from './config';
import { AppContext, createAppContext } from './context';
import { AccountRegistry, Database, importLegacyData, parseAccountSpec } from './data';
import { DashboardServer } from './monitoring';
import { logger, handleError, errorMessage } from './utils';

type CliOptions = {
  addUser?: string;
  importLegacy?: string;
};

class StatsTracker {
  private context: AppContext;
  private dashboardServer: DashboardServer;
  private schedulerDone: Promise<void> | null = null;

  constructor(context: AppContext) {
    this.context = context;
    this.dashboardServer = new DashboardServer(context.store, context.healthChecker, {
      webDir: context.config.app.webDir,
    });
  }

  async start(): Promise<void> {
    await this.dashboardServer.start(this.context.config.app.port);

    this.schedulerDone = this.context.scheduler.start().catch((error) => {
      logger.error('System', 'Scheduler terminated unexpectedly', { error: errorMessage(error) });
    });

    logger.info('System', 'Tracker started');
  }

  async stop(): Promise<void> {
    logger.info('System', 'Stopping tracker...');
    this.context.scheduler.stop();

    const graceMs = this.context.config.app.shutdownGraceMs;
    const stopped = Promise.all([this.schedulerDone, this.dashboardServer.stop()]).then(() => 'stopped' as const);
    const outcome = await Promise.race([stopped, sleep(graceMs, 'timeout' as const, { ref: false })]);
    if (outcome === 'timeout') {
      logger.warn('System', `Shutdown did not finish within ${graceMs}ms, closing anyway`);
    }

    await this.context.db.disconnect();
    logger.info('System', 'Tracker stopped');
  }
}

function buildProgram(): Command {
  return new Command()
    .name('ncore-stats')
    .description('Track ncore profile statistics and serve their history')
    .option('--add-user <entry>', "Add a new user. Provide as 'DisplayName,ProfileID'")
    .option('--import-legacy <dir>', 'Import profiles.json and data.json from a directory, then exit');
}

async function withDatabase(db: Database, work: () => Promise<void>): Promise<void> {
  try {
    await work();
  } finally {
    await db.disconnect();
  }
}

async function main(argv: string[]): Promise<void> {
  const options = buildProgram().parse(argv).opts<CliOptions>();

  loadEnvFiles();
  const config = loadConfig();
  logger.setLevel(config.app.logLevel);
  logger.setJsonOutput(config.app.nodeEnv === 'production');
  logger.info('System', 'Application configuration loaded');

  // Validate administrative input before touching the database
  const newAccount = options.addUser !== undefined ? parseAccountSpec(options.addUser) : null;

  const db = new Database(config.database.url, { nodeEnv: config.app.nodeEnv });
  await db.connect();
  try {
    await db.migrate();
  } catch (error) {
    await db.disconnect();
    throw error;
  }

  if (newAccount) {
    await withDatabase(db, async () => {
      const account = await new AccountRegistry(db).add(newAccount.displayName, newAccount.remoteId);
      logger.audit('Add account', 'cli', { id: account.id, displayName: account.displayName });
    });
    return;
  }

  if (options.importLegacy !== undefined) {
    const dir = options.importLegacy;
    await withDatabase(db, async () => {
      const result = await importLegacyData(db, dir);
      logger.audit('Import legacy data', 'cli', { dir, ...result });
    });
    return;
  }

  const tracker = new StatsTracker(createAppContext(config, db));

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info('System', `Received ${signal}, shutting down...`);
    tracker.stop().then(
      () => process.exit(0),
      (error) => {
        logger.error('System', 'Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await tracker.start();
}

main(process.argv).catch((error) => {
  logger.error('System', 'Fatal error', handleError(error).toJSON());
  process.exit(1);
});
