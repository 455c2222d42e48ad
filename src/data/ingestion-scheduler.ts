import { EventEmitter } from 'events';
import { setTimeout as sleep } from 'timers/promises';
import type { CheerioAPI } from 'cheerio';
import { extractProfile } from '../ncore';
import { Account, CycleSummary, Snapshot } from '../types';
import { logger, SourceFetchError, StorageError, errorMessage } from '../utils';

export interface AccountSource {
  list(): Promise<Account[]>;
}

export interface ProfileSource {
  fetch(account: Account): Promise<CheerioAPI>;
}

export interface SnapshotSink {
  append(snapshot: Snapshot, accountId: number): Promise<void>;
}

export interface IngestionSchedulerOptions {
  intervalMs: number;
  pauseMs: number;
  // Clock for snapshot timestamps
  now?: () => Date;
}

export interface SchedulerStatus {
  running: boolean;
  lastCycle: CycleSummary | null;
}

/**
 * Single writer of the snapshot history. Runs a cycle right away, then one
 * per interval; accounts are processed one at a time with a short pause in
 * between. Cancellation is observed while sleeping and between accounts.
 *
 * Events: `snapshot` (Snapshot) after each append, `cycleComplete` (CycleSummary).
 */
export class IngestionScheduler extends EventEmitter {
  private registry: AccountSource;
  private client: ProfileSource;
  private store: SnapshotSink;
  private intervalMs: number;
  private pauseMs: number;
  private now: () => Date;
  private controller: AbortController | null = null;
  private lastCycle: CycleSummary | null = null;

  constructor(registry: AccountSource, client: ProfileSource, store: SnapshotSink, options: IngestionSchedulerOptions) {
    super();
    this.registry = registry;
    this.client = client;
    this.store = store;
    this.intervalMs = options.intervalMs;
    this.pauseMs = options.pauseMs;
    this.now = options.now ?? (() => new Date());
  }

  /** Resolves once the loop has been cancelled, through `signal` or `stop()`. */
  async start(signal?: AbortSignal): Promise<void> {
    if (this.controller) {
      logger.warn('Scheduler', 'Scheduler already running');
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    const onAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    logger.info('Scheduler', 'Starting background profile fetcher', {
      intervalMs: this.intervalMs,
      pauseMs: this.pauseMs,
    });

    try {
      while (!controller.signal.aborted) {
        await this.runCycle(controller.signal);
        if (!(await this.pause(this.intervalMs, controller.signal))) {
          break;
        }
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.controller = null;
      logger.info('Scheduler', 'Stopping background profile fetcher');
    }
  }

  stop(): void {
    this.controller?.abort();
  }

  getStatus(): SchedulerStatus {
    return { running: this.controller !== null, lastCycle: this.lastCycle };
  }

  async runCycle(signal?: AbortSignal): Promise<CycleSummary> {
    const summary: CycleSummary = {
      startedAt: new Date(),
      finishedAt: new Date(),
      accounts: 0,
      succeeded: 0,
      failed: 0,
      cancelled: false,
    };

    let accounts: Account[];
    try {
      accounts = await this.registry.list();
    } catch (error) {
      logger.error('Scheduler', 'Could not get accounts to fetch', { error: errorMessage(error) });
      return this.finishCycle(summary);
    }

    if (accounts.length === 0) {
      logger.info('Scheduler', 'No accounts in database to fetch. Use --add-user to add one.');
      return this.finishCycle(summary);
    }

    summary.accounts = accounts.length;
    logger.info('Scheduler', `Starting profile fetch for ${accounts.length} account(s)`);

    for (const [index, account] of accounts.entries()) {
      // The in-flight account always finishes; cancellation is honoured between accounts
      const proceed = !signal?.aborted && (index === 0 || (await this.pause(this.pauseMs, signal)));
      if (!proceed) {
        summary.cancelled = true;
        logger.info('Scheduler', 'Cycle cancelled', { remaining: accounts.length - index });
        break;
      }

      if (await this.ingest(account)) {
        summary.succeeded++;
      } else {
        summary.failed++;
      }
    }

    return this.finishCycle(summary);
  }

  private async ingest(account: Account): Promise<boolean> {
    let snapshot: Snapshot;
    try {
      const document = await this.client.fetch(account);
      snapshot = extractProfile(document, account.displayName, this.now());
      await this.store.append(snapshot, account.id);
    } catch (error) {
      const stage = error instanceof SourceFetchError ? 'fetch' : error instanceof StorageError ? 'store' : 'ingest';
      logger.error('Scheduler', `Error processing profile for ${account.displayName}`, {
        stage,
        error: errorMessage(error),
      });
      return false;
    }

    logger.info('Scheduler', `Profile for ${account.displayName} logged`, {
      rank: snapshot.rank,
      points: snapshot.points,
      seedingCount: snapshot.seedingCount,
    });
    this.notify('snapshot', snapshot);
    return true;
  }

  // Listener failures are reported but never undo or fail the stored work
  private notify(event: 'snapshot' | 'cycleComplete', payload: Snapshot | CycleSummary): void {
    try {
      this.emit(event, payload);
    } catch (error) {
      logger.error('Scheduler', `A '${event}' listener failed`, { error: errorMessage(error) });
    }
  }

  /** Sleeps `ms`; false when the signal fired first. */
  private async pause(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return false;
    }
    try {
      await sleep(ms, undefined, { signal });
      return true;
    } catch (error) {
      if (signal?.aborted) {
        return false;
      }
      throw error;
    }
  }

  private finishCycle(summary: CycleSummary): CycleSummary {
    summary.finishedAt = new Date();
    this.lastCycle = summary;
    logger.info('Scheduler', 'Profile fetch cycle complete', {
      accounts: summary.accounts,
      succeeded: summary.succeeded,
      failed: summary.failed,
      cancelled: summary.cancelled,
    });
    this.notify('cycleComplete', summary);
    return summary;
  }
}
