import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { AccountRegistry } from '../src/data/account-registry';
import { Database } from '../src/data/database';
import { SnapshotStore } from '../src/data/snapshot-store';
import { emptySnapshot } from '../src/ncore/field-extractor';
import { Account, Snapshot } from '../src/types';
import { StorageError } from '../src/utils/errors';
import { createTestDatabase } from './helpers/test-database';

function at(iso: string): Date {
  return new Date(iso);
}

function snapshot(owner: string, recordedAt: Date, points: number): Snapshot {
  return { ...emptySnapshot(owner, recordedAt), points };
}

// Small deterministic generator so the randomized histories are reproducible
function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };
}

describe('SnapshotStore', () => {
  let db: Database;
  let registry: AccountRegistry;
  let store: SnapshotStore;
  let alice: Account;
  let bob: Account;

  beforeEach(async () => {
    db = await createTestDatabase();
    registry = new AccountRegistry(db);
    store = new SnapshotStore(db);
    alice = await registry.add('Alice', '111');
    bob = await registry.add('Bob', '222');
  });

  afterEach(async () => {
    await db.disconnect();
  });

  describe('latestPerAccount', () => {
    it('should be empty before anything is recorded', async () => {
      expect(await store.latestPerAccount()).toEqual([]);
    });

    it('should leave out accounts without snapshots', async () => {
      await store.append(snapshot('Alice', at('2024-05-01T10:00:00Z'), 10), alice.id);

      const latest = await store.latestPerAccount();

      expect(latest.map((s) => s.owner)).toEqual(['Alice']);
    });

    it('should pick the newest timestamp even when inserted out of order', async () => {
      await store.append(snapshot('Alice', at('2024-05-03T10:00:00Z'), 30), alice.id);
      await store.append(snapshot('Alice', at('2024-05-01T10:00:00Z'), 10), alice.id);
      await store.append(snapshot('Bob', at('2024-05-02T10:00:00Z'), 20), bob.id);

      const latest = await store.latestPerAccount();

      expect(latest).toEqual([
        snapshot('Alice', at('2024-05-03T10:00:00Z'), 30),
        snapshot('Bob', at('2024-05-02T10:00:00Z'), 20),
      ]);
    });

    it('should resolve a timestamp tie in favour of the later insert', async () => {
      const time = at('2024-05-01T10:00:00Z');
      await store.append(snapshot('Alice', time, 1), alice.id);
      await store.append(snapshot('Alice', time, 2), alice.id);

      const latest = await store.latestPerAccount();

      expect(latest).toHaveLength(1);
      expect(latest[0].points).toBe(2);
    });

    it('should return the maximum-timestamp snapshot for every account with history', async () => {
      const random = lcg(7);
      const base = Date.parse('2024-01-01T00:00:00Z');
      const accounts = [alice, bob, await registry.add('Carol', '333')];
      const expected = new Map<string, Snapshot>();

      for (let i = 0; i < 40; i++) {
        const account = accounts[Math.floor(random() * accounts.length)];
        // Whole hours over ten days, so collisions happen now and then
        const recordedAt = new Date(base + Math.floor(random() * 240) * 3600000);
        const entry = snapshot(account.displayName, recordedAt, i);
        await store.append(entry, account.id);

        const current = expected.get(account.displayName);
        if (!current || current.recordedAt.getTime() <= recordedAt.getTime()) {
          expected.set(account.displayName, entry);
        }
      }

      const latest = await store.latestPerAccount();
      const wanted = [...expected.values()].sort((a, b) => a.owner.localeCompare(b.owner));

      expect(latest).toEqual(wanted);
    });
  });

  describe('historyFor', () => {
    it('should return every snapshot of one account, oldest first', async () => {
      await store.append(snapshot('Alice', at('2024-05-02T10:00:00Z'), 2), alice.id);
      await store.append(snapshot('Bob', at('2024-05-01T12:00:00Z'), 99), bob.id);
      await store.append(snapshot('Alice', at('2024-05-01T10:00:00Z'), 1), alice.id);
      await store.append(snapshot('Alice', at('2024-05-03T10:00:00Z'), 3), alice.id);

      const history = await store.historyFor('Alice');

      expect(history).toEqual([
        snapshot('Alice', at('2024-05-01T10:00:00Z'), 1),
        snapshot('Alice', at('2024-05-02T10:00:00Z'), 2),
        snapshot('Alice', at('2024-05-03T10:00:00Z'), 3),
      ]);
    });

    it('should return an empty list for an account without snapshots', async () => {
      expect(await store.historyFor('Bob')).toEqual([]);
    });

    it('should return an empty list for an unknown name', async () => {
      expect(await store.historyFor('Mallory')).toEqual([]);
    });
  });

  describe('account removal', () => {
    it('should drop the history of a deleted account', async () => {
      await store.append(snapshot('Alice', at('2024-05-01T10:00:00Z'), 1), alice.id);
      await store.append(snapshot('Alice', at('2024-05-02T10:00:00Z'), 2), alice.id);
      await store.append(snapshot('Bob', at('2024-05-01T10:00:00Z'), 3), bob.id);

      await db.query('DELETE FROM accounts WHERE id = $1', [alice.id]);

      const orphans = await db.query<{ id: number }>('SELECT id FROM snapshots WHERE account_id = $1', [alice.id]);
      expect(orphans.rows).toEqual([]);
      expect(await store.historyFor('Alice')).toEqual([]);
      expect(await store.latestPerAccount()).toEqual([snapshot('Bob', at('2024-05-01T10:00:00Z'), 3)]);
    });
  });

  describe('append', () => {
    it('should keep every field as recorded', async () => {
      const full: Snapshot = {
        owner: 'Alice',
        recordedAt: at('2024-05-01T10:00:00.123Z'),
        rank: 42,
        upload: '12.34 TiB',
        currentUpload: '1.50 GiB',
        currentDownload: '300.00 MiB',
        points: 1234567,
        seedingCount: 12,
      };

      await store.append(full, alice.id);

      expect(await store.historyFor('Alice')).toEqual([full]);
    });

    it('should reject a snapshot for an account that does not exist', async () => {
      await expect(store.append(snapshot('Ghost', at('2024-05-01T10:00:00Z'), 1), 9999))
        .rejects.toBeInstanceOf(StorageError);
    });
  });
});
