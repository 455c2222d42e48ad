import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { Snapshot } from '../types';
import { logger, ValidationError, formatIssues } from '../utils';
import { AccountRegistry } from './account-registry';
import { Database } from './database';
import { SnapshotStore } from './snapshot-store';

export const LEGACY_PROFILES_FILE = 'profiles.json';
export const LEGACY_HISTORY_FILE = 'data.json';

// profiles.json: { "<display name>": "<profile id>" }
const legacyProfilesSchema = z.record(z.string().min(1), z.string().min(1));

// data.json: the same record shape the API serves
const legacyHistorySchema = z.array(
  z.object({
    owner: z.string(),
    timestamp: z.coerce.date(),
    rank: z.number().int().default(0),
    upload: z.string().default(''),
    current_upload: z.string().default(''),
    current_download: z.string().default(''),
    points: z.number().int().default(0),
    seeding_count: z.number().int().default(0),
  })
);

export interface ImportResult {
  accounts: number;
  snapshots: number;
  skipped: number;
}

async function readJson<T extends z.ZodTypeAny>(path: string, schema: T): Promise<z.infer<T>> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`Invalid legacy file ${path}`, path, { issues: formatIssues(result.error) });
  }
  return result.data;
}

/**
 * Loads the JSON files kept before the relational store existed. Everything
 * happens in one transaction: a single failed insert leaves the store untouched.
 */
export async function importLegacyData(db: Database, dir: string): Promise<ImportResult> {
  const profiles = await readJson(join(dir, LEGACY_PROFILES_FILE), legacyProfilesSchema);
  const history = await readJson(join(dir, LEGACY_HISTORY_FILE), legacyHistorySchema);

  const result = await db.transaction(async (tx) => {
    const registry = new AccountRegistry(tx);
    const store = new SnapshotStore(tx);
    const idsByName = new Map<string, number>();

    for (const [displayName, remoteId] of Object.entries(profiles)) {
      const account = await registry.add(displayName, remoteId);
      idsByName.set(displayName, account.id);
    }

    let snapshots = 0;
    let skipped = 0;
    for (const record of history) {
      const accountId = idsByName.get(record.owner);
      if (accountId === undefined) {
        logger.warn('Import', `Skipping history record for '${record.owner}': not found in ${LEGACY_PROFILES_FILE}`);
        skipped++;
        continue;
      }

      const snapshot: Snapshot = {
        owner: record.owner,
        recordedAt: record.timestamp,
        rank: record.rank,
        upload: record.upload,
        currentUpload: record.current_upload,
        currentDownload: record.current_download,
        points: record.points,
        seedingCount: record.seeding_count,
      };
      await store.append(snapshot, accountId);
      snapshots++;

      if (snapshots % 100 === 0) {
        logger.info('Import', `Imported ${snapshots} history records...`);
      }
    }

    return { accounts: idsByName.size, snapshots, skipped };
  });

  logger.info('Import', 'Legacy import completed', { ...result });
  return result;
}
