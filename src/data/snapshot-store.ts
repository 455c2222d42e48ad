import { Snapshot } from '../types';
import { logger, StorageError, errorMessage } from '../utils';
import { Queryable } from './database';

interface SnapshotRow {
  owner: string;
  recordedAt: Date | string;
  rank: number;
  upload: string;
  currentUpload: string;
  currentDownload: string;
  points: number;
  seedingCount: number;
}

const SNAPSHOT_COLUMNS = `
  a.display_name AS "owner", s.recorded_at AS "recordedAt", s.site_rank AS "rank", s.upload,
  s.current_upload AS "currentUpload", s.current_download AS "currentDownload",
  s.points, s.seeding_count AS "seedingCount"`;

// Newest row per account, derived from the history on every read. Rows sharing
// an account's newest timestamp collapse to the later insert (highest id).
const LATEST_PER_ACCOUNT_SQL = `
  SELECT ${SNAPSHOT_COLUMNS}
  FROM snapshots s
  INNER JOIN (
    SELECT tied.account_id, MAX(tied.id) AS latest_id
    FROM snapshots tied
    INNER JOIN (
      SELECT account_id, MAX(recorded_at) AS max_recorded_at
      FROM snapshots
      GROUP BY account_id
    ) newest ON newest.account_id = tied.account_id AND newest.max_recorded_at = tied.recorded_at
    GROUP BY tied.account_id
  ) latest ON latest.latest_id = s.id
  INNER JOIN accounts a ON a.id = s.account_id
  ORDER BY a.display_name ASC`;

const HISTORY_SQL = `
  SELECT ${SNAPSHOT_COLUMNS}
  FROM snapshots s
  INNER JOIN accounts a ON a.id = s.account_id
  WHERE a.display_name = $1
  ORDER BY s.recorded_at ASC, s.id ASC`;

function toSnapshot(row: SnapshotRow): Snapshot {
  return {
    owner: row.owner,
    recordedAt: new Date(row.recordedAt),
    rank: Number(row.rank),
    upload: row.upload,
    currentUpload: row.currentUpload,
    currentDownload: row.currentDownload,
    points: Number(row.points),
    seedingCount: Number(row.seedingCount),
  };
}

/** Append-only profile history plus the two read paths served to the dashboard. */
export class SnapshotStore {
  private db: Queryable;

  constructor(db: Queryable) {
    this.db = db;
  }

  async append(snapshot: Snapshot, accountId: number): Promise<void> {
    try {
      await this.db.query(
        `INSERT INTO snapshots (account_id, recorded_at, site_rank, upload, current_upload, current_download, points, seeding_count)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
        [
          accountId,
          snapshot.recordedAt,
          snapshot.rank,
          snapshot.upload,
          snapshot.currentUpload,
          snapshot.currentDownload,
          snapshot.points,
          snapshot.seedingCount,
        ]
      );
    } catch (error) {
      throw new StorageError(`Failed to append snapshot for ${snapshot.owner}`, {
        owner: snapshot.owner,
        accountId,
        error: errorMessage(error),
      });
    }
    logger.debug('SnapshotStore', `Snapshot for ${snapshot.owner} stored`, { accountId });
  }

  /** Exactly one snapshot per account that has any; accounts without history are absent. */
  async latestPerAccount(): Promise<Snapshot[]> {
    try {
      const result = await this.db.query<SnapshotRow>(LATEST_PER_ACCOUNT_SQL);
      return result.rows.map(toSnapshot);
    } catch (error) {
      throw new StorageError('Failed to read latest snapshots', { error: errorMessage(error) });
    }
  }

  /**
   * Full history for one account, oldest first. Unknown names and accounts
   * without data both yield an empty list.
   */
  async historyFor(displayName: string): Promise<Snapshot[]> {
    try {
      const result = await this.db.query<SnapshotRow>(HISTORY_SQL, [displayName]);
      return result.rows.map(toSnapshot);
    } catch (error) {
      throw new StorageError(`Failed to read history for ${displayName}`, { displayName, error: errorMessage(error) });
    }
  }
}
